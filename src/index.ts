/**
 * graphtoolkit - Entra ID app registration automation for Graph mail, audit and endpoint management
 */

export * from './types';
export * from './core';
export * from './utils/constants';
export * from './utils/errors';
export * from './utils/logger';
