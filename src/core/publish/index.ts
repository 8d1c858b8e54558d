export * from './base';
export * from './email';
export * from './audit';
export * from './mem';
