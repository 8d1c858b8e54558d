/**
 * Input patterns shared by the CLI and the core
 */

import { ValidationError } from './errors';

export const PATTERNS = {
  APP_PREFIX: /^[A-Z0-9]{2,4}$/,
  GUID: /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,
  THUMBPRINT: /^[A-Fa-f0-9]{40}$/,
  EMAIL: /^[^@\s]+@[^@\s]+\.[^@\s]+$/,
  MAIL_ALIAS: /^[A-Za-z0-9._-]{1,64}$/,
};

export function assertAppPrefix(prefix: string, field: string = 'prefix'): void {
  if (!PATTERNS.APP_PREFIX.test(prefix)) {
    throw new ValidationError(
      `Invalid ${field} "${prefix}": expected 2-4 upper-case letters or digits`,
      { field, value: prefix }
    );
  }
}

export function assertGuid(value: string, field: string): void {
  if (!PATTERNS.GUID.test(value)) {
    throw new ValidationError(`Invalid ${field} format (expected GUID): ${value}`, {
      field,
      value,
    });
  }
}

export function assertEmail(value: string, field: string): void {
  if (!PATTERNS.EMAIL.test(value)) {
    throw new ValidationError(`Invalid ${field} format (expected email address): ${value}`, {
      field,
      value,
    });
  }
}

/**
 * Validate a certificate thumbprint and return its canonical upper-case form
 */
export function normalizeThumbprint(value: string): string {
  if (!PATTERNS.THUMBPRINT.test(value)) {
    throw new ValidationError(
      `Invalid certificate thumbprint "${value}": expected 40 hexadecimal characters`,
      { field: 'thumbprint', value }
    );
  }
  return value.toUpperCase();
}
