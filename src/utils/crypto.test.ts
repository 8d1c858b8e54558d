import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors';
import { decrypt, encrypt, isEncrypted } from './crypto';

describe('crypto', () => {
  it('round-trips a value through a fresh IV each time', () => {
    const first = encrypt('test-secret');
    const second = encrypt('test-secret');

    expect(first).not.toBe(second);
    expect(isEncrypted(first)).toBe(true);
    expect(decrypt(first)).toBe('test-secret');
  });

  it('rejects plain text', () => {
    expect(isEncrypted('{"accessToken":"x"}')).toBe(false);
    expect(() => decrypt('plain')).toThrow(ValidationError);
  });

  it('detects tampering', () => {
    const sealed = encrypt('test-secret');
    const parts = sealed.split('.');
    const data = Buffer.from(parts[3], 'base64url');
    data[0] = data[0] ^ 0xff;
    parts[3] = data.toString('base64url');

    expect(() => decrypt(parts.join('.'))).toThrow();
  });
});
