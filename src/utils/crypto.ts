/**
 * Encryption for values kept on disk: vault secrets, certificate private keys and the MSAL cache
 */

import crypto from 'crypto';
import os from 'os';
import { ValidationError } from './errors';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const FORMAT_TAG = 'gtk1';

let machineKey: Buffer | undefined;

// Derived once per process
function getMachineKey(): Buffer {
  if (!machineKey) {
    const machineId = `${os.hostname()}-${os.platform()}-${os.arch()}`;
    machineKey = crypto.scryptSync(machineId, 'graphtoolkit-salt', 32);
  }
  return machineKey;
}

/**
 * Encrypt to "gtk1.<iv>.<tag>.<data>", each part base64url encoded
 */
export function encrypt(plaintext: string): string {
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, getMachineKey(), iv);
  const data = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

  return [FORMAT_TAG, iv, cipher.getAuthTag(), data]
    .map((part) => (typeof part === 'string' ? part : part.toString('base64url')))
    .join('.');
}

export function decrypt(sealed: string): string {
  if (!isEncrypted(sealed)) {
    throw new ValidationError('Value is not in the toolkit encrypted format');
  }

  const [, ivText, tagText, dataText] = sealed.split('.');
  const decipher = crypto.createDecipheriv(ALGORITHM, getMachineKey(), Buffer.from(ivText, 'base64url'));
  decipher.setAuthTag(Buffer.from(tagText, 'base64url'));

  return Buffer.concat([decipher.update(Buffer.from(dataText, 'base64url')), decipher.final()]).toString(
    'utf8'
  );
}

export function isEncrypted(value: string): boolean {
  const parts = value.split('.');
  return parts.length === 4 && parts[0] === FORMAT_TAG && parts.slice(1, 3).every((p) => p.length > 0);
}
