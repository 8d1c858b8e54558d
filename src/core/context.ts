/**
 * Toolkit context
 * Collaborators shared by one command invocation
 */

import path from 'path';
import { AUTH, PATHS } from '../utils/constants';
import { AuditLog } from './audit-log';
import { DelegatedAuthProvider } from './auth';
import { CertificateGenerator, CertificateStore } from './certificates';
import { SessionConnector } from './session';
import { SecretVault } from './vault';

export interface ToolkitContext {
  audit: AuditLog;
  sessions: SessionConnector;
  certificates: CertificateStore;
  vault: SecretVault;
  env: NodeJS.ProcessEnv;
  grantDelayMs?: number;
  generateCertificate?: CertificateGenerator;
}

/**
 * Wire the default collaborators: device-code sign-in, on-disk certificate store and vault
 */
export function createToolkitContext(options?: {
  audit?: AuditLog;
  onDeviceCode?: (message: string) => void;
}): ToolkitContext {
  const audit = options?.audit || new AuditLog();
  const cacheFile = path.resolve(PATHS.DATA_DIR, PATHS.MSAL_CACHE_FILE);

  const sessions = new SessionConnector({
    graphAuth: new DelegatedAuthProvider({
      clientId: AUTH.GRAPH_CLIENT_ID,
      cacheFile,
      onDeviceCode: options?.onDeviceCode,
    }),
    exchangeAuth: new DelegatedAuthProvider({
      clientId: AUTH.EXCHANGE_CLIENT_ID,
      cacheFile: cacheFile.replace(/\.json$/, '.exo.json'),
      onDeviceCode: options?.onDeviceCode,
    }),
    audit,
  });

  return {
    audit,
    sessions,
    certificates: new CertificateStore(),
    vault: new SecretVault(),
    env: process.env,
  };
}
