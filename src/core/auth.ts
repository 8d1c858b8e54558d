/**
 * Azure AD Authentication
 * Delegated operator sign-in and certificate-based app-only tokens via MSAL
 */

import fs from 'fs';
import path from 'path';
import {
  AccountInfo,
  AuthenticationResult,
  ConfidentialClientApplication,
  Configuration,
  ICachePlugin,
  InteractionRequiredAuthError,
  LogLevel,
  PublicClientApplication,
  TokenCacheContext,
} from '@azure/msal-node';
import { AUTH, GRAPH_API, LOGIN_BASE_URL, PATHS } from '../utils/constants';
import { decrypt, encrypt, isEncrypted } from '../utils/crypto';
import { UpstreamError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface AccessToken {
  accessToken: string;
  scopes: string[];
  tenantId: string;
  account: string;
  expiresOn: Date;
}

/**
 * Source of delegated tokens for an operator session
 */
export interface TokenProvider {
  acquire(scopes: string[]): Promise<AccessToken>;
  signOut(): Promise<void>;
}

const loggerOptions = {
  loggerCallback: (level: LogLevel, message: string) => {
    if (level <= LogLevel.Warning) {
      logger.debug(`MSAL: ${message}`);
    }
  },
  piiLoggingEnabled: false,
  logLevel: LogLevel.Warning,
};

/**
 * Persists the MSAL cache between runs, encrypted with the machine key
 */
export class FileCachePlugin implements ICachePlugin {
  private cacheFile: string;

  constructor(cacheFile: string) {
    this.cacheFile = cacheFile;
  }

  async beforeCacheAccess(cacheContext: TokenCacheContext): Promise<void> {
    if (!fs.existsSync(this.cacheFile)) {
      return;
    }
    const data = fs.readFileSync(this.cacheFile, 'utf-8');
    cacheContext.tokenCache.deserialize(isEncrypted(data) ? decrypt(data) : data);
  }

  async afterCacheAccess(cacheContext: TokenCacheContext): Promise<void> {
    if (!cacheContext.cacheHasChanged) {
      return;
    }
    const dir = path.dirname(this.cacheFile);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.cacheFile, encrypt(cacheContext.tokenCache.serialize()), { mode: 0o600 });
  }
}

function toAccessToken(result: AuthenticationResult): AccessToken {
  return {
    accessToken: result.accessToken,
    scopes: result.scopes,
    tenantId: result.tenantId,
    account: result.account ? result.account.username : '',
    expiresOn: result.expiresOn ? new Date(result.expiresOn) : new Date(Date.now() + 3600 * 1000),
  };
}

/**
 * Operator sign-in: silent from cache, device code otherwise
 */
export class DelegatedAuthProvider implements TokenProvider {
  private client: PublicClientApplication;
  private onDeviceCode: (message: string) => void;

  constructor(options: {
    clientId: string;
    tenant?: string;
    cacheFile?: string;
    onDeviceCode?: (message: string) => void;
  }) {
    const cacheFile =
      options.cacheFile || path.resolve(PATHS.DATA_DIR, PATHS.MSAL_CACHE_FILE);

    const config: Configuration = {
      auth: {
        clientId: options.clientId,
        authority: `${LOGIN_BASE_URL}/${options.tenant || AUTH.AUTHORITY_TENANT}`,
      },
      cache: { cachePlugin: new FileCachePlugin(cacheFile) },
      system: { loggerOptions },
    };

    this.client = new PublicClientApplication(config);
    this.onDeviceCode = options.onDeviceCode || ((message) => logger.warn(message));
  }

  async acquire(scopes: string[]): Promise<AccessToken> {
    const silent = await this.acquireSilent(scopes);
    if (silent) {
      return silent;
    }

    logger.debug(`Starting device code sign-in for ${scopes.join(', ')}`);
    const result = await this.client.acquireTokenByDeviceCode({
      scopes,
      deviceCodeCallback: (response) => this.onDeviceCode(response.message),
    });

    if (!result || !result.accessToken) {
      throw new UpstreamError('Failed to acquire access token');
    }
    return toAccessToken(result);
  }

  async signOut(): Promise<void> {
    const cache = this.client.getTokenCache();
    const accounts = await cache.getAllAccounts();
    for (const account of accounts) {
      await cache.removeAccount(account);
    }
  }

  private async acquireSilent(scopes: string[]): Promise<AccessToken | null> {
    const accounts: AccountInfo[] = await this.client.getTokenCache().getAllAccounts();
    const account = accounts[0];
    if (!account) {
      return null;
    }

    try {
      const result = await this.client.acquireTokenSilent({ account, scopes });
      return result && result.accessToken ? toAccessToken(result) : null;
    } catch (error) {
      if (error instanceof InteractionRequiredAuthError) {
        logger.debug(`Silent sign-in needs interaction: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}

export interface CertificateCredentials {
  tenantId: string;
  clientId: string;
  thumbprint: string;
  privateKey: string;
}

/**
 * Source of app-only Graph tokens for a published app
 */
export interface AppTokenSource {
  getAccessToken(credentials: CertificateCredentials): Promise<string>;
}

export class CertificateAuthManager implements AppTokenSource {
  private clients: Map<string, ConfidentialClientApplication> = new Map();
  private tokenCache: Map<string, { accessToken: string; expiresAt: Date }> = new Map();

  /**
   * Get or create MSAL client for an app registration
   */
  private getClient(credentials: CertificateCredentials): ConfidentialClientApplication {
    const cacheKey = `${credentials.tenantId}:${credentials.clientId}`;

    const existing = this.clients.get(cacheKey);
    if (existing) {
      return existing;
    }

    const config: Configuration = {
      auth: {
        clientId: credentials.clientId,
        authority: `${LOGIN_BASE_URL}/${credentials.tenantId}`,
        clientCertificate: {
          thumbprint: credentials.thumbprint,
          privateKey: credentials.privateKey,
        },
      },
      system: { loggerOptions },
    };

    const client = new ConfidentialClientApplication(config);
    this.clients.set(cacheKey, client);

    return client;
  }

  /**
   * Acquire access token using client credentials flow
   */
  async getAccessToken(credentials: CertificateCredentials): Promise<string> {
    const cacheKey = `${credentials.tenantId}:${credentials.clientId}`;

    const cached = this.tokenCache.get(cacheKey);
    if (cached && cached.expiresAt > new Date()) {
      logger.debug(`Using cached token for app ${credentials.clientId}`);
      return cached.accessToken;
    }

    const client = this.getClient(credentials);

    try {
      const result = await client.acquireTokenByClientCredential({
        scopes: GRAPH_API.SCOPES,
      });

      if (!result || !result.accessToken) {
        throw new UpstreamError('Failed to acquire access token');
      }

      const expiresAt = result.expiresOn || new Date(Date.now() + 3600 * 1000);
      this.tokenCache.set(cacheKey, {
        accessToken: result.accessToken,
        expiresAt: new Date(expiresAt),
      });

      logger.info(`Acquired app-only token for ${credentials.clientId} (expires: ${expiresAt})`);
      return result.accessToken;
    } catch (error) {
      logger.error(`Failed to acquire token for app ${credentials.clientId}: ${errorMessage(error)}`);
      throw error;
    }
  }
}
