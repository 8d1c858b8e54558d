/**
 * Session Connector
 * Establishes or reuses operator sessions to Graph and Exchange Online
 */

import { AccessToken, TokenProvider } from './auth';
import { AuditLog } from './audit-log';
import { DirectoryApi, GraphClient, MailApi } from './graph';
import { ExchangeApi, ExchangeOnlineClient } from './exchange';
import { EXCHANGE_API } from '../utils/constants';
import { errorMessage } from '../utils/errors';

export type GraphApi = DirectoryApi & MailApi;

export interface GraphSession {
  client: GraphApi;
  tenantId: string;
  account: string;
  scopes: string[];
}

export interface ExchangeSession {
  client: ExchangeApi;
  tenantId: string;
  organization: string;
}

export interface SessionConnectorOptions {
  graphAuth: TokenProvider;
  exchangeAuth: TokenProvider;
  audit: AuditLog;
  createGraphClient?: (token: AccessToken) => GraphApi;
  createExchangeClient?: (token: AccessToken) => ExchangeApi;
}

/**
 * Strip the resource prefix and case so "https://graph.microsoft.com/User.Read" matches "user.read"
 */
export function normalizeScope(scope: string): string {
  const slash = scope.lastIndexOf('/');
  return (slash >= 0 ? scope.slice(slash + 1) : scope).toLowerCase();
}

export function missingScopes(requested: string[], granted: string[]): string[] {
  const have = new Set(granted.map(normalizeScope));
  return requested.filter((s) => !have.has(normalizeScope(s)));
}

export class SessionConnector {
  private graphAuth: TokenProvider;
  private exchangeAuth: TokenProvider;
  private audit: AuditLog;
  private createGraphClient: (token: AccessToken) => GraphApi;
  private createExchangeClient: (token: AccessToken) => ExchangeApi;
  private graphSession: GraphSession | null = null;
  private exchangeSession: ExchangeSession | null = null;

  constructor(options: SessionConnectorOptions) {
    this.graphAuth = options.graphAuth;
    this.exchangeAuth = options.exchangeAuth;
    this.audit = options.audit;
    this.createGraphClient =
      options.createGraphClient || ((token) => new GraphClient(token.accessToken));
    this.createExchangeClient =
      options.createExchangeClient ||
      ((token) => new ExchangeOnlineClient(token.accessToken, token.tenantId));
  }

  /**
   * Reuse the current Graph session when it still answers and holds every requested scope
   */
  async connectGraph(scopes: string[]): Promise<GraphSession> {
    return this.audit.track('SessionConnector.connectGraph', async () => {
      const current = this.graphSession;
      if (current) {
        const missing = await this.probeGraph(current, scopes);
        if (missing && missing.length === 0) {
          this.audit.log(`Reusing Graph session for ${current.account}`, 'Verbose');
          return current;
        }
        if (missing) {
          this.audit.log(`Graph session is missing scopes: ${missing.join(', ')}. Reconnecting.`, 'Warning');
        }
        this.graphSession = null;
      }

      const token = await this.graphAuth.acquire(scopes);
      const client = this.createGraphClient(token);
      const org = await client.getOrganization();

      const session: GraphSession = {
        client,
        tenantId: org.id || token.tenantId,
        account: token.account,
        scopes: token.scopes,
      };
      this.graphSession = session;
      this.audit.log(`Connected to Graph as ${session.account} (tenant ${session.tenantId})`);
      return session;
    });
  }

  /**
   * Any answering Exchange session is reused; there is no scope check
   */
  async connectExchange(): Promise<ExchangeSession> {
    return this.audit.track('SessionConnector.connectExchange', async () => {
      const current = this.exchangeSession;
      if (current) {
        try {
          await current.client.getOrganizationConfig();
          this.audit.log(`Reusing Exchange Online session for ${current.organization}`, 'Verbose');
          return current;
        } catch (error) {
          this.audit.log(`Exchange Online session probe failed: ${errorMessage(error)}`, 'Verbose');
          this.exchangeSession = null;
        }
      }

      const token = await this.exchangeAuth.acquire(EXCHANGE_API.SCOPES);
      const client = this.createExchangeClient(token);
      const org = await client.getOrganizationConfig();

      const session: ExchangeSession = {
        client,
        tenantId: token.tenantId,
        organization: org.name,
      };
      this.exchangeSession = session;
      this.audit.log(`Connected to Exchange Online (${session.organization})`);
      return session;
    });
  }

  async disconnect(): Promise<void> {
    this.graphSession = null;
    this.exchangeSession = null;
    await this.graphAuth.signOut();
    await this.exchangeAuth.signOut();
    this.audit.log('Signed out of Graph and Exchange Online');
  }

  /**
   * Missing scopes for a live session, or null when the probe fails
   */
  private async probeGraph(session: GraphSession, scopes: string[]): Promise<string[] | null> {
    try {
      await session.client.getOrganization();
    } catch (error) {
      this.audit.log(`Graph session probe failed: ${errorMessage(error)}`, 'Verbose');
      return null;
    }
    return missingScopes(scopes, session.scopes);
  }
}
