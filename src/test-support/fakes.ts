/**
 * In-process stand-ins for Graph, Exchange Online and MSAL used by the tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import winston from 'winston';
import {
  AcceptedDomain,
  AccessCheckResult,
  Application,
  ApplicationAccessPolicy,
  DirectoryRole,
  DirectoryUser,
  DistributionGroup,
  KeyCredential,
  NewApplication,
  OAuth2PermissionGrant,
  Organization,
  OutgoingMessage,
  ServicePrincipal,
} from '../types';
import { RESOURCE_APPS } from '../utils/constants';
import { AuditLog } from '../core/audit-log';
import { AccessToken, AppTokenSource, CertificateCredentials, TokenProvider } from '../core/auth';
import { CertificateStore, createCertificateGenerator } from '../core/certificates';
import { ToolkitContext } from '../core/context';
import {
  ExchangeApi,
  ExchangeOrganization,
  NewApplicationAccessPolicyRequest,
  NewDistributionGroupRequest,
} from '../core/exchange';
import { GraphApi, SessionConnector } from '../core/session';
import { SecretVault } from '../core/vault';

export const TENANT_ID = '11111111-2222-3333-4444-555555555555';

export const GRAPH_ROLES = [
  { id: '12345', value: 'Mail.Send' },
  { id: 'role-audit-log', value: 'AuditLog.Read.All' },
  { id: 'role-directory', value: 'Directory.Read.All' },
  { id: 'role-group-read', value: 'Group.Read.All' },
  { id: 'role-device-read', value: 'DeviceManagementManagedDevices.Read.All' },
  { id: 'role-device-rw', value: 'DeviceManagementManagedDevices.ReadWrite.All' },
];

export function silentLogger(): winston.Logger {
  return winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });
}

export function testAudit(): AuditLog {
  return new AuditLog({ sink: silentLogger() });
}

export function tempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `graphtoolkit-${label}-`));
}

// Small keys keep certificate generation fast
export const fastCertificateGenerator = createCertificateGenerator({ keyBits: 512 });

export class FakeDirectory implements GraphApi {
  users: DirectoryUser[] = [];
  applications: Application[] = [];
  servicePrincipals: ServicePrincipal[] = [
    {
      id: 'sp-graph',
      appId: RESOURCE_APPS.GRAPH,
      displayName: 'Microsoft Graph',
      appRoles: GRAPH_ROLES.map((r) => ({ ...r, allowedMemberTypes: ['Application'] })),
    },
    { id: 'sp-sharepoint', appId: RESOURCE_APPS.SHAREPOINT, displayName: 'Office 365 SharePoint Online' },
    { id: 'sp-exchange', appId: RESOURCE_APPS.EXCHANGE, displayName: 'Office 365 Exchange Online' },
  ];
  roles: DirectoryRole[] = [];
  roleMembers: Array<{ roleId: string; memberId: string }> = [];
  grants: OAuth2PermissionGrant[] = [];
  sentMail: Array<{ from: string; message: OutgoingMessage; saveToSentItems: boolean }> = [];
  keyCredentialUpdates: Array<{ objectId: string; keyCredentials: KeyCredential[] }> = [];
  organizationCalls = 0;
  failOrganization = false;
  private counter = 0;

  async getOrganization(): Promise<Organization> {
    this.organizationCalls += 1;
    if (this.failOrganization) {
      throw new Error('session expired');
    }
    return { id: TENANT_ID, displayName: 'Contoso' };
  }

  async getServicePrincipalByDisplayName(displayName: string): Promise<ServicePrincipal | null> {
    return this.servicePrincipals.find((sp) => sp.displayName === displayName) || null;
  }

  async getServicePrincipalByAppId(appId: string): Promise<ServicePrincipal | null> {
    return this.servicePrincipals.find((sp) => sp.appId === appId) || null;
  }

  async createServicePrincipal(appId: string): Promise<ServicePrincipal> {
    const app = this.applications.find((a) => a.appId === appId);
    const sp: ServicePrincipal = { id: this.nextId('sp'), appId, displayName: app ? app.displayName : appId };
    this.servicePrincipals.push(sp);
    return sp;
  }

  async createApplication(app: NewApplication): Promise<Application> {
    const created: Application = {
      id: this.nextGuid(),
      appId: this.nextGuid(),
      displayName: app.displayName,
      notes: app.notes,
      keyCredentials: app.keyCredentials,
      requiredResourceAccess: app.requiredResourceAccess,
    };
    this.applications.push(created);
    return created;
  }

  async getApplication(objectId: string): Promise<Application | null> {
    return this.applications.find((a) => a.id === objectId) || null;
  }

  async updateApplicationKeyCredentials(objectId: string, keyCredentials: KeyCredential[]): Promise<void> {
    this.keyCredentialUpdates.push({ objectId, keyCredentials });
    const app = this.applications.find((a) => a.id === objectId);
    if (app) {
      app.keyCredentials = keyCredentials;
    }
  }

  async createOAuth2PermissionGrant(grant: OAuth2PermissionGrant): Promise<OAuth2PermissionGrant> {
    const created = { ...grant, id: this.nextId('grant') };
    this.grants.push(created);
    return created;
  }

  async getUser(idOrUserPrincipalName: string): Promise<DirectoryUser | null> {
    const wanted = idOrUserPrincipalName.toLowerCase();
    return (
      this.users.find((u) => u.id === idOrUserPrincipalName || u.userPrincipalName.toLowerCase() === wanted) ||
      null
    );
  }

  async getDirectoryRoleByTemplateId(roleTemplateId: string): Promise<DirectoryRole | null> {
    return this.roles.find((r) => r.roleTemplateId === roleTemplateId) || null;
  }

  async activateDirectoryRole(roleTemplateId: string): Promise<DirectoryRole> {
    const role: DirectoryRole = {
      id: this.nextId('role'),
      displayName: `Role ${roleTemplateId.slice(0, 8)}`,
      roleTemplateId,
    };
    this.roles.push(role);
    return role;
  }

  async addDirectoryRoleMember(roleId: string, directoryObjectId: string): Promise<void> {
    this.roleMembers.push({ roleId, memberId: directoryObjectId });
  }

  async sendMail(from: string, message: OutgoingMessage, saveToSentItems: boolean): Promise<void> {
    this.sentMail.push({ from, message, saveToSentItems });
  }

  private nextId(kind: string): string {
    this.counter += 1;
    return `${kind}-${this.counter}`;
  }

  private nextGuid(): string {
    this.counter += 1;
    return `00000000-0000-0000-0000-${String(this.counter).padStart(12, '0')}`;
  }
}

export class FakeExchange implements ExchangeApi {
  groups: DistributionGroup[] = [];
  members: Record<string, string[]> = {};
  domains: AcceptedDomain[] = [{ domainName: 'contoso.com', isDefault: true }];
  policies: NewApplicationAccessPolicyRequest[] = [];
  createdGroups: NewDistributionGroupRequest[] = [];
  accessVerdict: AccessCheckResult = 'Granted';
  organizationCalls = 0;

  async getOrganizationConfig(): Promise<ExchangeOrganization> {
    this.organizationCalls += 1;
    return { name: 'contoso.onmicrosoft.com', identity: 'contoso.onmicrosoft.com' };
  }

  async getAcceptedDomains(): Promise<AcceptedDomain[]> {
    return this.domains;
  }

  async getDistributionGroup(identity: string): Promise<DistributionGroup | null> {
    const wanted = identity.toLowerCase();
    return (
      this.groups.find(
        (g) => g.identity.toLowerCase() === wanted || g.primarySmtpAddress.toLowerCase() === wanted
      ) || null
    );
  }

  async newDistributionGroup(request: NewDistributionGroupRequest): Promise<DistributionGroup> {
    this.createdGroups.push(request);
    const group: DistributionGroup = {
      identity: request.name,
      name: request.name,
      alias: request.alias,
      primarySmtpAddress: request.primarySmtpAddress,
    };
    this.groups.push(group);
    return group;
  }

  async getDistributionGroupMembers(identity: string): Promise<string[]> {
    return this.members[identity] || [];
  }

  async addDistributionGroupMember(identity: string, member: string): Promise<void> {
    this.members[identity] = [...(this.members[identity] || []), member];
  }

  async newApplicationAccessPolicy(request: NewApplicationAccessPolicyRequest): Promise<ApplicationAccessPolicy> {
    this.policies.push(request);
    return {
      identity: `${TENANT_ID}\\${request.appId}`,
      appId: request.appId,
      scopeName: request.policyScopeGroupId,
      accessRight: request.accessRight,
      description: request.description,
    };
  }

  async testApplicationAccessPolicy(): Promise<AccessCheckResult> {
    return this.accessVerdict;
  }
}

export class FakeTokenProvider implements TokenProvider {
  acquired: string[][] = [];
  signedOut = false;
  grantedScopes?: string[];

  async acquire(scopes: string[]): Promise<AccessToken> {
    this.acquired.push(scopes);
    return {
      accessToken: 'test-token',
      scopes: this.grantedScopes || scopes,
      tenantId: TENANT_ID,
      account: 'admin@contoso.com',
      expiresOn: new Date(Date.now() + 3600 * 1000),
    };
  }

  async signOut(): Promise<void> {
    this.signedOut = true;
  }
}

export class FakeAppTokenSource implements AppTokenSource {
  requests: CertificateCredentials[] = [];

  async getAccessToken(credentials: CertificateCredentials): Promise<string> {
    this.requests.push(credentials);
    return 'test-app-token';
  }
}

export interface TestContext extends ToolkitContext {
  directory: FakeDirectory;
  exchange: FakeExchange;
  graphAuth: FakeTokenProvider;
  exchangeAuth: FakeTokenProvider;
}

export function createTestContext(env: NodeJS.ProcessEnv = {}): TestContext {
  const audit = testAudit();
  const directory = new FakeDirectory();
  const exchange = new FakeExchange();
  const graphAuth = new FakeTokenProvider();
  const exchangeAuth = new FakeTokenProvider();

  return {
    audit,
    sessions: new SessionConnector({
      graphAuth,
      exchangeAuth,
      audit,
      createGraphClient: () => directory,
      createExchangeClient: () => exchange,
    }),
    certificates: new CertificateStore(tempDir('certs')),
    vault: new SecretVault(':memory:'),
    env,
    grantDelayMs: 0,
    generateCertificate: fastCertificateGenerator,
    directory,
    exchange,
    graphAuth,
    exchangeAuth,
  };
}
