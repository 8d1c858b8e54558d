/**
 * graphtoolkit Core Types
 */

// ============================================================================
// Certificates
// ============================================================================

export type KeyExportPolicy = 'Exportable' | 'NonExportable';

export type StoreLocation = 'CurrentUser' | 'LocalMachine';

export interface CertificateDescriptor {
  thumbprint: string;
  subjectName: string;
  notBefore: string;
  expiryTimestamp: string;
  exportPolicy: KeyExportPolicy;
  storeLocation: StoreLocation;
}

export interface StoredCertificate extends CertificateDescriptor {
  certPem: string;
  keyPem: string; // Encrypted at rest
}

export type CertificatePlan =
  | { action: 'use-existing'; thumbprint: string; subjectName: string; expiryTimestamp: string }
  | { action: 'create'; subject: string }
  | { action: 'replace'; subject: string; existingThumbprint: string };

// ============================================================================
// Permissions
// ============================================================================

export type ResourceKind = 'graph' | 'sharepoint' | 'exchange';

export type PermissionScenario = '365Audit';

export interface ResourceAccess {
  id: string;
  type: 'Role';
}

export interface ResourcePermissionBlock {
  resource: ResourceKind;
  resourceAppId: string;
  resourceAccess: ResourceAccess[];
  permissionNames: string[];
}

export type RequiredPermissionSet = ResourcePermissionBlock[];

// Wire shape of application.requiredResourceAccess
export interface RequiredResourceAccess {
  resourceAppId: string;
  resourceAccess: ResourceAccess[];
}

// ============================================================================
// Graph directory objects
// ============================================================================

export interface AppRole {
  id: string;
  value: string;
  displayName?: string;
  allowedMemberTypes: string[];
  isEnabled?: boolean;
}

export interface ServicePrincipal {
  id: string;
  appId: string;
  displayName: string;
  appRoles?: AppRole[];
}

export interface KeyCredential {
  type: 'AsymmetricX509Cert';
  usage: 'Verify';
  key: string | null; // Base64 DER
  keyId?: string;
  displayName?: string;
  customKeyIdentifier?: string;
}

export interface Application {
  id: string;
  appId: string;
  displayName: string;
  notes?: string | null;
  keyCredentials?: KeyCredential[];
  requiredResourceAccess?: RequiredResourceAccess[];
}

export interface NewApplication {
  displayName: string;
  signInAudience: string;
  notes?: string;
  keyCredentials: KeyCredential[];
  requiredResourceAccess: RequiredResourceAccess[];
}

export interface OAuth2PermissionGrant {
  id?: string;
  clientId: string;
  consentType: 'AllPrincipals';
  resourceId: string;
  scope: string;
}

export interface DirectoryUser {
  id: string;
  displayName: string;
  userPrincipalName: string;
  mail?: string | null;
}

export interface DirectoryRole {
  id: string;
  displayName: string;
  roleTemplateId: string;
}

export interface Organization {
  id: string;
  displayName: string;
  verifiedDomains?: Array<{ name: string; isDefault: boolean }>;
}

// ============================================================================
// App registrations
// ============================================================================

export interface AppRegistration {
  displayName: string;
  appId: string;
  objectId: string;
  tenantId: string;
  notes: string;
  certificate: CertificateDescriptor;
}

export interface AppRegistrationResult {
  displayName: string;
  appId: string;
  objectId: string;
  tenantId: string;
  certificateThumbprint: string;
  certificateExpiry: string;
  consentUrl: string;
  notes: string;
}

export interface EmailAppResult extends AppRegistrationResult {
  kind: 'email';
  sendAsUser: string;
  sendAsUserEmail: string;
  restrictedSendGroup: string;
  defaultDomain: string;
  certificateStoreLocation: StoreLocation;
}

export interface AuditAppResult extends AppRegistrationResult {
  kind: 'audit';
  permissions: string;
  directoryRoles: string[];
}

export type MemPermissionSet = 'ReadWrite' | 'ReadOnly';

export interface MemAppResult extends AppRegistrationResult {
  kind: 'mem';
  permissionSet: MemPermissionSet;
  permissions: string;
}

export type PublishedAppResult = EmailAppResult | AuditAppResult | MemAppResult;

export type AppKind = PublishedAppResult['kind'];

// ============================================================================
// Vault
// ============================================================================

export interface VaultSecret {
  vaultName: string;
  name: string;
  value: string;
  createdAt: string;
  updatedAt: string;
}

export interface SecretPlan {
  name: string;
  vaultName: string;
  action: 'create' | 'overwrite';
}

// ============================================================================
// Audit log
// ============================================================================

export type AuditSeverity = 'Verbose' | 'Warning' | 'Error' | 'Information';

export interface AuditLogEntry {
  sequence: number;
  timestamp: string;
  severity: AuditSeverity;
  scope: string;
  message: string;
}

// ============================================================================
// Exchange Online
// ============================================================================

export interface DistributionGroup {
  identity: string;
  name: string;
  alias: string;
  primarySmtpAddress: string;
  externalDirectoryObjectId?: string;
}

export interface AcceptedDomain {
  domainName: string;
  isDefault: boolean;
}

export interface ApplicationAccessPolicy {
  identity: string;
  appId: string;
  scopeName: string;
  accessRight: 'RestrictAccess' | 'DenyAccess';
  description: string;
}

export type AccessCheckResult = 'Granted' | 'Denied';

// ============================================================================
// Publishing
// ============================================================================

export interface PublishPlan {
  kind: AppKind;
  appName: string;
  tenantId: string;
  certificate: CertificatePlan;
  permissions: string[];
  secret: SecretPlan;
  changes: string[];
}

export interface PublishOutcome<T extends PublishedAppResult> {
  result: T;
  secretName: string;
  splat?: string;
}

// ============================================================================
// Mail
// ============================================================================

export type MailContentType = 'Text' | 'HTML';

export interface MailAttachment {
  name: string;
  contentType: string;
  contentBytes: string; // Base64
}

export interface OutgoingMessage {
  subject: string;
  body: { contentType: MailContentType; content: string };
  toRecipients: string[];
  ccRecipients: string[];
  bccRecipients: string[];
  attachments: MailAttachment[];
}
