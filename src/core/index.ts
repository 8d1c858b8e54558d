/**
 * Core module exports
 */

export { AuditLog } from './audit-log';
export { CertificateAuthManager, DelegatedAuthProvider, FileCachePlugin } from './auth';
export {
  CertificateProvider,
  CertificateStore,
  createCertificateGenerator,
  generateSelfSignedCertificate,
  toSubjectName,
} from './certificates';
export { createToolkitContext } from './context';
export { ExchangeOnlineClient } from './exchange';
export { GraphClient } from './graph';
export { buildAppName, domainSuffix } from './app-name';
export { EmailSender, isEmailAppResult, parsePublishedApp, readAttachment } from './mail';
export { MailGroupService } from './mail-group';
export { PermissionResolver, permissionNamesOf, toRequiredResourceAccess } from './permissions';
export { AppRegistrar, buildConsentUrl } from './registration';
export { SessionConnector, missingScopes, normalizeScope } from './session';
export { formatParamSplat } from './splat';
export { SecretStoreWriter, SecretVault } from './vault';
export * from './publish';
export type { AccessToken, AppTokenSource, CertificateCredentials, TokenProvider } from './auth';
export type { CertificateGenerator, CertificateRequest, GeneratedCertificate } from './certificates';
export type { ToolkitContext } from './context';
export type { ExchangeApi } from './exchange';
export type { DirectoryApi, MailApi } from './graph';
export type { AppNameOptions } from './app-name';
export type { SendEmailOptions, SendEmailResult } from './mail';
export type { CreateMailGroupOptions } from './mail-group';
export type { GrantOutcome, RegisterRequest } from './registration';
export type { ExchangeSession, GraphApi, GraphSession } from './session';
