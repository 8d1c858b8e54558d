/**
 * App Registrar
 * Creates application objects, their service principals, consent grants and role memberships
 */

import {
  AppRegistration,
  CertificateDescriptor,
  DirectoryRole,
  KeyCredential,
  RequiredPermissionSet,
  ServicePrincipal,
} from '../types';
import { DEFAULTS, LOGIN_BASE_URL, MAX_RESOURCE_BLOCKS } from '../utils/constants';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { AuditLog } from './audit-log';
import { CertificateStore } from './certificates';
import { DirectoryApi } from './graph';
import { toRequiredResourceAccess } from './permissions';

export interface RegisterRequest {
  displayName: string;
  certificate?: CertificateDescriptor;
  permissions: RequiredPermissionSet;
  tenantId: string;
  signInAudience?: string;
  notes: string;
}

export interface GrantOutcome {
  servicePrincipal: ServicePrincipal;
  consentUrl: string;
  grantedScopes: Record<string, string>;
}

export function buildConsentUrl(tenantId: string, appId: string): string {
  return `${LOGIN_BASE_URL}/${tenantId}/adminconsent?client_id=${appId}`;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class AppRegistrar {
  private directory: DirectoryApi;
  private certificates: CertificateStore;
  private audit: AuditLog;
  private grantDelayMs: number;

  constructor(
    directory: DirectoryApi,
    certificates: CertificateStore,
    audit: AuditLog,
    options?: { grantDelayMs?: number }
  ) {
    this.directory = directory;
    this.certificates = certificates;
    this.audit = audit;
    this.grantDelayMs = options?.grantDelayMs ?? DEFAULTS.GRANT_DELAY_MS;
  }

  keyCredentialFor(certificate: CertificateDescriptor): KeyCredential {
    return {
      type: 'AsymmetricX509Cert',
      usage: 'Verify',
      key: this.certificates.getRawData(certificate.storeLocation, certificate.thumbprint),
      displayName: certificate.subjectName,
    };
  }

  /**
   * Create the application object with the certificate as its only credential
   */
  async register(request: RegisterRequest): Promise<AppRegistration> {
    return this.audit.track('AppRegistrar.register', async () => {
      const { certificate } = request;
      if (!certificate) {
        throw new ValidationError(
          'A certificate thumbprint is required to register an app; no other methods supported yet'
        );
      }

      const app = await this.directory.createApplication({
        displayName: request.displayName,
        signInAudience: request.signInAudience || DEFAULTS.SIGN_IN_AUDIENCE,
        notes: request.notes,
        keyCredentials: [this.keyCredentialFor(certificate)],
        requiredResourceAccess: toRequiredResourceAccess(request.permissions),
      });

      this.audit.log(`Registered application ${app.displayName} (appId ${app.appId}, objectId ${app.id})`);

      return {
        displayName: app.displayName,
        appId: app.appId,
        objectId: app.id,
        tenantId: request.tenantId,
        notes: request.notes,
        certificate,
      };
    });
  }

  /**
   * Create the service principal and grant tenant-wide consent per resource
   */
  async grant(registration: AppRegistration, permissions: RequiredPermissionSet): Promise<GrantOutcome> {
    return this.audit.track('AppRegistrar.grant', async () => {
      if (permissions.length > MAX_RESOURCE_BLOCKS) {
        throw new ConflictError('Too many resources in RequiredResourceAccessList.', {
          resources: permissions.map((p) => p.resourceAppId),
        });
      }

      const servicePrincipal = await this.directory.createServicePrincipal(registration.appId);
      this.audit.log(`Created service principal ${servicePrincipal.id} for ${registration.displayName}`);

      const grantedScopes: Record<string, string> = {};

      for (const [index, block] of permissions.entries()) {
        const resource = await this.directory.getServicePrincipalByAppId(block.resourceAppId);
        if (!resource) {
          throw new NotFoundError(
            `Service principal for resource ${block.resourceAppId} (${block.resource}) not found`,
            { resourceAppId: block.resourceAppId }
          );
        }

        const scope = block.permissionNames.join(' ');
        if (index > 0 && this.grantDelayMs > 0) {
          await sleep(this.grantDelayMs);
        }

        await this.directory.createOAuth2PermissionGrant({
          clientId: servicePrincipal.id,
          consentType: 'AllPrincipals',
          resourceId: resource.id,
          scope,
        });
        grantedScopes[block.resource] = scope;
        this.audit.log(`Granted "${scope}" on ${resource.displayName}`);
      }

      const consentUrl = buildConsentUrl(registration.tenantId, registration.appId);
      this.audit.log(`Admin consent URL: ${consentUrl}`);

      return { servicePrincipal, consentUrl, grantedScopes };
    });
  }

  /**
   * Add the service principal to directory roles, activating roles that are not yet in use
   */
  async assignDirectoryRoles(servicePrincipalId: string, roleTemplateIds: string[]): Promise<DirectoryRole[]> {
    return this.audit.track('AppRegistrar.assignDirectoryRoles', async () => {
      const assigned: DirectoryRole[] = [];
      for (const templateId of roleTemplateIds) {
        let role = await this.directory.getDirectoryRoleByTemplateId(templateId);
        if (!role) {
          role = await this.directory.activateDirectoryRole(templateId);
          this.audit.log(`Activated directory role ${role.displayName}`);
        }
        await this.directory.addDirectoryRoleMember(role.id, servicePrincipalId);
        this.audit.log(`Assigned ${role.displayName} to service principal ${servicePrincipalId}`);
        assigned.push(role);
      }
      return assigned;
    });
  }

  /**
   * Append a certificate credential to an existing application
   */
  async addCertificateToApplication(
    objectId: string,
    certificate: CertificateDescriptor,
    tenantId: string
  ): Promise<AppRegistration & { servicePrincipal: ServicePrincipal }> {
    return this.audit.track('AppRegistrar.addCertificateToApplication', async () => {
      const app = await this.directory.getApplication(objectId);
      if (!app) {
        throw new NotFoundError(`Application with object id ${objectId} not found`, { objectId });
      }

      const servicePrincipal = await this.directory.getServicePrincipalByAppId(app.appId);
      if (!servicePrincipal) {
        throw new NotFoundError(`Service principal for application ${app.appId} not found`, {
          appId: app.appId,
        });
      }

      // Existing credentials come back without key bytes; Graph keeps them by keyId
      const keyCredentials = [...(app.keyCredentials || []), this.keyCredentialFor(certificate)];
      await this.directory.updateApplicationKeyCredentials(app.id, keyCredentials);
      this.audit.log(`Added certificate ${certificate.thumbprint} to ${app.displayName}`);

      return {
        displayName: app.displayName,
        appId: app.appId,
        objectId: app.id,
        tenantId,
        notes: app.notes || '',
        certificate,
        servicePrincipal,
      };
    });
  }
}
