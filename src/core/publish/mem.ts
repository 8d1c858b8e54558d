/**
 * MEM policy app publisher
 */

import { MemAppResult, MemPermissionSet, PublishOutcome, PublishPlan } from '../../types';
import { MEM_APP_PERMISSIONS, SESSION_SCOPES } from '../../utils/constants';
import { buildAppName } from '../app-name';
import { toSubjectName } from '../certificates';
import { PermissionResolver, permissionNamesOf } from '../permissions';
import {
  AppPublisher,
  PublishOptions,
  ResolvedPublishOptions,
  describeCertificatePlan,
  describeSecretPlan,
  resolvePublishOptions,
} from './base';

export interface MemAppOptions extends PublishOptions {
  readWrite?: boolean;
}

export interface MemAppPlan extends PublishPlan {
  kind: 'mem';
  permissionSet: MemPermissionSet;
  options: ResolvedPublishOptions;
}

export function memPermissions(permissionSet: MemPermissionSet): string[] {
  return permissionSet === 'ReadWrite'
    ? [...MEM_APP_PERMISSIONS.READ_WRITE]
    : [...MEM_APP_PERMISSIONS.READ_ONLY];
}

export class MemAppPublisher extends AppPublisher<MemAppOptions, MemAppPlan, MemAppResult> {
  async plan(input: MemAppOptions): Promise<MemAppPlan> {
    return this.ctx.audit.track('MemAppPublisher.plan', async () => {
      const options = resolvePublishOptions(input);
      const permissionSet: MemPermissionSet = input.readWrite ? 'ReadWrite' : 'ReadOnly';
      const appName = buildAppName(
        {
          prefix: options.prefix,
          scenarioName: 'MemPolicy',
          includeDomainSuffix: options.includeDomainSuffix,
        },
        this.ctx.env
      );

      const graph = await this.ctx.sessions.connectGraph(SESSION_SCOPES.APP_MANAGEMENT);
      const subject = toSubjectName(appName);
      const certificate = this.planCertificate(subject, options);
      const secret = this.planSecret(subject, options);
      const permissions = memPermissions(permissionSet);

      return {
        kind: 'mem',
        permissionSet,
        appName,
        tenantId: graph.tenantId,
        certificate,
        permissions,
        secret,
        changes: [
          describeCertificatePlan(certificate),
          `Register application ${appName} with ${permissions.join(', ')}`,
          'Create its service principal and grant tenant-wide consent',
          describeSecretPlan(secret),
        ],
        options,
      };
    });
  }

  async apply(plan: MemAppPlan): Promise<PublishOutcome<MemAppResult>> {
    return this.ctx.audit.track('MemAppPublisher.apply', async () => {
      const graph = await this.ctx.sessions.connectGraph(SESSION_SCOPES.APP_MANAGEMENT);
      const registrar = this.registrar(graph);
      const certificate = await this.provisionCertificate(plan.secret.name, plan.options);

      const permissions = await new PermissionResolver(graph.client, this.ctx.audit).resolve(
        plan.permissions
      );
      const registration = await registrar.register({
        displayName: plan.appName,
        certificate,
        permissions,
        tenantId: plan.tenantId,
        notes: `Endpoint management policy application (${plan.permissionSet})`,
      });
      const granted = await registrar.grant(registration, permissions);

      const result: MemAppResult = {
        kind: 'mem',
        displayName: registration.displayName,
        appId: registration.appId,
        objectId: registration.objectId,
        tenantId: plan.tenantId,
        certificateThumbprint: certificate.thumbprint,
        certificateExpiry: certificate.expiryTimestamp,
        consentUrl: granted.consentUrl,
        notes: registration.notes,
        permissionSet: plan.permissionSet,
        permissions: permissionNamesOf(permissions).join(', '),
      };

      return this.finish(result, plan);
    });
  }
}
