/**
 * Audit app publisher
 * Read-only tenant audit app with Graph, SharePoint and Exchange permissions plus reader roles
 */

import { AuditAppResult, PublishOutcome, PublishPlan } from '../../types';
import { AUDIT_APP_PERMISSIONS, DIRECTORY_ROLES, SESSION_SCOPES } from '../../utils/constants';
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

export type AuditAppOptions = PublishOptions;

export interface AuditAppPlan extends PublishPlan {
  kind: 'audit';
  options: ResolvedPublishOptions;
}

const GRAPH_SCOPES = [...SESSION_SCOPES.APP_MANAGEMENT, ...SESSION_SCOPES.ROLE_MANAGEMENT];

const ROLE_TEMPLATES = [DIRECTORY_ROLES.EXCHANGE_ADMINISTRATOR, DIRECTORY_ROLES.GLOBAL_READER];

export class AuditAppPublisher extends AppPublisher<AuditAppOptions, AuditAppPlan, AuditAppResult> {
  async plan(input: AuditAppOptions): Promise<AuditAppPlan> {
    return this.ctx.audit.track('AuditAppPublisher.plan', async () => {
      const options = resolvePublishOptions(input);
      const appName = buildAppName(
        {
          prefix: options.prefix,
          scenarioName: 'Audit',
          includeDomainSuffix: options.includeDomainSuffix,
        },
        this.ctx.env
      );

      const graph = await this.ctx.sessions.connectGraph(GRAPH_SCOPES);
      const subject = toSubjectName(appName);
      const certificate = this.planCertificate(subject, options);
      const secret = this.planSecret(subject, options);

      return {
        kind: 'audit',
        appName,
        tenantId: graph.tenantId,
        certificate,
        permissions: [...AUDIT_APP_PERMISSIONS],
        secret,
        changes: [
          describeCertificatePlan(certificate),
          `Register application ${appName} with Graph, SharePoint and Exchange audit permissions`,
          'Create its service principal and grant tenant-wide consent',
          'Assign the Exchange Administrator and Global Reader directory roles',
          describeSecretPlan(secret),
        ],
        options,
      };
    });
  }

  async apply(plan: AuditAppPlan): Promise<PublishOutcome<AuditAppResult>> {
    return this.ctx.audit.track('AuditAppPublisher.apply', async () => {
      const graph = await this.ctx.sessions.connectGraph(GRAPH_SCOPES);
      const registrar = this.registrar(graph);
      const certificate = await this.provisionCertificate(plan.secret.name, plan.options);

      const permissions = await new PermissionResolver(graph.client, this.ctx.audit).resolve(
        AUDIT_APP_PERMISSIONS,
        '365Audit'
      );
      const registration = await registrar.register({
        displayName: plan.appName,
        certificate,
        permissions,
        tenantId: plan.tenantId,
        notes: 'Read-only tenant audit application',
      });
      const granted = await registrar.grant(registration, permissions);
      const roles = await registrar.assignDirectoryRoles(granted.servicePrincipal.id, ROLE_TEMPLATES);

      const result: AuditAppResult = {
        kind: 'audit',
        displayName: registration.displayName,
        appId: registration.appId,
        objectId: registration.objectId,
        tenantId: plan.tenantId,
        certificateThumbprint: certificate.thumbprint,
        certificateExpiry: certificate.expiryTimestamp,
        consentUrl: granted.consentUrl,
        notes: registration.notes,
        permissions: permissionNamesOf(permissions.filter((block) => block.resource === 'graph')).join(', '),
        directoryRoles: roles.map((r) => r.displayName),
      };

      return this.finish(result, plan);
    });
  }
}
