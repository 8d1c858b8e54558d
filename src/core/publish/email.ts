/**
 * Email app publisher
 * Registers a Mail.Send app restricted to one mail-enabled security group
 */

import {
  AccessCheckResult,
  Application,
  DirectoryUser,
  DistributionGroup,
  EmailAppResult,
  PublishOutcome,
  PublishPlan,
} from '../../types';
import { EMAIL_APP_PERMISSIONS, SESSION_SCOPES } from '../../utils/constants';
import { NotFoundError } from '../../utils/errors';
import { assertEmail, assertGuid } from '../../utils/validation';
import { buildAppName } from '../app-name';
import { toSubjectName } from '../certificates';
import { ExchangeApi } from '../exchange';
import { PermissionResolver } from '../permissions';
import { buildConsentUrl } from '../registration';
import {
  AppPublisher,
  PublishOptions,
  ResolvedPublishOptions,
  describeCertificatePlan,
  describeSecretPlan,
  resolvePublishOptions,
} from './base';

export interface EmailAppOptions extends PublishOptions {
  authorizedSenderUserName: string;
  mailEnabledSendingGroup: string;
  // In existing-app mode the prefix names the new certificate only
  existingAppObjectId?: string;
}

export interface EmailAppPlan extends PublishPlan {
  kind: 'email';
  mode: 'new' | 'existing';
  options: ResolvedPublishOptions;
  sender: DirectoryUser;
  senderEmail: string;
  group: DistributionGroup;
  existingApp?: Application;
}

const GRAPH_SCOPES = [...SESSION_SCOPES.APP_MANAGEMENT, ...SESSION_SCOPES.USER_READ];

export class EmailAppPublisher extends AppPublisher<EmailAppOptions, EmailAppPlan, EmailAppResult> {
  async plan(input: EmailAppOptions): Promise<EmailAppPlan> {
    return this.ctx.audit.track('EmailAppPublisher.plan', async () => {
      const options = resolvePublishOptions(input);
      assertEmail(input.authorizedSenderUserName, 'authorized sender');
      if (input.existingAppObjectId !== undefined) {
        assertGuid(input.existingAppObjectId, 'existing app object id');
      }

      const certName = buildAppName(
        {
          prefix: options.prefix,
          userEmail: input.authorizedSenderUserName,
          includeDomainSuffix: options.includeDomainSuffix,
        },
        this.ctx.env
      );

      const graph = await this.ctx.sessions.connectGraph(GRAPH_SCOPES);
      const exchange = await this.ctx.sessions.connectExchange();

      const sender = await graph.client.getUser(input.authorizedSenderUserName);
      if (!sender) {
        throw new NotFoundError(`User ${input.authorizedSenderUserName} not found`, {
          user: input.authorizedSenderUserName,
        });
      }

      const group = await exchange.client.getDistributionGroup(input.mailEnabledSendingGroup);
      if (!group) {
        throw new NotFoundError(`Mail-enabled group ${input.mailEnabledSendingGroup} not found`, {
          group: input.mailEnabledSendingGroup,
        });
      }

      let existingApp: Application | undefined;
      if (input.existingAppObjectId) {
        const app = await graph.client.getApplication(input.existingAppObjectId);
        if (!app) {
          throw new NotFoundError(`Application with object id ${input.existingAppObjectId} not found`, {
            objectId: input.existingAppObjectId,
          });
        }
        existingApp = app;
      }

      const subject = toSubjectName(certName);
      const certificate = this.planCertificate(subject, options);
      const secret = this.planSecret(subject, options);
      const senderEmail = sender.mail || sender.userPrincipalName;
      const appName = existingApp ? existingApp.displayName : certName;

      const changes: string[] = [describeCertificatePlan(certificate)];
      if (existingApp) {
        changes.push(`Add the certificate to existing application ${existingApp.displayName} (${existingApp.appId})`);
      } else {
        changes.push(`Register application ${appName} with ${EMAIL_APP_PERMISSIONS.join(', ')}`);
        changes.push('Create its service principal and grant tenant-wide consent');
        changes.push(`Restrict the application to members of ${group.primarySmtpAddress}`);
      }
      changes.push(`Ensure ${senderEmail} is a member of ${group.primarySmtpAddress}`);
      changes.push(describeSecretPlan(secret));

      return {
        kind: 'email',
        mode: existingApp ? 'existing' : 'new',
        appName,
        tenantId: graph.tenantId,
        certificate,
        permissions: [...EMAIL_APP_PERMISSIONS],
        secret,
        changes,
        options,
        sender,
        senderEmail,
        group,
        existingApp,
      };
    });
  }

  async apply(plan: EmailAppPlan): Promise<PublishOutcome<EmailAppResult>> {
    return this.ctx.audit.track('EmailAppPublisher.apply', async () => {
      const graph = await this.ctx.sessions.connectGraph(GRAPH_SCOPES);
      const exchange = await this.ctx.sessions.connectExchange();
      const registrar = this.registrar(graph);
      const certificate = await this.provisionCertificate(plan.secret.name, plan.options);

      let appId: string;
      let objectId: string;
      let displayName: string;
      let consentUrl: string;
      let notes: string;

      if (plan.existingApp) {
        const updated = await registrar.addCertificateToApplication(
          plan.existingApp.id,
          certificate,
          plan.tenantId
        );
        appId = updated.appId;
        objectId = updated.objectId;
        displayName = updated.displayName;
        notes = updated.notes;
        consentUrl = buildConsentUrl(plan.tenantId, updated.appId);
      } else {
        const permissions = await new PermissionResolver(graph.client, this.ctx.audit).resolve(
          EMAIL_APP_PERMISSIONS
        );
        const registration = await registrar.register({
          displayName: plan.appName,
          certificate,
          permissions,
          tenantId: plan.tenantId,
          notes: `Sends mail as ${plan.senderEmail}; restricted to members of ${plan.group.primarySmtpAddress}`,
        });
        const granted = await registrar.grant(registration, permissions);

        await exchange.client.newApplicationAccessPolicy({
          appId: registration.appId,
          policyScopeGroupId: plan.group.primarySmtpAddress,
          accessRight: 'RestrictAccess',
          description: `Restrict ${registration.displayName} to ${plan.group.primarySmtpAddress}`,
        });
        this.ctx.audit.log(`Created application access policy for ${registration.appId}`);

        appId = registration.appId;
        objectId = registration.objectId;
        displayName = registration.displayName;
        notes = registration.notes;
        consentUrl = granted.consentUrl;
      }

      await this.ensureMembership(exchange.client, plan.group, plan.senderEmail);
      const verdict = await exchange.client.testApplicationAccessPolicy(plan.senderEmail, appId);
      this.logAccessVerdict(verdict, plan.senderEmail, appId);

      const result: EmailAppResult = {
        kind: 'email',
        displayName,
        appId,
        objectId,
        tenantId: plan.tenantId,
        certificateThumbprint: certificate.thumbprint,
        certificateExpiry: certificate.expiryTimestamp,
        consentUrl,
        notes,
        sendAsUser: plan.sender.userPrincipalName,
        sendAsUserEmail: plan.senderEmail,
        restrictedSendGroup: plan.group.primarySmtpAddress,
        defaultDomain: plan.senderEmail.split('@')[1],
        certificateStoreLocation: certificate.storeLocation,
      };

      return this.finish(result, plan);
    });
  }

  private async ensureMembership(
    exchange: ExchangeApi,
    group: DistributionGroup,
    member: string
  ): Promise<void> {
    const members = await exchange.getDistributionGroupMembers(group.identity);
    if (members.some((m) => m.toLowerCase() === member.toLowerCase())) {
      this.ctx.audit.log(`${member} is already a member of ${group.primarySmtpAddress}`, 'Verbose');
      return;
    }
    await exchange.addDistributionGroupMember(group.identity, member);
    this.ctx.audit.log(`Added ${member} to ${group.primarySmtpAddress}`);
  }

  private logAccessVerdict(verdict: AccessCheckResult, mailbox: string, appId: string): void {
    if (verdict === 'Granted') {
      this.ctx.audit.log(`Access policy test: ${appId} may send as ${mailbox}`);
    } else {
      // Policy changes can take a while to replicate
      this.ctx.audit.log(
        `Access policy test: ${appId} is denied for ${mailbox}; retry after replication completes`,
        'Warning'
      );
    }
  }
}
