/**
 * Mail-enabled security groups used to scope email apps
 */

import { DistributionGroup } from '../types';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { PATTERNS, assertEmail } from '../utils/validation';
import { AuditLog } from './audit-log';
import { SessionConnector } from './session';

export interface CreateMailGroupOptions {
  name: string;
  alias: string;
  primarySmtpAddress?: string;
  useDefaultDomain?: boolean;
}

export class MailGroupService {
  private sessions: SessionConnector;
  private audit: AuditLog;

  constructor(sessions: SessionConnector, audit: AuditLog) {
    this.sessions = sessions;
    this.audit = audit;
  }

  async create(options: CreateMailGroupOptions): Promise<DistributionGroup> {
    return this.audit.track('MailGroupService.create', async () => {
      if (!options.name.trim()) {
        throw new ValidationError('Group name must not be empty');
      }
      if (!PATTERNS.MAIL_ALIAS.test(options.alias)) {
        throw new ValidationError(`Invalid mail alias "${options.alias}"`, { alias: options.alias });
      }
      if (!options.primarySmtpAddress && !options.useDefaultDomain) {
        throw new ValidationError('Provide a primary SMTP address or use the default accepted domain');
      }
      if (options.primarySmtpAddress) {
        assertEmail(options.primarySmtpAddress, 'primary SMTP address');
      }

      const exchange = await this.sessions.connectExchange();

      let address = options.primarySmtpAddress;
      if (!address) {
        const domains = await exchange.client.getAcceptedDomains();
        const defaultDomain = domains.find((d) => d.isDefault);
        if (!defaultDomain) {
          throw new NotFoundError('No default accepted domain found');
        }
        address = `${options.alias}@${defaultDomain.domainName}`;
        this.audit.log(`Using default accepted domain ${defaultDomain.domainName}`, 'Verbose');
      }

      const existing = await exchange.client.getDistributionGroup(address);
      if (existing) {
        throw new ConflictError(`A group with address ${address} already exists`, {
          identity: existing.identity,
        });
      }

      const group = await exchange.client.newDistributionGroup({
        name: options.name,
        alias: options.alias,
        primarySmtpAddress: address,
      });
      this.audit.log(`Created mail-enabled security group ${group.name} <${group.primarySmtpAddress}>`);
      return group;
    });
  }
}
