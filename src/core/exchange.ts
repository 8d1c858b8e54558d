/**
 * Exchange Online Client
 * Runs Exchange cmdlets through the admin API's InvokeCommand endpoint
 */

import 'isomorphic-fetch';
import {
  AcceptedDomain,
  AccessCheckResult,
  ApplicationAccessPolicy,
  DistributionGroup,
} from '../types';
import { EXCHANGE_API } from '../utils/constants';
import { UpstreamError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ExchangeOrganization {
  name: string;
  identity: string;
}

export interface NewDistributionGroupRequest {
  name: string;
  alias: string;
  primarySmtpAddress: string;
}

export interface NewApplicationAccessPolicyRequest {
  appId: string;
  policyScopeGroupId: string;
  accessRight: 'RestrictAccess' | 'DenyAccess';
  description: string;
}

/**
 * Exchange Online operations the toolkit depends on
 */
export interface ExchangeApi {
  getOrganizationConfig(): Promise<ExchangeOrganization>;
  getAcceptedDomains(): Promise<AcceptedDomain[]>;
  getDistributionGroup(identity: string): Promise<DistributionGroup | null>;
  newDistributionGroup(request: NewDistributionGroupRequest): Promise<DistributionGroup>;
  getDistributionGroupMembers(identity: string): Promise<string[]>;
  addDistributionGroupMember(identity: string, member: string): Promise<void>;
  newApplicationAccessPolicy(
    request: NewApplicationAccessPolicyRequest
  ): Promise<ApplicationAccessPolicy>;
  testApplicationAccessPolicy(mailbox: string, appId: string): Promise<AccessCheckResult>;
}

type CmdletRecord = Record<string, unknown>;

type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class ExchangeOnlineClient implements ExchangeApi {
  private accessToken: string;
  private tenantId: string;
  private fetchImpl: FetchLike;

  constructor(accessToken: string, tenantId: string, fetchImpl?: FetchLike) {
    this.accessToken = accessToken;
    this.tenantId = tenantId;
    this.fetchImpl = fetchImpl || ((url, init) => fetch(url, init));
  }

  /**
   * Invoke a cmdlet and return its output records
   */
  async invoke(cmdletName: string, parameters: Record<string, unknown> = {}): Promise<CmdletRecord[]> {
    const url = `${EXCHANGE_API.BASE_URL}/${this.tenantId}/InvokeCommand`;

    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({ CmdletInput: { CmdletName: cmdletName, Parameters: parameters } }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new UpstreamError(`${cmdletName} failed: ${extractErrorMessage(text)}`, response.status, {
        cmdlet: cmdletName,
      });
    }

    const body: unknown = await response.json();
    logger.debug(`Exchange cmdlet ${cmdletName} completed`);
    return readRecords(body);
  }

  async getOrganizationConfig(): Promise<ExchangeOrganization> {
    const [org] = await this.invoke('Get-OrganizationConfig');
    if (!org) {
      throw new UpstreamError('Get-OrganizationConfig returned no organization');
    }
    return { name: readString(org, 'Name'), identity: readString(org, 'Identity') };
  }

  async getAcceptedDomains(): Promise<AcceptedDomain[]> {
    const records = await this.invoke('Get-AcceptedDomain');
    return records.map((r) => ({
      domainName: readString(r, 'DomainName'),
      isDefault: r.Default === true,
    }));
  }

  async getDistributionGroup(identity: string): Promise<DistributionGroup | null> {
    try {
      const [group] = await this.invoke('Get-DistributionGroup', { Identity: identity });
      return group ? toDistributionGroup(group) : null;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async newDistributionGroup(request: NewDistributionGroupRequest): Promise<DistributionGroup> {
    const [group] = await this.invoke('New-DistributionGroup', {
      Name: request.name,
      Alias: request.alias,
      PrimarySmtpAddress: request.primarySmtpAddress,
      Type: 'Security',
    });
    if (!group) {
      throw new UpstreamError(`New-DistributionGroup returned no group for ${request.name}`);
    }
    return toDistributionGroup(group);
  }

  async getDistributionGroupMembers(identity: string): Promise<string[]> {
    const records = await this.invoke('Get-DistributionGroupMember', { Identity: identity });
    return records.map((r) => readString(r, 'PrimarySmtpAddress'));
  }

  async addDistributionGroupMember(identity: string, member: string): Promise<void> {
    await this.invoke('Add-DistributionGroupMember', { Identity: identity, Member: member });
  }

  async newApplicationAccessPolicy(
    request: NewApplicationAccessPolicyRequest
  ): Promise<ApplicationAccessPolicy> {
    const [policy] = await this.invoke('New-ApplicationAccessPolicy', {
      AppId: request.appId,
      PolicyScopeGroupId: request.policyScopeGroupId,
      AccessRight: request.accessRight,
      Description: request.description,
    });
    if (!policy) {
      throw new UpstreamError(`New-ApplicationAccessPolicy returned no policy for ${request.appId}`);
    }
    return {
      identity: readString(policy, 'Identity'),
      appId: request.appId,
      scopeName: readString(policy, 'ScopeName') || request.policyScopeGroupId,
      accessRight: request.accessRight,
      description: request.description,
    };
  }

  async testApplicationAccessPolicy(mailbox: string, appId: string): Promise<AccessCheckResult> {
    const [result] = await this.invoke('Test-ApplicationAccessPolicy', {
      Identity: mailbox,
      AppId: appId,
    });
    return result && readString(result, 'AccessCheckResult') === 'Granted' ? 'Granted' : 'Denied';
  }
}

function readRecords(body: unknown): CmdletRecord[] {
  if (typeof body === 'object' && body !== null && 'value' in body && Array.isArray(body.value)) {
    return body.value.filter(isRecord);
  }
  return [];
}

function isRecord(value: unknown): value is CmdletRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: CmdletRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

function toDistributionGroup(record: CmdletRecord): DistributionGroup {
  return {
    identity: readString(record, 'Identity'),
    name: readString(record, 'Name'),
    alias: readString(record, 'Alias'),
    primarySmtpAddress: readString(record, 'PrimarySmtpAddress'),
    externalDirectoryObjectId: readString(record, 'ExternalDirectoryObjectId') || undefined,
  };
}

function extractErrorMessage(text: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text || 'no response body';
  }
  const error = isRecord(parsed) ? parsed.error : undefined;
  if (isRecord(error)) {
    const message = error.message;
    if (typeof message === 'string') {
      return message;
    }
  }
  return text || 'no response body';
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof UpstreamError &&
    (error.statusCode === 404 || /couldn't be found/i.test(error.message))
  );
}
