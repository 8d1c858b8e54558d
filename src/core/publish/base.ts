/**
 * Shared plan/apply plumbing for the publish workflows
 */

import {
  CertificateDescriptor,
  CertificatePlan,
  KeyExportPolicy,
  PublishOutcome,
  PublishPlan,
  PublishedAppResult,
  SecretPlan,
  StoreLocation,
} from '../../types';
import { DEFAULTS } from '../../utils/constants';
import { normalizeThumbprint } from '../../utils/validation';
import { CertificateProvider } from '../certificates';
import { ToolkitContext } from '../context';
import { AppRegistrar } from '../registration';
import { GraphSession } from '../session';
import { formatParamSplat } from '../splat';
import { SecretStoreWriter } from '../vault';

export interface PublishOptions {
  prefix: string;
  certThumbprint?: string;
  keyExportPolicy?: KeyExportPolicy;
  storeLocation?: StoreLocation;
  vaultName?: string;
  overwriteVaultSecret?: boolean;
  replaceCertificate?: boolean;
  returnParamSplat?: boolean;
  includeDomainSuffix?: boolean;
}

export interface ResolvedPublishOptions {
  prefix: string;
  certThumbprint?: string;
  keyExportPolicy: KeyExportPolicy;
  storeLocation: StoreLocation;
  vaultName: string;
  overwriteVaultSecret: boolean;
  replaceCertificate: boolean;
  returnParamSplat: boolean;
  includeDomainSuffix: boolean;
}

export function resolvePublishOptions(options: PublishOptions): ResolvedPublishOptions {
  return {
    prefix: options.prefix,
    certThumbprint: options.certThumbprint ? normalizeThumbprint(options.certThumbprint) : undefined,
    keyExportPolicy: options.keyExportPolicy || DEFAULTS.KEY_EXPORT_POLICY,
    storeLocation: options.storeLocation || DEFAULTS.STORE_LOCATION,
    vaultName: options.vaultName || DEFAULTS.VAULT_NAME,
    overwriteVaultSecret: options.overwriteVaultSecret === true,
    replaceCertificate: options.replaceCertificate === true,
    returnParamSplat: options.returnParamSplat === true,
    includeDomainSuffix: options.includeDomainSuffix !== false,
  };
}

export function describeCertificatePlan(plan: CertificatePlan): string {
  switch (plan.action) {
    case 'use-existing':
      return `Use existing certificate ${plan.subjectName} (${plan.thumbprint}), expires ${plan.expiryTimestamp}`;
    case 'create':
      return `Create self-signed certificate ${plan.subject}`;
    case 'replace':
      return `Remove certificate ${plan.existingThumbprint} and create a new one for ${plan.subject}`;
  }
}

export function describeSecretPlan(plan: SecretPlan): string {
  return plan.action === 'overwrite'
    ? `Overwrite secret ${plan.name} in vault ${plan.vaultName}`
    : `Store secret ${plan.name} in vault ${plan.vaultName}`;
}

/**
 * Two-phase publisher: plan() reports pending changes, apply() performs them
 */
export abstract class AppPublisher<
  TOptions extends PublishOptions,
  TPlan extends PublishPlan & { options: ResolvedPublishOptions },
  TResult extends PublishedAppResult,
> {
  protected ctx: ToolkitContext;

  constructor(ctx: ToolkitContext) {
    this.ctx = ctx;
  }

  abstract plan(options: TOptions): Promise<TPlan>;

  abstract apply(plan: TPlan): Promise<PublishOutcome<TResult>>;

  /**
   * Plan and apply in one call, for callers that have already obtained consent
   */
  async publish(options: TOptions): Promise<PublishOutcome<TResult>> {
    return this.apply(await this.plan(options));
  }

  protected certificateProvider(): CertificateProvider {
    return new CertificateProvider(
      this.ctx.certificates,
      this.ctx.audit,
      this.ctx.generateCertificate
    );
  }

  protected secretWriter(): SecretStoreWriter {
    return new SecretStoreWriter(this.ctx.vault, this.ctx.audit);
  }

  protected registrar(session: GraphSession): AppRegistrar {
    return new AppRegistrar(session.client, this.ctx.certificates, this.ctx.audit, {
      grantDelayMs: this.ctx.grantDelayMs,
    });
  }

  protected planCertificate(subject: string, options: ResolvedPublishOptions): CertificatePlan {
    return this.certificateProvider().plan({
      thumbprint: options.certThumbprint,
      subject,
      storeLocation: options.storeLocation,
      exportPolicy: options.keyExportPolicy,
      replaceExisting: options.replaceCertificate,
    });
  }

  protected planSecret(name: string, options: ResolvedPublishOptions): SecretPlan {
    return this.secretWriter().plan(name, options.vaultName, options.overwriteVaultSecret);
  }

  protected async provisionCertificate(
    subject: string,
    options: ResolvedPublishOptions
  ): Promise<CertificateDescriptor> {
    return this.certificateProvider().resolve({
      thumbprint: options.certThumbprint,
      subject,
      storeLocation: options.storeLocation,
      exportPolicy: options.keyExportPolicy,
      replaceExisting: options.replaceCertificate,
    });
  }

  /**
   * Persist the result and render the requested return format
   */
  protected async finish(result: TResult, plan: TPlan): Promise<PublishOutcome<TResult>> {
    const secretName = await this.secretWriter().store(
      plan.secret.name,
      result,
      plan.secret.vaultName,
      plan.options.overwriteVaultSecret
    );

    this.ctx.audit.log(`Published ${result.displayName} (${result.appId})`);

    return {
      result,
      secretName,
      splat: plan.options.returnParamSplat ? formatParamSplat(result) : undefined,
    };
  }
}
