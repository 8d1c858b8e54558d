/**
 * Helpers shared by the CLI commands
 */

import { InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { table } from 'table';
import { AuditLog } from '../core/audit-log';
import { ToolkitContext, createToolkitContext } from '../core/context';
import { PublishOptions } from '../core/publish';
import { KeyExportPolicy, PublishOutcome, PublishPlan, PublishedAppResult, StoreLocation } from '../types';
import { ToolkitError, errorMessage } from '../utils/errors';
import { PATTERNS } from '../utils/validation';

export interface RunFlags {
  logCsv?: string;
}

export interface PublishFlags extends RunFlags {
  prefix: string;
  certThumbprint?: string;
  keyExportPolicy: KeyExportPolicy;
  storeLocation: StoreLocation;
  vaultName?: string;
  overwriteVaultSecret?: boolean;
  replaceCertificate?: boolean;
  returnParamSplat?: boolean;
  domainSuffix: boolean;
  confirm?: boolean;
}

function patternParser(pattern: RegExp, expected: string): (value: string) => string {
  return (value) => {
    if (!pattern.test(value)) {
      throw new InvalidArgumentError(`Expected ${expected}.`);
    }
    return value;
  };
}

export const parsePrefix = patternParser(PATTERNS.APP_PREFIX, '2-4 upper-case letters or digits');
export const parseGuid = patternParser(PATTERNS.GUID, 'a GUID');
export const parseThumbprint = patternParser(PATTERNS.THUMBPRINT, '40 hexadecimal characters');
export const parseEmail = patternParser(PATTERNS.EMAIL, 'an email address');

export function collectEmail(value: string, previous: string[] = []): string[] {
  return [...previous, parseEmail(value)];
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function storeLocationOption(): Option {
  return new Option('--store-location <location>', 'Certificate store location')
    .choices(['CurrentUser', 'LocalMachine'])
    .default('CurrentUser');
}

export function publishOptions(): Option[] {
  return [
    new Option('--prefix <prefix>', 'App name prefix (2-4 upper-case letters or digits)')
      .argParser(parsePrefix)
      .makeOptionMandatory(),
    new Option('--cert-thumbprint <thumbprint>', 'Use an existing certificate').argParser(parseThumbprint),
    new Option('--key-export-policy <policy>', 'Key export policy for a new certificate')
      .choices(['Exportable', 'NonExportable'])
      .default('NonExportable'),
    storeLocationOption(),
    new Option('--vault-name <name>', 'Vault that receives the app details'),
    new Option('--overwrite-vault-secret', 'Replace an existing vault secret'),
    new Option('--replace-certificate', 'Replace a certificate with the same subject'),
    new Option('--return-param-splat', 'Print a parameter splat instead of a table'),
    new Option('--no-domain-suffix', 'Leave the domain label out of the app name'),
    new Option('--confirm', 'Apply the plan'),
    new Option('--log-csv <path>', 'Export the audit log to CSV'),
  ];
}

export function toPublishOptions(flags: PublishFlags): PublishOptions {
  return {
    prefix: flags.prefix,
    certThumbprint: flags.certThumbprint,
    keyExportPolicy: flags.keyExportPolicy,
    storeLocation: flags.storeLocation,
    vaultName: flags.vaultName,
    overwriteVaultSecret: flags.overwriteVaultSecret,
    replaceCertificate: flags.replaceCertificate,
    returnParamSplat: flags.returnParamSplat,
    includeDomainSuffix: flags.domainSuffix,
  };
}

/**
 * Run a command with its own audit log; failures print and exit non-zero
 */
export async function runCommand(
  name: string,
  flags: RunFlags,
  fn: (ctx: ToolkitContext) => Promise<void>
): Promise<void> {
  const audit = new AuditLog();
  audit.start(name);
  const ctx = createToolkitContext({
    audit,
    onDeviceCode: (message) => console.log(chalk.cyan(message)),
  });

  let failed = false;
  try {
    await fn(ctx);
  } catch (error) {
    failed = true;
    const label = error instanceof ToolkitError ? error.code : 'ERROR';
    console.error(chalk.red(`${label}: ${errorMessage(error)}`));
  } finally {
    audit.end(flags.logCsv);
    ctx.vault.close();
  }

  if (flags.logCsv) {
    console.log(chalk.gray(`Audit log written to ${flags.logCsv}`));
  }
  if (failed) {
    process.exit(1);
  }
}

export function printPlan(plan: PublishPlan): void {
  console.log(chalk.bold(`\nPlan: ${plan.appName}`));
  console.log(`  Tenant:      ${plan.tenantId}`);
  console.log(`  Permissions: ${plan.permissions.join(', ')}`);
  console.log(chalk.bold('\nChanges:'));
  plan.changes.forEach((change, i) => console.log(`  ${i + 1}. ${change}`));
}

export function printOutcome(outcome: PublishOutcome<PublishedAppResult>): void {
  if (outcome.splat) {
    console.log(outcome.splat);
    return;
  }

  const rows = Object.entries(outcome.result).map(([key, value]: [string, unknown]) => [
    key,
    Array.isArray(value) ? value.join(', ') : String(value),
  ]);
  console.log(table([['Field', 'Value'], ...rows]));
  console.log(chalk.green(`✓ Stored as ${outcome.secretName}`));
  console.log(chalk.yellow(`Grant admin consent: ${outcome.result.consentUrl}`));
}
