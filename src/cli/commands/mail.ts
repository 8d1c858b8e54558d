/**
 * Mail CLI commands
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { CertificateAuthManager } from '../../core/auth';
import { EmailSender } from '../../core/mail';
import { MailGroupService } from '../../core/mail-group';
import { MailContentType, StoreLocation } from '../../types';
import {
  RunFlags,
  collect,
  collectEmail,
  parseEmail,
  parseGuid,
  parseThumbprint,
  runCommand,
} from '../shared';

interface SendEmailFlags extends RunFlags {
  appName?: string;
  appId?: string;
  tenantId?: string;
  certThumbprint?: string;
  vaultName?: string;
  storeLocation?: StoreLocation;
  from?: string;
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  body: string;
  contentType: MailContentType;
  attachment?: string[];
  saveToSentItems: boolean;
}

interface MailGroupFlags extends RunFlags {
  name: string;
  alias: string;
  primarySmtpAddress?: string;
  defaultDomain?: boolean;
}

export const sendEmailCommand = new Command('send-email')
  .description('Send mail as a published email app')
  .option('--app-name <name>', 'Published app name (looked up in the vault)')
  .addOption(new Option('--app-id <id>', 'App id, when not using the vault').argParser(parseGuid))
  .addOption(new Option('--tenant-id <id>', 'Tenant id, when not using the vault').argParser(parseGuid))
  .addOption(
    new Option('--cert-thumbprint <thumbprint>', 'Certificate thumbprint, when not using the vault')
      .argParser(parseThumbprint)
  )
  .option('--vault-name <name>', 'Vault holding the app details')
  .addOption(
    new Option('--store-location <location>', 'Certificate store location (defaults to the one recorded for the app)')
      .choices(['CurrentUser', 'LocalMachine'])
  )
  .addOption(new Option('--from <address>', 'Sender mailbox').argParser(parseEmail))
  .requiredOption('--to <address>', 'Recipient (repeatable)', collectEmail)
  .option('--cc <address>', 'Cc recipient (repeatable)', collectEmail)
  .option('--bcc <address>', 'Bcc recipient (repeatable)', collectEmail)
  .requiredOption('--subject <subject>', 'Message subject')
  .requiredOption('--body <body>', 'Message body')
  .addOption(new Option('--content-type <type>', 'Body content type').choices(['Text', 'HTML']).default('HTML'))
  .option('--attachment <path>', 'File to attach (repeatable)', collect)
  .option('--no-save-to-sent-items', 'Do not keep a copy in Sent Items')
  .option('--log-csv <path>', 'Export the audit log to CSV')
  .action(async (flags: SendEmailFlags) => {
    await runCommand('send-email', flags, async (ctx) => {
      const sender = new EmailSender({
        vault: ctx.vault,
        certificates: ctx.certificates,
        tokens: new CertificateAuthManager(),
        audit: ctx.audit,
      });

      const spinner = ora('Sending message...').start();
      try {
        const result = await sender.send({
          appName: flags.appName,
          appId: flags.appId,
          tenantId: flags.tenantId,
          certThumbprint: flags.certThumbprint,
          vaultName: flags.vaultName,
          storeLocation: flags.storeLocation,
          from: flags.from,
          to: flags.to,
          cc: flags.cc,
          bcc: flags.bcc,
          subject: flags.subject,
          body: flags.body,
          contentType: flags.contentType,
          attachments: flags.attachment,
          saveToSentItems: flags.saveToSentItems,
        });
        spinner.succeed(`Sent from ${result.from} to ${result.recipients} recipient(s)`);
      } catch (error) {
        spinner.fail('Send failed');
        throw error;
      }
    });
  });

export const createMailGroupCommand = new Command('create-mail-group')
  .description('Create a mail-enabled security group')
  .requiredOption('--name <name>', 'Group display name')
  .requiredOption('--alias <alias>', 'Mail alias')
  .addOption(
    new Option('--primary-smtp-address <address>', 'Group address').argParser(parseEmail)
  )
  .option('--default-domain', 'Build the address from the alias and the default accepted domain')
  .option('--log-csv <path>', 'Export the audit log to CSV')
  .action(async (flags: MailGroupFlags) => {
    await runCommand('create-mail-group', flags, async (ctx) => {
      const group = await new MailGroupService(ctx.sessions, ctx.audit).create({
        name: flags.name,
        alias: flags.alias,
        primarySmtpAddress: flags.primarySmtpAddress,
        useDefaultDomain: flags.defaultDomain,
      });
      console.log(chalk.green(`✓ Created group ${group.name} <${group.primarySmtpAddress}>`));
    });
  });
