/**
 * Publish CLI commands
 */

import { Command, Option } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { AuditAppPublisher, EmailAppPublisher, MemAppPublisher } from '../../core/publish';
import { PublishOutcome, PublishPlan, PublishedAppResult } from '../../types';
import {
  PublishFlags,
  parseEmail,
  parseGuid,
  printOutcome,
  printPlan,
  publishOptions,
  runCommand,
  toPublishOptions,
} from '../shared';

interface EmailAppFlags extends PublishFlags {
  authorizedSender: string;
  sendingGroup: string;
  existingAppObjectId?: string;
}

interface MemAppFlags extends PublishFlags {
  readWrite?: boolean;
}

function withPublishOptions(command: Command): Command {
  publishOptions().forEach((option) => command.addOption(option));
  return command;
}

/**
 * Print the plan; apply it only when confirmed
 */
async function planThenApply<TPlan extends PublishPlan>(
  flags: PublishFlags,
  plan: () => Promise<TPlan>,
  apply: (plan: TPlan) => Promise<PublishOutcome<PublishedAppResult>>
): Promise<void> {
  const spinner = ora('Checking tenant state...').start();
  const pending = await plan().catch((error: unknown) => {
    spinner.fail('Planning failed');
    throw error;
  });
  spinner.succeed('Plan ready');
  printPlan(pending);

  if (!flags.confirm) {
    console.log(chalk.yellow('\nNo changes made. Re-run with --confirm to apply.'));
    return;
  }

  const applying = ora('Applying changes...').start();
  const outcome = await apply(pending).catch((error: unknown) => {
    applying.fail('Apply failed');
    throw error;
  });
  applying.succeed(`Published ${outcome.result.displayName}`);
  printOutcome(outcome);
}

export const publishEmailAppCommand = withPublishOptions(
  new Command('publish-email-app')
    .description('Register an app that sends mail as one user, restricted to a mail-enabled group')
    .addOption(
      new Option('--authorized-sender <upn>', 'Mailbox the app sends as')
        .argParser(parseEmail)
        .makeOptionMandatory()
    )
    .addOption(
      new Option('--sending-group <address>', 'Mail-enabled security group that scopes the app')
        .argParser(parseEmail)
        .makeOptionMandatory()
    )
    .addOption(
      new Option('--existing-app-object-id <id>', 'Add a certificate to this app instead of creating one')
        .argParser(parseGuid)
    )
).action(async (flags: EmailAppFlags) => {
  await runCommand('publish-email-app', flags, async (ctx) => {
    const publisher = new EmailAppPublisher(ctx);
    await planThenApply(
      flags,
      () =>
        publisher.plan({
          ...toPublishOptions(flags),
          authorizedSenderUserName: flags.authorizedSender,
          mailEnabledSendingGroup: flags.sendingGroup,
          existingAppObjectId: flags.existingAppObjectId,
        }),
      (plan) => publisher.apply(plan)
    );
  });
});

export const publishAuditAppCommand = withPublishOptions(
  new Command('publish-audit-app').description(
    'Register a read-only audit app with Graph, SharePoint and Exchange permissions'
  )
).action(async (flags: PublishFlags) => {
  await runCommand('publish-audit-app', flags, async (ctx) => {
    const publisher = new AuditAppPublisher(ctx);
    await planThenApply(
      flags,
      () => publisher.plan(toPublishOptions(flags)),
      (plan) => publisher.apply(plan)
    );
  });
});

export const publishMemAppCommand = withPublishOptions(
  new Command('publish-mem-app')
    .description('Register an endpoint management policy app')
    .option('--read-write', 'Request read-write permissions instead of read-only')
).action(async (flags: MemAppFlags) => {
  await runCommand('publish-mem-app', flags, async (ctx) => {
    const publisher = new MemAppPublisher(ctx);
    await planThenApply(
      flags,
      () => publisher.plan({ ...toPublishOptions(flags), readWrite: flags.readWrite }),
      (plan) => publisher.apply(plan)
    );
  });
});
