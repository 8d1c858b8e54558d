#!/usr/bin/env node
/**
 * graphtoolkit CLI
 * Entra ID app registrations for Graph mail, tenant audit and endpoint management
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { enableConsoleLogging } from '../utils/logger';
import { publishAuditAppCommand, publishEmailAppCommand, publishMemAppCommand } from './commands/publish';
import { createMailGroupCommand, sendEmailCommand } from './commands/mail';
import { vaultCommands } from './commands/vault';
import { certCommands } from './commands/cert';

const program = new Command();

program
  .name('graphtoolkit')
  .description('Entra ID app registrations for Graph mail, tenant audit and endpoint management')
  .version('1.0.0')
  .option('-v, --verbose', 'Verbose console logging');

program.hook('preAction', (thisCommand) => {
  const { verbose } = thisCommand.opts<{ verbose?: boolean }>();
  if (verbose) {
    enableConsoleLogging(true);
  }
});

// Register commands
program.addCommand(createMailGroupCommand);
program.addCommand(publishEmailAppCommand);
program.addCommand(publishAuditAppCommand);
program.addCommand(publishMemAppCommand);
program.addCommand(sendEmailCommand);
program.addCommand(vaultCommands);
program.addCommand(certCommands);

// Global error handling
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`Error: ${err.message}`));
  process.exit(1);
});

// Show help if no command specified
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
