/**
 * Vault CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { table } from 'table';
import { SecretVault } from '../../core/vault';
import { DEFAULTS } from '../../utils/constants';

export const vaultCommands = new Command('vault')
  .description('Inspect the local vault of published apps');

// List secrets
vaultCommands
  .command('list')
  .alias('ls')
  .description('List stored secrets')
  .option('--vault-name <name>', 'Vault name', DEFAULTS.VAULT_NAME)
  .action((options: { vaultName: string }) => {
    const vault = new SecretVault();
    try {
      const secrets = vault.listSecrets(options.vaultName);
      if (secrets.length === 0) {
        console.log(chalk.yellow(`No secrets in vault "${options.vaultName}".`));
        return;
      }

      const data = [
        ['Name', 'Created', 'Updated'],
        ...secrets.map((s) => [
          s.name,
          new Date(s.createdAt).toLocaleString(),
          new Date(s.updatedAt).toLocaleString(),
        ]),
      ];
      console.log(table(data));
    } finally {
      vault.close();
    }
  });

// Show a secret
vaultCommands
  .command('show <name>')
  .description('Show a stored app result')
  .option('--vault-name <name>', 'Vault name', DEFAULTS.VAULT_NAME)
  .action((name: string, options: { vaultName: string }) => {
    const vault = new SecretVault();
    try {
      const secret = vault.getSecret(options.vaultName, name);
      if (!secret) {
        console.error(chalk.red(`Secret "${name}" not found in vault "${options.vaultName}"`));
        process.exitCode = 1;
        return;
      }
      const value: unknown = JSON.parse(secret.value);
      console.log(JSON.stringify(value, null, 2));
    } finally {
      vault.close();
    }
  });
