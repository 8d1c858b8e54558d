/**
 * Certificate CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { table } from 'table';
import { CertificateStore } from '../../core/certificates';
import { StoreLocation } from '../../types';
import { errorMessage } from '../../utils/errors';
import { normalizeThumbprint } from '../../utils/validation';
import { parseThumbprint, storeLocationOption } from '../shared';

const store = new CertificateStore();

export const certCommands = new Command('cert')
  .description('Manage toolkit certificates');

// List certificates
certCommands
  .command('list')
  .alias('ls')
  .description('List certificates in a store location')
  .addOption(storeLocationOption())
  .action((options: { storeLocation: StoreLocation }) => {
    const certs = store.list(options.storeLocation);
    if (certs.length === 0) {
      console.log(chalk.yellow(`No certificates in ${options.storeLocation}.`));
      return;
    }

    const data = [
      ['Thumbprint', 'Subject', 'Expires', 'Key'],
      ...certs.map((c) => [
        c.thumbprint,
        c.subjectName,
        new Date(c.expiryTimestamp).toLocaleDateString(),
        c.exportPolicy,
      ]),
    ];
    console.log(table(data));
  });

// Export certificate
certCommands
  .command('export <thumbprint>')
  .description('Write certificate and private key as PEM files')
  .addOption(storeLocationOption())
  .option('-o, --out <dir>', 'Output directory', '.')
  .action((thumbprint: string, options: { storeLocation: StoreLocation; out: string }) => {
    try {
      const thumb = normalizeThumbprint(parseThumbprint(thumbprint));
      const { certPem, keyPem } = store.exportPem(options.storeLocation, thumb);
      fs.mkdirSync(options.out, { recursive: true });
      const certFile = path.join(options.out, `${thumb}.crt.pem`);
      const keyFile = path.join(options.out, `${thumb}.key.pem`);
      fs.writeFileSync(certFile, certPem);
      fs.writeFileSync(keyFile, keyPem, { mode: 0o600 });
      console.log(chalk.green(`✓ Wrote ${certFile} and ${keyFile}`));
    } catch (error) {
      console.error(chalk.red(`Export failed: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
