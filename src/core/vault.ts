/**
 * Secret Vault
 * SQLite-backed local vault for published app credentials
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { SecretPlan, VaultSecret } from '../types';
import { PATHS } from '../utils/constants';
import { decrypt, encrypt } from '../utils/crypto';
import { ConflictError } from '../utils/errors';
import { logger } from '../utils/logger';
import { AuditLog } from './audit-log';

interface SecretRow {
  vault_name: string;
  name: string;
  value: string;
  created_at: string;
  updated_at: string;
}

export class SecretVault {
  private db: Database.Database;

  /**
   * @param location data directory, or ":memory:" for a throwaway vault
   */
  constructor(location?: string) {
    if (location === ':memory:') {
      this.db = new Database(':memory:');
    } else {
      const dir = location || path.resolve(PATHS.DATA_DIR);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      this.db = new Database(path.join(dir, PATHS.VAULT_FILE));
      this.db.pragma('journal_mode = WAL');
    }

    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vaults (
        name TEXT PRIMARY KEY COLLATE NOCASE,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS secrets (
        vault_name TEXT NOT NULL COLLATE NOCASE,
        name TEXT NOT NULL COLLATE NOCASE,
        value TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (vault_name, name)
      );
    `);
  }

  hasVault(vaultName: string): boolean {
    return this.db.prepare('SELECT 1 FROM vaults WHERE name = ?').get(vaultName) !== undefined;
  }

  registerVault(vaultName: string): void {
    this.db
      .prepare('INSERT OR IGNORE INTO vaults (name, created_at) VALUES (?, ?)')
      .run(vaultName, new Date().toISOString());
    logger.debug(`Registered vault ${vaultName}`);
  }

  listVaults(): string[] {
    const rows = this.db
      .prepare<[], { name: string }>('SELECT name FROM vaults ORDER BY name')
      .all();
    return rows.map((r) => r.name);
  }

  hasSecret(vaultName: string, name: string): boolean {
    return (
      this.db
        .prepare('SELECT 1 FROM secrets WHERE vault_name = ? AND name = ?')
        .get(vaultName, name) !== undefined
    );
  }

  getSecret(vaultName: string, name: string): VaultSecret | undefined {
    const row = this.db
      .prepare<[string, string], SecretRow>(
        'SELECT * FROM secrets WHERE vault_name = ? AND name = ?'
      )
      .get(vaultName, name);
    return row ? this.rowToSecret(row) : undefined;
  }

  setSecret(vaultName: string, name: string, value: string): void {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO secrets (vault_name, name, value, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(vaultName, name, encrypt(value), now, now);
  }

  removeSecret(vaultName: string, name: string): boolean {
    const result = this.db
      .prepare('DELETE FROM secrets WHERE vault_name = ? AND name = ?')
      .run(vaultName, name);
    return result.changes > 0;
  }

  /**
   * Secret metadata for a vault; values stay encrypted
   */
  listSecrets(vaultName: string): Array<Omit<VaultSecret, 'value'>> {
    const rows = this.db
      .prepare<[string], SecretRow>('SELECT * FROM secrets WHERE vault_name = ? ORDER BY name')
      .all(vaultName);
    return rows.map((r) => ({
      vaultName: r.vault_name,
      name: r.name,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    }));
  }

  close(): void {
    this.db.close();
  }

  private rowToSecret(row: SecretRow): VaultSecret {
    return {
      vaultName: row.vault_name,
      name: row.name,
      value: decrypt(row.value),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

/**
 * Persists a result object as JSON under a named secret
 */
export class SecretStoreWriter {
  private vault: SecretVault;
  private audit: AuditLog;

  constructor(vault: SecretVault, audit: AuditLog) {
    this.vault = vault;
    this.audit = audit;
  }

  plan(name: string, vaultName: string, overwrite: boolean): SecretPlan {
    if (this.vault.hasVault(vaultName) && this.vault.hasSecret(vaultName, name)) {
      if (!overwrite) {
        throw new ConflictError(
          `Secret "${name}" already exists in vault "${vaultName}". Use the overwrite option to replace it.`,
          { name, vaultName }
        );
      }
      return { name, vaultName, action: 'overwrite' };
    }
    return { name, vaultName, action: 'create' };
  }

  async store(name: string, payload: object, vaultName: string, overwrite: boolean): Promise<string> {
    return this.audit.track('SecretStoreWriter.store', async () => {
      if (!this.vault.hasVault(vaultName)) {
        this.vault.registerVault(vaultName);
        this.audit.log(`Registered vault ${vaultName}`);
      }

      const plan = this.plan(name, vaultName, overwrite);
      if (plan.action === 'overwrite') {
        this.vault.removeSecret(vaultName, name);
        this.audit.log(`Removed existing secret ${name} from ${vaultName}`, 'Warning');
      }

      this.vault.setSecret(vaultName, name, JSON.stringify(payload));
      this.audit.log(`Stored secret ${name} in vault ${vaultName}`);
      return name;
    });
  }
}
