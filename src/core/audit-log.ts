/**
 * Audit Log
 * Ordered, append-only record of one command invocation
 */

import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'winston';
import { AuditLogEntry, AuditSeverity } from '../types';
import { errorMessage } from '../utils/errors';
import { logger as defaultLogger } from '../utils/logger';

const WINSTON_LEVELS: Record<AuditSeverity, string> = {
  Verbose: 'debug',
  Information: 'info',
  Warning: 'warn',
  Error: 'error',
};

export class AuditLog {
  private items: AuditLogEntry[] = [];
  private scopes: string[] = [];
  private runId: string = uuidv4();
  private sink: Logger;
  private now: () => Date;

  constructor(options?: { sink?: Logger; now?: () => Date }) {
    this.sink = options?.sink || defaultLogger;
    this.now = options?.now || (() => new Date());
  }

  get id(): string {
    return this.runId;
  }

  /**
   * Reset the log for a new top-level command
   */
  start(command: string): void {
    this.items = [];
    this.scopes = [command];
    this.runId = uuidv4();
    this.log(`Begin ${command} (run ${this.runId})`, 'Verbose');
  }

  beginFunction(name: string): void {
    this.scopes.push(name);
    this.log(`Begin ${name}`, 'Verbose');
  }

  endFunction(name: string): void {
    this.log(`End ${name}`, 'Verbose');
    const index = this.scopes.lastIndexOf(name);
    if (index > 0) {
      this.scopes.splice(index);
    }
  }

  log(message: string, severity: AuditSeverity = 'Information'): void {
    const entry: AuditLogEntry = {
      sequence: this.items.length + 1,
      timestamp: this.now().toISOString(),
      severity,
      scope: this.currentScope(),
      message,
    };
    this.items.push(entry);
    this.sink.log(WINSTON_LEVELS[severity], `[${entry.scope}] ${message}`);
  }

  /**
   * Run fn inside begin/end markers; failures are recorded and re-thrown unchanged
   */
  async track<T>(name: string, fn: () => Promise<T>): Promise<T> {
    this.beginFunction(name);
    try {
      return await fn();
    } catch (error) {
      this.log(`${name} failed: ${errorMessage(error)}`, 'Error');
      throw error;
    } finally {
      this.endFunction(name);
    }
  }

  entries(): AuditLogEntry[] {
    return this.items.map((e) => ({ ...e }));
  }

  /**
   * Close the run and optionally export every entry to CSV
   */
  end(outputPath?: string): AuditLogEntry[] {
    const command = this.scopes[0] || 'graphtoolkit';
    this.scopes = this.scopes.slice(0, 1);
    this.log(`End ${command}`, 'Verbose');

    if (outputPath) {
      const dir = path.dirname(outputPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      fs.writeFileSync(outputPath, this.toCsv());
      this.sink.info(`Exported ${this.items.length} audit entries to ${outputPath}`);
    }

    return this.entries();
  }

  toCsv(): string {
    return Papa.unparse(this.items, {
      columns: ['sequence', 'timestamp', 'severity', 'scope', 'message'],
    });
  }

  private currentScope(): string {
    return this.scopes[this.scopes.length - 1] || 'graphtoolkit';
  }
}
