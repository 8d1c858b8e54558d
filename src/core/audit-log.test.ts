import fs from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { silentLogger, tempDir } from '../test-support/fakes';
import { AuditLog } from './audit-log';

const fixedNow = () => new Date('2024-05-01T12:00:00.000Z');

describe('AuditLog', () => {
  it('numbers entries in order and tags them with the active scope', async () => {
    const audit = new AuditLog({ sink: silentLogger(), now: fixedNow });
    audit.start('publish-mem-app');
    await audit.track('Step', async () => {
      audit.log('inside', 'Warning');
    });
    audit.log('after');

    const entries = audit.entries();
    expect(entries.map((e) => e.sequence)).toEqual([1, 2, 3, 4, 5]);
    expect(entries.map((e) => [e.scope, e.severity, e.message])).toEqual([
      ['publish-mem-app', 'Verbose', `Begin publish-mem-app (run ${audit.id})`],
      ['Step', 'Verbose', 'Begin Step'],
      ['Step', 'Warning', 'inside'],
      ['Step', 'Verbose', 'End Step'],
      ['publish-mem-app', 'Information', 'after'],
    ]);
  });

  it('records a failure and re-throws it', async () => {
    const audit = new AuditLog({ sink: silentLogger(), now: fixedNow });
    await expect(
      audit.track('Broken', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    const failure = audit.entries().find((e) => e.severity === 'Error');
    expect(failure).toMatchObject({ scope: 'Broken', message: 'Broken failed: boom' });
  });

  it('starts a fresh log for each command', () => {
    const audit = new AuditLog({ sink: silentLogger(), now: fixedNow });
    audit.start('first');
    audit.log('one');
    audit.start('second');
    expect(audit.entries()).toHaveLength(1);
    expect(audit.entries()[0].scope).toBe('second');
  });

  it('exports entries to CSV', () => {
    const audit = new AuditLog({ sink: silentLogger(), now: fixedNow });
    audit.log('hello, world');
    const file = path.join(tempDir('audit'), 'run.csv');
    audit.end(file);

    expect(fs.readFileSync(file, 'utf-8')).toBe(
      [
        'sequence,timestamp,severity,scope,message',
        '1,2024-05-01T12:00:00.000Z,Information,graphtoolkit,"hello, world"',
        '2,2024-05-01T12:00:00.000Z,Verbose,graphtoolkit,End graphtoolkit',
      ].join('\r\n')
    );
  });
});
