import { jest, describe, test, expect, afterEach } from '@jest/globals';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { keepVerdict } from '../classification/classifyChannel';
import { displayReport, formatRecordLine, summarizeActions } from '../report/consoleReport';
import { escapeCsvField, toCsv, writeCsvReport } from '../report/csvReport';
import type { RunResultRecord } from '../types';

const records: RunResultRecord[] = [
  {
    channelId: 'C1',
    channelName: 'proj-x',
    verdict: {
      kind: 'archive_by_domain',
      reason: 'all members belong to acme.com',
      activityAgeMs: null,
      memberDomains: ['acme.com'],
    },
    action: 'simulated',
    error: null,
  },
  {
    channelId: 'C2',
    channelName: null,
    verdict: keepVerdict('data unavailable'),
    action: 'none',
    error: 'conversations.members failed: missing_scope',
  },
  {
    channelId: 'C3',
    channelName: 'ops, "legacy"',
    verdict: {
      kind: 'archive_by_inactivity',
      reason: 'no activity for 90 days (threshold 30 days)',
      activityAgeMs: 90,
      memberDomains: [],
    },
    action: 'failed',
    error: 'conversations.archive failed: restricted_action',
  },
];

describe('formatRecordLine', () => {
  test('shows channel, verdict, action and reason', () => {
    expect(formatRecordLine(records[0])).toBe(
      '📝 #proj-x (C1) archive_by_domain → simulated: all members belong to acme.com'
    );
  });

  test('falls back to the id and appends the error', () => {
    expect(formatRecordLine(records[1])).toBe(
      '· C2 (C2) keep → none: data unavailable [conversations.members failed: missing_scope]'
    );
  });
});

describe('summarizeActions', () => {
  test('counts records per action', () => {
    expect(summarizeActions(records)).toEqual({ none: 1, simulated: 1, archived: 0, failed: 1 });
  });
});

describe('displayReport', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('prints each record and the dry-run totals', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    displayReport(records, false);

    const lines = log.mock.calls.map(([line]) => line);
    expect(lines).toContain(formatRecordLine(records[2]));
    expect(lines).toContain('\nTotal channels: 3');
    expect(lines).toContain('  Would archive: 1');
    expect(lines).not.toContain('  Archived: 0');
  });

  test('prints archived and failed totals in live mode', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    displayReport(records, true);

    const lines = log.mock.calls.map(([line]) => line);
    expect(lines).toContain('  Archived: 0');
    expect(lines).toContain('  Failed: 1');
  });
});

describe('CSV report', () => {
  test('quotes fields that need it', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
  });

  test('renders one row per record under the header', () => {
    expect(toCsv(records)).toBe(
      [
        'channel_id,channel_name,verdict,action,reason',
        'C1,proj-x,archive_by_domain,simulated,all members belong to acme.com',
        'C2,,keep,none,data unavailable: conversations.members failed: missing_scope',
        'C3,"ops, ""legacy""",archive_by_inactivity,failed,no activity for 90 days (threshold 30 days): conversations.archive failed: restricted_action',
        '',
      ].join('\n')
    );
  });

  test('writes the file, creating missing directories', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'channel-sweeper-'));
    try {
      const written = writeCsvReport(path.join(dir, 'nested', 'report.csv'), records.slice(0, 1));

      expect(written).toBe(path.join(dir, 'nested', 'report.csv'));
      expect(fs.readFileSync(written, 'utf-8')).toBe(
        'channel_id,channel_name,verdict,action,reason\n' +
          'C1,proj-x,archive_by_domain,simulated,all members belong to acme.com\n'
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
