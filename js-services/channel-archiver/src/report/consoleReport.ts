/**
 * Console output for a finished sweep
 */

import type { ArchiveAction, RunResultRecord } from '../types';

const ACTION_ICONS: Record<ArchiveAction, string> = {
  none: '·',
  simulated: '📝',
  archived: '📦',
  failed: '❌',
};

export function formatRecordLine(record: RunResultRecord): string {
  const name = record.channelName ? `#${record.channelName}` : record.channelId;
  const { kind, reason } = record.verdict;
  let line = `${ACTION_ICONS[record.action]} ${name} (${record.channelId}) ${kind} → ${record.action}: ${reason}`;
  if (record.error) {
    line += ` [${record.error}]`;
  }
  return line;
}

export function summarizeActions(records: RunResultRecord[]): Record<ArchiveAction, number> {
  const counts: Record<ArchiveAction, number> = { none: 0, simulated: 0, archived: 0, failed: 0 };
  for (const record of records) {
    counts[record.action] += 1;
  }
  return counts;
}

export function displayReport(records: RunResultRecord[], live: boolean): void {
  console.log(`\n${'='.repeat(80)}`);
  console.log(live ? '📊 CHANNEL SWEEP SUMMARY' : '📊 CHANNEL SWEEP SUMMARY (DRY RUN)');
  console.log(`${'='.repeat(80)}\n`);

  for (const record of records) {
    console.log(formatRecordLine(record));
  }

  const counts = summarizeActions(records);
  console.log(`\nTotal channels: ${records.length}`);
  console.log(`  Kept: ${counts.none}`);
  if (live) {
    console.log(`  Archived: ${counts.archived}`);
    console.log(`  Failed: ${counts.failed}`);
  } else {
    console.log(`  Would archive: ${counts.simulated}`);
    console.log('\nDRY RUN: use --live to archive');
  }
}
