import fs from 'node:fs';
import path from 'node:path';
import type { RunResultRecord } from '../types';

export const CSV_HEADER = ['channel_id', 'channel_name', 'verdict', 'action', 'reason'] as const;

/**
 * Quote a field when it holds a comma, quote or line break
 */
export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(records: RunResultRecord[]): string {
  const lines = [
    CSV_HEADER.join(','),
    ...records.map((record) =>
      [
        record.channelId,
        record.channelName ?? '',
        record.verdict.kind,
        record.action,
        record.error ? `${record.verdict.reason}: ${record.error}` : record.verdict.reason,
      ]
        .map(escapeCsvField)
        .join(',')
    ),
  ];
  return `${lines.join('\n')}\n`;
}

export function writeCsvReport(outputPath: string, records: RunResultRecord[]): string {
  const resolved = path.resolve(process.cwd(), outputPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, toCsv(records), 'utf-8');
  return resolved;
}
