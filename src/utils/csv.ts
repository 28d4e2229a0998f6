import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { log } from '../logger';
import { parseEcosystem } from '../target';
import { BlockAction, BlockListEntry } from '../types';
import { isRecord } from './json';

function pick(record: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value) return value;
  }
  return '';
}

export function parseAction(value: string): BlockAction | null {
  const action = value.toLowerCase();
  if (!action || action === 'block' || action === 'critical') return 'block';
  if (action === 'warn' || action === 'warning') return 'warn';
  return null;
}

export function loadBlockListCsv(filePath: string): BlockListEntry[] {
  const raw = fs.readFileSync(filePath, 'utf8');
  return parseBlockListCsv(raw);
}

/**
 * Reads a block list with a header row. Recognised columns are
 * `ecosystem`, `name` (or `package`/`package_name`), `version`, `action`
 * (`block` or `warn`, default `block`) and `reason`.
 */
export function parseBlockListCsv(raw: string): BlockListEntry[] {
  const records: unknown = parse(raw, {
    columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    comment: '#',
  });
  if (!Array.isArray(records)) return [];

  const entries: BlockListEntry[] = [];
  for (const record of records) {
    if (!isRecord(record)) continue;
    const name = pick(record, ['name', 'package', 'package name', 'package_name']);
    if (!name) continue;

    const action = parseAction(pick(record, ['action', 'severity']));
    if (!action) {
      log.warn(`Skipping block list entry '${name}' with unknown action`);
      continue;
    }

    const entry: BlockListEntry = { name, action };
    const ecosystem = pick(record, ['ecosystem']);
    if (ecosystem) {
      const parsed = parseEcosystem(ecosystem);
      if (!parsed) {
        log.warn(`Skipping block list entry '${name}' with unknown ecosystem '${ecosystem}'`);
        continue;
      }
      entry.ecosystem = parsed;
    }
    const version = pick(record, ['version', 'package version', 'package_version']);
    if (version && version !== '*') entry.version = version;
    const reason = pick(record, ['reason', 'message']);
    if (reason) entry.reason = reason;
    entries.push(entry);
  }
  return entries;
}
