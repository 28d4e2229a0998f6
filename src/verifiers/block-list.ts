import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { log } from '../logger';
import { canonicalName, formatTarget, parseEcosystem } from '../target';
import { BlockListEntry, Ecosystem, Finding, InstallTarget, Verifier, VerifyOptions } from '../types';
import { loadBlockListCsv, parseAction } from '../utils/csv';
import { isRecord } from '../utils/json';

function entriesFromYamlItem(item: unknown): BlockListEntry[] {
  if (!isRecord(item) || typeof item.name !== 'string' || !item.name) {
    throw new Error('every entry needs a name');
  }
  const name = item.name;

  const action = parseAction(typeof item.action === 'string' ? item.action : '');
  if (!action) throw new Error(`entry '${name}' has an unknown action`);

  let ecosystem: Ecosystem | undefined;
  if (item.ecosystem !== undefined) {
    const parsed = typeof item.ecosystem === 'string' ? parseEcosystem(item.ecosystem) : null;
    if (!parsed) throw new Error(`entry '${name}' has an unknown ecosystem`);
    ecosystem = parsed;
  }

  const reason = typeof item.reason === 'string' ? item.reason : undefined;
  const versions: unknown[] = Array.isArray(item.versions)
    ? item.versions
    : item.version !== undefined
      ? [item.version]
      : [];

  const base: BlockListEntry = { name, action, ...(ecosystem ? { ecosystem } : {}), ...(reason ? { reason } : {}) };
  if (versions.length === 0) return [base];
  return versions.map((v) => {
    const version = String(v);
    return version === '*' ? base : { ...base, version };
  });
}

/**
 * Parses a YAML block list: a list of entries, each with a `name` and
 * optionally `ecosystem`, `version` or `versions`, `action` and `reason`.
 */
export function parseBlockListYaml(raw: string): BlockListEntry[] {
  const doc = yaml.load(raw);
  if (doc === undefined || doc === null) return [];
  if (!Array.isArray(doc)) {
    throw new Error('block list must be a list of entries');
  }
  return doc.flatMap(entriesFromYamlItem);
}

export function loadBlockLists(dir: string): BlockListEntry[] {
  if (!fs.existsSync(dir)) {
    log.debug(`No block list directory at ${dir}`);
    return [];
  }

  const entries: BlockListEntry[] = [];
  for (const file of fs.readdirSync(dir).sort()) {
    const filePath = path.join(dir, file);
    const ext = path.extname(file).toLowerCase();
    try {
      if (ext === '.yml' || ext === '.yaml') {
        entries.push(...parseBlockListYaml(fs.readFileSync(filePath, 'utf8')));
      } else if (ext === '.csv') {
        entries.push(...loadBlockListCsv(filePath));
      }
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      log.warn(`Failed to import block list ${filePath}: ${msg}`);
    }
  }
  return entries;
}

function matches(entry: BlockListEntry, target: InstallTarget): boolean {
  if (entry.ecosystem && entry.ecosystem !== target.ecosystem) return false;
  if (canonicalName(target.ecosystem, entry.name) !== canonicalName(target.ecosystem, target.name)) return false;
  return entry.version === undefined || entry.version === target.version;
}

/** Flags targets named in the user's own block lists: `block` entries are critical, `warn` entries warnings. */
export class BlockListVerifier implements Verifier {
  readonly name = 'block-list';

  constructor(private readonly entries: readonly BlockListEntry[]) {}

  static fromDirectory(dir: string): BlockListVerifier {
    return new BlockListVerifier(loadBlockLists(dir));
  }

  async verify(targets: readonly InstallTarget[], _options?: VerifyOptions): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const target of targets) {
      for (const entry of this.entries) {
        if (!matches(entry, target)) continue;
        findings.push({
          target,
          severity: entry.action === 'block' ? 'critical' : 'warning',
          verifier: this.name,
          message: entry.reason ?? `${formatTarget(target)} is on a user block list`,
        });
      }
    }
    return findings;
  }
}
