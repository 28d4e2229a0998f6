import { Ecosystem, InstallTarget } from './types';

export function makeTarget(
  ecosystem: Ecosystem,
  name: string,
  version: string,
  source?: string,
): InstallTarget {
  const target: InstallTarget = { ecosystem, name, version };
  if (source) target.source = source;
  return Object.freeze(target);
}

/**
 * Identity of a target: ecosystem, canonical name and version. The source hint
 * does not take part, and PyPI spellings such as `Django` and `django` coincide.
 */
export function targetKey(target: InstallTarget): string {
  return `${target.ecosystem}|${canonicalName(target.ecosystem, target.name)}@${target.version}`;
}

export function formatTarget(target: InstallTarget): string {
  return `${target.name}@${target.version}`;
}

export function sameTarget(a: InstallTarget, b: InstallTarget): boolean {
  return targetKey(a) === targetKey(b);
}

/**
 * Removes repeated targets, keeping the first occurrence so that reporting
 * follows the order the manager printed them in.
 */
export function dedupeTargets(targets: Iterable<InstallTarget>): InstallTarget[] {
  const seen = new Map<string, InstallTarget>();
  for (const target of targets) {
    const key = targetKey(target);
    if (!seen.has(key)) seen.set(key, target);
  }
  return Array.from(seen.values());
}

/**
 * Splits an npm-style `name@version` spec, taking care of scoped names
 * (`@scope/name@1.0.0`). Returns null when either half is missing.
 */
export function splitSpec(spec: string): { name: string; version: string } | null {
  const at = spec.lastIndexOf('@');
  if (at <= 0) return null;
  const name = spec.slice(0, at);
  const version = spec.slice(at + 1);
  if (!name || !version) return null;
  return { name, version };
}

const ECOSYSTEM_ALIASES = new Map<string, Ecosystem>([
  ['npm', 'npm'],
  ['pypi', 'PyPI'],
  ['pip', 'PyPI'],
  ['python', 'PyPI'],
]);

export function parseEcosystem(value: string): Ecosystem | null {
  return ECOSYSTEM_ALIASES.get(value.trim().toLowerCase()) ?? null;
}

/**
 * Canonical package name for comparisons: PyPI names are case-insensitive and
 * treat runs of `-`, `_` and `.` alike, npm names are compared as written.
 */
export function canonicalName(ecosystem: Ecosystem, name: string): string {
  return ecosystem === 'PyPI' ? name.toLowerCase().replace(/[-_.]+/g, '-') : name;
}
