import { ResolutionError } from '../errors';
import { log } from '../logger';
import { dedupeTargets, makeTarget } from '../target';
import { InstallTarget, ManagerContext, ManagerHandler } from '../types';

const INSTALLISH = ['add', 'install', 'sync', 'update'];

const NOOP_OPTIONS = ['-h', '--help', '--dry-run', '-V', '--version'];

const OPTIONS_WITH_VALUE = new Set(['-C', '--directory', '-P', '--project']);

//   - Installing tree-sitter (0.21.3)
//   • Updating tree-sitter (0.21.1 -> 0.21.3)
const OPERATION_LINE = /^[-•]?\s*(Installing|Updating|Downgrading)\s+(\S+)\s+\(([^)]+)\)(.*)$/;
const SUMMARY_LINE = /^Package operations:\s*(.*)$/;

function normalize(executable: string, command: string[]): string[] {
  if (command.length === 0) throw new Error('Received empty poetry command line');
  if (command[0] !== 'poetry') throw new Error('Received invalid poetry command line');
  return [executable, ...command.slice(1)];
}

function subcommand(command: string[]): string | null {
  for (let i = 1; i < command.length; i++) {
    const token = command[i];
    if (OPTIONS_WITH_VALUE.has(token)) {
      i++;
      continue;
    }
    if (!token.startsWith('-')) return token;
  }
  return null;
}

function parseVersion(output: string): string | null {
  // Poetry (version 1.8.3)
  const match = /Poetry \(version ([^)]+)\)/.exec(output);
  return match ? match[1].trim() : null;
}

function summaryCount(summary: string): number {
  let total = 0;
  for (const part of summary.split(',')) {
    const match = /^(\d+)\s+(install|installs|update|updates)$/.exec(part.trim());
    if (match) total += Number(match[1]);
  }
  return total;
}

/**
 * Reads the operations `poetry ... --dry-run` announces. Installs, updates and
 * downgrades each bring in the named release (the new one, for the latter two);
 * removals and skipped operations bring in nothing. The installation of the
 * project itself is not a target.
 */
export function parsePoetryDryRun(output: string): InstallTarget[] {
  const targets: InstallTarget[] = [];
  let expected: number | null = null;

  for (const raw of output.split('\n')) {
    const line = raw.trim();

    const summary = SUMMARY_LINE.exec(line);
    if (summary) {
      expected = summaryCount(summary[1]);
      continue;
    }

    if (line.startsWith('Installing the current project')) continue;

    const op = OPERATION_LINE.exec(line);
    if (!op) continue;
    const [, kind, name, versions, rest] = op;
    if (/\bSkipped\b/.test(rest)) continue;

    let version = versions.trim();
    if (kind !== 'Installing') {
      const arrow = version.split('->');
      if (arrow.length !== 2 || !arrow[1].trim()) {
        throw new ResolutionError(`Failed to parse poetry operation '${line}'`);
      }
      version = arrow[1].trim();
    }
    targets.push(makeTarget('PyPI', name, version));
  }

  if (targets.length > 0 && expected === null) {
    throw new ResolutionError('poetry dry run listed operations without a package operations summary');
  }
  if (expected !== null && expected !== targets.length) {
    throw new ResolutionError(
      `poetry dry run announced ${expected} installs and updates but listed ${targets.length}`,
    );
  }

  return dedupeTargets(targets);
}

/** Parses `poetry show`, skipping packages marked `(!)` as not installed. */
export function parsePoetryShow(output: string): InstallTarget[] {
  const targets: InstallTarget[] = [];
  for (const line of output.split('\n')) {
    const tokens = line.trim().split(/\s+/);
    if (tokens.length < 2 || !tokens[0]) continue;
    if (tokens[1] === '(!)') {
      log.debug(`Skipping not-installed poetry package '${tokens[0]}'`);
      continue;
    }
    targets.push(makeTarget('PyPI', tokens[0], tokens[1]));
  }
  return dedupeTargets(targets);
}

async function resolveTargets(ctx: ManagerContext, command: string[]): Promise<InstallTarget[]> {
  const sub = subcommand(command);
  if (!sub || !INSTALLISH.includes(sub) || NOOP_OPTIONS.some((opt) => command.includes(opt))) {
    return [];
  }

  const [file, ...args] = normalize(ctx.executable, command);
  const dryRun = await ctx.runner(file, [...args, '--dry-run', '--no-ansi'], {
    cwd: ctx.cwd,
    signal: ctx.signal,
  });
  if (dryRun.code !== 0) {
    log.info(`poetry dry run exited with status ${dryRun.code}: nothing will be installed`);
    return [];
  }
  return parsePoetryDryRun(dryRun.stdout);
}

async function listInstalled(ctx: ManagerContext): Promise<InstallTarget[]> {
  const listing = await ctx.runner(ctx.executable, ['show', '--no-ansi'], { cwd: ctx.cwd, signal: ctx.signal });
  if (listing.code !== 0) {
    throw new ResolutionError(`Failed to list installed poetry packages: ${listing.stderr.trim()}`);
  }
  return parsePoetryShow(listing.stdout);
}

const poetryHandler: ManagerHandler = {
  kind: 'poetry',
  label: 'poetry',
  ecosystem: 'PyPI',
  minVersion: '1.8.0',
  installish: new Set(INSTALLISH),
  defaultExecutables: () => ['poetry'],
  normalize,
  subcommand,
  isNoop: (command) => NOOP_OPTIONS.some((opt) => command.includes(opt)),
  versionArgs: ['--version'],
  parseVersion,
  resolveTargets,
  listInstalled,
};

export default poetryHandler;
