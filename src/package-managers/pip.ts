import * as path from 'path';
import { ResolutionError } from '../errors';
import { log } from '../logger';
import { dedupeTargets, makeTarget } from '../target';
import { InstallTarget, ManagerContext, ManagerHandler } from '../types';
import { isRecord, parseJson } from '../utils/json';

// Global pip options whose value is a separate token
const OPTIONS_WITH_VALUE = new Set([
  '--log',
  '--proxy',
  '--retries',
  '--timeout',
  '--exists-action',
  '--trusted-host',
  '--cert',
  '--client-cert',
  '--cache-dir',
  '--python',
  '--keyring-provider',
  '--use-feature',
  '--use-deprecated',
]);

const NOOP_OPTIONS = ['-h', '--help', '--dry-run'];

function assertPipCommand(command: string[]): void {
  if (command.length === 0) throw new Error('Received empty pip command line');
  if (command[0] !== 'pip') throw new Error('Received invalid pip command line');
}

function normalize(executable: string, command: string[]): string[] {
  assertPipCommand(command);
  return [executable, '-m', ...command];
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
  // pip 24.0 from /usr/lib/python3/dist-packages/pip (python 3.12)
  const match = /^pip (\S+)/.exec(output.trim());
  return match ? match[1] : null;
}

function sourceOf(item: Record<string, unknown>): string | undefined {
  const info = item.download_info;
  if (!isRecord(info) || typeof info.url !== 'string') return undefined;
  if (isRecord(info.vcs_info)) {
    return typeof info.vcs_info.vcs === 'string' ? `${info.vcs_info.vcs}+${info.url}` : info.url;
  }
  if (item.is_direct === true || isRecord(info.dir_info)) return info.url;
  return undefined;
}

/**
 * Turns the JSON installation report of `pip install --dry-run --report -` into
 * targets. Every entry must carry a name and a pinned version.
 */
export function parsePipReport(output: string): InstallTarget[] {
  const report = parseJson(output, 'pip installation report');
  if (!isRecord(report) || !Array.isArray(report.install)) {
    throw new ResolutionError('pip installation report has no "install" list');
  }

  return dedupeTargets(
    report.install.map((item: unknown) => {
      if (!isRecord(item) || !isRecord(item.metadata)) {
        throw new ResolutionError('Missing metadata for pip installation target');
      }
      const { name, version } = item.metadata;
      if (typeof name !== 'string' || !name) {
        throw new ResolutionError('Missing name for pip installation target');
      }
      if (typeof version !== 'string' || !version) {
        throw new ResolutionError(`Missing version for pip installation target ${name}`);
      }
      return makeTarget('PyPI', name, version, sourceOf(item));
    }),
  );
}

export function parsePipList(output: string): InstallTarget[] {
  const listing = parseJson(output, 'pip package listing');
  if (!Array.isArray(listing)) {
    throw new ResolutionError('pip package listing is not a list');
  }
  return dedupeTargets(
    listing.map((entry: unknown) => {
      if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.version !== 'string') {
        throw new ResolutionError('Malformed entry in pip package listing');
      }
      return makeTarget('PyPI', entry.name, entry.version);
    }),
  );
}

async function resolveTargets(ctx: ManagerContext, command: string[]): Promise<InstallTarget[]> {
  if (subcommand(command) !== 'install' || NOOP_OPTIONS.some((opt) => command.includes(opt))) {
    return [];
  }

  const [file, ...args] = normalize(ctx.executable, command);
  const dryRun = await ctx.runner(file, [...args, '--dry-run', '--quiet', '--report', '-'], {
    cwd: ctx.cwd,
    signal: ctx.signal,
  });
  if (dryRun.code !== 0) {
    // The real command fails the same way, so nothing would be installed
    log.info(`pip dry run exited with status ${dryRun.code}: nothing will be installed`);
    log.debug(dryRun.stderr.trim());
    return [];
  }
  return parsePipReport(dryRun.stdout);
}

async function listInstalled(ctx: ManagerContext): Promise<InstallTarget[]> {
  const [file, ...args] = normalize(ctx.executable, ['pip', 'list', '--format', 'json']);
  const listing = await ctx.runner(file, args, { cwd: ctx.cwd, signal: ctx.signal });
  if (listing.code !== 0) {
    throw new ResolutionError(`Failed to list installed pip packages: ${listing.stderr.trim()}`);
  }
  return parsePipList(listing.stdout);
}

const pipHandler: ManagerHandler = {
  kind: 'pip',
  label: 'pip',
  ecosystem: 'PyPI',
  minVersion: '22.2.0',
  installish: new Set(['install']),
  defaultExecutables: (env) => {
    // An active virtual environment wins over whatever shims sit on PATH
    const venv = env.VIRTUAL_ENV;
    const fromVenv = venv ? [path.join(venv, process.platform === 'win32' ? 'Scripts/python.exe' : 'bin/python')] : [];
    return [...fromVenv, 'python3', 'python'];
  },
  normalize,
  subcommand,
  isNoop: (command) => NOOP_OPTIONS.some((opt) => command.includes(opt)),
  versionArgs: ['-m', 'pip', '--version'],
  parseVersion,
  resolveTargets,
  listInstalled,
};

export default pipHandler;
