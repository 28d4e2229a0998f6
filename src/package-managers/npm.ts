import * as fs from 'fs';
import * as path from 'path';
import { ResolutionError } from '../errors';
import { log } from '../logger';
import { dedupeTargets, makeTarget, splitSpec } from '../target';
import { InstallTarget, ManagerContext, ManagerHandler } from '../types';
import { isRecord, parseJson } from '../utils/json';

// https://docs.npmjs.com/cli/v10/commands/npm-install
const INSTALL_ALIASES = [
  'install',
  'add',
  'i',
  'in',
  'ins',
  'inst',
  'insta',
  'instal',
  'isnt',
  'isnta',
  'isntal',
  'isntall',
];

const OPTIONS_WITH_VALUE = new Set([
  '--prefix',
  '--loglevel',
  '--registry',
  '--cache',
  '--userconfig',
  '--globalconfig',
  '--workspace',
  '-w',
  '--tag',
  '--omit',
  '--include',
  '--install-strategy',
  '--before',
  '--otp',
]);

const NOOP_OPTIONS = ['-h', '--help', '--dry-run'];

export interface NpmLockPackage {
  version?: string;
}

export interface NpmDryRunLog {
  placed: InstallTarget[];
  handles: string[];
  sillyLines: number;
}

function normalize(executable: string, command: string[]): string[] {
  if (command.length === 0) throw new Error('Received empty npm command line');
  if (command[0] !== 'npm') throw new Error('Received invalid npm command line');
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
  const version = output.trim();
  return /^\d+\.\d+\.\d+\S*$/.test(version) ? version : null;
}

/**
 * Picks the lines of `npm ... --dry-run --loglevel silly` that describe the tree
 * being built: `placeDep` lines name the exact `name@version` placed, and
 * `ADD`/`CHANGE` lines name the tree location that would be written.
 *
 *   npm sill placeDep ROOT react@18.3.1 OK for:  want: *
 *   npm sill ADD node_modules/react
 */
export function parseDryRunLog(stderr: string): NpmDryRunLog {
  const placed: InstallTarget[] = [];
  const handles: string[] = [];
  let sillyLines = 0;

  for (const line of stderr.split('\n')) {
    const tokens = line.trim().split(/\s+/);
    if (tokens[0] !== 'npm' || (tokens[1] !== 'sill' && tokens[1] !== 'silly')) continue;
    sillyLines++;

    if (tokens[2] === 'placeDep') {
      const spec = tokens[4];
      const parsed = spec ? splitSpec(spec) : null;
      if (!parsed) {
        throw new ResolutionError(`Failed to parse npm installation target specification '${spec ?? line}'`);
      }
      placed.push(makeTarget('npm', parsed.name, parsed.version));
    } else if ((tokens[2] === 'ADD' || tokens[2] === 'CHANGE') && tokens[3]) {
      handles.push(tokens[3]);
    }
  }

  return { placed, handles, sillyLines };
}

/** `node_modules/a/node_modules/@scope/b` -> `@scope/b` */
export function nameFromHandle(handle: string): string {
  const idx = handle.lastIndexOf('node_modules/');
  return idx === -1 ? handle : handle.slice(idx + 'node_modules/'.length);
}

/**
 * Matches every tree location to a concrete version, first against the placed
 * dependencies and then against the lockfile. Anything left unexplained on
 * either side means the output was not understood.
 */
export function matchTargets(
  dryRun: NpmDryRunLog,
  lockPackages: Record<string, NpmLockPackage>,
): InstallTarget[] {
  const placed = [...dryRun.placed];
  const targets: InstallTarget[] = [];

  for (const handle of dryRun.handles) {
    const name = nameFromHandle(handle);
    const idx = placed.findIndex((p) => p.name === name);
    if (idx !== -1) {
      targets.push(placed[idx]);
      placed.splice(idx, 1);
      continue;
    }

    const entry = lockPackages[handle];
    if (entry) {
      if (!entry.version) {
        throw new ResolutionError(`Malformed lockfile entry for npm installation target '${name}'`);
      }
      log.debug(`Matched npm installation target '${name}' to lockfile entry '${handle}'`);
      targets.push(makeTarget('npm', name, entry.version));
      continue;
    }

    throw new ResolutionError(`Failed to resolve npm installation target '${name}' to a precise version`);
  }

  if (placed.length > 0) {
    throw new ResolutionError(
      `Failed to match placed npm dependencies to installation targets: ${placed.map((p) => `${p.name}@${p.version}`).join(', ')}`,
    );
  }

  return dedupeTargets(targets);
}

function readLockPackages(lockPath: string): Record<string, NpmLockPackage> {
  if (!fs.existsSync(lockPath)) {
    log.debug(`No lockfile at ${lockPath}`);
    return {};
  }
  try {
    const lockJson: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf8'));
    if (!isRecord(lockJson) || !isRecord(lockJson.packages)) return {};
    const packages: Record<string, NpmLockPackage> = {};
    for (const [handle, info] of Object.entries(lockJson.packages)) {
      if (!isRecord(info)) continue;
      packages[handle] = { version: typeof info.version === 'string' ? info.version : undefined };
    }
    return packages;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    log.warn(`Unable to parse ${path.basename(lockPath)}: ${msg}`);
    return {};
  }
}

async function findLockFile(ctx: ManagerContext): Promise<string | null> {
  const prefix = await ctx.runner(ctx.executable, ['prefix'], { cwd: ctx.cwd, signal: ctx.signal });
  const root = prefix.stdout.trim();
  if (prefix.code !== 0 || !root) {
    log.debug("'npm prefix' returned no project root");
    return null;
  }
  return path.join(root, 'package-lock.json');
}

async function resolveTargets(ctx: ManagerContext, command: string[]): Promise<InstallTarget[]> {
  const sub = subcommand(command);
  if (!sub || !INSTALL_ALIASES.includes(sub) || NOOP_OPTIONS.some((opt) => command.includes(opt))) {
    return [];
  }

  const [file, ...args] = normalize(ctx.executable, command);
  const dryRun = await ctx.runner(file, [...args, '--dry-run', '--loglevel', 'silly'], {
    cwd: ctx.cwd,
    signal: ctx.signal,
  });
  if (dryRun.code !== 0) {
    log.info(`npm dry run exited with status ${dryRun.code}: nothing will be installed`);
    return [];
  }

  const parsed = parseDryRunLog(dryRun.stderr);
  if (parsed.sillyLines === 0) {
    throw new ResolutionError('npm dry run produced no silly-level log output');
  }
  if (parsed.handles.length === 0) {
    if (parsed.placed.length > 0) {
      throw new ResolutionError('npm dry run placed dependencies but reported no tree changes');
    }
    return [];
  }

  // Locations npm did not place itself (already in the lockfile) need the lockfile to pin a version
  const needsLock = parsed.handles.some((h) => !parsed.placed.some((p) => p.name === nameFromHandle(h)));
  const lockPath = needsLock ? await findLockFile(ctx) : null;
  return matchTargets(parsed, lockPath ? readLockPackages(lockPath) : {});
}

function collectInstalled(dependencies: Record<string, unknown>, out: InstallTarget[]): void {
  for (const [name, info] of Object.entries(dependencies)) {
    if (!isRecord(info)) {
      throw new ResolutionError(`Malformed npm listing entry for '${name}'`);
    }
    if (info.missing === true) continue;
    if (typeof info.version !== 'string') {
      throw new ResolutionError(`npm listing entry for '${name}' has no version`);
    }
    out.push(makeTarget('npm', name, info.version));
    if (isRecord(info.dependencies)) {
      collectInstalled(info.dependencies, out);
    }
  }
}

export function parseNpmList(output: string): InstallTarget[] {
  const listing = parseJson(output, 'npm package listing');
  if (!isRecord(listing)) {
    throw new ResolutionError('npm package listing is not an object');
  }
  const out: InstallTarget[] = [];
  if (isRecord(listing.dependencies)) {
    collectInstalled(listing.dependencies, out);
  }
  return dedupeTargets(out);
}

async function listInstalled(ctx: ManagerContext): Promise<InstallTarget[]> {
  const listing = await ctx.runner(ctx.executable, ['list', '--all', '--json'], {
    cwd: ctx.cwd,
    signal: ctx.signal,
  });
  // npm exits non-zero for problems such as extraneous packages but still prints the tree
  if (listing.code !== 0 && !listing.stdout.trim()) {
    throw new ResolutionError(`Failed to list installed npm packages: ${listing.stderr.trim()}`);
  }
  return parseNpmList(listing.stdout);
}

const npmHandler: ManagerHandler = {
  kind: 'npm',
  label: 'npm',
  ecosystem: 'npm',
  minVersion: '7.0.0',
  installish: new Set(INSTALL_ALIASES),
  defaultExecutables: () => ['npm'],
  normalize,
  subcommand,
  isNoop: (command) => NOOP_OPTIONS.some((opt) => command.includes(opt)),
  versionArgs: ['--version'],
  parseVersion,
  resolveTargets,
  listInstalled,
};

export default npmHandler;
