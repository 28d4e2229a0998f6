import * as fs from 'fs';
import * as path from 'path';
import * as semver from 'semver';
import { ManagerNotFoundError } from './errors';
import { which } from './exec';
import { log } from './logger';
import { Classification, CommandRunner, ManagerHandler, ProcessResult } from './types';

export interface CompatibilityOptions {
  runner: CommandRunner;
  cwd?: string;
  signal?: AbortSignal;
}

export interface CompatibilityResult {
  classification: Classification;
  version?: string;
}

/**
 * Finds the executable that will run the command. An explicit override must
 * name an existing file; otherwise the handler's candidates are looked up on PATH.
 */
export function locateExecutable(
  handler: ManagerHandler,
  override?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (override) {
    const resolved = path.resolve(override);
    if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
      throw new ManagerNotFoundError(`Executable '${override}' for ${handler.label} does not exist`);
    }
    return resolved;
  }

  for (const candidate of handler.defaultExecutables(env)) {
    const found = which(candidate, env);
    if (found) return found;
  }
  throw new ManagerNotFoundError(`Could not find an executable for ${handler.label} on PATH`);
}

/** Orders versions like `24.0` or `1.8.3` after coercing them to full semver. */
export function isSupportedVersion(version: string, minimum: string): boolean {
  const found = semver.coerce(version);
  const min = semver.coerce(minimum);
  if (!found || !min) return false;
  return semver.gte(found, min);
}

export async function queryVersion(
  handler: ManagerHandler,
  executable: string,
  options: CompatibilityOptions,
): Promise<string | null> {
  let result: ProcessResult;
  try {
    result = await options.runner(executable, handler.versionArgs, { cwd: options.cwd, signal: options.signal });
  } catch (err: unknown) {
    if (err instanceof ManagerNotFoundError) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new ManagerNotFoundError(`Failed to query the ${handler.label} version: ${msg}`);
  }
  if (result.code !== 0) {
    throw new ManagerNotFoundError(`Failed to query the ${handler.label} version: ${result.stderr.trim()}`);
  }
  return handler.parseVersion(result.stdout);
}

/**
 * Classifies a command line. Only installish commands pay for a version query;
 * everything else passes straight through.
 */
export async function checkCompatibility(
  handler: ManagerHandler,
  executable: string,
  command: string[],
  options: CompatibilityOptions,
): Promise<CompatibilityResult> {
  const sub = handler.subcommand(command);
  if (!sub || !handler.installish.has(sub)) {
    return { classification: 'NOT_INSTALLISH' };
  }

  const version = await queryVersion(handler, executable, options);
  if (!version) {
    log.debug(`Unparsable ${handler.label} version output`);
    return { classification: 'UNSUPPORTED_VERSION' };
  }
  if (!isSupportedVersion(version, handler.minVersion)) {
    return { classification: 'UNSUPPORTED_VERSION', version };
  }
  return { classification: 'INSTALLISH', version };
}
