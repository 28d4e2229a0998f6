import * as path from 'path';
import { wardenHome } from '../cache';
import { WardenConfig } from '../config';
import { log } from '../logger';
import { loadPlugins, PluginLoadFailure } from '../plugins';
import { Verifier } from '../types';
import { isRecord } from '../utils/json';
import { AgeVerifier, resolveMinimumAge } from './age';
import { BlockListVerifier } from './block-list';
import { MaliciousPackagesVerifier } from './malicious-packages';
import { OsvVerifier } from './osv';

export interface VerifierRegistry {
  verifiers: Verifier[];
  failures: PluginLoadFailure[];
}

export interface RegistryOptions {
  searchPaths?: readonly string[];
  disabled?: readonly string[];
  /** Built-in verifiers; created from configuration when omitted. */
  builtins?: () => Verifier[];
}

export function isVerifier(value: unknown): value is Verifier {
  return isRecord(value) && typeof value.name === 'string' && !!value.name && typeof value.verify === 'function';
}

export function builtinVerifiers(
  config: Pick<WardenConfig, 'blockListDir' | 'datasetUrl' | 'minimumAgeHours'>,
  env: NodeJS.ProcessEnv = process.env,
): Verifier[] {
  const home = wardenHome(env);
  return [
    new OsvVerifier(),
    new MaliciousPackagesVerifier({ datasetUrl: config.datasetUrl, cacheDir: path.join(home, 'cache') }),
    new AgeVerifier({ minimumAgeHours: resolveMinimumAge(config.minimumAgeHours, env) }),
    BlockListVerifier.fromDirectory(config.blockListDir ?? path.join(home, 'block_lists')),
  ];
}

let cache: { key: string; registry: VerifierRegistry } | undefined;

/**
 * Discovers the verifiers for this process: the built-ins followed by every
 * plugin on the search path. The result is kept for as long as the search path
 * and the disabled set stay the same.
 */
export function loadVerifierRegistry(options: RegistryOptions = {}): VerifierRegistry {
  const searchPaths = (options.searchPaths ?? []).map((p) => path.resolve(p));
  const disabled = new Set(options.disabled ?? []);
  const key = JSON.stringify([searchPaths, Array.from(disabled).sort()]);
  if (cache && cache.key === key) {
    return cache.registry;
  }

  const candidates = [...(options.builtins ?? (() => builtinVerifiers({})))()];
  const { plugins, failures } = loadPlugins(searchPaths, 'loadVerifier', isVerifier);
  candidates.push(...plugins);

  const verifiers: Verifier[] = [];
  const names = new Set<string>();
  for (const verifier of candidates) {
    if (disabled.has(verifier.name)) {
      log.debug(`Verifier '${verifier.name}' is disabled`);
      continue;
    }
    if (names.has(verifier.name)) {
      const reason = `Duplicate verifier name '${verifier.name}'`;
      log.warn(`${reason}: skipping the later one`);
      failures.push({ path: verifier.name, reason });
      continue;
    }
    names.add(verifier.name);
    verifiers.push(verifier);
  }

  const registry = { verifiers, failures };
  cache = { key, registry };
  return registry;
}

export function resetVerifierRegistry(): void {
  cache = undefined;
}

export { AgeVerifier, BlockListVerifier, MaliciousPackagesVerifier, OsvVerifier };
