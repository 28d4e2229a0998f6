import * as fs from 'fs';
import * as path from 'path';
import { log } from './logger';
import { isRecord } from './utils/json';

const PLUGIN_EXTENSIONS = new Set(['.js', '.cjs']);

export interface PluginLoadFailure {
  path: string;
  reason: string;
}

export interface LoadedPlugins<T> {
  plugins: T[];
  failures: PluginLoadFailure[];
}

function pluginFiles(dir: string): string[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    log.debug(`Plugin directory ${dir} does not exist`);
    return [];
  }
  return fs
    .readdirSync(dir)
    .filter((file) => PLUGIN_EXTENSIONS.has(path.extname(file)))
    .sort()
    .map((file) => path.join(dir, file));
}

function instantiate(mod: unknown, factoryName: string): unknown {
  if (!isRecord(mod)) {
    throw new Error('module has no exports');
  }
  const factory = mod[factoryName];
  if (typeof factory === 'function') {
    return factory();
  }
  const fallback = mod.default;
  if (typeof fallback === 'function') {
    return fallback();
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new Error(`module exports neither ${factoryName}() nor a default export`);
}

/**
 * Loads every `.js`/`.cjs` module of the given directories, in directory order
 * and then by file name. A module contributes the value returned by its
 * `factoryName` export, or its default export. Anything that fails to load or
 * does not pass `guard` is recorded and skipped.
 */
export function loadPlugins<T>(
  dirs: readonly string[],
  factoryName: string,
  guard: (value: unknown) => value is T,
): LoadedPlugins<T> {
  const plugins: T[] = [];
  const failures: PluginLoadFailure[] = [];

  for (const dir of dirs) {
    for (const file of pluginFiles(path.resolve(dir))) {
      try {
        const mod: unknown = require(file);
        const plugin = instantiate(mod, factoryName);
        if (!guard(plugin)) {
          throw new Error(`${factoryName}() returned an object of the wrong shape`);
        }
        plugins.push(plugin);
        log.debug(`Loaded plugin ${file}`);
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        log.warn(`Failed to load plugin ${file}: ${reason}`);
        failures.push({ path: file, reason });
      }
    }
  }

  return { plugins, failures };
}
