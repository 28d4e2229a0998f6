import { cosmiconfigSync } from 'cosmiconfig';
import { log } from './logger';
import { OnWarning } from './types';
import { isRecord } from './utils/json';

export interface WardenConfig {
  onWarning?: OnWarning;
  errorOnBlock: boolean;
  allowUnsupported: boolean;
  verifierTimeoutMs: number;
  verifierPaths: string[];
  loggerPaths: string[];
  disabledVerifiers: string[];
  blockListDir?: string;
  datasetUrl?: string;
  minimumAgeHours?: number;
}

export const defaultConfig: WardenConfig = {
  errorOnBlock: false,
  allowUnsupported: false,
  verifierTimeoutMs: 30_000,
  verifierPaths: [],
  loggerPaths: [],
  disabledVerifiers: [],
};

function stringList(value: unknown, key: string): string[] | undefined {
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return value;
  }
  log.warn(`Ignoring configuration key '${key}': expected a list of strings`);
  return undefined;
}

/** Keeps the keys that have the right type; everything else is dropped with a warning. */
export function validateConfig(raw: unknown): Partial<WardenConfig> {
  if (!isRecord(raw)) {
    log.warn('Ignoring configuration: expected an object');
    return {};
  }

  const config: Partial<WardenConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'onWarning':
        if (value === 'allow' || value === 'block') config.onWarning = value;
        else log.warn("Ignoring configuration key 'onWarning': expected 'allow' or 'block'");
        break;
      case 'errorOnBlock':
      case 'allowUnsupported':
        if (typeof value === 'boolean') config[key] = value;
        else log.warn(`Ignoring configuration key '${key}': expected a boolean`);
        break;
      case 'verifierTimeoutMs':
        if (typeof value === 'number' && Number.isInteger(value) && value > 0) config.verifierTimeoutMs = value;
        else log.warn("Ignoring configuration key 'verifierTimeoutMs': expected a positive integer");
        break;
      case 'minimumAgeHours':
        if (typeof value === 'number' && Number.isInteger(value) && value >= 0) config.minimumAgeHours = value;
        else log.warn("Ignoring configuration key 'minimumAgeHours': expected a non-negative integer");
        break;
      case 'verifierPaths':
      case 'loggerPaths':
      case 'disabledVerifiers': {
        const list = stringList(value, key);
        if (list) config[key] = list;
        break;
      }
      case 'blockListDir':
      case 'datasetUrl':
        if (typeof value === 'string' && value) config[key] = value;
        else log.warn(`Ignoring configuration key '${key}': expected a string`);
        break;
      default:
        log.warn(`Ignoring unknown configuration key '${key}'`);
    }
  }
  return config;
}

export function loadConfig(searchFrom: string = process.cwd()): WardenConfig {
  const explorer = cosmiconfigSync('warden');
  try {
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      log.debug(`Loaded configuration from ${result.filepath}`);
      return { ...defaultConfig, ...validateConfig(result.config) };
    }
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    log.warn(`Failed to load configuration file: ${msg}`);
  }
  return { ...defaultConfig };
}
