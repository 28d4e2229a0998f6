import { CancelledError, VerifierError } from '../errors';
import { log } from '../logger';
import { formatTarget } from '../target';
import { Ecosystem, Finding, InstallTarget, Verifier, VerifyOptions } from '../types';
import { requestJson } from '../utils/http';
import { isRecord } from '../utils/json';

export const DEFAULT_MINIMUM_AGE_HOURS = 24;

const HOUR_MS = 60 * 60 * 1000;
const REQUEST_TIMEOUT_MS = 10_000;
const CONCURRENCY = 8;

export type MetadataFetcher = (url: string, signal: AbortSignal) => Promise<unknown>;

export interface AgeVerifierOptions {
  /** Packages or releases younger than this many hours get a warning; 0 turns the check off. */
  minimumAgeHours?: number;
  fetchMetadata?: MetadataFetcher;
  now?: () => number;
}

/** When the package first appeared and when the requested version was published. */
export interface PublicationTimes {
  created: number;
  released?: number;
}

export function metadataUrl(target: InstallTarget): string {
  return target.ecosystem === 'npm'
    ? `https://registry.npmjs.org/${target.name.replace('/', '%2f')}`
    : `https://pypi.org/pypi/${encodeURIComponent(target.name)}/json`;
}

function timestamp(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

/** Reads the npm registry document's `time` map. */
export function npmPublicationTimes(doc: unknown, version: string): PublicationTimes {
  if (!isRecord(doc) || !isRecord(doc.time)) {
    throw new Error('npm registry metadata has no publication times');
  }
  const created = timestamp(doc.time.created);
  if (created === undefined) {
    throw new Error('npm registry metadata has no creation time');
  }
  const released = timestamp(doc.time[version]);
  return released === undefined ? { created } : { created, released };
}

function uploadTimes(files: unknown): number[] {
  if (!Array.isArray(files)) return [];
  return files.flatMap((file: unknown) => {
    if (!isRecord(file)) return [];
    const ms = timestamp(file.upload_time_iso_8601);
    return ms === undefined ? [] : [ms];
  });
}

/** PyPI has no creation date; the earliest upload of any release stands in for it. */
export function pypiPublicationTimes(doc: unknown, version: string): PublicationTimes {
  if (!isRecord(doc) || !isRecord(doc.releases)) {
    throw new Error('PyPI metadata has no releases');
  }
  const all = Object.values(doc.releases).flatMap(uploadTimes);
  if (all.length === 0) {
    throw new Error('PyPI metadata has no upload times');
  }
  const created = Math.min(...all);
  const ofVersion = uploadTimes(doc.releases[version]);
  return ofVersion.length > 0 ? { created, released: Math.min(...ofVersion) } : { created };
}

const PARSERS: Record<Ecosystem, (doc: unknown, version: string) => PublicationTimes> = {
  npm: npmPublicationTimes,
  PyPI: pypiPublicationTimes,
};

/**
 * Minimum age in hours: `WARDEN_MINIMUM_AGE` wins over the configuration file.
 * Anything but a non-negative integer falls back with a warning.
 */
export function resolveMinimumAge(configured: number | undefined, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.WARDEN_MINIMUM_AGE?.trim();
  if (raw) {
    if (/^\d+$/.test(raw)) return Number(raw);
    log.warn(`Invalid minimum package age '${raw}', using ${configured ?? DEFAULT_MINIMUM_AGE_HOURS} hours`);
  }
  return configured ?? DEFAULT_MINIMUM_AGE_HOURS;
}

/**
 * Warns about packages that appeared on their registry, or releases that were
 * published, less than the minimum age ago. A package whose metadata cannot be
 * read is skipped; the verifier only fails when no lookup succeeds.
 */
export class AgeVerifier implements Verifier {
  readonly name = 'age';

  private readonly minimumAgeHours: number;
  private readonly fetchMetadata: MetadataFetcher;
  private readonly now: () => number;

  constructor(options: AgeVerifierOptions = {}) {
    this.minimumAgeHours = options.minimumAgeHours ?? DEFAULT_MINIMUM_AGE_HOURS;
    this.fetchMetadata =
      options.fetchMetadata ?? ((url, signal) => requestJson(url, { signal, timeoutMs: REQUEST_TIMEOUT_MS }));
    this.now = options.now ?? Date.now;
  }

  private check(target: InstallTarget, times: PublicationTimes): Finding | null {
    const limit = this.now() - this.minimumAgeHours * HOUR_MS;
    if (times.created > limit) {
      return {
        target,
        severity: 'warning',
        verifier: this.name,
        message: `Package ${target.name} was created less than ${this.minimumAgeHours} hours ago: treat new packages with caution`,
      };
    }
    if (times.released !== undefined && times.released > limit) {
      return {
        target,
        severity: 'warning',
        verifier: this.name,
        message: `${formatTarget(target)} was published less than ${this.minimumAgeHours} hours ago: treat new releases with caution`,
      };
    }
    return null;
  }

  async verify(targets: readonly InstallTarget[], options: VerifyOptions): Promise<Finding[]> {
    if (this.minimumAgeHours === 0 || targets.length === 0) return [];

    const findings: (Finding | null)[] = new Array(targets.length).fill(null);
    let next = 0;
    let succeeded = 0;
    let lastError = '';

    const worker = async () => {
      while (next < targets.length) {
        const idx = next++;
        const target = targets[idx];
        try {
          const doc = await this.fetchMetadata(metadataUrl(target), options.signal);
          findings[idx] = this.check(target, PARSERS[target.ecosystem](doc, target.version));
          succeeded++;
        } catch (err: unknown) {
          if (err instanceof CancelledError) throw err;
          lastError = err instanceof Error ? err.message : String(err);
          log.warn(`Failed to determine the age of ${formatTarget(target)}: ${lastError}`);
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(CONCURRENCY, targets.length) }, worker));
    if (succeeded === 0) {
      throw new VerifierError(`Failed to determine the age of any package: ${lastError}`);
    }
    return findings.filter((f): f is Finding => f !== null);
  }
}
