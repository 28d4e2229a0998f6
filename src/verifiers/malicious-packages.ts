import * as path from 'path';
import { loadCache, saveCache } from '../cache';
import { VerifierError } from '../errors';
import { log } from '../logger';
import { canonicalName } from '../target';
import { Ecosystem, Finding, InstallTarget, Verifier, VerifyOptions } from '../types';
import { requestJson } from '../utils/http';
import { isRecord } from '../utils/json';

export const DEFAULT_DATASET_URL =
  'https://raw.githubusercontent.com/DataDog/malicious-software-packages-dataset/main/samples';

const TTL_MS = 60 * 60 * 1000; // 1 hour

/** Package names known to be malicious; versions are not consulted. */
export type Manifest = ReadonlySet<string>;

export type ManifestFetcher = (url: string, signal: AbortSignal) => Promise<unknown>;

export interface MaliciousPackagesOptions {
  datasetUrl?: string;
  cacheDir: string;
  ttlMs?: number;
  fetchManifest?: ManifestFetcher;
}

export function manifestUrl(datasetUrl: string, ecosystem: Ecosystem): string {
  return `${datasetUrl.replace(/\/+$/, '')}/${ecosystem.toLowerCase()}/manifest.json`;
}

/** The dataset maps each package name to its affected versions (or null). */
export function toManifest(ecosystem: Ecosystem, raw: unknown): Manifest {
  if (!isRecord(raw)) {
    throw new Error(`malicious ${ecosystem} packages manifest is not an object`);
  }
  return new Set(Object.keys(raw).map((name) => canonicalName(ecosystem, name)));
}

const defaultFetcher: ManifestFetcher = (url, signal) => requestJson(url, { signal, timeoutMs: 15_000 });

export class MaliciousPackagesVerifier implements Verifier {
  readonly name = 'malicious-packages';

  private readonly datasetUrl: string;
  private readonly cacheDir: string;
  private readonly ttlMs: number;
  private readonly fetchManifest: ManifestFetcher;
  private readonly manifests = new Map<Ecosystem, Manifest>();

  constructor(options: MaliciousPackagesOptions) {
    this.datasetUrl = options.datasetUrl ?? DEFAULT_DATASET_URL;
    this.cacheDir = options.cacheDir;
    this.ttlMs = options.ttlMs ?? TTL_MS;
    this.fetchManifest = options.fetchManifest ?? defaultFetcher;
  }

  private cacheFile(ecosystem: Ecosystem): string {
    return path.join(this.cacheDir, `malicious-${ecosystem.toLowerCase()}.json`);
  }

  /**
   * Fresh cache, then the network, then a stale cache. Only when all three come
   * up empty does the verifier give up.
   */
  async manifest(ecosystem: Ecosystem, signal: AbortSignal): Promise<Manifest> {
    const loaded = this.manifests.get(ecosystem);
    if (loaded) return loaded;

    const file = this.cacheFile(ecosystem);
    const cached = loadCache(file, this.ttlMs);
    if (cached?.fresh) {
      try {
        const manifest = toManifest(ecosystem, cached.data);
        this.manifests.set(ecosystem, manifest);
        return manifest;
      } catch (err: unknown) {
        log.debug(`Discarding cached ${ecosystem} manifest: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    const url = manifestUrl(this.datasetUrl, ecosystem);
    try {
      const raw = await this.fetchManifest(url, signal);
      const manifest = toManifest(ecosystem, raw);
      saveCache(file, raw);
      this.manifests.set(ecosystem, manifest);
      return manifest;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      if (cached) {
        log.warn(`Failed to refresh malicious ${ecosystem} packages dataset (${msg}); using cached copy`);
        const manifest = toManifest(ecosystem, cached.data);
        this.manifests.set(ecosystem, manifest);
        return manifest;
      }
      throw new VerifierError(`Failed to obtain malicious ${ecosystem} packages dataset: ${msg}`);
    }
  }

  async verify(targets: readonly InstallTarget[], options: VerifyOptions): Promise<Finding[]> {
    const ecosystems = Array.from(new Set(targets.map((t) => t.ecosystem)));
    const manifests = new Map<Ecosystem, Manifest>();
    for (const ecosystem of ecosystems) {
      manifests.set(ecosystem, await this.manifest(ecosystem, options.signal));
    }

    const findings: Finding[] = [];
    for (const target of targets) {
      if (manifests.get(target.ecosystem)?.has(canonicalName(target.ecosystem, target.name))) {
        findings.push({
          target,
          severity: 'critical',
          verifier: this.name,
          message: `Package ${target.name} is listed in the malicious packages dataset`,
        });
      }
    }
    return findings;
  }
}
