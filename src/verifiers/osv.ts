import { CancelledError, VerifierError } from '../errors';
import { log } from '../logger';
import { formatTarget } from '../target';
import { Finding, InstallTarget, Verifier, VerifyOptions } from '../types';
import { requestJson } from '../utils/http';
import { isRecord } from '../utils/json';
import { advisorySeverity, SeverityLevel, severityRank } from './osv-severity';

export const OSV_QUERY_URL = 'https://api.osv.dev/v1/query';
const OSV_VULN_URL = 'https://osv.dev/vulnerability';

// The OSV.dev API can be slow
const REQUEST_TIMEOUT_MS = 10_000;
const CONCURRENCY = 8;
const MAX_PAGES = 20;

interface OsvAdvisory {
  id: string;
  severity?: SeverityLevel;
}

function toAdvisory(vuln: unknown): OsvAdvisory | null {
  if (!isRecord(vuln) || typeof vuln.id !== 'string' || !vuln.id) return null;
  const severity = advisorySeverity(vuln);
  return severity === undefined ? { id: vuln.id } : { id: vuln.id, severity };
}

/** Most severe first; advisories of unknown severity go last, otherwise keeping their order. */
export function bySeverity<T extends { severity?: SeverityLevel }>(advisories: readonly T[]): T[] {
  return [...advisories].sort((a, b) => severityRank(b.severity) - severityRank(a.severity));
}

async function queryAdvisories(target: InstallTarget, signal: AbortSignal): Promise<OsvAdvisory[]> {
  const advisories = new Map<string, OsvAdvisory>();
  let pageToken: string | undefined;

  for (let page = 0; page < MAX_PAGES; page++) {
    const query = {
      version: target.version,
      package: { name: target.name, ecosystem: target.ecosystem },
      ...(pageToken ? { page_token: pageToken } : {}),
    };
    const response = await requestJson(OSV_QUERY_URL, {
      method: 'POST',
      body: query,
      timeoutMs: REQUEST_TIMEOUT_MS,
      signal,
    });
    if (!isRecord(response)) {
      throw new Error('unexpected response from OSV.dev');
    }

    if (Array.isArray(response.vulns)) {
      for (const vuln of response.vulns) {
        const advisory = toAdvisory(vuln);
        if (advisory && !advisories.has(advisory.id)) advisories.set(advisory.id, advisory);
      }
    }

    pageToken = typeof response.next_page_token === 'string' && response.next_page_token
      ? response.next_page_token
      : undefined;
    if (!pageToken) break;
  }

  return Array.from(advisories.values());
}

function toFindings(target: InstallTarget, advisories: OsvAdvisory[], verifier: string): Finding[] {
  const tag = (a: OsvAdvisory) => (a.severity ? `[${a.severity}] ` : '');
  const sorted = bySeverity(advisories);
  const malicious = sorted.filter((a) => a.id.startsWith('MAL-'));
  const other = sorted.filter((a) => !a.id.startsWith('MAL-'));

  return [
    ...malicious.map<Finding>((a) => ({
      target,
      severity: 'critical',
      verifier,
      message: `An OSV.dev malicious package disclosure exists for ${formatTarget(target)}: ${tag(a)}${a.id}`,
      detail: { advisoryId: a.id, url: `${OSV_VULN_URL}/${a.id}` },
    })),
    ...other.map<Finding>((a) => ({
      target,
      severity: 'warning',
      verifier,
      message: `An OSV.dev disclosure exists for ${formatTarget(target)}: ${tag(a)}${a.id}`,
      detail: { advisoryId: a.id, url: `${OSV_VULN_URL}/${a.id}` },
    })),
  ];
}

/**
 * Queries OSV.dev for every target. Advisories with `MAL-` identifiers are
 * malicious package reports and are critical; anything else is a warning.
 * Most, but not all, malicious packages on OSV.dev carry a `MAL-` id.
 * Severity tags come from the records' CVSS vectors where they can be scored.
 */
export class OsvVerifier implements Verifier {
  readonly name = 'osv';

  async verify(targets: readonly InstallTarget[], options: VerifyOptions): Promise<Finding[]> {
    const findings: Finding[][] = new Array(targets.length);
    let next = 0;
    let failed = false;

    const worker = async () => {
      while (!failed && next < targets.length) {
        const idx = next++;
        const target = targets[idx];
        try {
          findings[idx] = toFindings(target, await queryAdvisories(target, options.signal), this.name);
        } catch (err: unknown) {
          failed = true;
          if (err instanceof CancelledError) throw err;
          const msg = err instanceof Error ? err.message : String(err);
          log.debug(`OSV.dev query for ${formatTarget(target)} failed: ${msg}`);
          throw new VerifierError(`Failed to query OSV.dev for ${formatTarget(target)}: ${msg}`);
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(CONCURRENCY, targets.length) }, worker));
    return findings.flat();
  }
}
