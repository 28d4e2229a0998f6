import { isRecord } from '../utils/json';

export const SEVERITY_LEVELS = ['None', 'Low', 'Medium', 'High', 'Critical'] as const;

export type SeverityLevel = (typeof SEVERITY_LEVELS)[number];

export function severityRank(level: SeverityLevel | undefined): number {
  return level === undefined ? -1 : SEVERITY_LEVELS.indexOf(level);
}

/** Accepts any capitalisation, and Ubuntu's "Negligible" as None. */
export function parseSeverityLabel(label: string): SeverityLevel | undefined {
  const lower = label.trim().toLowerCase();
  if (lower === 'negligible') return 'None';
  if (lower === 'moderate') return 'Medium';
  return SEVERITY_LEVELS.find((level) => level.toLowerCase() === lower);
}

function metrics(vector: string): Map<string, string> {
  const parts = new Map<string, string>();
  for (const part of vector.split('/')) {
    const [key, value] = part.split(':');
    if (key && value) parts.set(key, value);
  }
  return parts;
}

function weight(table: Record<string, number>, value: string | undefined): number {
  if (value === undefined || !(value in table)) {
    throw new Error(`unknown metric value '${value ?? ''}'`);
  }
  return table[value];
}

// CVSS v3.x rounds up to one decimal, avoiding floating-point drift
function roundUp(x: number): number {
  const i = Math.round(x * 100_000);
  return i % 10_000 === 0 ? i / 100_000 : (Math.floor(i / 10_000) + 1) / 10;
}

const V3_AV = { N: 0.85, A: 0.62, L: 0.55, P: 0.2 };
const V3_AC = { L: 0.77, H: 0.44 };
const V3_PR_UNCHANGED = { N: 0.85, L: 0.62, H: 0.27 };
const V3_PR_CHANGED = { N: 0.85, L: 0.68, H: 0.5 };
const V3_UI = { N: 0.85, R: 0.62 };
const V3_CIA = { H: 0.56, L: 0.22, N: 0 };

/** Base score of a `CVSS:3.0/...` or `CVSS:3.1/...` vector. */
export function cvss3BaseScore(vector: string): number {
  const m = metrics(vector);
  const changed = m.get('S') === 'C';
  if (!changed && m.get('S') !== 'U') throw new Error("unknown metric value for 'S'");

  const iss =
    1 - (1 - weight(V3_CIA, m.get('C'))) * (1 - weight(V3_CIA, m.get('I'))) * (1 - weight(V3_CIA, m.get('A')));
  const impact = changed ? 7.52 * (iss - 0.029) - 3.25 * Math.pow(iss - 0.02, 15) : 6.42 * iss;
  const exploitability =
    8.22 *
    weight(V3_AV, m.get('AV')) *
    weight(V3_AC, m.get('AC')) *
    weight(changed ? V3_PR_CHANGED : V3_PR_UNCHANGED, m.get('PR')) *
    weight(V3_UI, m.get('UI'));

  if (impact <= 0) return 0;
  return roundUp(Math.min((changed ? 1.08 : 1) * (impact + exploitability), 10));
}

const V2_AV = { L: 0.395, A: 0.646, N: 1 };
const V2_AC = { H: 0.35, M: 0.61, L: 0.71 };
const V2_AU = { M: 0.45, S: 0.56, N: 0.704 };
const V2_CIA = { N: 0, P: 0.275, C: 0.66 };

export function cvss2BaseScore(vector: string): number {
  const m = metrics(vector);
  const impact =
    10.41 *
    (1 -
      (1 - weight(V2_CIA, m.get('C'))) * (1 - weight(V2_CIA, m.get('I'))) * (1 - weight(V2_CIA, m.get('A'))));
  const exploitability = 20 * weight(V2_AV, m.get('AV')) * weight(V2_AC, m.get('AC')) * weight(V2_AU, m.get('Au'));
  const f = impact === 0 ? 0 : 1.176;
  return Math.round((0.6 * impact + 0.4 * exploitability - 1.5) * f * 10) / 10;
}

export function cvss3Rating(score: number): SeverityLevel {
  if (score === 0) return 'None';
  if (score < 4) return 'Low';
  if (score < 7) return 'Medium';
  if (score < 9) return 'High';
  return 'Critical';
}

export function cvss2Rating(score: number): SeverityLevel {
  if (score === 0) return 'None';
  if (score < 4) return 'Low';
  if (score < 7) return 'Medium';
  return 'High';
}

/**
 * Level of a single OSV `severity[]` entry. CVSS v4 vectors are not scored;
 * such entries count only through the advisory's own severity label.
 */
export function entrySeverity(entry: unknown): SeverityLevel | undefined {
  if (!isRecord(entry) || typeof entry.type !== 'string' || typeof entry.score !== 'string') return undefined;
  try {
    switch (entry.type) {
      case 'CVSS_V3':
        return cvss3Rating(cvss3BaseScore(entry.score));
      case 'CVSS_V2':
        return cvss2Rating(cvss2BaseScore(entry.score));
      case 'Ubuntu':
        return parseSeverityLabel(entry.score);
      default:
        return undefined;
    }
  } catch {
    return undefined;
  }
}

/**
 * The highest level across an OSV record's `severity[]` entries, falling back
 * to `database_specific.severity` when none of them can be scored.
 */
export function advisorySeverity(vuln: Record<string, unknown>): SeverityLevel | undefined {
  let best: SeverityLevel | undefined;
  if (Array.isArray(vuln.severity)) {
    for (const entry of vuln.severity) {
      const level = entrySeverity(entry);
      if (severityRank(level) > severityRank(best)) best = level;
    }
  }
  if (best !== undefined) return best;

  const specific = vuln.database_specific;
  return isRecord(specific) && typeof specific.severity === 'string'
    ? parseSeverityLabel(specific.severity)
    : undefined;
}
