import { CancelledError, VerifierError } from './errors';
import { log } from './logger';
import { ReportBuilder, VerificationReport } from './report';
import { formatTarget, targetKey } from './target';
import { Finding, InstallTarget, Verifier, VerifierFailure } from './types';
import { isRecord } from './utils/json';

export interface OrchestratorOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

type Outcome = { ok: true; findings: Finding[] } | { ok: false; failure: VerifierFailure };

function toFinding(raw: unknown, verifier: string): Finding | null {
  if (!isRecord(raw) || !isRecord(raw.target) || typeof raw.message !== 'string') return null;
  if (raw.severity !== 'critical' && raw.severity !== 'warning') return null;
  const { ecosystem, name, version } = raw.target;
  if ((ecosystem !== 'npm' && ecosystem !== 'PyPI') || typeof name !== 'string' || typeof version !== 'string') {
    return null;
  }
  const finding: Finding = {
    target: { ecosystem, name, version },
    severity: raw.severity,
    message: raw.message,
    verifier,
  };
  if (isRecord(raw.detail)) {
    const { advisoryId, url } = raw.detail;
    finding.detail = {
      ...(typeof advisoryId === 'string' ? { advisoryId } : {}),
      ...(typeof url === 'string' ? { url } : {}),
    };
  }
  return finding;
}

async function runOne(
  verifier: Verifier,
  targets: readonly InstallTarget[],
  options: OrchestratorOptions,
): Promise<Outcome> {
  const controller = new AbortController();
  let onOuterAbort: () => void = () => undefined;
  // Settles as soon as the caller cancels, whether or not the verifier honours its signal
  const cancelled = new Promise<Outcome>((resolve) => {
    onOuterAbort = () => {
      controller.abort();
      resolve({ ok: false, failure: { verifier: verifier.name, kind: 'error', reason: 'Cancelled' } });
    };
  });
  options.signal?.addEventListener('abort', onOuterAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<Outcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({
        ok: false,
        failure: { verifier: verifier.name, kind: 'timeout', reason: `Timed out after ${options.timeoutMs}ms` },
      });
    }, options.timeoutMs);
  });

  const task = Promise.resolve()
    .then(() => verifier.verify(targets, { signal: controller.signal }))
    .then<Outcome, Outcome>(
      (result: unknown) => {
        if (!Array.isArray(result)) {
          return { ok: false, failure: { verifier: verifier.name, kind: 'fault', reason: 'verify() did not return a list' } };
        }
        const findings: Finding[] = [];
        for (const raw of result) {
          const finding = toFinding(raw, verifier.name);
          if (finding) findings.push(finding);
          else log.warn(`Dropping malformed finding from verifier '${verifier.name}'`);
        }
        return { ok: true, findings };
      },
      (err: unknown) => ({
        ok: false,
        failure: {
          verifier: verifier.name,
          kind: err instanceof VerifierError ? 'error' : 'fault',
          reason: err instanceof Error ? err.message : String(err),
        },
      }),
    );

  try {
    return await Promise.race([task, timeout, cancelled]);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onOuterAbort);
  }
}

/**
 * Runs every verifier concurrently against the same frozen target list and
 * joins them all. Each verifier gets its own timeout and abort signal; a
 * verifier that times out, rejects or misbehaves becomes a recorded failure.
 */
export async function verifyTargets(
  verifiers: readonly Verifier[],
  targets: readonly InstallTarget[],
  options: OrchestratorOptions,
): Promise<VerificationReport> {
  if (options.signal?.aborted) throw new CancelledError();

  const frozen = Object.freeze([...targets]);
  const known = new Map(frozen.map((t) => [targetKey(t), t]));
  const outcomes = await Promise.all(verifiers.map((v) => runOne(v, frozen, options)));

  if (options.signal?.aborted) throw new CancelledError();

  const builder = new ReportBuilder();
  const byTarget = new Map<string, Finding[]>();
  verifiers.forEach((verifier, idx) => {
    builder.ranVerifier(verifier.name);
    const outcome = outcomes[idx];
    if (!outcome.ok) {
      log.warn(`Verifier '${verifier.name}' failed: ${outcome.failure.reason}`);
      builder.addFailure(outcome.failure);
      return;
    }
    for (const finding of outcome.findings) {
      const key = targetKey(finding.target);
      const target = known.get(key);
      if (!target) {
        log.warn(`Verifier '${verifier.name}' reported on ${formatTarget(finding.target)}, which is not being installed`);
        continue;
      }
      const list = byTarget.get(key) ?? [];
      list.push({ ...finding, target });
      byTarget.set(key, list);
    }
  });

  for (const target of frozen) {
    for (const finding of byTarget.get(targetKey(target)) ?? []) {
      builder.addFinding(finding);
    }
  }
  return builder.build();
}
