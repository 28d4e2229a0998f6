import { evaluate } from './decision';
import { locateExecutable } from './gate';
import { log } from './logger';
import { FirewallLogger, logAudit } from './loggers';
import { verifyTargets } from './orchestrator';
import { getHandler } from './package-managers';
import { VerificationReport } from './report';
import { formatTarget } from './target';
import { CommandRunner, FirewallAction, InstallTarget, ManagerKind, OnWarning, Verifier } from './types';

export interface AuditOptions {
  timeoutMs: number;
  executable?: string;
  onWarning?: OnWarning;
  cwd?: string;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export interface AuditDeps {
  runner: CommandRunner;
  verifiers: readonly Verifier[];
  loggers: readonly FirewallLogger[];
  loggerTimeoutMs?: number;
}

export interface AuditResult {
  manager: ManagerKind;
  executable: string;
  targets: InstallTarget[];
  report: VerificationReport;
  /** What the firewall would have decided had these packages been about to be installed. */
  advisory: FirewallAction;
}

/**
 * Verifies the packages already installed for a manager. Nothing is run or
 * refused; the decision is advisory and never prompts.
 */
export async function runAudit(manager: string, options: AuditOptions, deps: AuditDeps): Promise<AuditResult> {
  const handler = getHandler(manager);
  const executable = locateExecutable(handler, options.executable, options.env ?? process.env);

  const targets = await handler.listInstalled({
    executable,
    runner: deps.runner,
    cwd: options.cwd,
    signal: options.signal,
  });
  log.info(`Auditing ${targets.length} installed ${handler.label} package(s)`);

  const report =
    targets.length === 0
      ? VerificationReport.empty()
      : await verifyTargets(deps.verifiers, targets, { timeoutMs: options.timeoutMs, signal: options.signal });

  const evaluation = evaluate(report, {
    interactive: false,
    ...(options.onWarning ? { onWarning: options.onWarning } : {}),
    errorOnBlock: false,
    dryRun: true,
    allowUnsupported: false,
  });
  // A non-interactive evaluation never asks
  const advisory: FirewallAction = evaluation === 'prompt' ? 'abort' : evaluation;

  await logAudit(
    deps.loggers,
    {
      timestamp: new Date().toISOString(),
      manager: handler.kind,
      executable,
      ecosystem: handler.ecosystem,
      packages: targets.length,
      findings: report.entries.flatMap((e) =>
        e.findings.map((f) => ({
          target: formatTarget(e.target),
          severity: f.severity,
          verifier: f.verifier,
          message: f.message,
        })),
      ),
      failedVerifiers: report.failures.map((f) => f.verifier),
    },
    deps.loggerTimeoutMs,
  );

  return { manager: handler.kind, executable, targets, report, advisory };
}
