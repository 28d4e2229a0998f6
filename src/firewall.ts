import { decide, Decision, Prompter } from './decision';
import { ResolutionError, UnsupportedVersionError } from './errors';
import { checkCompatibility, locateExecutable } from './gate';
import { log } from './logger';
import { FirewallLogger, logAction } from './loggers';
import { verifyTargets } from './orchestrator';
import { getManagerHandler } from './package-managers';
import { VerificationReport } from './report';
import * as jsonReporter from './reporters/json';
import { decisionBanner, ReporterContext, report as renderText, unverifiedBanner } from './reporters/text';
import { resolveInstallTargets } from './resolver';
import { formatTarget } from './target';
import { CommandRunner, FirewallAction, InstallTarget, ManagerHandler, Policy, RunOptions, Verifier } from './types';

export type OutputFormat = 'text' | 'json';

export interface ProgressReporter {
  start(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
}

export interface FirewallDeps {
  /** Runs a process and captures its output (dry runs, version queries). */
  runner: CommandRunner;
  /** Runs the user's command attached to the terminal. */
  execute: (file: string, args: string[], options?: RunOptions) => Promise<number>;
  verifiers: readonly Verifier[];
  loggers: readonly FirewallLogger[];
  prompter: Prompter;
  context: ReporterContext;
  output: (text: string) => void;
  progress?: ProgressReporter;
  env?: NodeJS.ProcessEnv;
  /** Upper bound on each logger's delivery; defaults to `DELIVERY_TIMEOUT_MS`. */
  loggerTimeoutMs?: number;
}

export interface FirewallRequest {
  command: string[];
  policy: Policy;
  timeoutMs: number;
  executable?: string;
  format?: OutputFormat;
  cwd?: string;
  signal?: AbortSignal;
}

export const EXIT_BLOCKED = 2;
export const EXIT_ABORTED = 3;

function exitCodeFor(action: FirewallAction, policy: Policy): number {
  if (!policy.errorOnBlock) return 0;
  if (action === 'block') return EXIT_BLOCKED;
  if (action === 'abort') return EXIT_ABORTED;
  return 0;
}

/**
 * Runs a package-manager command behind the firewall and resolves with the
 * process exit code. Gate and resolution failures reject; verifier failures
 * are part of the report.
 */
export async function runFirewall(request: FirewallRequest, deps: FirewallDeps): Promise<number> {
  const { command, policy } = request;
  const env = deps.env ?? process.env;
  const format = request.format ?? 'text';
  const ctx = { runner: deps.runner, cwd: request.cwd, signal: request.signal };

  const handler = getManagerHandler(command);
  const executable = locateExecutable(handler, request.executable, env);
  const [file, ...args] = handler.normalize(executable, command);

  const runCommand = async (): Promise<number> => {
    log.debug(`Running ${file} ${args.join(' ')}`);
    return deps.execute(file, args, { cwd: request.cwd, signal: request.signal });
  };

  const compat = await checkCompatibility(handler, executable, command, ctx);
  if (compat.classification === 'NOT_INSTALLISH') {
    if (policy.dryRun) {
      deps.output(`Dry run: '${command.join(' ')}' installs nothing and would run unverified.`);
      return 0;
    }
    return runCommand();
  }

  if (compat.classification === 'UNSUPPORTED_VERSION') {
    if (!policy.allowUnsupported) {
      throw new UnsupportedVersionError(handler.label, compat.version ?? null, handler.minVersion);
    }
    log.warn(
      `${handler.label} ${compat.version ? `v${compat.version}` : '(unknown version)'} is not supported; continuing at your own risk`,
    );
  }

  let targets: InstallTarget[];
  try {
    targets = await resolveInstallTargets(handler, { executable, ...ctx }, command);
  } catch (err: unknown) {
    if (!(err instanceof ResolutionError) || !policy.allowUnsupported) throw err;
    log.error(`Failed to determine installation targets: ${err.message}`);
    deps.output(unverifiedBanner(err.message, deps.context));
    await logAction(
      deps.loggers,
      {
        timestamp: new Date().toISOString(),
        manager: handler.kind,
        executable,
        ecosystem: handler.ecosystem,
        command,
        targets: [],
        action: 'allow',
        verified: false,
        warned: true,
        dryRun: policy.dryRun,
      },
      deps.loggerTimeoutMs,
    );
    return policy.dryRun ? 0 : runCommand();
  }

  const decision = await verifyAndDecide(handler, targets, request, deps, format);

  await logAction(
    deps.loggers,
    {
      timestamp: new Date().toISOString(),
      manager: handler.kind,
      executable,
      ecosystem: handler.ecosystem,
      command,
      targets: targets.map(formatTarget),
      action: decision.action,
      verified: true,
      warned: decision.report.has('warning') || decision.report.failures.length > 0,
      dryRun: policy.dryRun,
    },
    deps.loggerTimeoutMs,
  );

  const { action } = decision;
  if (format === 'text') {
    deps.output(decisionBanner(action, policy.dryRun, deps.context));
  }
  if (action !== 'allow') {
    return exitCodeFor(action, policy);
  }
  return policy.dryRun ? 0 : runCommand();
}

async function verifyAndDecide(
  handler: ManagerHandler,
  targets: InstallTarget[],
  request: FirewallRequest,
  deps: FirewallDeps,
  format: OutputFormat,
): Promise<Decision> {
  const { policy } = request;

  if (targets.length === 0) {
    log.info(`${handler.label} command would install nothing`);
    const report = VerificationReport.empty();
    if (format === 'json') deps.output(jsonReporter.report(report, targets, { action: 'allow' }));
    return { action: 'allow', report, prompted: false };
  }

  deps.progress?.start(`Verifying ${targets.length} package(s) with ${deps.verifiers.length} verifier(s)`);
  let report: VerificationReport;
  try {
    report = await verifyTargets(deps.verifiers, targets, { timeoutMs: request.timeoutMs, signal: request.signal });
  } catch (err: unknown) {
    deps.progress?.fail('Verification interrupted');
    throw err;
  }
  const failed = report.failures.length;
  deps.progress?.succeed(
    failed > 0
      ? `Verified ${targets.length} package(s); ${failed} of ${report.verifiers.length} verifiers unavailable`
      : `Verified ${targets.length} package(s)`,
  );

  if (format === 'text') {
    deps.output(renderText(report, targets, deps.context));
  }

  const decision = await decide(report, policy, deps.prompter);
  if (format === 'json') {
    deps.output(jsonReporter.report(report, targets, { action: decision.action, prompted: decision.prompted }));
  }
  return decision;
}
