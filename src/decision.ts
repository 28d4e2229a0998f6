import { VerificationReport } from './report';
import { formatTarget } from './target';
import { FirewallAction, Policy } from './types';

export type Evaluation = FirewallAction | 'prompt';

export interface Decision {
  action: FirewallAction;
  report: VerificationReport;
  prompted: boolean;
}

/** Asks the user whether to go ahead; resolves true to proceed. */
export type Prompter = (summary: string) => Promise<boolean>;

/**
 * Critical findings always block. Warnings follow the configured warning
 * action, fall back to asking when someone is there to answer, and abort
 * otherwise.
 */
export function evaluate(report: VerificationReport, policy: Policy): Evaluation {
  if (report.has('critical')) return 'block';
  if (report.has('warning')) {
    if (policy.onWarning === 'block') return 'block';
    if (policy.onWarning === 'allow') return 'allow';
    return policy.interactive ? 'prompt' : 'abort';
  }
  return 'allow';
}

export function warningSummary(report: VerificationReport): string {
  const lines = report
    .filter('warning')
    .flatMap((entry) => entry.findings.map((f) => `  - ${formatTarget(entry.target)}: ${f.message}`));
  return [`Verifiers raised ${lines.length} warning(s):`, ...lines, 'Proceed with installation?'].join('\n');
}

export async function decide(report: VerificationReport, policy: Policy, prompter: Prompter): Promise<Decision> {
  const evaluation = evaluate(report, policy);
  if (evaluation !== 'prompt') {
    return { action: evaluation, report, prompted: false };
  }
  const proceed = await prompter(warningSummary(report));
  return { action: proceed ? 'allow' : 'abort', report, prompted: true };
}
