import { VerificationReport } from '../report';
import { formatTarget } from '../target';
import { InstallTarget } from '../types';

export function report(rep: VerificationReport, targets: readonly InstallTarget[], extra: Record<string, unknown> = {}) {
  return JSON.stringify({ ...extra, targets: targets.map(formatTarget), ...rep.toJSON() }, null, 2);
}
