import Table = require('cli-table3');
import boxen from 'boxen';
import chalk from 'chalk';
import { VerificationReport } from '../report';
import { formatTarget } from '../target';
import { FirewallAction, InstallTarget } from '../types';

export interface ReporterContext {
  chalk: chalk.Chalk;
  boxen: (text: string, options?: boxen.Options) => string;
}

export function report(rep: VerificationReport, targets: readonly InstallTarget[], context: ReporterContext): string {
  const { chalk: c, boxen: b } = context;
  let output = '';

  if (rep.failures.length > 0) {
    output += '\n' + c.yellow.bold(`⚠️  ${rep.failures.length} of ${rep.verifiers.length} verifiers unavailable:`) + '\n';
    rep.failures.forEach((f) => {
      output += c.yellow(`  - ${f.verifier} (${f.kind}): ${f.reason}`) + '\n';
    });
  }

  if (rep.isClean) {
    if (rep.noVerifierSucceeded) {
      output +=
        '\n' +
        b(c.yellow.bold(`❓ No verifier could check the ${targets.length} package(s) to install.`), {
          padding: 1,
          borderStyle: 'double',
          borderColor: 'yellow',
        }) +
        '\n';
    } else {
      output +=
        '\n' +
        b(c.green.bold(`✅ No findings for ${targets.length} package(s).`), {
          padding: 1,
          borderStyle: 'round',
          borderColor: 'green',
        }) +
        '\n';
    }
    return output;
  }

  const table = new Table({
    head: [c.bold('Package'), c.bold('Severity'), c.bold('Verifier'), c.bold('Finding')],
    style: {
      head: [],
      border: [],
    },
  });

  rep.entries.forEach(({ target, findings }) => {
    findings.forEach((f) => {
      const paint = f.severity === 'critical' ? c.red : c.yellow;
      const message = f.detail?.url ? `${f.message}\n${c.dim(f.detail.url)}` : f.message;
      table.push([paint.bold(formatTarget(target)), paint(f.severity.toUpperCase()), c.dim(f.verifier), message]);
    });
  });

  output += '\n' + table.toString() + '\n';
  return output;
}

export function decisionBanner(action: FirewallAction, dryRun: boolean, context: ReporterContext): string {
  const { chalk: c, boxen: b } = context;
  switch (action) {
    case 'block':
      return b(c.red.bold('🚫 Installation blocked'), { padding: 1, borderStyle: 'double', borderColor: 'red' });
    case 'abort':
      return b(c.yellow.bold('✋ Installation aborted'), { padding: 1, borderStyle: 'round', borderColor: 'yellow' });
    case 'allow':
      return dryRun
        ? c.green('Dry run: the installation would be allowed; nothing was run.')
        : c.green('Installation allowed.');
  }
}

export function unverifiedBanner(reason: string, context: ReporterContext): string {
  const { chalk: c, boxen: b } = context;
  return b(c.red.bold(`⚠️  Running WITHOUT verification\n${reason}`), {
    padding: 1,
    borderStyle: 'double',
    borderColor: 'red',
  });
}
