import { Command, InvalidArgumentError, Option } from 'commander';
import { isLogLevel, LOG_LEVELS, LogLevel, setLogLevel } from './logger';
import pkg from '../package.json';

export interface RunCommandOptions {
  dryRun?: boolean;
  allowOnWarning?: boolean;
  blockOnWarning?: boolean;
  allowUnsupported?: boolean;
  errorOnBlock?: boolean;
  executable?: string;
  verifiers: string[];
  loggers: string[];
  timeout?: number;
  format: 'text' | 'json';
}

export interface AuditCommandOptions {
  executable?: string;
  verifiers: string[];
  loggers: string[];
  timeout?: number;
  format: 'text' | 'json';
}

export interface CliActions {
  run(command: string[], options: RunCommandOptions): Promise<void>;
  audit(manager: string, options: AuditCommandOptions): Promise<void>;
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return ms;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
  }
  return value;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const formatOption = () => new Option('--format <format>', 'Output format').choices(['text', 'json']).default('text');

/**
 * Builds the command-line interface. Options of `run` must come before the
 * package-manager command; everything from the command on is passed through
 * untouched.
 */
export function buildProgram(actions: CliActions, env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('warden')
    .description('Verify the packages a pip, npm or poetry command would install before it installs them.')
    .version(pkg.version)
    .option('--log-level <level>', `Console log level (${LOG_LEVELS.join(', ')})`, parseLogLevel)
    .enablePositionalOptions()
    .exitOverride()
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ logLevel?: LogLevel }>();
      const fromEnv = env.WARDEN_LOG_LEVEL;
      if (opts.logLevel) setLogLevel(opts.logLevel);
      else if (fromEnv && isLogLevel(fromEnv)) setLogLevel(fromEnv);
    });

  program
    .command('run')
    .description('Run a package-manager command behind the firewall')
    .argument('<command...>', 'The package-manager command line, e.g. npm install react')
    .passThroughOptions()
    .option('--dry-run', 'Verify and decide, but never run the command')
    .option('--allow-on-warning', 'Proceed without asking when only warnings are found')
    .option('--block-on-warning', 'Block without asking when warnings are found')
    .option('--allow-unsupported', 'Proceed, unverified if need be, with unsupported manager versions or output')
    .option('--error-on-block', 'Exit non-zero when the installation is blocked or aborted')
    .option('--executable <path>', 'Package-manager executable to use')
    .option('--verifiers <dir>', 'Additional verifier plugin directory (repeatable)', collect, [])
    .option('--loggers <dir>', 'Additional firewall logger plugin directory (repeatable)', collect, [])
    .option('--timeout <ms>', 'Per-verifier timeout in milliseconds', parseTimeout)
    .addOption(formatOption())
    .action(async (command: string[], options: RunCommandOptions) => {
      await actions.run(command, options);
    });

  program
    .command('audit')
    .description('Verify the packages a package manager has already installed')
    .argument('<manager>', 'pip, npm or poetry')
    .option('--executable <path>', 'Package-manager executable to use')
    .option('--verifiers <dir>', 'Additional verifier plugin directory (repeatable)', collect, [])
    .option('--loggers <dir>', 'Additional firewall logger plugin directory (repeatable)', collect, [])
    .option('--timeout <ms>', 'Per-verifier timeout in milliseconds', parseTimeout)
    .addOption(formatOption())
    .action(async (manager: string, options: AuditCommandOptions) => {
      await actions.audit(manager, options);
    });

  return program;
}
