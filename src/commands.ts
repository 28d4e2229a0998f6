import boxen from 'boxen';
import chalk from 'chalk';
import gradient from 'gradient-string';
import ora from 'ora';
import { AuditResult, runAudit } from './audit';
import { AuditCommandOptions, CliActions, RunCommandOptions } from './cli';
import { loadConfig, WardenConfig } from './config';
import { runInteractive, runProcess } from './exec';
import { ProgressReporter, runFirewall } from './firewall';
import { log } from './logger';
import { createLoggers } from './loggers';
import { configuredWarningAction, resolvePolicy } from './policy';
import { createPrompter } from './prompt';
import * as jsonReporter from './reporters/json';
import { ReporterContext, report as renderText } from './reporters/text';
import { builtinVerifiers, loadVerifierRegistry } from './verifiers';

export interface ActionEnvironment {
  signal: AbortSignal;
  setExitCode: (code: number) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function spinner(enabled: boolean): ProgressReporter | undefined {
  if (!enabled) return undefined;
  const s = ora({ stream: process.stderr });
  return {
    start: (text) => s.start(text),
    succeed: (text) => s.succeed(text),
    fail: (text) => s.fail(text),
  };
}

function registryFor(config: WardenConfig, extraPaths: string[], env: NodeJS.ProcessEnv) {
  return loadVerifierRegistry({
    searchPaths: [...config.verifierPaths, ...extraPaths],
    disabled: config.disabledVerifiers,
    builtins: () => builtinVerifiers(config, env),
  });
}

/** Wires the command-line actions to the terminal, the file system and the network. */
export function createActions({ signal, setExitCode, env = process.env, cwd = process.cwd() }: ActionEnvironment): CliActions {
  const context: ReporterContext = { chalk, boxen };
  const interactive = Boolean(process.stdin.isTTY && process.stdout.isTTY);
  const output = (text: string) => console.log(text);

  return {
    async run(command: string[], options: RunCommandOptions) {
      const config = loadConfig(cwd);
      const policy = resolvePolicy({ flags: options, config, env, interactive });
      const { verifiers } = registryFor(config, options.verifiers, env);
      const { loggers } = createLoggers([...config.loggerPaths, ...options.loggers], env);

      const code = await runFirewall(
        {
          command,
          policy,
          timeoutMs: options.timeout ?? config.verifierTimeoutMs,
          executable: options.executable,
          format: options.format,
          cwd,
          signal,
        },
        {
          runner: runProcess,
          execute: runInteractive,
          verifiers,
          loggers,
          prompter: createPrompter({ signal }),
          context,
          output,
          progress: spinner(options.format === 'text' && Boolean(process.stderr.isTTY)),
          env,
        },
      );
      setExitCode(code);
    },

    async audit(manager: string, options: AuditCommandOptions) {
      const config = loadConfig(cwd);
      const { verifiers } = registryFor(config, options.verifiers, env);
      const { loggers } = createLoggers([...config.loggerPaths, ...options.loggers], env);

      if (options.format === 'text') {
        output(
          boxen(gradient(['#4facfe', '#00f2fe'])(`install-warden audit\n${manager}`), {
            padding: 1,
            borderStyle: 'round',
            borderColor: 'cyan',
          }),
        );
      }

      const progress = spinner(options.format === 'text' && Boolean(process.stderr.isTTY));
      progress?.start(`Listing and verifying installed ${manager} packages`);
      let result: AuditResult;
      try {
        result = await runAudit(
          manager,
          {
            timeoutMs: options.timeout ?? config.verifierTimeoutMs,
            executable: options.executable,
            onWarning: configuredWarningAction(config, env),
            cwd,
            signal,
            env,
          },
          { runner: runProcess, verifiers, loggers },
        );
      } catch (err: unknown) {
        progress?.fail('Audit failed');
        throw err;
      }
      progress?.succeed(`Verified ${result.targets.length} installed package(s)`);

      if (options.format === 'json') {
        output(jsonReporter.report(result.report, result.targets, { manager: result.manager, advisory: result.advisory }));
      } else {
        output(renderText(result.report, result.targets, context));
        output(chalk.dim('Advisory only: nothing was installed or removed.'));
        if (result.advisory !== 'allow') {
          output(chalk.yellow(`Had these packages been about to be installed, the firewall would ${result.advisory} it.`));
        }
      }
      log.debug(`Audit advisory for ${manager}: ${result.advisory}`);
      setExitCode(0);
    },
  };
}
