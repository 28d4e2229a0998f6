import { WardenConfig } from './config';
import { PolicyError } from './errors';
import { OnWarning, Policy } from './types';

export interface PolicyFlags {
  allowOnWarning?: boolean;
  blockOnWarning?: boolean;
  errorOnBlock?: boolean;
  dryRun?: boolean;
  allowUnsupported?: boolean;
}

export interface PolicyInputs {
  flags: PolicyFlags;
  config: WardenConfig;
  env?: NodeJS.ProcessEnv;
  interactive: boolean;
}

function onWarningFromEnv(env: NodeJS.ProcessEnv): OnWarning | undefined {
  const raw = env.WARDEN_ON_WARNING?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === 'allow' || raw === 'block') return raw;
  throw new PolicyError(`Invalid WARDEN_ON_WARNING value '${env.WARDEN_ON_WARNING}': expected 'allow' or 'block'`);
}

/** The warning action the environment or configuration file asks for, environment first. */
export function configuredWarningAction(
  config: Pick<WardenConfig, 'onWarning'>,
  env: NodeJS.ProcessEnv = process.env,
): OnWarning | undefined {
  return onWarningFromEnv(env) ?? config.onWarning;
}

/**
 * Folds command-line flags, environment and configuration file into one policy,
 * in that order of precedence. A warning action chosen anywhere means the user
 * is never prompted.
 */
export function resolvePolicy({ flags, config, env = process.env, interactive }: PolicyInputs): Policy {
  if (flags.allowOnWarning && flags.blockOnWarning) {
    throw new PolicyError('--allow-on-warning and --block-on-warning cannot be used together');
  }

  const fromFlags: OnWarning | undefined = flags.allowOnWarning ? 'allow' : flags.blockOnWarning ? 'block' : undefined;
  const onWarning = fromFlags ?? configuredWarningAction(config, env);

  return {
    interactive,
    ...(onWarning ? { onWarning } : {}),
    errorOnBlock: flags.errorOnBlock ?? config.errorOnBlock,
    dryRun: flags.dryRun ?? false,
    allowUnsupported: flags.allowUnsupported ?? config.allowUnsupported,
  };
}
