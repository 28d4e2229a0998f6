import { log } from './logger';
import { formatTarget } from './target';
import { InstallTarget, ManagerContext, ManagerHandler } from './types';

/**
 * Determines what an installish command would install, without installing it.
 * Raises `ResolutionError` when the manager's output cannot be fully understood.
 */
export async function resolveInstallTargets(
  handler: ManagerHandler,
  ctx: ManagerContext,
  command: string[],
): Promise<InstallTarget[]> {
  if (handler.isNoop(command)) {
    log.debug(`${handler.label} command installs nothing by itself`);
    return [];
  }
  const targets = await handler.resolveTargets(ctx, command);
  log.debug(`${handler.label} would install: ${targets.map(formatTarget).join(', ') || '(nothing)'}`);
  return targets;
}
