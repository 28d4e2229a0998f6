import * as path from 'path';
import { log } from '../logger';
import { loadPlugins, PluginLoadFailure } from '../plugins';
import { isRecord } from '../utils/json';
import { FileLogger } from './file';
import { ActionRecord, AuditRecord, FirewallLogger } from './types';

export function isFirewallLogger(value: unknown): value is FirewallLogger {
  return (
    isRecord(value) &&
    typeof value.logAction === 'function' &&
    (value.logAudit === undefined || typeof value.logAudit === 'function')
  );
}

/** Where the built-in file logger writes, if anywhere. */
export function logFilePath(env: NodeJS.ProcessEnv = process.env): string | null {
  if (env.WARDEN_LOG_FILE) return path.resolve(env.WARDEN_LOG_FILE);
  if (env.WARDEN_HOME) return path.join(path.resolve(env.WARDEN_HOME), 'warden.log');
  return null;
}

export function createLoggers(
  searchPaths: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): { loggers: FirewallLogger[]; failures: PluginLoadFailure[] } {
  const loggers: FirewallLogger[] = [];
  const file = logFilePath(env);
  if (file) loggers.push(new FileLogger(file));

  const { plugins, failures } = loadPlugins(searchPaths, 'loadLogger', isFirewallLogger);
  loggers.push(...plugins);
  return { loggers, failures };
}

/** How long a logger gets to take a record before the run moves on without it. */
export const DELIVERY_TIMEOUT_MS = 5_000;

function withTimeout(task: Promise<void>, ms: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<void>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${ms}ms`)), ms);
  });
  return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
}

async function deliver(
  loggers: readonly FirewallLogger[],
  send: (l: FirewallLogger) => void | Promise<void>,
  timeoutMs: number,
) {
  const results = await Promise.allSettled(loggers.map((l) => withTimeout(Promise.resolve().then(() => send(l)), timeoutMs)));
  for (const result of results) {
    if (result.status === 'rejected') {
      const reason: unknown = result.reason;
      log.warn(`Failed to log firewall record: ${reason instanceof Error ? reason.message : String(reason)}`);
    }
  }
}

export function logAction(
  loggers: readonly FirewallLogger[],
  record: ActionRecord,
  timeoutMs: number = DELIVERY_TIMEOUT_MS,
): Promise<void> {
  return deliver(loggers, (l) => l.logAction(record), timeoutMs);
}

export function logAudit(
  loggers: readonly FirewallLogger[],
  record: AuditRecord,
  timeoutMs: number = DELIVERY_TIMEOUT_MS,
): Promise<void> {
  return deliver(loggers, (l) => l.logAudit?.(record), timeoutMs);
}

export { FileLogger };
export type { ActionRecord, AuditRecord, FirewallLogger };
