export * from './types';
export * from './errors';
export { makeTarget, targetKey, formatTarget, dedupeTargets, canonicalName } from './target';
export { VerificationReport, ReportBuilder } from './report';
export type { ReportEntry } from './report';
export { getManagerHandler, getHandler, MANAGER_HANDLERS } from './package-managers';
export { checkCompatibility, locateExecutable, isSupportedVersion } from './gate';
export { resolveInstallTargets } from './resolver';
export { verifyTargets } from './orchestrator';
export { evaluate, decide } from './decision';
export type { Decision, Evaluation, Prompter } from './decision';
export { resolvePolicy } from './policy';
export { runFirewall, EXIT_ABORTED, EXIT_BLOCKED } from './firewall';
export type { FirewallDeps, FirewallRequest, ProgressReporter } from './firewall';
export { runAudit } from './audit';
export type { AuditResult } from './audit';
export { loadVerifierRegistry, resetVerifierRegistry, builtinVerifiers, AgeVerifier } from './verifiers';
export type { VerifierRegistry } from './verifiers';
export { createLoggers, FileLogger } from './loggers';
export type { ActionRecord, AuditRecord, FirewallLogger } from './loggers';
export { loadConfig, defaultConfig } from './config';
export type { WardenConfig } from './config';
