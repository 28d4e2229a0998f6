import { Ecosystem, FirewallAction, ManagerKind, Severity } from '../types';

export interface ActionRecord {
  timestamp: string;
  manager: ManagerKind;
  executable: string;
  ecosystem: Ecosystem;
  command: string[];
  targets: string[];
  action: FirewallAction;
  /** False when the command ran without verification (`--allow-unsupported`). */
  verified: boolean;
  warned: boolean;
  dryRun: boolean;
}

export interface AuditRecord {
  timestamp: string;
  manager: ManagerKind;
  executable: string;
  ecosystem: Ecosystem;
  packages: number;
  findings: { target: string; severity: Severity; verifier: string; message: string }[];
  failedVerifiers: string[];
}

/** Receives a record of every firewall run and audit. */
export interface FirewallLogger {
  logAction(record: ActionRecord): void | Promise<void>;
  logAudit?(record: AuditRecord): void | Promise<void>;
}
