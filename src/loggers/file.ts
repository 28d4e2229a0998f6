import * as fs from 'fs';
import * as path from 'path';
import { ActionRecord, AuditRecord, FirewallLogger } from './types';

/** Appends one JSON document per line. */
export class FileLogger implements FirewallLogger {
  constructor(readonly file: string) {}

  private append(entry: object): void {
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    fs.appendFileSync(this.file, JSON.stringify(entry) + '\n', 'utf8');
  }

  logAction(record: ActionRecord): void {
    this.append({ type: 'action', ...record });
  }

  logAudit(record: AuditRecord): void {
    this.append({ type: 'audit', ...record });
  }
}
