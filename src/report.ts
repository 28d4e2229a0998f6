import { formatTarget, targetKey } from './target';
import { Finding, InstallTarget, Severity, VerifierFailure } from './types';

export interface ReportEntry {
  target: InstallTarget;
  findings: readonly Finding[];
}

/**
 * Findings per target plus the verifiers that could not give an opinion.
 * Instances are only produced by {@link ReportBuilder.build} and never change
 * afterwards.
 */
export class VerificationReport {
  private readonly byKey: ReadonlyMap<string, ReportEntry>;

  constructor(
    entries: ReportEntry[],
    readonly failures: readonly VerifierFailure[],
    readonly verifiers: readonly string[],
  ) {
    this.byKey = new Map(entries.map((e) => [targetKey(e.target), e]));
    Object.freeze(this);
  }

  static empty(): VerificationReport {
    return new ReportBuilder().build();
  }

  get entries(): ReportEntry[] {
    return Array.from(this.byKey.values());
  }

  get findings(): Finding[] {
    return this.entries.flatMap((e) => e.findings);
  }

  findingsFor(target: InstallTarget): readonly Finding[] {
    return this.byKey.get(targetKey(target))?.findings ?? [];
  }

  has(severity: Severity): boolean {
    return this.findings.some((f) => f.severity === severity);
  }

  /** Entries restricted to findings of one severity; targets left without findings are dropped. */
  filter(severity: Severity): ReportEntry[] {
    return this.entries
      .map((e) => ({ target: e.target, findings: e.findings.filter((f) => f.severity === severity) }))
      .filter((e) => e.findings.length > 0);
  }

  get isClean(): boolean {
    return this.byKey.size === 0;
  }

  /** Every verifier that was asked failed, so a clean report means nothing. */
  get noVerifierSucceeded(): boolean {
    return this.verifiers.length === 0 || this.failures.length >= this.verifiers.length;
  }

  toJSON() {
    return {
      findings: this.entries.map((e) => ({
        target: formatTarget(e.target),
        ecosystem: e.target.ecosystem,
        findings: e.findings.map((f) => ({
          severity: f.severity,
          verifier: f.verifier,
          message: f.message,
          ...(f.detail ? { detail: f.detail } : {}),
        })),
      })),
      failedVerifiers: this.failures,
      verifiers: this.verifiers,
    };
  }
}

export class ReportBuilder {
  private readonly entries = new Map<string, { target: InstallTarget; findings: Finding[] }>();
  private readonly failures: VerifierFailure[] = [];
  private readonly verifiers: string[] = [];

  ranVerifier(name: string): this {
    this.verifiers.push(name);
    return this;
  }

  addFinding(finding: Finding): this {
    const key = targetKey(finding.target);
    const entry = this.entries.get(key);
    const frozen = Object.freeze({ ...finding });
    if (entry) {
      entry.findings.push(frozen);
    } else {
      this.entries.set(key, { target: finding.target, findings: [frozen] });
    }
    return this;
  }

  addFailure(failure: VerifierFailure): this {
    this.failures.push(Object.freeze({ ...failure }));
    return this;
  }

  build(): VerificationReport {
    const entries = Array.from(this.entries.values()).map((e) => ({
      target: e.target,
      findings: Object.freeze([...e.findings]),
    }));
    return new VerificationReport(entries, Object.freeze([...this.failures]), Object.freeze([...this.verifiers]));
  }
}
