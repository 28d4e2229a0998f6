export type Ecosystem = 'npm' | 'PyPI';

export type ManagerKind = 'pip' | 'npm' | 'poetry';

export type Severity = 'warning' | 'critical';

export interface InstallTarget {
  ecosystem: Ecosystem;
  name: string;
  version: string;
  source?: string; // VCS or direct URL the package is fetched from, when not the registry
}

export interface FindingDetail {
  advisoryId?: string;
  url?: string;
}

export interface Finding {
  target: InstallTarget;
  severity: Severity;
  message: string;
  verifier: string;
  detail?: FindingDetail;
}

export type VerifierFailureKind = 'timeout' | 'error' | 'fault';

export interface VerifierFailure {
  verifier: string;
  reason: string;
  kind: VerifierFailureKind;
}

export interface VerifyOptions {
  signal: AbortSignal;
}

/**
 * A named source of findings. Implementations receive the full, ordered target
 * list and report only on the targets they have something to say about.
 */
export interface Verifier {
  readonly name: string;
  verify(targets: readonly InstallTarget[], options: VerifyOptions): Promise<Finding[]>;
}

export type Classification = 'NOT_INSTALLISH' | 'INSTALLISH' | 'UNSUPPORTED_VERSION';

export type FirewallAction = 'allow' | 'block' | 'abort';

export type OnWarning = 'allow' | 'block';

export interface Policy {
  interactive: boolean;
  onWarning?: OnWarning;
  errorOnBlock: boolean;
  dryRun: boolean;
  allowUnsupported: boolean;
}

export interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  signal?: AbortSignal;
}

export type CommandRunner = (file: string, args: string[], options?: RunOptions) => Promise<ProcessResult>;

export interface ManagerContext {
  executable: string;
  runner: CommandRunner;
  cwd?: string;
  signal?: AbortSignal;
}

export interface ManagerHandler {
  kind: ManagerKind;
  label: string;
  ecosystem: Ecosystem;
  minVersion: string;
  installish: ReadonlySet<string>;
  /** Candidate executables, most preferred first, looked up on PATH when no explicit path is given. */
  defaultExecutables(env: NodeJS.ProcessEnv): string[];
  /** Full argv for running a `[label, ...args]` command line with the given executable. */
  normalize(executable: string, command: string[]): string[];
  subcommand(command: string[]): string | null;
  /** True when the manager itself guarantees the command installs nothing (help, dry run). */
  isNoop(command: string[]): boolean;
  versionArgs: string[];
  parseVersion(output: string): string | null;
  resolveTargets(ctx: ManagerContext, command: string[]): Promise<InstallTarget[]>;
  listInstalled(ctx: ManagerContext): Promise<InstallTarget[]>;
}

export type BlockAction = 'block' | 'warn';

/** One line of a user block list; no version means every version. */
export interface BlockListEntry {
  ecosystem?: Ecosystem;
  name: string;
  version?: string;
  action: BlockAction;
  reason?: string;
}
