import { CommandRunner, Finding, InstallTarget, ProcessResult, Verifier } from '../src/types';

export interface FakeCall {
  file: string;
  args: string[];
}

/**
 * A CommandRunner answering from a table keyed by `file arg1 arg2 ...`.
 * Unknown command lines exit 127.
 */
export function fakeRunner(responses: Record<string, Partial<ProcessResult>>): CommandRunner & { calls: FakeCall[] } {
  const calls: FakeCall[] = [];
  const runner = async (file: string, args: string[]): Promise<ProcessResult> => {
    calls.push({ file, args });
    const hit = responses[[file, ...args].join(' ')];
    if (!hit) return { code: 127, stdout: '', stderr: `unexpected command: ${file} ${args.join(' ')}` };
    return { code: hit.code ?? 0, stdout: hit.stdout ?? '', stderr: hit.stderr ?? '' };
  };
  return Object.assign(runner, { calls });
}

export function staticVerifier(name: string, findings: (targets: readonly InstallTarget[]) => Omit<Finding, 'verifier'>[]): Verifier {
  return {
    name,
    verify: async (targets) => findings(targets).map((f) => ({ ...f, verifier: name })),
  };
}
