import chalk from 'chalk';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ResolutionError, UnsupportedVersionError } from '../src/errors';
import { FirewallDeps, FirewallRequest, runFirewall } from '../src/firewall';
import { ActionRecord, FirewallLogger } from '../src/loggers';
import { makeTarget } from '../src/target';
import { Policy, ProcessResult, Verifier } from '../src/types';
import { fakeRunner, staticVerifier } from './helpers';

let binDir: string;
let python: string;
let npm: string;

beforeAll(() => {
  binDir = fs.mkdtempSync(path.join(os.tmpdir(), 'warden-bin-'));
  python = path.join(binDir, 'python3');
  npm = path.join(binDir, 'npm');
  for (const file of [python, npm]) fs.writeFileSync(file, '#!/bin/sh\n', { mode: 0o755 });
});

afterAll(() => {
  fs.rmSync(binDir, { recursive: true, force: true });
});

const requests = makeTarget('PyPI', 'requests', '2.32.3');
const idna = makeTarget('PyPI', 'idna', '3.7');

const pipReport = JSON.stringify({
  install: [
    { metadata: { name: 'requests', version: '2.32.3' } },
    { metadata: { name: 'idna', version: '3.7' } },
  ],
});

function pipResponses(extra: Record<string, Partial<ProcessResult>> = {}) {
  return {
    [`${python} -m pip --version`]: { stdout: 'pip 24.0 from /lib/pip (python 3.12)\n' },
    [`${python} -m pip install requests --dry-run --quiet --report -`]: { stdout: pipReport },
    ...extra,
  };
}

function policy(overrides: Partial<Policy> = {}): Policy {
  return { interactive: false, errorOnBlock: false, dryRun: false, allowUnsupported: false, ...overrides };
}

function setup(verifiers: Verifier[], responses: Record<string, Partial<ProcessResult>>, loggers: FirewallLogger[] = []) {
  const output: string[] = [];
  const execute = jest.fn().mockResolvedValue(0);
  const prompter = jest.fn().mockResolvedValue(true);
  const deps: FirewallDeps = {
    runner: fakeRunner(responses),
    execute,
    verifiers,
    loggers,
    prompter,
    context: { chalk: new chalk.Instance({ level: 0 }), boxen: (s: string) => s },
    output: (text) => output.push(text),
    env: { PATH: binDir },
  };
  return { deps, execute, prompter, output };
}

function request(command: string[], overrides: Partial<FirewallRequest> = {}): FirewallRequest {
  return { command, policy: policy(), timeoutMs: 1000, ...overrides };
}

describe('runFirewall', () => {
  test('blocks pip install when one target is critical and another a warning', async () => {
    const verifier = staticVerifier('list', () => [
      { target: requests, severity: 'critical', message: 'known malware' },
      { target: idna, severity: 'warning', message: 'old advisory' },
    ]);
    const { deps, execute, prompter, output } = setup([verifier], pipResponses());

    const code = await runFirewall(request(['pip', 'install', 'requests'], { policy: policy({ errorOnBlock: true }) }), deps);

    expect(code).toBe(2);
    expect(execute).not.toHaveBeenCalled();
    expect(prompter).not.toHaveBeenCalled();
    expect(output[output.length - 1]).toBe('🚫 Installation blocked');
  });

  test('a block exits 0 without --error-on-block', async () => {
    const verifier = staticVerifier('list', () => [{ target: requests, severity: 'critical', message: 'bad' }]);
    const { deps, execute } = setup([verifier], pipResponses());
    await expect(runFirewall(request(['pip', 'install', 'requests']), deps)).resolves.toBe(0);
    expect(execute).not.toHaveBeenCalled();
  });

  test('runs the command when verifiers find nothing and returns its exit code', async () => {
    const { deps, execute } = setup([staticVerifier('quiet', () => [])], pipResponses());
    execute.mockResolvedValue(5);

    await expect(runFirewall(request(['pip', 'install', 'requests']), deps)).resolves.toBe(5);
    expect(execute).toHaveBeenCalledWith(python, ['-m', 'pip', 'install', 'requests'], { cwd: undefined, signal: undefined });
  });

  test('an empty target list is allowed without asking any verifier', async () => {
    const verify = jest.fn();
    const { deps, execute } = setup(
      [{ name: 'spy', verify }],
      pipResponses({
        [`${python} -m pip install requests --dry-run --quiet --report -`]: { stdout: JSON.stringify({ install: [] }) },
      }),
    );
    await expect(runFirewall(request(['pip', 'install', 'requests']), deps)).resolves.toBe(0);
    expect(verify).not.toHaveBeenCalled();
    expect(execute).toHaveBeenCalledTimes(1);
  });

  test('a dry run decides but never runs the command', async () => {
    const { deps, execute, output } = setup([staticVerifier('quiet', () => [])], pipResponses());
    const code = await runFirewall(request(['pip', 'install', 'requests'], { policy: policy({ dryRun: true }) }), deps);
    expect(code).toBe(0);
    expect(execute).not.toHaveBeenCalled();
    expect(output[output.length - 1]).toBe('Dry run: the installation would be allowed; nothing was run.');
  });

  test('warnings abort without a terminal and exit 3 with --error-on-block', async () => {
    const verifier = staticVerifier('list', () => [{ target: idna, severity: 'warning', message: 'meh' }]);
    const { deps, execute, prompter } = setup([verifier], pipResponses());
    const code = await runFirewall(request(['pip', 'install', 'requests'], { policy: policy({ errorOnBlock: true }) }), deps);
    expect(code).toBe(3);
    expect(prompter).not.toHaveBeenCalled();
    expect(execute).not.toHaveBeenCalled();
  });

  test('warnings prompt on a terminal and run the command on yes', async () => {
    const verifier = staticVerifier('list', () => [{ target: idna, severity: 'warning', message: 'meh' }]);
    const { deps, execute, prompter } = setup([verifier], pipResponses());
    await runFirewall(request(['pip', 'install', 'requests'], { policy: policy({ interactive: true }) }), deps);
    expect(prompter).toHaveBeenCalledTimes(1);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  test('an unsupported manager version fails closed', async () => {
    const { deps, execute } = setup([], {
      [`${python} -m pip --version`]: { stdout: 'pip 21.0 from /lib/pip (python 3.9)\n' },
    });
    await expect(runFirewall(request(['pip', 'install', 'requests']), deps)).rejects.toThrow(UnsupportedVersionError);
    expect(execute).not.toHaveBeenCalled();
  });

  test('non-installish commands pass straight through', async () => {
    const { deps, execute } = setup([], {});
    execute.mockResolvedValue(7);
    await expect(runFirewall(request(['npm', 'run', 'test']), deps)).resolves.toBe(7);
    expect(execute).toHaveBeenCalledWith(npm, ['run', 'test'], { cwd: undefined, signal: undefined });
  });

  describe('unreadable dry-run output', () => {
    function npmResponses() {
      return {
        [`${npm} --version`]: { stdout: '10.8.2\n' },
        [`${npm} install react --dry-run --loglevel silly`]: { stderr: 'added 3 packages\n' },
      };
    }

    test('fails closed', async () => {
      const { deps, execute } = setup([], npmResponses());
      await expect(runFirewall(request(['npm', 'install', 'react']), deps)).rejects.toThrow(ResolutionError);
      expect(execute).not.toHaveBeenCalled();
    });

    test('runs unverified with --allow-unsupported and logs it', async () => {
      const records: ActionRecord[] = [];
      const { deps, execute } = setup([], npmResponses(), [{ logAction: (r) => void records.push(r) }]);
      const code = await runFirewall(
        request(['npm', 'install', 'react'], { policy: policy({ allowUnsupported: true }) }),
        deps,
      );
      expect(code).toBe(0);
      expect(execute).toHaveBeenCalledTimes(1);
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ manager: 'npm', action: 'allow', verified: false, warned: true });
    });
  });

  test('a failing logger does not change the outcome', async () => {
    const broken: FirewallLogger = {
      logAction: () => {
        throw new Error('disk full');
      },
    };
    const { deps, execute } = setup([staticVerifier('quiet', () => [])], pipResponses(), [broken]);
    await expect(runFirewall(request(['pip', 'install', 'requests']), deps)).resolves.toBe(0);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  test('a logger that never answers does not hold up the command', async () => {
    const stuck: FirewallLogger = { logAction: () => new Promise<void>(() => undefined) };
    const { deps, execute } = setup([staticVerifier('quiet', () => [])], pipResponses(), [stuck]);
    const errors = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(runFirewall(request(['pip', 'install', 'requests']), { ...deps, loggerTimeoutMs: 20 })).resolves.toBe(0);

    expect(execute).toHaveBeenCalledTimes(1);
    expect(errors).toHaveBeenCalledWith(expect.stringContaining('Failed to log firewall record: timed out after 20ms'));
    errors.mockRestore();
  });

  test('records the decision and targets', async () => {
    const records: ActionRecord[] = [];
    const verifier = staticVerifier('list', () => [{ target: requests, severity: 'critical', message: 'bad' }]);
    const { deps } = setup([verifier], pipResponses(), [{ logAction: (r) => void records.push(r) }]);
    await runFirewall(request(['pip', 'install', 'requests']), deps);
    expect(records[0]).toMatchObject({
      manager: 'pip',
      executable: python,
      ecosystem: 'PyPI',
      command: ['pip', 'install', 'requests'],
      targets: ['requests@2.32.3', 'idna@3.7'],
      action: 'block',
      verified: true,
      warned: false,
      dryRun: false,
    });
  });
});
