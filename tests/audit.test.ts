import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runAudit } from '../src/audit';
import { UnsupportedManagerError } from '../src/errors';
import { AuditRecord } from '../src/loggers';
import { makeTarget } from '../src/target';
import { fakeRunner, staticVerifier } from './helpers';

let binDir: string;
let npm: string;

beforeAll(() => {
  binDir = fs.mkdtempSync(path.join(os.tmpdir(), 'warden-audit-'));
  npm = path.join(binDir, 'npm');
  fs.writeFileSync(npm, '#!/bin/sh\n', { mode: 0o755 });
});

afterAll(() => {
  fs.rmSync(binDir, { recursive: true, force: true });
});

const listing = JSON.stringify({
  name: 'app',
  dependencies: {
    react: { version: '18.3.1', dependencies: { 'loose-envify': { version: '1.4.0' } } },
    'left-pad': { version: '1.3.0' },
  },
});

describe('runAudit', () => {
  test('verifies installed packages and reports what the firewall would decide', async () => {
    const records: AuditRecord[] = [];
    const verifier = staticVerifier('list', () => [
      { target: makeTarget('npm', 'left-pad', '1.3.0'), severity: 'warning', message: 'unmaintained' },
    ]);

    const result = await runAudit(
      'npm',
      { timeoutMs: 1000, env: { PATH: binDir } },
      {
        runner: fakeRunner({ [`${npm} list --all --json`]: { stdout: listing } }),
        verifiers: [verifier],
        loggers: [{ logAction: jest.fn(), logAudit: (r) => void records.push(r) }],
      },
    );

    expect(result.manager).toBe('npm');
    expect(result.executable).toBe(npm);
    expect(result.targets.map((t) => `${t.name}@${t.version}`)).toEqual([
      'react@18.3.1',
      'loose-envify@1.4.0',
      'left-pad@1.3.0',
    ]);
    expect(result.advisory).toBe('abort');
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      manager: 'npm',
      ecosystem: 'npm',
      packages: 3,
      findings: [{ target: 'left-pad@1.3.0', severity: 'warning', verifier: 'list', message: 'unmaintained' }],
      failedVerifiers: [],
    });
  });

  test('honours the configured warning action', async () => {
    const verifier = staticVerifier('list', () => [
      { target: makeTarget('npm', 'react', '18.3.1'), severity: 'warning', message: 'meh' },
    ]);
    const result = await runAudit(
      'npm',
      { timeoutMs: 1000, onWarning: 'allow', env: { PATH: binDir } },
      {
        runner: fakeRunner({ [`${npm} list --all --json`]: { stdout: listing } }),
        verifiers: [verifier],
        loggers: [],
      },
    );
    expect(result.advisory).toBe('allow');
  });

  test('skips verification when nothing is installed', async () => {
    const verify = jest.fn();
    const result = await runAudit(
      'npm',
      { timeoutMs: 1000, env: { PATH: binDir } },
      {
        runner: fakeRunner({ [`${npm} list --all --json`]: { stdout: '{"name":"app"}' } }),
        verifiers: [{ name: 'spy', verify }],
        loggers: [],
      },
    );
    expect(verify).not.toHaveBeenCalled();
    expect(result.targets).toEqual([]);
    expect(result.advisory).toBe('allow');
  });

  test('rejects unknown managers', async () => {
    await expect(
      runAudit('cargo', { timeoutMs: 1000, env: { PATH: binDir } }, { runner: fakeRunner({}), verifiers: [], loggers: [] }),
    ).rejects.toThrow(UnsupportedManagerError);
  });
});
