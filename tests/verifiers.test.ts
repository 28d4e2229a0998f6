import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AgeVerifier, builtinVerifiers, loadVerifierRegistry, resetVerifierRegistry } from '../src/verifiers';
import { makeTarget } from '../src/target';
import { staticVerifier } from './helpers';

let dir: string;

beforeEach(() => {
  resetVerifierRegistry();
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'warden-plugins-'));
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

function plugin(file: string, source: string): void {
  fs.writeFileSync(path.join(dir, file), source, 'utf8');
}

const builtins = () => [staticVerifier('osv', () => []), staticVerifier('block-list', () => [])];

describe('loadVerifierRegistry', () => {
  test('lists built-ins first, then plugins by file name', () => {
    plugin('b.js', "exports.loadVerifier = () => ({ name: 'beta', verify: async () => [] });");
    plugin('a.cjs', "module.exports = { default: { name: 'alpha', verify: async () => [] } };");
    plugin('notes.txt', 'not a plugin');

    const { verifiers, failures } = loadVerifierRegistry({ searchPaths: [dir], builtins });

    expect(verifiers.map((v) => v.name)).toEqual(['osv', 'block-list', 'alpha', 'beta']);
    expect(failures).toEqual([]);
  });

  test('records plugins that fail to load or have the wrong shape', () => {
    plugin('broken.js', "throw new Error('boom');");
    plugin('shapeless.js', 'exports.loadVerifier = () => ({ name: 42 });');

    const { verifiers, failures } = loadVerifierRegistry({ searchPaths: [dir], builtins });

    expect(verifiers.map((v) => v.name)).toEqual(['osv', 'block-list']);
    expect(failures).toEqual([
      { path: path.join(dir, 'broken.js'), reason: 'boom' },
      { path: path.join(dir, 'shapeless.js'), reason: 'loadVerifier() returned an object of the wrong shape' },
    ]);
  });

  test('keeps the first verifier of a name', () => {
    plugin('osv.js', "exports.loadVerifier = () => ({ name: 'osv', verify: async () => [] });");

    const { verifiers, failures } = loadVerifierRegistry({ searchPaths: [dir], builtins });

    expect(verifiers.map((v) => v.name)).toEqual(['osv', 'block-list']);
    expect(failures).toEqual([{ path: 'osv', reason: "Duplicate verifier name 'osv'" }]);
  });

  test('leaves out disabled verifiers', () => {
    const { verifiers } = loadVerifierRegistry({ disabled: ['osv'], builtins });
    expect(verifiers.map((v) => v.name)).toEqual(['block-list']);
  });

  test('reuses the registry for the same search path', () => {
    const first = loadVerifierRegistry({ searchPaths: [dir], builtins });
    const second = loadVerifierRegistry({ searchPaths: [dir], builtins });
    expect(second).toBe(first);

    resetVerifierRegistry();
    expect(loadVerifierRegistry({ searchPaths: [dir], builtins })).not.toBe(first);
  });

  test('a missing plugin directory contributes nothing', () => {
    const { verifiers, failures } = loadVerifierRegistry({ searchPaths: [path.join(dir, 'nope')], builtins });
    expect(verifiers).toHaveLength(2);
    expect(failures).toEqual([]);
  });
});

describe('builtinVerifiers', () => {
  test('includes the age check, configured from the environment', async () => {
    const verifiers = builtinVerifiers({ minimumAgeHours: 12 }, { WARDEN_HOME: dir, WARDEN_MINIMUM_AGE: '0' });
    expect(verifiers.map((v) => v.name)).toEqual(['osv', 'malicious-packages', 'age', 'block-list']);

    const age = verifiers.find((v): v is AgeVerifier => v instanceof AgeVerifier);
    expect(age).toBeDefined();
    // A minimum of zero answers without any lookup
    const target = makeTarget('npm', 'left-pad', '1.3.0');
    expect(await age?.verify([target], { signal: new AbortController().signal })).toEqual([]);
  });
});
