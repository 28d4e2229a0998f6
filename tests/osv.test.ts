import { CancelledError, VerifierError } from '../src/errors';
import { makeTarget } from '../src/target';
import { OSV_QUERY_URL, OsvVerifier } from '../src/verifiers/osv';
import { HttpOptions, requestJson } from '../src/utils/http';

jest.mock('../src/utils/http');

const mockedRequest = jest.mocked(requestJson);
const signal = new AbortController().signal;

interface Query {
  package: { name: string };
  page_token?: string;
}

function isQuery(body: unknown): body is Query {
  return typeof body === 'object' && body !== null && 'package' in body;
}

/** Answers OSV queries from a table keyed by package name and page token. */
function respondWith(pages: Record<string, unknown>) {
  mockedRequest.mockImplementation(async (_url: string, options?: HttpOptions) => {
    const body = options?.body;
    if (!isQuery(body)) throw new Error('bad query');
    const key = body.page_token ? `${body.package.name}#${body.page_token}` : body.package.name;
    if (!(key in pages)) throw new Error(`no page for ${key}`);
    return pages[key];
  });
}

beforeEach(() => {
  mockedRequest.mockReset();
});

describe('OsvVerifier', () => {
  const verifier = new OsvVerifier();
  const lodash = makeTarget('npm', 'lodash', '4.17.20');
  const evil = makeTarget('npm', 'evil-pkg', '1.0.0');
  const react = makeTarget('npm', 'react', '18.3.1');

  test('treats MAL- advisories as critical and the rest as warnings', async () => {
    respondWith({
      lodash: { vulns: [{ id: 'GHSA-35jh-r3h4-6jhm', database_specific: { severity: 'HIGH' } }] },
      'evil-pkg': { vulns: [{ id: 'MAL-2024-1234' }] },
      react: {},
    });

    const findings = await verifier.verify([lodash, evil, react], { signal });

    expect(findings).toEqual([
      {
        target: lodash,
        severity: 'warning',
        verifier: 'osv',
        message: 'An OSV.dev disclosure exists for lodash@4.17.20: [High] GHSA-35jh-r3h4-6jhm',
        detail: { advisoryId: 'GHSA-35jh-r3h4-6jhm', url: 'https://osv.dev/vulnerability/GHSA-35jh-r3h4-6jhm' },
      },
      {
        target: evil,
        severity: 'critical',
        verifier: 'osv',
        message: 'An OSV.dev malicious package disclosure exists for evil-pkg@1.0.0: MAL-2024-1234',
        detail: { advisoryId: 'MAL-2024-1234', url: 'https://osv.dev/vulnerability/MAL-2024-1234' },
      },
    ]);
  });

  test('tags advisories by their scored severity, most severe first', async () => {
    respondWith({
      lodash: {
        vulns: [
          { id: 'GHSA-medium', severity: [{ type: 'CVSS_V3', score: 'CVSS:3.1/AV:N/AC:L/PR:N/UI:R/S:U/C:L/I:N/A:N' }] },
          { id: 'GHSA-unknown' },
          {
            id: 'GHSA-critical',
            severity: [
              { type: 'CVSS_V2', score: 'AV:N/AC:L/Au:N/C:P/I:P/A:P' },
              { type: 'CVSS_V3', score: 'CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H' },
            ],
            database_specific: { severity: 'LOW' },
          },
          { id: 'UBUNTU-negligible', severity: [{ type: 'Ubuntu', score: 'Negligible' }] },
          { id: 'GHSA-high', severity: [{ type: 'CVSS_V2', score: 'AV:N/AC:L/Au:N/C:P/I:P/A:P' }] },
        ],
      },
    });

    const findings = await verifier.verify([lodash], { signal });

    expect(findings.map((f) => f.message)).toEqual([
      'An OSV.dev disclosure exists for lodash@4.17.20: [Critical] GHSA-critical',
      'An OSV.dev disclosure exists for lodash@4.17.20: [High] GHSA-high',
      'An OSV.dev disclosure exists for lodash@4.17.20: [Medium] GHSA-medium',
      'An OSV.dev disclosure exists for lodash@4.17.20: [None] UBUNTU-negligible',
      'An OSV.dev disclosure exists for lodash@4.17.20: GHSA-unknown',
    ]);
  });

  test('sends one query per target to the OSV.dev query endpoint', async () => {
    respondWith({ react: {} });
    await verifier.verify([react], { signal });
    expect(mockedRequest).toHaveBeenCalledWith(OSV_QUERY_URL, {
      method: 'POST',
      body: { version: '18.3.1', package: { name: 'react', ecosystem: 'npm' } },
      timeoutMs: 10_000,
      signal,
    });
  });

  test('follows result pages and drops repeated advisories', async () => {
    respondWith({
      lodash: { vulns: [{ id: 'GHSA-1' }], next_page_token: 'p2' },
      'lodash#p2': { vulns: [{ id: 'GHSA-1' }, { id: 'GHSA-2' }] },
    });

    const findings = await verifier.verify([lodash], { signal });

    expect(mockedRequest).toHaveBeenCalledTimes(2);
    expect(findings.map((f) => f.detail?.advisoryId)).toEqual(['GHSA-1', 'GHSA-2']);
  });

  test('turns request failures into a verifier error', async () => {
    respondWith({});
    const result = verifier.verify([react], { signal });
    await expect(result).rejects.toThrow(VerifierError);
    await expect(result).rejects.toThrow('Failed to query OSV.dev for react@18.3.1: no page for react');
  });

  test('lets cancellation through untouched', async () => {
    mockedRequest.mockRejectedValue(new CancelledError('Request aborted'));
    await expect(verifier.verify([react], { signal })).rejects.toThrow(CancelledError);
  });
});
