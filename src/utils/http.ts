import { IncomingMessage } from 'http';
import * as https from 'https';
import { CancelledError } from '../errors';
import { validateUrl } from './validators';

const MAX_REDIRECTS = 5;

export interface HttpOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  timeoutMs?: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/**
 * Sends an https request and resolves with the response body. Redirects are
 * followed for GET requests; any other non-200 status rejects.
 */
export function httpRequest(url: string, options: HttpOptions = {}, attempt = 1): Promise<string> {
  const { method = 'GET', body, timeoutMs = 10_000, signal } = options;
  const payload = body === undefined ? undefined : JSON.stringify(body);

  return validateUrl(url).then(
    (resolvedIp) =>
      new Promise<string>((resolve, reject) => {
        if (attempt > MAX_REDIRECTS) {
          reject(new Error('Too many redirects'));
          return;
        }
        if (signal?.aborted) {
          reject(new CancelledError('Request aborted'));
          return;
        }

        const urlObj = new URL(url);
        const requestOptions: https.RequestOptions = {
          method,
          hostname: resolvedIp,
          port: urlObj.port || 443,
          path: urlObj.pathname + urlObj.search,
          servername: urlObj.hostname,
          headers: {
            Host: urlObj.hostname,
            Accept: 'application/json',
            'User-Agent': 'install-warden',
            ...(payload !== undefined
              ? { 'Content-Type': 'application/json', 'Content-Length': String(Buffer.byteLength(payload)) }
              : {}),
            ...options.headers,
          },
        };

        const onAbort = () => {
          req.destroy();
          reject(new CancelledError('Request aborted'));
        };

        const req = https.request(requestOptions, (res: IncomingMessage) => {
          const status = res.statusCode ?? 0;
          if (status >= 300 && status < 400 && res.headers.location && method === 'GET') {
            res.resume();
            signal?.removeEventListener('abort', onAbort);
            const next = new URL(res.headers.location, url).toString();
            httpRequest(next, options, attempt + 1).then(resolve, reject);
            return;
          }
          if (status !== 200) {
            res.resume();
            signal?.removeEventListener('abort', onAbort);
            reject(new Error(`Request to ${urlObj.hostname} failed with status ${status}`));
            return;
          }

          let data = '';
          res.setEncoding('utf8');
          res.on('data', (chunk: string) => (data += chunk));
          res.on('end', () => {
            signal?.removeEventListener('abort', onAbort);
            resolve(data);
          });
          res.on('error', reject);
        });

        signal?.addEventListener('abort', onAbort, { once: true });
        req.on('error', (err: Error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        });
        req.setTimeout(timeoutMs, () => {
          signal?.removeEventListener('abort', onAbort);
          req.destroy();
          reject(new Error(`Request to ${urlObj.hostname} timed out after ${timeoutMs}ms`));
        });
        if (payload !== undefined) req.write(payload);
        req.end();
      }),
  );
}

export async function requestJson(url: string, options: HttpOptions = {}): Promise<unknown> {
  const raw = await httpRequest(url, options);
  try {
    return JSON.parse(raw);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to parse response from ${new URL(url).hostname}: ${msg}`);
  }
}
