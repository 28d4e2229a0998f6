import * as dns from 'dns';
import * as net from 'net';

const PRIVATE_RANGES = new net.BlockList();
PRIVATE_RANGES.addSubnet('10.0.0.0', 8, 'ipv4');
PRIVATE_RANGES.addSubnet('172.16.0.0', 12, 'ipv4');
PRIVATE_RANGES.addSubnet('192.168.0.0', 16, 'ipv4');
PRIVATE_RANGES.addSubnet('127.0.0.0', 8, 'ipv4');
PRIVATE_RANGES.addSubnet('169.254.0.0', 16, 'ipv4');
PRIVATE_RANGES.addAddress('::1', 'ipv6');
PRIVATE_RANGES.addSubnet('fc00::', 7, 'ipv6');
PRIVATE_RANGES.addSubnet('fe80::', 10, 'ipv6');

export function isPrivateIp(ip: string): boolean {
  const family = net.isIP(ip);
  if (family === 0) return false;
  return PRIVATE_RANGES.check(ip, family === 4 ? 'ipv4' : 'ipv6');
}

/**
 * Accepts only https URLs whose host resolves to a public address, and returns
 * that address so the request connects to exactly what was checked.
 */
export async function validateUrl(urlStr: string): Promise<string> {
  let parsed: URL;
  try {
    parsed = new URL(urlStr);
  } catch {
    throw new Error(`Invalid URL: ${urlStr}`);
  }

  if (parsed.protocol !== 'https:') {
    throw new Error(`Refusing non-https URL: ${urlStr}`);
  }

  // URL keeps the brackets around IPv6 literals
  const hostname = parsed.hostname.replace(/^\[|\]$/g, '');
  if (net.isIP(hostname)) {
    if (isPrivateIp(hostname)) {
      throw new Error(`Refusing private address ${hostname}`);
    }
    return hostname;
  }

  let address: string;
  try {
    ({ address } = await dns.promises.lookup(hostname));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`DNS lookup failed for ${hostname}: ${msg}`);
  }
  if (isPrivateIp(address)) {
    throw new Error(`Hostname ${hostname} resolves to private address ${address}`);
  }
  return address;
}
