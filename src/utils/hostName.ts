import { ConfigurationError } from '../error/configurationError.js';
import type { SafeWrap } from './wrap.js';

const SCHEME = /^https?:\/\//i;
const DNS_LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/i;
const IPV6 = /^\[[0-9a-f:.]+\]$/i;
const PORT = /^\d{1,5}$/;

/**
 * Removes surrounding whitespace, any `http://`/`https://` prefix and trailing slashes.
 */
export function stripHostName(hostName: string): string {
  return hostName.trim().replace(SCHEME, '').replace(/\/+$/, '');
}

/**
 * Checks a bare host (no scheme, no path) for being a DNS name, an IPv4 address or a
 * bracketed IPv6 address, optionally followed by `:port`.
 */
export function isValidHost(host: string): boolean {
  if (!host) {
    return false;
  }

  let name = host;
  const portAt = host.lastIndexOf(':');
  if (portAt !== -1 && !host.endsWith(']')) {
    const port = host.slice(portAt + 1);
    if (!PORT.test(port) || Number(port) < 1 || Number(port) > 65_535) {
      return false;
    }

    name = host.slice(0, portAt);
  }

  if (name.startsWith('[')) {
    return IPV6.test(name);
  }

  if (name.length > 253) {
    return false;
  }

  return name.split('.').every((label) => DNS_LABEL.test(label));
}

/**
 * Normalizes a host name to exactly one scheme prefix and no trailing slash.
 *
 * `secure` picks `https://` or `http://`; left undefined, the scheme the caller wrote is kept
 * (`https://` stays secure, anything else becomes `http://`).
 *
 * @example
 * normalizeHostName('cms.example.com/') // [null, 'http://cms.example.com']
 * normalizeHostName('http://cms.example.com', true) // [null, 'https://cms.example.com']
 */
export function normalizeHostName(hostName: string, secure?: boolean): SafeWrap<ConfigurationError, string> {
  const host = stripHostName(hostName);
  if (!isValidHost(host)) {
    return [new ConfigurationError(`hostName cannot be empty or an unrecognized host: "${hostName}"`, 'hostName'), null];
  }

  const useTls = secure ?? /^https:\/\//i.test(hostName.trim());
  return [null, `${useTls ? 'https' : 'http'}://${host}`];
}
