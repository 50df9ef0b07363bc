import { isIP } from 'node:net';

import { InvalidRequestError } from './errors.js';

const DOMAIN_LABEL = /^(?!-)[a-z0-9-]{1,63}(?<!-)$/i;
// Plain alphabetic TLDs, or IDNA ones in their punycode form (xn--p1ai).
const TOP_LEVEL_DOMAIN = /^(?:[a-z]{2,63}|xn--[a-z0-9-]{1,59})$/i;

function isDomainName(hostname: string): boolean {
  if (hostname.length === 0 || hostname.length > 253) {
    return false;
  }
  const labels = hostname.replace(/\.$/, '').split('.');
  if (labels.length < 2) {
    return false;
  }
  const tld = labels[labels.length - 1] ?? '';
  return labels.every((label) => DOMAIN_LABEL.test(label)) && TOP_LEVEL_DOMAIN.test(tld);
}

/** Validates a link submitted for analysis. Only http(s) URLs on a domain name are accepted. */
export function validateUrl(value: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new InvalidRequestError(`Invalid URL: ${value}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidRequestError('URL must use http or https scheme');
  }

  const hostname = parsed.hostname.replace(/^\[|\]$/g, '');
  if (isIP(hostname) !== 0 || !isDomainName(hostname)) {
    throw new InvalidRequestError('URL must have a valid domain');
  }

  return parsed;
}

export function isValidUrl(value: string): boolean {
  try {
    validateUrl(value);
    return true;
  } catch {
    return false;
  }
}
