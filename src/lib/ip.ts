import type { IPLookup, RequestView } from '../types';

export const REMOTE_ADDR = 'RemoteAddr';

export const defaultIPLookup: IPLookup = { name: REMOTE_ADDR, indexFromRight: 0 };

/**
 * Strips the port from a transport peer address.
 * `1.2.3.4:80` -> `1.2.3.4`, `[::1]:80` -> `::1`; bare IPv4 and IPv6 stay as they are.
 */
export function stripPort(address: string): string {
  const trimmed = address.trim();
  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']');
    return end > 0 ? trimmed.slice(1, end) : trimmed;
  }
  const firstColon = trimmed.indexOf(':');
  // more than one colon without brackets is an IPv6 address with no port
  if (firstColon === -1 || firstColon !== trimmed.lastIndexOf(':')) return trimmed;
  return trimmed.slice(0, firstColon);
}

/**
 * Treats every occurrence of a header as one comma-separated list and returns
 * its trimmed elements in order. Blank elements keep their position.
 */
export function headerListElements(values: readonly string[] | undefined): string[] {
  if (!values || values.length === 0) return [];
  return values
    .join(',')
    .split(',')
    .map((part) => part.trim());
}

/** Like `headerListElements`, without the blank elements. */
export function splitHeaderValues(values: readonly string[] | undefined): string[] {
  return headerListElements(values).filter((part) => part.length > 0);
}

export function headerValues(request: RequestView, name: string): readonly string[] | undefined {
  return request.headers[name.toLowerCase()];
}

/**
 * Derives the address to limit by. Returns undefined when the lookup finds
 * nothing at the configured position; callers treat that as "no identity".
 */
export function resolveAddress(request: RequestView, lookup: IPLookup = defaultIPLookup): string | undefined {
  if (lookup.name.toLowerCase() === REMOTE_ADDR.toLowerCase()) {
    if (!request.remoteAddress) return undefined;
    const address = stripPort(request.remoteAddress);
    return address.length > 0 ? address : undefined;
  }

  // positions count blank elements too, so a blank hop cannot shift the selection
  const candidates = headerListElements(headerValues(request, lookup.name));
  const { indexFromRight } = lookup;
  if (!Number.isInteger(indexFromRight) || indexFromRight < 0 || indexFromRight >= candidates.length) {
    return undefined;
  }
  const selected = candidates[candidates.length - 1 - indexFromRight];
  return selected ? selected : undefined;
}
