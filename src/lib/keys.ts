import type { RequestView } from '../types';
import { headerValues, splitHeaderValues } from './ip';

// ASCII unit separator: never legal in a path, method, address or header value
export const KEY_SEPARATOR = '\u001f';

// Key shared by every request when no dimension is active: one global bucket.
export const GLOBAL_KEY = 'global';

export type KeyComposerConfig = {
  ignoreAddress: boolean;
  ignoreURL: boolean;
  methods: ReadonlySet<string>;
  isBasicAuthUser: (user: string) => boolean;
  headers: ReadonlyArray<readonly [string, ReadonlySet<string>]>;
};

/** Username from an `Authorization: Basic ...` header, if there is one. */
export function parseBasicAuthUser(authorization: string | undefined): string | undefined {
  if (!authorization) return undefined;
  const match = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(authorization);
  const encoded = match?.[1];
  if (!encoded) return undefined;
  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const colon = decoded.indexOf(':');
  if (colon <= 0) return undefined;
  return decoded.slice(0, colon);
}

function matchedHeaderPairs(request: RequestView, headers: KeyComposerConfig['headers']): string[] {
  const pairs: string[] = [];
  const names = [...headers].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [name, allowed] of names) {
    const values = [...new Set(splitHeaderValues(headerValues(request, name)))].sort();
    for (const value of values) {
      // an entry registered without values matches any value of that header
      if (allowed.size === 0 || allowed.has(value)) pairs.push(`header=${name}:${value}`);
    }
  }
  return pairs;
}

/**
 * Tagged key dimensions in their fixed order: address, path, method, basic-auth
 * user, then header pairs sorted by name and value. Returns undefined when the
 * address dimension is on but unresolved and nothing else identifies the caller.
 */
export function buildKeyParts(
  request: RequestView,
  address: string | undefined,
  config: KeyComposerConfig,
): string[] | undefined {
  const method = request.method.toUpperCase();
  const user = parseBasicAuthUser(headerValues(request, 'authorization')?.[0]);
  const matchedUser = user !== undefined && config.isBasicAuthUser(user) ? user : undefined;
  const headerPairs = matchedHeaderPairs(request, config.headers);

  if (!config.ignoreAddress && address === undefined && matchedUser === undefined && headerPairs.length === 0) {
    return undefined;
  }

  const parts: string[] = [];
  if (!config.ignoreAddress && address !== undefined) parts.push(`ip=${address}`);
  if (!config.ignoreURL) parts.push(`path=${request.path}`);
  if (config.methods.size > 0 && config.methods.has(method)) parts.push(`method=${method}`);
  if (matchedUser !== undefined) parts.push(`user=${matchedUser}`);
  parts.push(...headerPairs);
  return parts;
}

export function joinKeyParts(parts: readonly string[]): string {
  return parts.length > 0 ? parts.join(KEY_SEPARATOR) : GLOBAL_KEY;
}

export function composeKey(
  request: RequestView,
  address: string | undefined,
  config: KeyComposerConfig,
): string | undefined {
  const parts = buildKeyParts(request, address, config);
  return parts ? joinKeyParts(parts) : undefined;
}
