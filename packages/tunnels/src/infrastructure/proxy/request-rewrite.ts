/**
 * @file request-rewrite.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { IncomingHttpHeaders } from 'node:http';
import { HOP_BY_HOP_HEADERS } from '../../config/constants.js';

/**
 * Headers the proxy owns: recomputed, replaced by the signature, or meaningless upstream.
 */
const PROXY_OWNED_HEADERS: ReadonlySet<string> = new Set([
  'host',
  'content-length',
  'expect',
  'authorization',
  'x-amz-date',
  'x-amz-security-token',
  'x-amz-content-sha256',
]);

export interface RewrittenTarget {
  /** Encoded path including the stage prefix */
  path: string;
  /** Raw query string without the leading '?', or '' */
  query: string;
}

/**
 * Splits a request target and prepends the stage prefix unless the path
 * already starts with it. Matching is per segment: `/prodx` is not under `/prod`.
 */
export function rewriteTarget(rawUrl: string, prefix: string): RewrittenTarget {
  const mark = rawUrl.indexOf('?');
  const rawPath = mark === -1 ? rawUrl : rawUrl.slice(0, mark);
  const query = mark === -1 ? '' : rawUrl.slice(mark + 1);
  const path = rawPath.startsWith('/') ? rawPath : `/${rawPath}`;

  if (prefix === '' || path === prefix || path.startsWith(`${prefix}/`)) {
    return { path, query };
  }
  return { path: `${prefix}${path}`, query };
}

function decodeComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed escapes are signed as sent
    return value;
  }
}

/**
 * Parses a raw query string into the multi-value bag the signer canonicalizes.
 */
export function parseQuery(query: string): Record<string, string | string[]> {
  const bag: Record<string, string | string[]> = {};
  if (query === '') return bag;

  for (const pair of query.split('&')) {
    if (pair === '') continue;
    const eq = pair.indexOf('=');
    const key = decodeComponent(eq === -1 ? pair : pair.slice(0, eq));
    const value = eq === -1 ? '' : decodeComponent(pair.slice(eq + 1));
    const existing = bag[key];
    if (existing === undefined) {
      bag[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      bag[key] = [existing, value];
    }
  }
  return bag;
}

/**
 * Names listed in a Connection header, which are hop-by-hop for this message only.
 */
function connectionTokens(value: string | string[] | undefined): Set<string> {
  const joined = Array.isArray(value) ? value.join(',') : (value ?? '');
  return new Set(
    joined
      .split(',')
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token.length > 0)
  );
}

function joinValue(name: string, value: string | string[]): string {
  if (!Array.isArray(value)) return value;
  return value.join(name === 'cookie' ? '; ' : ', ');
}

export interface UpstreamHeaderOptions {
  host: string;
  bodyLength: number;
  /** Set when the client framed a body, so an empty body is still declared */
  hadBody: boolean;
  apiId?: string;
}

/**
 * Builds the header set sent upstream, before signing.
 */
export function buildUpstreamHeaders(
  incoming: IncomingHttpHeaders,
  options: UpstreamHeaderOptions
): Record<string, string> {
  const dropped = connectionTokens(incoming.connection);
  const headers: Record<string, string> = {};

  for (const [name, value] of Object.entries(incoming)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(key) || PROXY_OWNED_HEADERS.has(key) || dropped.has(key)) {
      continue;
    }
    headers[key] = joinValue(key, value);
  }

  headers.host = options.host;
  if (options.hadBody || options.bodyLength > 0) {
    headers['content-length'] = String(options.bodyLength);
  }
  if (options.apiId !== undefined) {
    headers['x-apigw-api-id'] = options.apiId;
  }
  return headers;
}

/**
 * Response headers relayed back to the local client.
 */
export function filterResponseHeaders(
  upstream: Record<string, string | string[] | undefined>
): Record<string, string | string[]> {
  const dropped = connectionTokens(upstream.connection);
  const headers: Record<string, string | string[]> = {};

  for (const [name, value] of Object.entries(upstream)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(key) || dropped.has(key)) continue;
    headers[key] = value;
  }
  return headers;
}
