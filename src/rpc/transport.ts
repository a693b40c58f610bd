// This module performs one authenticated JSON-RPC POST and hands back the raw response body.

import { buildBasicAuthority } from '../config/credentials.js';
import type { BasicAuthority, CallOptions, Credentials } from '../types/domain.js';

export function basicAuthorizationHeader(authority: BasicAuthority): string {
  const token = Buffer.from(`${authority.username}:${authority.password}`, 'utf8').toString('base64');
  return `Basic ${token}`;
}

// The request always targets the authority's own site, so Authorization is sent preemptively.
export function buildRequestHeaders(authority: BasicAuthority, body: Uint8Array): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'Content-Length': String(body.byteLength),
    Authorization: basicAuthorizationHeader(authority)
  };
}

// This function sends one POST without status inspection, retries, or logging of its own.
export async function postJsonRpc(credentials: Credentials, body: Uint8Array, options: CallOptions = {}): Promise<Uint8Array> {
  const authority = buildBasicAuthority(credentials);

  const response = await fetch(authority.site, {
    method: 'POST',
    headers: buildRequestHeaders(authority, body),
    body,
    signal: options.signal
  });

  return new Uint8Array(await response.arrayBuffer());
}
