// This module builds immutable daemon credentials and fails fast on malformed endpoints.

import { z } from 'zod';
import type { BasicAuthority, Credentials, CredentialsInput } from '../types/domain.js';
import { InvalidConfigError, InvalidEndpointError } from '../utils/errors.js';
import { BASIC_AUTH_REALM, DEFAULT_RPC_URL } from '../version.js';

const credentialsInputSchema = z.object({
  url: z.string().trim().min(1),
  username: z.string(),
  password: z.string()
});

const envSchema = z.object({
  BITCOIND_RPC_URL: z.string().trim().min(1).default(DEFAULT_RPC_URL),
  BITCOIND_RPC_USER: z.string().min(1),
  BITCOIND_RPC_PASSWORD: z.string().min(1)
});

// This helper parses the endpoint and accepts only absolute http(s) URLs.
export function parseEndpoint(url: string): URL {
  let endpoint: URL;
  try {
    endpoint = new URL(url);
  } catch {
    throw new InvalidEndpointError(url, 'not an absolute URL');
  }

  if (endpoint.protocol !== 'http:' && endpoint.protocol !== 'https:') {
    throw new InvalidEndpointError(url, `unsupported scheme ${endpoint.protocol}`);
  }

  if (!endpoint.hostname) {
    throw new InvalidEndpointError(url, 'missing host');
  }

  return endpoint;
}

// This function validates caller input and returns frozen credentials.
export function createCredentials(input: CredentialsInput): Credentials {
  const parsed = credentialsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError('Credentials require string url, username and password.', {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }

  parseEndpoint(parsed.data.url);

  return Object.freeze({
    url: parsed.data.url,
    username: parsed.data.username,
    password: parsed.data.password
  });
}

// This function reads credentials from BITCOIND_RPC_* environment variables.
export function loadCredentialsFromEnv(env: NodeJS.ProcessEnv = process.env): Credentials {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError('Missing or invalid BITCOIND_RPC_* environment variables.', {
      variables: parsed.error.issues.map((issue) => issue.path.join('.'))
    });
  }

  return createCredentials({
    url: parsed.data.BITCOIND_RPC_URL,
    username: parsed.data.BITCOIND_RPC_USER,
    password: parsed.data.BITCOIND_RPC_PASSWORD
  });
}

// This helper scopes Basic credentials to the endpoint authority under the daemon's realm.
// The url is parsed again so hand-built credentials hit the same fatal check.
export function buildBasicAuthority(credentials: Credentials): BasicAuthority {
  const site = parseEndpoint(credentials.url);
  site.username = '';
  site.password = '';
  site.hash = '';

  return {
    realm: BASIC_AUTH_REALM,
    username: credentials.username,
    password: credentials.password,
    site
  };
}
