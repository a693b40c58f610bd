// This module centralizes client identity and protocol constants so encoder, transport, and logs stay in sync.

export const CLIENT_NAME = 'bitcoind-rpc';
export const CLIENT_VERSION = '0.1.0';

export const JSON_RPC_VERSION = '2.0';

// bitcoind pairs responses by HTTP exchange, not by id, so every request carries the same one.
export const JSON_RPC_REQUEST_ID = 1;

export const BASIC_AUTH_REALM = 'jsonrpc';

export const DEFAULT_RPC_URL = 'http://127.0.0.1:8332';
