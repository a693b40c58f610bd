// This module exposes the generic call operation consumed by per-command wrappers.

import type { Logger } from 'pino';
import type { CallOptions, Credentials } from '../types/domain.js';
import type { ResultDecoder, RpcParam } from '../types/rpc.js';
import { normalizeError } from '../utils/errors.js';
import { errorForLog, previewBody, redactUrl } from '../utils/logger.js';
import { decodeResponse, serializeRequest, unwrapOutcome } from './envelope.js';
import { postJsonRpc } from './transport.js';

// This function is the no-conversion call: the caller supplies the body and receives the raw bytes.
export async function callApiRaw(credentials: Credentials, body: Uint8Array, options?: CallOptions): Promise<Uint8Array> {
  return postJsonRpc(credentials, body, options);
}

/**
 * Calls `method` on the daemon and decodes the result with `decoder`.
 *
 * Throws `BitcoinApiError` when the daemon reports an error object and
 * `BitcoinResultTypeError` when the response does not match the envelope or
 * the expected result type. HTTP status codes are not consulted.
 *
 * Results pass through `JSON.parse`, so integers beyond 2^53 (large amounts
 * in satoshis, some ids) are rounded before `decoder` sees them. Use
 * `callApiRaw` and parse the bytes yourself when exact values matter.
 *
 * @example
 * const credentials = createCredentials({ url: 'http://127.0.0.1:8332', username: 'user', password: 'pass' });
 * const balance = await callApi(credentials, 'getbalance', ['*', 6], z.number());
 */
export async function callApi<T>(
  credentials: Credentials,
  method: string,
  params: RpcParam[],
  decoder: ResultDecoder<T>,
  options?: CallOptions
): Promise<T> {
  const body = await callApiRaw(credentials, serializeRequest(method, params), options);
  return unwrapOutcome(decodeResponse(body, decoder));
}

export interface BitcoindClientOptions {
  logger?: Logger;
}

// This class binds credentials once so command wrappers only pass method, params, and decoder.
export class BitcoindClient {
  public readonly credentials: Credentials;
  private readonly logger?: Logger;

  public constructor(credentials: Credentials, options: BitcoindClientOptions = {}) {
    this.credentials = credentials;
    this.logger = options.logger?.child({
      component: 'bitcoind_client'
    });
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details?: Record<string, unknown>): void {
    if (!this.logger) {
      return;
    }

    this.logger[level](
      {
        event,
        endpoint: redactUrl(this.credentials.url),
        details: details ?? {}
      },
      event
    );
  }

  public async call<T>(method: string, params: RpcParam[], decoder: ResultDecoder<T>, options?: CallOptions): Promise<T> {
    const startedAt = Date.now();
    this.log('debug', 'rpc_call_started', { method, paramCount: params.length });

    let body: Uint8Array;
    try {
      body = await callApiRaw(this.credentials, serializeRequest(method, params), options);
    } catch (error) {
      this.log('error', 'rpc_call_transport_failed', {
        method,
        durationMs: Date.now() - startedAt,
        error: errorForLog(normalizeError(error))
      });
      throw error;
    }

    const outcome = decodeResponse(body, decoder);
    switch (outcome.kind) {
      case 'ok':
        this.log('debug', 'rpc_call_completed', { method, durationMs: Date.now() - startedAt, bytes: body.byteLength });
        break;
      case 'api-error':
        this.log('warn', 'rpc_call_api_error', { method, rpcCode: outcome.code, rpcMessage: outcome.message });
        break;
      case 'type-error':
        this.log('error', 'rpc_call_result_type_error', { method, bytes: body.byteLength, bodyPreview: previewBody(body) });
        break;
    }

    return unwrapOutcome(outcome);
  }

  public async callRaw(body: Uint8Array, options?: CallOptions): Promise<Uint8Array> {
    return callApiRaw(this.credentials, body, options);
  }
}
