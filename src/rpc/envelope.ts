// This module encodes JSON-RPC request envelopes and classifies response envelopes into tagged outcomes.

import { z } from 'zod';
import type { JsonRpcRequest, ResultDecoder, RpcOutcome, RpcParam } from '../types/rpc.js';
import { BitcoinApiError, BitcoinResultTypeError } from '../utils/errors.js';
import { encodeJson, parseJsonBytes } from '../utils/json.js';
import { JSON_RPC_REQUEST_ID, JSON_RPC_VERSION } from '../version.js';

// Both members must be present; `result` may hold any JSON value, including null.
const responseEnvelopeSchema = z.object({
  result: z.unknown().refine((value) => value !== undefined),
  error: z.union([
    z.null(),
    z.object({
      code: z.number().int(),
      message: z.string()
    })
  ])
});

export function encodeRequest(method: string, params: RpcParam[] = []): JsonRpcRequest {
  return {
    jsonrpc: JSON_RPC_VERSION,
    method,
    params,
    id: JSON_RPC_REQUEST_ID
  };
}

export function serializeRequest(method: string, params: RpcParam[] = []): Uint8Array {
  return encodeJson(encodeRequest(method, params));
}

// This function maps raw response bytes to ok, api-error, or type-error without throwing.
export function decodeResponse<T>(body: Uint8Array, decoder: ResultDecoder<T>): RpcOutcome<T> {
  const parsed = parseJsonBytes(body);
  if (!parsed.ok) {
    return { kind: 'type-error', body };
  }

  const envelope = responseEnvelopeSchema.safeParse(parsed.value);
  if (!envelope.success) {
    return { kind: 'type-error', body };
  }

  const { error, result } = envelope.data;
  if (error !== null) {
    return { kind: 'api-error', code: error.code, message: error.message };
  }

  const decoded = decoder.safeParse(result);
  if (!decoded.success) {
    return { kind: 'type-error', body };
  }

  return { kind: 'ok', value: decoded.data };
}

export function unwrapOutcome<T>(outcome: RpcOutcome<T>): T {
  switch (outcome.kind) {
    case 'ok':
      return outcome.value;
    case 'api-error':
      throw new BitcoinApiError(outcome.code, outcome.message);
    case 'type-error':
      throw new BitcoinResultTypeError(outcome.body);
  }
}
