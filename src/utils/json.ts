// This utility module keeps JSON parse/stringify operations on raw RPC bodies explicit.

import type { JsonValue, RpcParam, ToJson } from '../types/rpc.js';

// ignoreBOM keeps a leading BOM in the text, so JSON.parse rejects it.
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const utf8Encoder = new TextEncoder();

export type JsonParseResult = { ok: true; value: unknown } | { ok: false };

// This helper parses a UTF-8 JSON body and reports failure as a value instead of throwing.
export function parseJsonBytes(body: Uint8Array): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(utf8Decoder.decode(body)) };
  } catch {
    return { ok: false };
  }
}

export function encodeJson(value: unknown): Uint8Array {
  return utf8Encoder.encode(JSON.stringify(value));
}

function isToJson(value: RpcParam): value is ToJson {
  return typeof value === 'object' && value !== null && 'toJSON' in value && typeof value.toJSON === 'function';
}

// This helper resolves a parameter to the JSON value it puts on the wire.
export function toJsonValue(value: RpcParam): JsonValue {
  if (isToJson(value)) {
    return value.toJSON();
  }

  return value;
}

export const tj = toJsonValue;
