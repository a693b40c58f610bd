// This file defines JSON-RPC wire payloads and the tagged decode outcome used by the envelope codec.

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// This interface covers parameter objects that choose their own wire form, such as address-amount maps.
export interface ToJson {
  toJSON(): JsonValue;
}

export type RpcParam = JsonValue | ToJson;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params: RpcParam[];
  id: number;
}

export interface RpcErrorObject {
  code: number;
  message: string;
}

// This capability is what a caller's expected result type must provide; zod schemas satisfy it as-is.
export interface ResultDecoder<T> {
  safeParse(value: unknown): { success: true; data: T } | { success: false };
}

export type RpcOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'api-error'; code: number; message: string }
  | { kind: 'type-error'; body: Uint8Array };
