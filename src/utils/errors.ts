// This module provides the typed error taxonomy surfaced to callers of the RPC client.

export class BitcoinRpcError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'BitcoinRpcError';
    this.code = code;
    this.details = details;
  }
}

// This error carries a JSON-RPC error object reported by the daemon itself.
export class BitcoinApiError extends BitcoinRpcError {
  public readonly rpcCode: number;

  public constructor(rpcCode: number, message: string) {
    super('api_error', message, { rpcCode });
    this.name = 'BitcoinApiError';
    this.rpcCode = rpcCode;
  }
}

// This error keeps the exact response bytes whenever the envelope or result could not be decoded.
export class BitcoinResultTypeError extends BitcoinRpcError {
  public readonly body: Uint8Array;

  public constructor(body: Uint8Array) {
    super('result_type_error', `Unexpected JSON-RPC response (${body.byteLength} bytes).`);
    this.name = 'BitcoinResultTypeError';
    this.body = body;
  }

  public get bodyText(): string {
    return new TextDecoder().decode(this.body);
  }
}

export class InvalidEndpointError extends BitcoinRpcError {
  public readonly url: string;

  public constructor(url: string, reason: string) {
    super('invalid_endpoint', `Invalid RPC endpoint URL: ${reason}`, { url });
    this.name = 'InvalidEndpointError';
    this.url = url;
  }
}

export class InvalidConfigError extends BitcoinRpcError {
  public constructor(message: string, details?: unknown) {
    super('invalid_config', message, details);
    this.name = 'InvalidConfigError';
  }
}

// This helper normalizes unknown failures into a BitcoinRpcError for uniform logging.
export function normalizeError(error: unknown): BitcoinRpcError {
  if (error instanceof BitcoinRpcError) {
    return error;
  }

  if (error instanceof Error) {
    return new BitcoinRpcError('transport_error', error.message, { name: error.name });
  }

  return new BitcoinRpcError('internal_error', 'An unexpected error occurred.');
}
