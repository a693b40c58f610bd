// This is the package entrypoint re-exporting the RPC client surface.

export { buildBasicAuthority, createCredentials, loadCredentialsFromEnv, parseEndpoint } from './config/credentials.js';
export { AddressAmounts, btcAmountSchema, encodeAddressAmounts, encodeBtcAmount } from './rpc/address-amounts.js';
export { BitcoindClient, callApi, callApiRaw } from './rpc/client.js';
export type { BitcoindClientOptions } from './rpc/client.js';
export { decodeResponse, encodeRequest, serializeRequest, unwrapOutcome } from './rpc/envelope.js';
export { basicAuthorizationHeader, buildRequestHeaders, postJsonRpc } from './rpc/transport.js';
export type {
  Address,
  AddressAmountPair,
  BasicAuthority,
  BtcAmount,
  CallOptions,
  Credentials,
  CredentialsInput
} from './types/domain.js';
export type {
  JsonPrimitive,
  JsonRpcRequest,
  JsonValue,
  ResultDecoder,
  RpcErrorObject,
  RpcOutcome,
  RpcParam,
  ToJson
} from './types/rpc.js';
export {
  BitcoinApiError,
  BitcoinResultTypeError,
  BitcoinRpcError,
  InvalidConfigError,
  InvalidEndpointError,
  normalizeError
} from './utils/errors.js';
export { encodeJson, parseJsonBytes, tj, toJsonValue } from './utils/json.js';
export { buildLoggerOptions, createLogger, errorForLog, previewBody, redactUrl } from './utils/logger.js';
export { CLIENT_NAME, CLIENT_VERSION, JSON_RPC_REQUEST_ID, JSON_RPC_VERSION } from './version.js';
