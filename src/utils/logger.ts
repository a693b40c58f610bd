// This module configures pino for client call events and shapes the few values those events carry.

import { pino, type Logger, type LoggerOptions } from 'pino';
import { CLIENT_NAME } from '../version.js';
import type { BitcoinRpcError } from './errors.js';

const MAX_BODY_PREVIEW_LENGTH = 512;

// Call records never carry credentials; these paths catch ones passed in by callers.
const REDACT_PATHS = ['password', 'credentials.password', 'headers.authorization', 'headers.Authorization'];

// This helper strips userinfo from URLs so endpoints can be logged.
export function redactUrl(value: string | URL): string {
  let url: URL;
  try {
    url = new URL(String(value));
  } catch {
    return '[unparsable-url]';
  }

  url.username = '';
  url.password = '';
  return url.toString();
}

// This helper renders a response body as bounded text for type-error records.
export function previewBody(body: Uint8Array): string {
  const text = new TextDecoder().decode(body);
  if (text.length <= MAX_BODY_PREVIEW_LENGTH) {
    return text;
  }

  return `${text.slice(0, MAX_BODY_PREVIEW_LENGTH)}...[truncated:${text.length - MAX_BODY_PREVIEW_LENGTH}]`;
}

export function errorForLog(error: BitcoinRpcError): Record<string, unknown> {
  return {
    name: error.name,
    code: error.code,
    message: error.message,
    details: error.details
  };
}

export function buildLoggerOptions(level = process.env.LOG_LEVEL ?? 'info'): LoggerOptions {
  return {
    level,
    base: {
      service: CLIENT_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

export function createLogger(level?: string): Logger {
  return pino(buildLoggerOptions(level));
}
