import type { FailureKind } from '@/types';

export const DEFAULT_VALUES = {
  PORT: 8000,
  HOST: '127.0.0.1',
  RPC_HOST: 'localhost',
  RPC_PORT: 51473,
  RPC_TIMEOUT: 30000,
  PEER_CACHE_TTL_MS: 5 * 60 * 60 * 1000,
  PEER_MIN_VERSION: 'DIVI Core: 3.0.0.0',
  PEER_HEIGHT_WINDOW: 1000,
  LOG_LEVEL: 'info',
} as const;

export const JSONRPC_VERSION = '2.0';
export const JSONRPC_REQUEST_ID = 1;

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
} as const;

/**
 * Client-facing error text, one per failure kind. Upstream wording is logged,
 * never returned.
 */
export const ERROR_MESSAGES = {
  unavailable: 'Service Unavailable. The blockchain node could not be reached. Try again later.',
  timeout: 'Request Timeout. The blockchain node took too long to respond. Try again later.',
  unauthorized: 'The blockchain node rejected the gateway credentials.',
  protocol: 'The blockchain node returned an unexpected HTTP error. Check your request and try again.',
  upstream: 'The blockchain node could not process the request. Check your parameters and try again.',
  internal: 'Something went wrong inside the gateway. Try again later.',
  unknown: 'Something went wrong while contacting the blockchain node. Try again later.',
  malformed_input: 'Invalid request parameters.',
  not_found: 'Not found.',
} as const satisfies Record<FailureKind, string>;
