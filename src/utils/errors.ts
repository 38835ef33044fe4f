import { ERROR_MESSAGES, HTTP_STATUS } from '@/config/constants';

export type GatewayErrorKind = 'malformed_input' | 'config' | 'internal';

/**
 * Errors raised inside the gateway itself. Upstream failures never take this
 * path; they travel as {@link RpcOutcome} values.
 */
export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly status: number;

  constructor(kind: GatewayErrorKind, message: string, status: number) {
    super(message);
    this.name = 'GatewayError';
    this.kind = kind;
    this.status = status;
  }

  /** Message that is safe to hand to an HTTP client. */
  get publicMessage(): string {
    return this.kind === 'malformed_input' ? this.message : ERROR_MESSAGES.internal;
  }
}

export class ValidationError extends GatewayError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('malformed_input', message, HTTP_STATUS.BAD_REQUEST);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string) {
    super('config', message, HTTP_STATUS.INTERNAL_SERVER_ERROR);
    this.name = 'ConfigError';
  }
}

export class PeerAddressError extends GatewayError {
  readonly addr: string;

  constructor(addr: string, reason: string) {
    super('internal', `Malformed peer address '${addr}': ${reason}`, HTTP_STATUS.INTERNAL_SERVER_ERROR);
    this.name = 'PeerAddressError';
    this.addr = addr;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
