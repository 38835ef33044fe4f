import { ERROR_MESSAGES, HTTP_STATUS } from '@/config/constants';
import { FailureKind, GatewayResponse, JSONValue, RpcOutcome } from '@/types';

/**
 * True when the upstream already wrapped its answer in a JSON-RPC style
 * envelope, i.e. a plain object that owns a `result` member.
 */
export function isEnvelopeShaped(value: JSONValue): value is { [key: string]: JSONValue } & { result: JSONValue } {
	return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.prototype.hasOwnProperty.call(value, 'result');
}

export function successResponse(result: JSONValue, now: Date = new Date()): GatewayResponse {
	return { result, error: null, timestamp_utc: now.toISOString() };
}

export function errorResponse(kind: FailureKind, now: Date = new Date(), message: string = ERROR_MESSAGES[kind]): GatewayResponse {
	return { result: null, error: { message }, timestamp_utc: now.toISOString() };
}

export function failureKind(outcome: Exclude<RpcOutcome, { type: 'success' }>): FailureKind {
	return outcome.type === 'transport' ? outcome.kind : 'upstream';
}

export function normalize(outcome: RpcOutcome, now: Date = new Date()): GatewayResponse {
	switch (outcome.type) {
		case 'success':
			return successResponse(isEnvelopeShaped(outcome.payload) ? outcome.payload.result : outcome.payload, now);
		case 'transport':
		case 'upstream':
			return errorResponse(failureKind(outcome), now);
		default: {
			const unhandled: never = outcome;
			throw new Error(`Unhandled RPC outcome: ${JSON.stringify(unhandled)}`);
		}
	}
}

export function statusForKind(kind: FailureKind): number {
	switch (kind) {
		case 'unavailable':
			return HTTP_STATUS.SERVICE_UNAVAILABLE;
		case 'timeout':
			return HTTP_STATUS.GATEWAY_TIMEOUT;
		case 'unauthorized':
			return HTTP_STATUS.UNAUTHORIZED;
		case 'protocol':
		case 'upstream':
		case 'malformed_input':
			return HTTP_STATUS.BAD_REQUEST;
		case 'not_found':
			return HTTP_STATUS.NOT_FOUND;
		case 'internal':
		case 'unknown':
			return HTTP_STATUS.INTERNAL_SERVER_ERROR;
		default: {
			const unhandled: never = kind;
			throw new Error(`Unhandled failure kind: ${String(unhandled)}`);
		}
	}
}

export function statusFor(outcome: RpcOutcome): number {
	return outcome.type === 'success' ? HTTP_STATUS.OK : statusForKind(failureKind(outcome));
}
