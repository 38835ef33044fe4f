import axios, { AxiosError, AxiosInstance } from 'axios';
import { JSONRPC_REQUEST_ID, JSONRPC_VERSION } from '@/config/constants';
import { PrometheusMetrics } from '@/telemetry/metrics';
import { GatewayConfig, JSONRPCRequest, JSONValue, RpcOutcome } from '@/types';
import { LoggerLike } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';

const UNAVAILABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN', 'EPIPE']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED']);

export interface RpcTransport {
	call(method: string, params?: JSONValue[]): Promise<RpcOutcome>;
	healthCheck(): Promise<boolean>;
}

/**
 * Non-null `error` member of a JSON-RPC response body, if there is one.
 */
export function extractRpcError(body: unknown): { message: string; code?: number } | undefined {
	if (typeof body !== 'object' || body === null || Array.isArray(body) || !('error' in body)) {
		return undefined;
	}
	const error: unknown = body.error;
	if (error === null || error === undefined) {
		return undefined;
	}
	if (typeof error === 'object' && !Array.isArray(error)) {
		const message = 'message' in error && typeof error.message === 'string' ? error.message : JSON.stringify(error);
		const code = 'code' in error && typeof error.code === 'number' ? error.code : undefined;
		return { message, code };
	}
	return { message: String(error) };
}

export function classifyError(err: unknown): RpcOutcome {
	if (!axios.isAxiosError(err)) {
		return { type: 'transport', kind: 'unknown', message: errorMessage(err) };
	}

	const axiosError: AxiosError = err;
	const response = axiosError.response;
	if (response) {
		const rpcError = extractRpcError(response.data);
		if (response.status === 401 || response.status === 403) {
			return { type: 'transport', kind: 'unauthorized', message: axiosError.message, status: response.status };
		}
		if (rpcError) {
			return { type: 'upstream', message: rpcError.message, code: rpcError.code };
		}
		return { type: 'transport', kind: 'protocol', message: axiosError.message, status: response.status };
	}

	const code = axiosError.code ?? '';
	if (TIMEOUT_CODES.has(code)) {
		return { type: 'transport', kind: 'timeout', message: axiosError.message };
	}
	if (UNAVAILABLE_CODES.has(code)) {
		return { type: 'transport', kind: 'unavailable', message: axiosError.message };
	}
	// Body that is not JSON
	if (code === AxiosError.ERR_BAD_RESPONSE) {
		return { type: 'transport', kind: 'protocol', message: axiosError.message };
	}
	return { type: 'transport', kind: 'unknown', message: axiosError.message };
}

function outcomeLabel(outcome: RpcOutcome): string {
	return outcome.type === 'transport' ? outcome.kind : outcome.type;
}

/**
 * JSON-RPC client for the single configured node. Never retries and never
 * throws: every call resolves to an {@link RpcOutcome}.
 */
export class HTTPClient implements RpcTransport {
	private readonly http: AxiosInstance;

	constructor(
		config: GatewayConfig,
		private readonly logger: LoggerLike,
		private readonly metrics: PrometheusMetrics = PrometheusMetrics.getInstance()
	) {
		this.http = axios.create({
			baseURL: `http://${config.rpc.host}:${config.rpc.port}`,
			timeout: config.rpc.timeout,
			auth: { username: config.rpc.user, password: config.rpc.password },
			headers: { 'Content-Type': 'application/json' },
			responseType: 'json',
			transitional: { clarifyTimeoutError: true, silentJSONParsing: false },
		});
	}

	async call(method: string, params: JSONValue[] = []): Promise<RpcOutcome> {
		const request: JSONRPCRequest = {
			jsonrpc: JSONRPC_VERSION,
			method,
			params,
			id: JSONRPC_REQUEST_ID,
		};
		const start = Date.now();

		let outcome: RpcOutcome;
		let status: number | undefined;
		try {
			const response = await this.http.post<JSONValue>('/', request);
			status = response.status;
			const rpcError = extractRpcError(response.data);
			outcome = rpcError
				? { type: 'upstream', message: rpcError.message, code: rpcError.code }
				: { type: 'success', payload: response.data };
		} catch (err) {
			outcome = classifyError(err);
			if (outcome.type === 'transport') {
				status = outcome.status;
			}
		}

		const duration = Date.now() - start;
		this.metrics.recordUpstreamCall(method, outcomeLabel(outcome), duration);

		if (outcome.type === 'success') {
			this.logger.debug('RPC call completed', { method, params, status, duration });
		} else {
			this.logger.warn('RPC call failed', {
				method,
				params,
				status,
				duration,
				outcome: outcomeLabel(outcome),
				detail: outcome.message,
			});
		}

		return outcome;
	}

	async healthCheck(): Promise<boolean> {
		const outcome = await this.call('getblockcount');
		return outcome.type === 'success';
	}
}
