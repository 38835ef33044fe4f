import { z } from 'zod';
import { DerivedViewCache } from '@/cache';
import { RpcTransport } from '@/client';
import { HTTP_STATUS } from '@/config/constants';
import {
	addressSchema,
	blockHashSchema,
	flagSchema,
	heightSchema,
	parseParam,
	rawTransactionSchema,
	txidSchema,
} from '@/middleware/validation';
import { PrometheusMetrics } from '@/telemetry/metrics';
import { CacheStats, GatewayResponse, HandlerResult, JSONValue, PeerFilterConfig, PeerRecord } from '@/types';
import { LoggerLike } from '@/utils/logger';
import { PeerAddressError, ValidationError } from '@/utils/errors';
import { errorResponse, normalize, statusFor, successResponse } from './normalizer';
import { filterPeers } from './peer-filter';

const PeerRecordSchema = z.object({
	subver: z.string(),
	startingheight: z.number().int(),
	addr: z.string(),
});

const PeerInfoSchema = z.array(PeerRecordSchema);

export interface GatewayOptions {
	peerTtlMs: number;
	peers: PeerFilterConfig;
	metrics?: PrometheusMetrics;
	clock?: () => number;
}

export interface PeerViewResult extends HandlerResult {
	body: GatewayResponse;
}

type AddressMethod = 'getaddressbalance' | 'getaddressdeltas' | 'getaddresstxids' | 'getaddressutxos';

/**
 * Maps each REST operation onto its JSON-RPC call and wraps the outcome in
 * the response envelope. Parameters arrive as raw request strings and are
 * validated here, before anything is sent upstream.
 */
export class RPCGateway {
	private readonly peerCache: DerivedViewCache<PeerViewResult>;
	private readonly metrics: PrometheusMetrics;
	private readonly clock: () => number;

	constructor(
		private readonly transport: RpcTransport,
		private readonly logger: LoggerLike,
		private readonly options: GatewayOptions
	) {
		this.peerCache = new DerivedViewCache<PeerViewResult>(options.peerTtlMs);
		this.metrics = options.metrics ?? PrometheusMetrics.getInstance();
		this.clock = options.clock ?? Date.now;
	}

	ping(): HandlerResult {
		return { status: HTTP_STATUS.OK, body: { message: 'pong' } };
	}

	getBlockCount(): Promise<HandlerResult> {
		return this.forward('getblockcount');
	}

	getBlock(hash: unknown): Promise<HandlerResult> {
		return this.guard(() => this.forward('getblock', [parseParam(blockHashSchema, 'hash', hash), true]));
	}

	getBlockHash(height: unknown): Promise<HandlerResult> {
		return this.guard(() => this.forward('getblockhash', [parseParam(heightSchema, 'block', height)]));
	}

	getInfo(): Promise<HandlerResult> {
		return this.forward('getinfo');
	}

	getTransaction(txid: unknown): Promise<HandlerResult> {
		return this.guard(() => this.forward('getrawtransaction', [parseParam(txidSchema, 'txid', txid), 1]));
	}

	getConnectionCount(): Promise<HandlerResult> {
		return this.forward('getconnectioncount');
	}

	getAddressBalance(address: unknown, isVault: unknown): Promise<HandlerResult> {
		return this.addressCall('getaddressbalance', address, isVault);
	}

	getAddressDeltas(address: unknown, isVault: unknown): Promise<HandlerResult> {
		return this.addressCall('getaddressdeltas', address, isVault);
	}

	getAddressTxids(address: unknown, isVault: unknown): Promise<HandlerResult> {
		return this.addressCall('getaddresstxids', address, isVault);
	}

	getAddressUtxos(address: unknown, isVault: unknown): Promise<HandlerResult> {
		return this.addressCall('getaddressutxos', address, isVault);
	}

	decodeRawTransaction(hex: unknown): Promise<HandlerResult> {
		return this.guard(() => this.forward('decoderawtransaction', [parseParam(rawTransactionSchema, 'hex', hex)]));
	}

	sendRawTransaction(hexstring: unknown, allowHighFees: unknown): Promise<HandlerResult> {
		return this.guard(() =>
			this.forward('sendrawtransaction', [
				parseParam(rawTransactionSchema, 'hexstring', hexstring),
				parseParam(flagSchema, 'allowhighfees', allowHighFees),
			])
		);
	}

	getRawMempool(): Promise<HandlerResult> {
		return this.forward('getrawmempool');
	}

	getMempoolInfo(): Promise<HandlerResult> {
		return this.forward('getmempoolinfo');
	}

	/** Lottery candidates at `blockHeight`, or the current list when it is absent. */
	getLottery(blockHeight: unknown): Promise<HandlerResult> {
		return this.guard(() =>
			this.forward(
				'getlotteryblockwinners',
				blockHeight === undefined || blockHeight === '' ? [] : [parseParam(heightSchema, 'blockheight', blockHeight)]
			)
		);
	}

	/**
	 * Filtered peer groups from the single-slot cache. The slot is not keyed by
	 * `includeIpv6`: whichever flag value computed it is served to everyone
	 * until it expires.
	 */
	getPeers(includeIpv6: unknown): Promise<HandlerResult> {
		return this.guard(async () => {
			const ipv6 = parseParam(flagSchema, 'ipv6', includeIpv6);
			const { value, hit } = await this.peerCache.lookup(
				this.clock(),
				() => this.computePeerView(ipv6),
				(result) => result.status === HTTP_STATUS.OK
			);
			this.metrics.recordPeerCache(hit);
			return value;
		});
	}

	peerCacheStats(): CacheStats {
		return this.peerCache.stats();
	}

	clearPeerCache(): void {
		this.peerCache.clear();
		this.logger.info('Peer cache cleared');
	}

	async healthCheck(): Promise<boolean> {
		return this.transport.healthCheck();
	}

	private async computePeerView(includeIpv6: boolean): Promise<PeerViewResult> {
		const countOutcome = await this.transport.call('getblockcount');
		if (countOutcome.type !== 'success') {
			return { status: statusFor(countOutcome), body: normalize(countOutcome, this.now()) };
		}
		const height = normalize(countOutcome).result;
		if (typeof height !== 'number' || !Number.isInteger(height)) {
			this.logger.error('Upstream returned a non-integer block count', { height });
			return this.internalError();
		}

		const peerOutcome = await this.transport.call('getpeerinfo');
		if (peerOutcome.type !== 'success') {
			return { status: statusFor(peerOutcome), body: normalize(peerOutcome, this.now()) };
		}
		const parsed = PeerInfoSchema.safeParse(normalize(peerOutcome).result);
		if (!parsed.success) {
			this.logger.error('Upstream returned malformed peer records', { issues: parsed.error.issues });
			return this.internalError();
		}

		const peers: PeerRecord[] = parsed.data;
		try {
			const groups = filterPeers(peers, height, includeIpv6, this.options.peers);
			this.logger.info('Peer view recomputed', { height, peers: peers.length, groups: groups.length, includeIpv6 });
			return { status: HTTP_STATUS.OK, body: successResponse(groups, this.now()) };
		} catch (err) {
			if (err instanceof PeerAddressError) {
				this.logger.error('Upstream returned a malformed peer address', { addr: err.addr, error: err.message });
				return this.internalError();
			}
			throw err;
		}
	}

	private addressCall(method: AddressMethod, address: unknown, isVault: unknown): Promise<HandlerResult> {
		return this.guard(() => {
			const params: JSONValue[] = [
				{ addresses: [parseParam(addressSchema, 'address', address)] },
				parseParam(flagSchema, 'isVault', isVault),
			];
			return this.forward(method, params);
		});
	}

	private async forward(method: string, params: JSONValue[] = []): Promise<HandlerResult> {
		const outcome = await this.transport.call(method, params);
		return { status: statusFor(outcome), body: normalize(outcome, this.now()) };
	}

	/** Turns local validation failures into a 400 envelope; other errors propagate. */
	private async guard(handler: () => Promise<HandlerResult>): Promise<HandlerResult> {
		try {
			return await handler();
		} catch (err) {
			if (err instanceof ValidationError) {
				this.logger.debug('Rejected request parameter', { field: err.field, error: err.message });
				return { status: err.status, body: errorResponse('malformed_input', this.now(), err.message) };
			}
			throw err;
		}
	}

	private internalError(): PeerViewResult {
		return { status: HTTP_STATUS.INTERNAL_SERVER_ERROR, body: errorResponse('internal', this.now()) };
	}

	private now(): Date {
		return new Date(this.clock());
	}
}
