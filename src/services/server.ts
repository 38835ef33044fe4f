import http from 'http';
import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { HTTPClient, RpcTransport } from '@/client';
import { ERROR_MESSAGES, HTTP_STATUS } from '@/config/constants';
import { createErrorLogger, createRequestLogger } from '@/middleware/logging';
import { PrometheusMetrics } from '@/telemetry/metrics';
import { GatewayConfig, HandlerResult, HealthCheckResponse } from '@/types';
import { GatewayError } from '@/utils/errors';
import { Logger, LoggerLike } from '@/utils/logger';
import { RPCGateway } from './gateway';
import { errorResponse } from './normalizer';

export interface GatewayServerDeps {
	transport?: RpcTransport;
	logger?: LoggerLike;
	metrics?: PrometheusMetrics;
	clock?: () => number;
}

function isBodyParseError(err: unknown): boolean {
	return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export class GatewayServer {
	private readonly app = express();
	private server?: http.Server;
	private readonly logger: LoggerLike;
	private readonly metrics: PrometheusMetrics;
	private readonly transport: RpcTransport;
	private readonly gateway: RPCGateway;

	constructor(private readonly config: GatewayConfig, deps: GatewayServerDeps = {}) {
		this.logger = deps.logger ?? Logger.getInstance(config);
		this.metrics = deps.metrics ?? PrometheusMetrics.getInstance();
		this.transport = deps.transport ?? new HTTPClient(config, this.logger, this.metrics);
		this.gateway = new RPCGateway(this.transport, this.logger, {
			peerTtlMs: config.cache.peerTtlMs,
			peers: config.peers,
			metrics: this.metrics,
			clock: deps.clock,
		});

		this.setupMiddleware();
		this.setupRoutes();
	}

	/** Binds the HTTP listener. A port of 0 picks a free one, see {@link port}. */
	async start(): Promise<void> {
		await new Promise<void>((resolve, reject) => {
			const server = this.app.listen(this.config.server.port, this.config.server.host, () => {
				this.logger.info('HTTP server listening', {
					host: this.config.server.host,
					port: this.port(),
				});
				resolve();
			});
			server.once('error', reject);
			this.server = server;
		});
	}

	async stop(): Promise<void> {
		const server = this.server;
		if (!server) return;
		this.server = undefined;
		await new Promise<void>((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
		});
	}

	port(): number | undefined {
		const address = this.server?.address();
		return address && typeof address === 'object' ? address.port : undefined;
	}

	getApp(): express.Express {
		return this.app;
	}

	private setupMiddleware(): void {
		if (this.config.helmet.enabled) {
			this.app.use(helmet({ contentSecurityPolicy: this.config.helmet.contentSecurityPolicy }));
		}
		if (this.config.cors.enabled) {
			this.app.use(cors({ origin: this.config.cors.origin, credentials: this.config.cors.credentials }));
		}

		this.app.use(express.json({ limit: '2mb' }));
		this.app.use(createRequestLogger(this.logger, this.metrics));
	}

	/** Adapts a gateway operation to an express handler; rejections reach the error responder. */
	private handle(operation: (req: Request) => HandlerResult | Promise<HandlerResult>): RequestHandler {
		return (req: Request, res: Response, next: NextFunction): void => {
			Promise.resolve()
				.then(() => operation(req))
				.then(({ status, body }) => {
					res.status(status).json(body);
				})
				.catch(next);
		};
	}

	private setupRoutes(): void {
		const gw = this.gateway;

		this.app.get('/ping', this.handle(() => gw.ping()));
		this.app.get('/blockcount', this.handle(() => gw.getBlockCount()));
		this.app.get('/block/:hash', this.handle((req) => gw.getBlock(req.params.hash)));
		this.app.get('/blockhash/:block', this.handle((req) => gw.getBlockHash(req.params.block)));
		this.app.get('/info', this.handle(() => gw.getInfo()));
		this.app.get('/tx/:txid', this.handle((req) => gw.getTransaction(req.params.txid)));
		this.app.get('/connectioncount', this.handle(() => gw.getConnectionCount()));

		this.app.get(
			'/getaddressbalance/:address/:isVault',
			this.handle((req) => gw.getAddressBalance(req.params.address, req.params.isVault))
		);
		this.app.get(
			'/getaddressdeltas/:address/:isVault',
			this.handle((req) => gw.getAddressDeltas(req.params.address, req.params.isVault))
		);
		this.app.get(
			'/getaddresstxids/:address/:isVault',
			this.handle((req) => gw.getAddressTxids(req.params.address, req.params.isVault))
		);
		this.app.get(
			'/getaddressutxos/:address/:isVault',
			this.handle((req) => gw.getAddressUtxos(req.params.address, req.params.isVault))
		);

		this.app.get('/decode-raw-tx/:hex', this.handle((req) => gw.decodeRawTransaction(req.params.hex)));
		this.app.post(
			'/sendrawtransaction',
			this.handle((req) => {
				const body: unknown = req.body;
				const fromBody: object = typeof body === 'object' && body !== null ? body : {};
				const hexstring = 'hexstring' in fromBody ? fromBody.hexstring : req.query.hexstring;
				const allowHighFees = 'allowhighfees' in fromBody ? fromBody.allowhighfees : req.query.allowhighfees;
				return gw.sendRawTransaction(hexstring, allowHighFees);
			})
		);

		this.app.get('/getrawmempool', this.handle(() => gw.getRawMempool()));
		this.app.get('/getmempoolinfo', this.handle(() => gw.getMempoolInfo()));
		this.app.get('/getlottery', this.handle((req) => gw.getLottery(req.query.blockheight)));
		this.app.get('/peers', this.handle((req) => gw.getPeers(req.query.ipv6)));

		this.app.get('/health', (_req: Request, res: Response, next: NextFunction) => {
			gw.healthCheck()
				.then((upstream) => {
					const body: HealthCheckResponse = {
						status: upstream ? 'healthy' : 'degraded',
						timestamp: new Date().toISOString(),
						uptime: Math.floor(process.uptime()),
						memory: process.memoryUsage(),
						version: process.env.npm_package_version || '1.0.0',
						upstream: upstream ? 'connected' : 'disconnected',
					};
					res.status(HTTP_STATUS.OK).json(body);
				})
				.catch(next);
		});

		this.app.get('/metrics', (_req: Request, res: Response, next: NextFunction) => {
			const register = this.metrics.getRegister();
			register
				.metrics()
				.then((text) => {
					res.setHeader('Content-Type', register.contentType);
					res.end(text);
				})
				.catch(next);
		});

		this.app.get('/cache/stats', (_req: Request, res: Response) => {
			res.status(HTTP_STATUS.OK).json(gw.peerCacheStats());
		});

		this.app.post('/cache/clear', (_req: Request, res: Response) => {
			gw.clearPeerCache();
			res.status(HTTP_STATUS.OK).json({ cleared: true });
		});

		this.app.use((_req: Request, res: Response) => {
			res.status(HTTP_STATUS.NOT_FOUND).json(errorResponse('not_found'));
		});

		this.app.use(createErrorLogger(this.logger));
		this.app.use(this.errorResponder);
	}

	private errorResponder = (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
		if (res.headersSent) {
			res.end();
			return;
		}
		if (isBodyParseError(err)) {
			res.status(HTTP_STATUS.BAD_REQUEST).json(errorResponse('malformed_input', new Date(), 'Invalid request body: malformed JSON'));
			return;
		}
		if (err instanceof GatewayError) {
			res.status(err.status).json(errorResponse(err.kind === 'malformed_input' ? 'malformed_input' : 'internal', new Date(), err.publicMessage));
			return;
		}
		res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json(errorResponse('internal', new Date(), ERROR_MESSAGES.internal));
	};
}
