import client from 'prom-client';

export class PrometheusMetrics {
	private static instance: PrometheusMetrics | undefined;
	private initialized = false;
	private readonly registry = new client.Registry();

	// Instruments
	requestsTotal!: client.Counter<string>;
	requestDurationMs!: client.Histogram<string>;
	upstreamCallsTotal!: client.Counter<string>;
	upstreamDurationMs!: client.Histogram<string>;
	peerCacheHitsTotal!: client.Counter<string>;
	peerCacheMissesTotal!: client.Counter<string>;

	static getInstance(): PrometheusMetrics {
		if (!this.instance) {
			this.instance = new PrometheusMetrics();
			this.instance.init();
		}
		return this.instance;
	}

	init(): void {
		if (this.initialized) return;

		this.requestsTotal = new client.Counter({
			name: 'gateway_http_requests_total',
			help: 'Total inbound HTTP requests handled',
			labelNames: ['route', 'status_code'],
			registers: [this.registry],
		});

		this.requestDurationMs = new client.Histogram({
			name: 'gateway_request_duration_ms',
			help: 'Duration of handling an inbound request in milliseconds',
			labelNames: ['route'],
			buckets: [5, 10, 20, 50, 100, 250, 500, 1000, 2500, 5000],
			registers: [this.registry],
		});

		this.upstreamCallsTotal = new client.Counter({
			name: 'gateway_upstream_calls_total',
			help: 'Total JSON-RPC calls made to the node, by outcome',
			labelNames: ['method', 'outcome'],
			registers: [this.registry],
		});

		this.upstreamDurationMs = new client.Histogram({
			name: 'gateway_upstream_duration_ms',
			help: 'Upstream JSON-RPC call duration in milliseconds',
			labelNames: ['method'],
			buckets: [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
			registers: [this.registry],
		});

		this.peerCacheHitsTotal = new client.Counter({
			name: 'gateway_peer_cache_hits_total',
			help: 'Peer list requests served from the cache',
			registers: [this.registry],
		});

		this.peerCacheMissesTotal = new client.Counter({
			name: 'gateway_peer_cache_misses_total',
			help: 'Peer list requests that recomputed the cached view',
			registers: [this.registry],
		});

		this.initialized = true;
	}

	getRegister(): client.Registry {
		return this.registry;
	}

	recordRequest(route: string, statusCode: number, duration: number): void {
		this.requestsTotal.labels(route, String(statusCode)).inc();
		this.requestDurationMs.labels(route).observe(duration);
	}

	recordUpstreamCall(method: string, outcome: string, duration: number): void {
		this.upstreamCallsTotal.labels(method, outcome).inc();
		this.upstreamDurationMs.labels(method).observe(duration);
	}

	recordPeerCache(hit: boolean): void {
		if (hit) {
			this.peerCacheHitsTotal.inc();
		} else {
			this.peerCacheMissesTotal.inc();
		}
	}
}
