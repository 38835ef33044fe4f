export * from './config';

export type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue };

export interface JSONRPCRequest {
  jsonrpc: '2.0';
  method: string;
  params: JSONValue[];
  id: number;
}

export interface JSONRPCError {
  code?: number;
  message: string;
}

export type TransportFailureKind = 'unavailable' | 'timeout' | 'unauthorized' | 'protocol' | 'unknown';

/**
 * Result of one upstream call. Transport problems are values, not exceptions,
 * so every caller has to decide what each kind means for its response.
 */
export type RpcOutcome =
  | { type: 'success'; payload: JSONValue }
  | { type: 'transport'; kind: TransportFailureKind; message: string; status?: number }
  | { type: 'upstream'; message: string; code?: number };

export type FailureKind = TransportFailureKind | 'upstream' | 'internal' | 'malformed_input' | 'not_found';

export interface GatewayResponse {
  result: JSONValue | null;
  error: { message: string } | null;
  timestamp_utc: string;
}

export interface HandlerResult {
  status: number;
  body: GatewayResponse | { message: string };
}

export interface PeerRecord {
  subver: string;
  startingheight: number;
  addr: string;
}

// Must stay type aliases: interfaces are not assignable to JSONValue.
export type PeerEndpoint = {
  ip: string;
  port: string;
};

export type FilteredPeerGroup = {
  core: string;
  peers: PeerEndpoint[];
};

export interface HealthCheckResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  memory: NodeJS.MemoryUsage;
  version: string;
  upstream: 'connected' | 'disconnected';
}

export interface CacheStats {
  hits: number;
  misses: number;
  computedAt: string | null;
  ttlMs: number;
}
