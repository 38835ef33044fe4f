/**
 * Gateway Configuration Types
 */

export interface GatewayConfig {
  server: ServerConfig;
  rpc: RPCConfig;
  cache: CacheConfig;
  peers: PeerFilterConfig;
  cors: CorsConfig;
  helmet: HelmetConfig;
}

export interface ServerConfig {
  port: number;
  host: string;
  environment: string;
  logLevel: string;
}

export interface RPCConfig {
  user: string;
  password: string;
  host: string;
  port: number;
  timeout: number; // Upstream deadline in ms
  confPath?: string; // divi.conf the credentials were read from, if any
}

export interface CacheConfig {
  peerTtlMs: number;
}

export interface PeerFilterConfig {
  minVersion: string;
  heightWindow: number;
}

export interface CorsConfig {
  enabled: boolean;
  origin: string;
  credentials: boolean;
}

export interface HelmetConfig {
  enabled: boolean;
  contentSecurityPolicy: boolean;
}
