import { jest } from '@jest/globals';
import { RpcTransport } from '@/client';
import { PrometheusMetrics } from '@/telemetry/metrics';
import { GatewayConfig, JSONValue, RpcOutcome } from '@/types';
import { LoggerLike } from '@/utils/logger';

export function createTestConfig(overrides: Partial<GatewayConfig['rpc']> = {}): GatewayConfig {
  return {
    server: { port: 0, host: '127.0.0.1', environment: 'test', logLevel: 'error' },
    rpc: {
      user: 'test-user',
      password: 'test-secret',
      host: '127.0.0.1',
      port: 1,
      timeout: 1000,
      ...overrides,
    },
    cache: { peerTtlMs: 5 * 60 * 60 * 1000 },
    peers: { minVersion: 'DIVI Core: 3.0.0.0', heightWindow: 1000 },
    cors: { enabled: true, origin: '*', credentials: false },
    helmet: { enabled: true, contentSecurityPolicy: false },
  };
}

export function createSilentLogger(): LoggerLike {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };
}

export function createMetrics(): PrometheusMetrics {
  const metrics = new PrometheusMetrics();
  metrics.init();
  return metrics;
}

export interface RecordedCall {
  method: string;
  params: JSONValue[];
}

/**
 * Transport double answering from a per-method table. Unlisted methods fail
 * as if the node were unreachable.
 */
export class FakeTransport implements RpcTransport {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly answers: Record<string, RpcOutcome | (() => Promise<RpcOutcome>)> = {}) {}

  set(method: string, answer: RpcOutcome | (() => Promise<RpcOutcome>)): void {
    this.answers[method] = answer;
  }

  async call(method: string, params: JSONValue[] = []): Promise<RpcOutcome> {
    this.calls.push({ method, params });
    const answer = this.answers[method];
    if (answer === undefined) {
      return { type: 'transport', kind: 'unavailable', message: 'connect ECONNREFUSED' };
    }
    return typeof answer === 'function' ? answer() : answer;
  }

  async healthCheck(): Promise<boolean> {
    return (await this.call('getblockcount')).type === 'success';
  }

  methods(): string[] {
    return this.calls.map((call) => call.method);
  }
}

export function rpcSuccess(result: JSONValue): RpcOutcome {
  return { type: 'success', payload: { result, error: null, id: 1 } };
}
