import { describe, it, expect, beforeEach } from '@jest/globals';
import { ERROR_MESSAGES } from '@/config/constants';
import { RPCGateway } from '@/services/gateway';
import { JSONValue } from '@/types';
import { LoggerLike } from '@/utils/logger';
import { createMetrics, createSilentLogger, FakeTransport, rpcSuccess } from '../helpers/fixtures';

const HASH = 'a'.repeat(64);
const TTL = 5 * 60 * 60 * 1000;
const START = Date.UTC(2024, 4, 1, 12, 0, 0);

const PEERS: JSONValue = [
  { subver: 'DIVI Core: 3.0.0.0', startingheight: 995, addr: '1.2.3.4:1000', synced_headers: 1000 },
  { subver: 'DIVI Core: 2.0.0.0', startingheight: 999, addr: '5.6.7.8:2000' },
  { subver: 'DIVI Core: 3.0.0.0', startingheight: 1000, addr: '[::1]:9999' },
];

describe('RPCGateway', () => {
  let transport: FakeTransport;
  let logger: LoggerLike;
  let now: number;
  let gateway: RPCGateway;

  beforeEach(() => {
    transport = new FakeTransport();
    logger = createSilentLogger();
    now = START;
    gateway = new RPCGateway(transport, logger, {
      peerTtlMs: TTL,
      peers: { minVersion: 'DIVI Core: 3.0.0.0', heightWindow: 1000 },
      metrics: createMetrics(),
      clock: () => now,
    });
  });

  it('answers ping without calling the node', () => {
    expect(gateway.ping()).toEqual({ status: 200, body: { message: 'pong' } });
    expect(transport.calls).toHaveLength(0);
  });

  it('wraps a successful call in the envelope', async () => {
    transport.set('getblockcount', rpcSuccess(1000));

    await expect(gateway.getBlockCount()).resolves.toEqual({
      status: 200,
      body: { result: 1000, error: null, timestamp_utc: '2024-05-01T12:00:00.000Z' },
    });
  });

  it('sends a valid block hash upstream with verbose output', async () => {
    transport.set('getblock', rpcSuccess({ hash: HASH }));

    const response = await gateway.getBlock(HASH);

    expect(response.status).toBe(200);
    expect(transport.calls).toEqual([{ method: 'getblock', params: [HASH, true] }]);
  });

  it.each(['zz', 'a'.repeat(63), `${'a'.repeat(63)}g`])('rejects block hash %s before any call', async (hash) => {
    const response = await gateway.getBlock(hash);

    expect(response).toEqual({
      status: 400,
      body: {
        result: null,
        error: { message: 'Invalid hash: must be a 64 character hex string' },
        timestamp_utc: '2024-05-01T12:00:00.000Z',
      },
    });
    expect(transport.calls).toHaveLength(0);
  });

  it('parses the block height before asking for its hash', async () => {
    transport.set('getblockhash', rpcSuccess(HASH));

    await gateway.getBlockHash('1234');
    const invalid = await gateway.getBlockHash('12a');

    expect(transport.calls).toEqual([{ method: 'getblockhash', params: [1234] }]);
    expect(invalid.status).toBe(400);
  });

  it('asks for verbose transactions', async () => {
    transport.set('getrawtransaction', rpcSuccess({ txid: HASH }));

    await gateway.getTransaction(HASH);

    expect(transport.calls).toEqual([{ method: 'getrawtransaction', params: [HASH, 1] }]);
  });

  it('passes the address and vault flag to address calls', async () => {
    transport.set('getaddressbalance', rpcSuccess({ balance: 5 }));
    transport.set('getaddressutxos', rpcSuccess([]));

    await gateway.getAddressBalance('DTestAddress1', 'TRUE');
    await gateway.getAddressUtxos('DTestAddress1', 'no');

    expect(transport.calls).toEqual([
      { method: 'getaddressbalance', params: [{ addresses: ['DTestAddress1'] }, true] },
      { method: 'getaddressutxos', params: [{ addresses: ['DTestAddress1'] }, false] },
    ]);
  });

  it('rejects a non-alphanumeric address', async () => {
    const response = await gateway.getAddressTxids('bad address!', 'false');

    expect(response.status).toBe(400);
    expect(transport.calls).toHaveLength(0);
  });

  it('validates raw transaction hex', async () => {
    transport.set('sendrawtransaction', rpcSuccess(HASH));

    const bad = await gateway.sendRawTransaction('abc', undefined);
    const missing = await gateway.sendRawTransaction(undefined, undefined);
    await gateway.sendRawTransaction('0100', 'true');

    expect(bad.body).toMatchObject({ error: { message: 'Invalid hexstring: must be an even-length hex string' } });
    expect(missing.body).toMatchObject({ error: { message: 'Invalid hexstring: is required' } });
    expect(transport.calls).toEqual([{ method: 'sendrawtransaction', params: ['0100', true] }]);
  });

  it('asks for the current lottery when no height is given', async () => {
    transport.set('getlotteryblockwinners', rpcSuccess({ winners: [] }));

    await gateway.getLottery(undefined);
    await gateway.getLottery('500');

    expect(transport.calls).toEqual([
      { method: 'getlotteryblockwinners', params: [] },
      { method: 'getlotteryblockwinners', params: [500] },
    ]);
  });

  it('maps an unreachable node to 503 and a slow one to 504', async () => {
    transport.set('getinfo', { type: 'transport', kind: 'unavailable', message: 'connect ECONNREFUSED' });
    transport.set('getmempoolinfo', { type: 'transport', kind: 'timeout', message: 'timeout of 1000ms exceeded' });

    const unavailable = await gateway.getInfo();
    const timeout = await gateway.getMempoolInfo();

    expect(unavailable).toEqual({
      status: 503,
      body: { result: null, error: { message: ERROR_MESSAGES.unavailable }, timestamp_utc: '2024-05-01T12:00:00.000Z' },
    });
    expect(timeout.status).toBe(504);
    expect(timeout.body).toMatchObject({ result: null, error: { message: ERROR_MESSAGES.timeout } });
  });

  describe('getPeers', () => {
    beforeEach(() => {
      transport.set('getblockcount', rpcSuccess(1000));
      transport.set('getpeerinfo', rpcSuccess(PEERS));
    });

    it('returns filtered groups', async () => {
      const response = await gateway.getPeers(undefined);

      expect(response).toEqual({
        status: 200,
        body: {
          result: [{ core: 'DIVI Core: 3.0.0.0', peers: [{ ip: '1.2.3.4', port: '1000' }] }],
          error: null,
          timestamp_utc: '2024-05-01T12:00:00.000Z',
        },
      });
      expect(transport.methods()).toEqual(['getblockcount', 'getpeerinfo']);
    });

    it('includes IPv6 peers when asked', async () => {
      const response = await gateway.getPeers('true');

      expect(response.body).toMatchObject({
        result: [
          {
            core: 'DIVI Core: 3.0.0.0',
            peers: [
              { ip: '1.2.3.4', port: '1000' },
              { ip: '::1', port: '9999' },
            ],
          },
        ],
      });
    });

    it('serves the cached view within the TTL', async () => {
      const first = await gateway.getPeers(undefined);
      now = START + TTL - 1;
      const second = await gateway.getPeers(undefined);

      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
      expect(transport.calls).toHaveLength(2);
    });

    it('serves the cached view regardless of the IPv6 flag', async () => {
      const first = await gateway.getPeers('false');
      const second = await gateway.getPeers('true');

      expect(second).toEqual(first);
      expect(transport.calls).toHaveLength(2);
    });

    it('recomputes after the TTL', async () => {
      await gateway.getPeers(undefined);
      now = START + TTL;
      const second = await gateway.getPeers(undefined);

      expect(transport.calls).toHaveLength(4);
      expect(second.body).toMatchObject({ timestamp_utc: new Date(START + TTL).toISOString() });
    });

    it('computes once for concurrent requests', async () => {
      const [a, b] = await Promise.all([gateway.getPeers(undefined), gateway.getPeers(undefined)]);

      expect(a).toEqual(b);
      expect(transport.methods()).toEqual(['getblockcount', 'getpeerinfo']);
    });

    it('does not cache an upstream failure', async () => {
      transport.set('getpeerinfo', { type: 'transport', kind: 'timeout', message: 'timeout' });

      const failed = await gateway.getPeers(undefined);
      transport.set('getpeerinfo', rpcSuccess(PEERS));
      const recovered = await gateway.getPeers(undefined);

      expect(failed.status).toBe(504);
      expect(recovered.status).toBe(200);
      expect(transport.methods()).toEqual(['getblockcount', 'getpeerinfo', 'getblockcount', 'getpeerinfo']);
    });

    it('stops after a failed block count', async () => {
      transport.set('getblockcount', { type: 'transport', kind: 'unavailable', message: 'down' });

      const response = await gateway.getPeers(undefined);

      expect(response.status).toBe(503);
      expect(transport.methods()).toEqual(['getblockcount']);
    });

    it('reports a malformed peer address as an internal error', async () => {
      transport.set('getpeerinfo', rpcSuccess([{ subver: 'DIVI Core: 3.0.0.0', startingheight: 1000, addr: 'nocolon' }]));

      const response = await gateway.getPeers(undefined);

      expect(response).toEqual({
        status: 500,
        body: { result: null, error: { message: ERROR_MESSAGES.internal }, timestamp_utc: '2024-05-01T12:00:00.000Z' },
      });
      expect(logger.error).toHaveBeenCalledWith('Upstream returned a malformed peer address', {
        addr: 'nocolon',
        error: "Malformed peer address 'nocolon': missing port separator",
      });
    });

    it('rejects peer records of the wrong shape', async () => {
      transport.set('getpeerinfo', rpcSuccess([{ subver: 3 }]));

      const response = await gateway.getPeers(undefined);

      expect(response.status).toBe(500);
    });

    it('exposes cache statistics and can be cleared', async () => {
      await gateway.getPeers(undefined);
      await gateway.getPeers(undefined);

      expect(gateway.peerCacheStats()).toEqual({
        hits: 1,
        misses: 1,
        computedAt: '2024-05-01T12:00:00.000Z',
        ttlMs: TTL,
      });

      gateway.clearPeerCache();
      await gateway.getPeers(undefined);
      expect(transport.calls).toHaveLength(4);
    });
  });
});
