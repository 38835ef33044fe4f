import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { classifyError, extractRpcError, HTTPClient } from '@/client';
import { FakeNode, unusedPort } from '../helpers/fake-node';
import { createMetrics, createSilentLogger, createTestConfig } from '../helpers/fixtures';

describe('HTTPClient', () => {
  let node: FakeNode;
  let client: HTTPClient;

  beforeEach(async () => {
    node = new FakeNode();
    const port = await node.start();
    client = new HTTPClient(createTestConfig({ port, timeout: 200 }), createSilentLogger(), createMetrics());
  });

  afterEach(async () => {
    await node.stop();
  });

  it('posts a JSON-RPC request with basic auth', async () => {
    node.replyWith({ status: 200, body: '{"result":1234,"error":null,"id":1}' });

    await client.call('getblockhash', [1234]);

    expect(node.received).toHaveLength(1);
    expect(node.received[0].body).toEqual({ jsonrpc: '2.0', method: 'getblockhash', params: [1234], id: 1 });
    expect(node.received[0].authorization).toBe(`Basic ${Buffer.from('test-user:test-secret').toString('base64')}`);
    expect(node.received[0].contentType).toContain('application/json');
  });

  it('defaults to an empty parameter list', async () => {
    await client.call('getblockcount');

    expect(node.received[0].body).toEqual({ jsonrpc: '2.0', method: 'getblockcount', params: [], id: 1 });
  });

  it('returns the parsed body untouched on success', async () => {
    node.replyWith({ status: 200, body: '{"result":{"blocks":42},"error":null,"id":1}' });

    await expect(client.call('getinfo')).resolves.toEqual({
      type: 'success',
      payload: { result: { blocks: 42 }, error: null, id: 1 },
    });
  });

  it('classifies a JSON-RPC error body as an upstream error', async () => {
    node.replyWith({ status: 500, body: '{"result":null,"error":{"code":-5,"message":"Block not found"},"id":1}' });

    await expect(client.call('getblock', ['00'])).resolves.toEqual({
      type: 'upstream',
      message: 'Block not found',
      code: -5,
    });
  });

  it('classifies rejected credentials as unauthorized', async () => {
    node.replyWith({ status: 401, body: '' });

    const outcome = await client.call('getinfo');

    expect(outcome).toMatchObject({ type: 'transport', kind: 'unauthorized', status: 401 });
  });

  it('classifies other HTTP errors as protocol errors', async () => {
    node.replyWith({ status: 404, body: '{}' });

    await expect(client.call('getinfo')).resolves.toMatchObject({ type: 'transport', kind: 'protocol', status: 404 });
  });

  it('classifies a non-JSON success body as a protocol error', async () => {
    node.replyWith({ status: 200, body: '<html>' });

    await expect(client.call('getinfo')).resolves.toMatchObject({ type: 'transport', kind: 'protocol' });
  });

  it('classifies a slow node as a timeout', async () => {
    node.replyWith({ status: 200, body: '{"result":1,"error":null,"id":1}', delayMs: 1000 });

    await expect(client.call('getblockcount')).resolves.toMatchObject({ type: 'transport', kind: 'timeout' });
  });

  it('classifies a refused connection as unavailable', async () => {
    const closed = new HTTPClient(
      createTestConfig({ port: await unusedPort(), timeout: 1000 }),
      createSilentLogger(),
      createMetrics()
    );

    await expect(closed.call('getblockcount')).resolves.toMatchObject({ type: 'transport', kind: 'unavailable' });
  });

  it('reports health from getblockcount', async () => {
    node.replyWith({ status: 200, body: '{"result":7,"error":null,"id":1}' });

    await expect(client.healthCheck()).resolves.toBe(true);
    expect(node.received[0].body).toMatchObject({ method: 'getblockcount' });
  });
});

describe('extractRpcError', () => {
  it('ignores null errors and non-objects', () => {
    expect(extractRpcError({ result: 1, error: null })).toBeUndefined();
    expect(extractRpcError('text')).toBeUndefined();
    expect(extractRpcError([1])).toBeUndefined();
  });

  it('reads message and code', () => {
    expect(extractRpcError({ error: { code: -8, message: 'Invalid parameter' } })).toEqual({
      message: 'Invalid parameter',
      code: -8,
    });
  });

  it('stringifies a bare error value', () => {
    expect(extractRpcError({ error: 'bad' })).toEqual({ message: 'bad' });
  });
});

describe('classifyError', () => {
  it('treats non-axios errors as unknown', () => {
    expect(classifyError(new Error('boom'))).toEqual({ type: 'transport', kind: 'unknown', message: 'boom' });
  });
});
