import { Server } from 'http';
import { loadConfig } from '../../config';
import { Runtime, buildRuntime } from '../../runtime';
import { createApp, startApiServer } from '../server';

const RELAY = '0x' + 'a1'.repeat(20);
const STRANGER = '0x' + 'b2'.repeat(20);
const LAUNCH = '0x' + '7c'.repeat(32);

const tokenCreated = {
  type: 'TokenCreated',
  launchId: LAUNCH,
  name: 'Test Token',
  symbol: 'TEST',
  creator: '0x' + '12'.repeat(20),
  originChainId: 1,
  targetChainIds: [10],
  originToken: '0x' + '34'.repeat(20)
};

describe('API server', () => {
  let runtime: Runtime;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    runtime = await buildRuntime(
      loadConfig({ CHAIN_IDS: '1,10', RELAY_IDENTITY: RELAY, AUTHORIZED_CALLERS: RELAY, ADMIN_IDENTITY: '' })
    );
    await runtime.coordinator.start();

    server = await startApiServer(
      createApp({ coordinator: runtime.coordinator, sources: runtime.sources, authorizer: runtime.authorizer }),
      0
    );
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    await runtime.close();
  });

  function postEvent(chainId: number, body: unknown, callerIdentity?: string) {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (callerIdentity) headers['x-caller-identity'] = callerIdentity;
    return fetch(`${baseUrl}/events/${chainId}`, { method: 'POST', headers, body: JSON.stringify(body) });
  }

  test('reports health with coordinator stats', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', coordinator: { sources: 2, eventsRejected: 0 } });
  });

  test('requires a caller identity', async () => {
    const response = await postEvent(1, tokenCreated);
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ success: false, error: { code: 'VALIDATION_FAILED' } });
  });

  test('rejects unknown callers', async () => {
    const response = await postEvent(1, tokenCreated, STRANGER);
    expect(response.status).toBe(403);
    expect(await response.json()).toMatchObject({ error: { code: 'UNAUTHORIZED_CALLER' } });
  });

  test('404s a chain without a source', async () => {
    expect((await postEvent(99, tokenCreated, RELAY)).status).toBe(404);
  });

  test('rejects a malformed event', async () => {
    const response = await postEvent(1, { ...tokenCreated, creator: 'nobody' }, RELAY);

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: { code: 'VALIDATION_FAILED', message: 'Malformed chain event: creator: Invalid address' }
    });
  });

  test('rejects a body that is not JSON', async () => {
    const response = await fetch(`${baseUrl}/events/1`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-caller-identity': RELAY },
      body: '{"type":'
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { code: 'INVALID_JSON' } });
  });

  test('accepts an event and serves the launch it created', async () => {
    const accepted = await postEvent(1, tokenCreated, RELAY);
    expect(accepted.status).toBe(202);
    expect(await accepted.json()).toMatchObject({ accepted: true, chainId: 1, type: 'TokenCreated', launchId: LAUNCH });

    await runtime.coordinator.drain();

    const response = await fetch(`${baseUrl}/launches/${LAUNCH}`);
    const initialCurve = {
      state: { virtualEth: '1000000000000000000', totalSupply: '0' },
      progressBps: 0,
      marketCap: '0'
    };

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      launch: { symbol: 'TEST', creatorFeeBps: 100 },
      curves: [
        { chainId: 1, ...initialCurve },
        { chainId: 10, ...initialCurve }
      ],
      deployments: [{ chainId: 10, status: 'DEPLOYED' }],
      unified: { price: '931966449', chains: 2 }
    });
  });

  test('404s an unknown launch and 400s a malformed id', async () => {
    const unknown = await fetch(`${baseUrl}/launches/0x${'00'.repeat(32)}`);
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toMatchObject({ error: { code: 'UNKNOWN_LAUNCH' } });

    expect((await fetch(`${baseUrl}/launches/not-a-launch`)).status).toBe(400);
  });

  test('lists dead letters and 404s an unknown re-dispatch', async () => {
    const list = await fetch(`${baseUrl}/dead-letters`);
    expect(await list.json()).toEqual({ deadLetters: [] });

    const redispatch = await fetch(`${baseUrl}/dead-letters/missing/redispatch`, { method: 'POST' });
    expect(redispatch.status).toBe(404);
  });
});
