import { RetryPolicy } from '../../config';
import { LAUNCH_CONSTANTS } from '../../constants/launch-constants';
import {
  ChainClient,
  ChainClientRegistry,
  DeployTokenRequest,
  DexMigrationResult,
  MigrateToDexRequest,
  SyncPriceRequest,
  SyncPriceResult
} from '../../chains/chain-client';
import { DestinationEndpoint } from '../../chains/destination-endpoint';
import { LocalChainClient } from '../../chains/local-chain-client';
import { SimulatedDexMigrator } from '../../chains/simulated-dex';
import { CurveManager } from '../../curve/curve-manager';
import { DEFAULT_FEE_SCHEDULE } from '../../curve/price-engine';
import { MemoryLaunchStore } from '../../database/memory-store';
import { DeploymentAddresses, DeploymentRegistry } from '../../registry/deployment-registry';
import { LaunchRegistry, deploymentSalt, predictAddress } from '../../registry/launch-registry';
import { PushEventSource } from '../../sources/push-event-source';
import { ChainEvent, ChainEventEnvelope, ChainId, DeploymentRecord } from '../../types';
import { KeyedSerializer } from '../../utils/keyed-serializer';
import { AllowListAuthorizer } from '../caller-authorizer';
import { ChainClientMigrator } from '../chain-client-migrator';
import { CrossChainCoordinator, EventRejectedEvent, PriceSyncedEvent, SyncDroppedEvent } from '../cross-chain-coordinator';

const E18 = 10n ** 18n;
const RELAY = '0x' + 'a1'.repeat(20);
const STRANGER = '0x' + 'b2'.repeat(20);
const LAUNCH = '0x' + '5e'.repeat(32);
const ORIGIN = 1;
const CHAINS = [ORIGIN, 10, 137];

const retry: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2, timeoutMs: 1_000 };

type ClientMethod = 'deployToken' | 'syncPrice' | 'migrateToDEX';

// Fails the next N calls of a method the way a dropped connection would
class FlakyClient implements ChainClient {
  readonly chainId: ChainId;
  failures: Record<ClientMethod, number> = { deployToken: 0, syncPrice: 0, migrateToDEX: 0 };
  calls: Record<ClientMethod, number> = { deployToken: 0, syncPrice: 0, migrateToDEX: 0 };
  // Deploys go through but the reply is lost
  lostDeployReplies = 0;
  // While set, syncPrice calls never answer until released
  stallSyncs = false;
  private stalled: Array<(error: Error) => void> = [];

  constructor(private inner: ChainClient) {
    this.chainId = inner.chainId;
  }

  private maybeFail(method: ClientMethod): void {
    this.calls[method]++;
    if (this.failures[method] > 0) {
      this.failures[method]--;
      throw new Error(`${method} connection reset`);
    }
  }

  async deployToken(request: DeployTokenRequest): Promise<DeploymentAddresses> {
    this.maybeFail('deployToken');
    const addresses = await this.inner.deployToken(request);
    if (this.lostDeployReplies > 0) {
      this.lostDeployReplies--;
      throw new Error('socket hang up');
    }
    return addresses;
  }

  async syncPrice(request: SyncPriceRequest): Promise<SyncPriceResult> {
    this.maybeFail('syncPrice');
    if (this.stallSyncs) {
      return new Promise<SyncPriceResult>((_resolve, reject) => {
        this.stalled.push(reject);
      });
    }
    return this.inner.syncPrice(request);
  }

  releaseStalledSyncs(): void {
    this.stallSyncs = false;
    for (const reject of this.stalled.splice(0)) {
      reject(new Error('syncPrice stalled'));
    }
  }

  async migrateToDEX(request: MigrateToDexRequest): Promise<DexMigrationResult> {
    this.maybeFail('migrateToDEX');
    return this.inner.migrateToDEX(request);
  }
}

function tokenCreated(launchId = LAUNCH): ChainEvent {
  return {
    type: 'TokenCreated',
    launchId,
    name: 'Test Token',
    symbol: 'TEST',
    creator: '0x' + '12'.repeat(20),
    originChainId: ORIGIN,
    targetChainIds: [10, 137],
    originToken: '0x' + '34'.repeat(20),
    creatorFeeBps: 100
  };
}

function purchase(seq: number, ethIn: bigint, launchId = LAUNCH): ChainEvent {
  return {
    type: 'TokenPurchase',
    launchId,
    buyer: '0x' + '56'.repeat(20),
    ethIn,
    tokensOut: 0n,
    price: 0n,
    seq
  };
}

function envelope(chainId: ChainId, event: ChainEvent, callerIdentity = RELAY): ChainEventEnvelope {
  return { chainId, callerIdentity, receivedAt: new Date(), event };
}

describe('CrossChainCoordinator', () => {
  let store: MemoryLaunchStore;
  let endpoints: Map<ChainId, DestinationEndpoint>;
  let endpointStores: Map<ChainId, MemoryLaunchStore>;
  let flaky: Map<ChainId, FlakyClient>;
  let coordinator: CrossChainCoordinator;

  function client(chainId: ChainId): FlakyClient {
    const found = flaky.get(chainId);
    if (!found) throw new Error(`no client for ${chainId}`);
    return found;
  }

  function endpoint(chainId: ChainId): DestinationEndpoint {
    const found = endpoints.get(chainId);
    if (!found) throw new Error(`no endpoint for ${chainId}`);
    return found;
  }

  async function deploymentsOn(chainId: ChainId): Promise<DeploymentRecord[]> {
    const found = endpointStores.get(chainId);
    if (!found) throw new Error(`no store for ${chainId}`);
    return found.listDeployments(LAUNCH);
  }

  beforeEach(() => {
    store = new MemoryLaunchStore();
    const authorizer = new AllowListAuthorizer('0x' + 'ad'.repeat(20), [RELAY]);
    const serializer = new KeyedSerializer();

    endpoints = new Map();
    endpointStores = new Map();
    flaky = new Map();
    const clients = new ChainClientRegistry();
    for (const chainId of CHAINS) {
      const endpointStore = new MemoryLaunchStore();
      const destination = new DestinationEndpoint(chainId, {
        authorizer,
        store: endpointStore,
        dexMigrator: new SimulatedDexMigrator()
      });
      const wrapped = new FlakyClient(new LocalChainClient(destination));
      endpoints.set(chainId, destination);
      endpointStores.set(chainId, endpointStore);
      flaky.set(chainId, wrapped);
      clients.register(wrapped);
    }

    const curves = new CurveManager(
      store,
      new ChainClientMigrator(clients, RELAY, retry),
      {
        fees: DEFAULT_FEE_SCHEDULE,
        initialVirtualEth: LAUNCH_CONSTANTS.INITIAL_VIRTUAL_ETH,
        initialVirtualTokens: LAUNCH_CONSTANTS.INITIAL_VIRTUAL_TOKENS
      },
      serializer
    );

    coordinator = new CrossChainCoordinator(
      {
        store,
        launches: new LaunchRegistry(store, { maxCreatorFeeBps: 500 }),
        curves,
        deployments: new DeploymentRegistry(store, serializer),
        clients,
        authorizer,
        serializer
      },
      { relayIdentity: RELAY, retry, fanoutConcurrency: 4, defaultCreatorFeeBps: 100 }
    );
  });

  describe('TokenCreated', () => {
    test('deploys to every target chain except the origin', async () => {
      const outcome = await coordinator.submit(envelope(ORIGIN, tokenCreated()));

      expect(outcome.status).toBe('applied');
      expect(outcome.legs).toEqual([
        { kind: 'deploy', chainId: 10, status: 'ok' },
        { kind: 'deploy', chainId: 137, status: 'ok' }
      ]);
      expect(await deploymentsOn(ORIGIN)).toEqual([]);

      const salt = deploymentSalt(LAUNCH, 137);
      expect(await deploymentsOn(137)).toMatchObject([{ tokenAddress: predictAddress(salt, 'token') }]);

      const view = await coordinator.describeLaunch(LAUNCH);
      expect(view.curves.map(curve => curve.chainId)).toEqual(CHAINS);
      expect(view.deployments.map(record => record.status)).toEqual(['DEPLOYED', 'DEPLOYED']);
    });

    test('redelivery deploys nothing new', async () => {
      const outcomes = [
        await coordinator.submit(envelope(ORIGIN, tokenCreated())),
        await coordinator.submit(envelope(ORIGIN, tokenCreated())),
        await coordinator.submit(envelope(ORIGIN, tokenCreated()))
      ];

      expect(outcomes.map(outcome => outcome.status)).toEqual(['applied', 'duplicate', 'duplicate']);
      expect(outcomes[2].legs.map(leg => leg.status)).toEqual(['skipped', 'skipped']);
      expect(client(10).calls.deployToken).toBe(1);
      expect(client(137).calls.deployToken).toBe(1);
    });

    test('concurrent deliveries deploy once per chain', async () => {
      await Promise.all([1, 2, 3, 4].map(() => coordinator.handleEvent(envelope(ORIGIN, tokenCreated()))));

      expect(await deploymentsOn(10)).toHaveLength(1);
      expect(await deploymentsOn(137)).toHaveLength(1);
      expect(coordinator.getStats().deployments).toBe(2);
      expect(coordinator.listDeadLetters()).toEqual([]);
    });

    test('a deploy whose reply was lost is recorded at its predicted addresses', async () => {
      client(10).lostDeployReplies = 1;

      const outcome = await coordinator.submit(envelope(ORIGIN, tokenCreated()));

      expect(outcome.legs[0]).toEqual({ kind: 'deploy', chainId: 10, status: 'ok' });
      expect(client(10).calls.deployToken).toBe(2);
      const view = await coordinator.describeLaunch(LAUNCH);
      expect(view.deployments[0].tokenAddress).toBe(predictAddress(deploymentSalt(LAUNCH, 10), 'token'));
    });

    test('rejects a creation delivered from another chain', async () => {
      const outcome = await coordinator.submit(envelope(10, tokenCreated()));
      expect(outcome.status).toBe('rejected');
      expect(outcome.reason).toBe('TokenCreated for chain 1 delivered from chain 10');
    });
  });

  describe('price sync', () => {
    beforeEach(async () => {
      await coordinator.submit(envelope(ORIGIN, tokenCreated()));
    });

    test('broadcasts the unified price to the other chains', async () => {
      const synced: PriceSyncedEvent[] = [];
      coordinator.on('priceSynced', (event: PriceSyncedEvent) => synced.push(event));

      const outcome = await coordinator.submit(envelope(ORIGIN, purchase(1, 10n ** 16n)));

      expect(outcome.status).toBe('applied');
      expect(outcome.legs).toEqual([
        { kind: 'sync', chainId: 10, status: 'ok' },
        { kind: 'sync', chainId: 137, status: 'ok' }
      ]);
      for (const chainId of [10, 137]) {
        expect(await endpoint(chainId).getCursor(LAUNCH)).toMatchObject({
          lastAppliedSeq: 1,
          lastPrice: 938_045_416n,
          lastTotalSupply: 10_413_349_178_055_060_408_001_585n
        });
      }
      expect(synced.map(event => event.seq)).toEqual([1, 1]);
    });

    test('each broadcast takes the next sequence', async () => {
      await coordinator.submit(envelope(ORIGIN, purchase(1, 10n ** 16n)));
      await coordinator.submit(envelope(10, purchase(1, 10n ** 16n)));

      // The origin only hears the second broadcast
      expect((await endpoint(ORIGIN).getCursor(LAUNCH)).lastAppliedSeq).toBe(2);
      expect((await endpoint(10).getCursor(LAUNCH)).lastAppliedSeq).toBe(1);
      expect((await endpoint(137).getCursor(LAUNCH)).lastAppliedSeq).toBe(2);
    });

    test('a replayed trade is a duplicate and syncs nothing', async () => {
      await coordinator.submit(envelope(ORIGIN, purchase(1, 10n ** 16n)));
      const replay = await coordinator.submit(envelope(ORIGIN, purchase(1, 10n ** 16n)));

      expect(replay.status).toBe('duplicate');
      expect(replay.legs).toEqual([]);
      expect(client(10).calls.syncPrice).toBe(1);
      expect((await coordinator.describeLaunch(LAUNCH)).curves[0].stats.tradeCount).toBe(1);
    });

    test('a destination ahead of the sequence drops the update', async () => {
      await endpoint(137).syncPrice({ callerIdentity: RELAY, launchId: LAUNCH, newPrice: 1n, totalSupply: 0n, seq: 50 });
      const dropped: SyncDroppedEvent[] = [];
      coordinator.on('syncDropped', (event: SyncDroppedEvent) => dropped.push(event));

      const outcome = await coordinator.submit(envelope(ORIGIN, purchase(1, 10n ** 16n)));

      expect(outcome.legs[1]).toEqual({ kind: 'sync', chainId: 137, status: 'skipped' });
      expect(dropped).toEqual([{ launchId: LAUNCH, chainId: 137, seq: 1, lastAppliedSeq: 50 }]);
      expect(coordinator.getStats().syncsDropped).toBe(1);
    });

    test('retries a flaky chain within the policy', async () => {
      client(137).failures.syncPrice = 2;

      const outcome = await coordinator.submit(envelope(ORIGIN, purchase(1, 10n ** 16n)));

      expect(outcome.legs[1]).toEqual({ kind: 'sync', chainId: 137, status: 'ok' });
      expect(client(137).calls.syncPrice).toBe(3);
    });

    test('parks a leg that exhausts its retries and re-dispatches it', async () => {
      client(137).failures.syncPrice = 10;

      const outcome = await coordinator.submit(envelope(ORIGIN, purchase(1, 10n ** 16n)));

      expect(outcome.status).toBe('applied');
      expect(outcome.legs[0]).toEqual({ kind: 'sync', chainId: 10, status: 'ok' });
      expect(outcome.legs[1]).toMatchObject({ kind: 'sync', chainId: 137, status: 'dead-lettered' });
      expect(client(137).calls.syncPrice).toBe(3);

      const [parked] = coordinator.listDeadLetters();
      expect(parked).toMatchObject({
        id: outcome.legs[1].deadLetterId,
        kind: 'sync',
        launchId: LAUNCH,
        chainId: 137,
        errorCode: 'NETWORK_ERROR',
        error: 'syncPrice(137): syncPrice connection reset',
        failures: 1
      });

      client(137).failures.syncPrice = 0;
      const leg = await coordinator.redispatch(parked.id);

      expect(leg).toEqual({ kind: 'sync', chainId: 137, status: 'ok' });
      expect(coordinator.listDeadLetters()).toEqual([]);
      expect((await endpoint(137).getCursor(LAUNCH)).lastAppliedSeq).toBe(2);
    });

    test('a stalled destination does not hold up later events from the same chain', async () => {
      const other = '0x' + '6f'.repeat(32);
      await coordinator.submit(envelope(ORIGIN, tokenCreated(other)));
      client(137).stallSyncs = true;

      const healthySyncs = new Promise<string[]>(resolve => {
        const launches: string[] = [];
        coordinator.on('priceSynced', (event: PriceSyncedEvent) => {
          if (event.chainId !== 10) return;
          launches.push(event.launchId);
          if (launches.length === 2) resolve(launches);
        });
      });

      const first = coordinator.submit(envelope(ORIGIN, purchase(1, 10n ** 16n)));
      const second = coordinator.submit(envelope(ORIGIN, purchase(1, 10n ** 16n, other)));

      // Both launches reach chain 10 while chain 137 is still silent
      expect((await healthySyncs).sort()).toEqual([LAUNCH, other]);
      expect((await endpoint(137).getCursor(other)).lastAppliedSeq).toBe(0);

      client(137).releaseStalledSyncs();
      const outcomes = await Promise.all([first, second]);

      for (const outcome of outcomes) {
        expect(outcome.legs).toEqual([
          { kind: 'sync', chainId: 10, status: 'ok' },
          { kind: 'sync', chainId: 137, status: 'ok' }
        ]);
      }
      expect((await endpoint(137).getCursor(other)).lastAppliedSeq).toBe(1);
    });

    test('redispatch of an unknown id returns null', async () => {
      await expect(coordinator.redispatch('sync-1-0-1')).resolves.toBeNull();
    });

    test('rejects a trade for an unknown launch', async () => {
      const outcome = await coordinator.submit(envelope(ORIGIN, { ...purchase(1, E18), launchId: '0x' + '00'.repeat(32) }));
      expect(outcome.status).toBe('rejected');
      expect(coordinator.getStats().eventsRejected).toBe(1);
    });
  });

  describe('migration', () => {
    beforeEach(async () => {
      await coordinator.submit(envelope(ORIGIN, tokenCreated()));
    });

    test('a threshold buy migrates its own chain and syncs nothing', async () => {
      // 5 ETH on a fresh curve buys past CURVE_SUPPLY
      const outcome = await coordinator.submit(envelope(ORIGIN, purchase(1, 5n * E18)));

      expect(outcome.legs).toEqual([{ kind: 'migrate', chainId: ORIGIN, status: 'ok' }]);
      expect(client(10).calls.syncPrice).toBe(0);
      expect(client(ORIGIN).calls.migrateToDEX).toBe(1);
      const view = await coordinator.describeLaunch(LAUNCH);
      expect(view.migrations.map(record => record.status)).toEqual(['MIGRATED', 'ACTIVE', 'ACTIVE']);
      expect(view.migrations[0].liquidityPair).toBe(predictAddress(deploymentSalt(LAUNCH, ORIGIN), 'pair'));
    });

    test('applies a chain-reported migration once', async () => {
      const completed: string[] = [];
      coordinator.on('migrationCompleted', () => completed.push('done'));
      const report: ChainEvent = {
        type: 'CurveMigrationTriggered',
        launchId: LAUNCH,
        finalPrice: 100n,
        liquidityEth: 30n * E18,
        liquidityTokens: LAUNCH_CONSTANTS.LIQUIDITY_SUPPLY
      };

      const first = await coordinator.submit(envelope(10, report));
      const second = await coordinator.submit(envelope(10, report));

      expect(first.status).toBe('applied');
      expect(first.legs).toEqual([{ kind: 'migrate', chainId: 10, status: 'ok' }]);
      expect(second.status).toBe('duplicate');
      expect(completed).toEqual(['done']);
      expect(client(10).calls.migrateToDEX).toBe(1);

      const trade = await coordinator.submit(envelope(10, purchase(1, E18)));
      expect(trade.status).toBe('duplicate');
    });

    test('parks a failed migration and re-dispatches it', async () => {
      client(10).failures.migrateToDEX = 3;
      const report: ChainEvent = {
        type: 'CurveMigrationTriggered',
        launchId: LAUNCH,
        finalPrice: 100n,
        liquidityEth: 30n * E18,
        liquidityTokens: LAUNCH_CONSTANTS.LIQUIDITY_SUPPLY
      };

      const outcome = await coordinator.submit(envelope(10, report));
      expect(outcome.legs[0]).toMatchObject({ kind: 'migrate', chainId: 10, status: 'dead-lettered' });

      // Already attempted: a redelivery leaves it to the dead-letter queue
      expect((await coordinator.submit(envelope(10, report))).status).toBe('duplicate');

      const [parked] = coordinator.listDeadLetters();
      const leg = await coordinator.redispatch(parked.id);
      expect(leg).toEqual({ kind: 'migrate', chainId: 10, status: 'ok' });
      expect((await coordinator.describeLaunch(LAUNCH)).migrations[1]).toMatchObject({ status: 'MIGRATED', attempts: 2 });
    });
  });

  describe('authorization', () => {
    test('rejects events from unknown callers', async () => {
      const rejected: EventRejectedEvent[] = [];
      coordinator.on('eventRejected', (event: EventRejectedEvent) => rejected.push(event));

      const outcome = await coordinator.submit(envelope(ORIGIN, tokenCreated(), STRANGER));

      expect(outcome.status).toBe('rejected');
      expect(rejected[0].error.code).toBe('UNAUTHORIZED_CALLER');
      expect(await store.getLaunch(LAUNCH)).toBeNull();
      expect(client(10).calls.deployToken).toBe(0);
    });
  });

  describe('event sources', () => {
    test('processes pushed events and stops cleanly', async () => {
      const source = new PushEventSource(ORIGIN);
      coordinator.attachSource(source);
      expect(() => coordinator.attachSource(new PushEventSource(ORIGIN))).toThrow('already attached');
      await coordinator.start();

      source.push(RELAY, {
        type: 'TokenCreated',
        launchId: LAUNCH.toUpperCase().replace('0X', '0x'),
        name: 'Test Token',
        symbol: 'TEST',
        creator: '0x' + '12'.repeat(20),
        originChainId: ORIGIN,
        targetChainIds: [10],
        originToken: '0x' + '34'.repeat(20)
      });
      await coordinator.drain();

      const view = await coordinator.describeLaunch(LAUNCH);
      expect(view.launch.creatorFeeBps).toBe(100);
      expect(view.deployments).toHaveLength(1);
      expect(coordinator.getStats()).toMatchObject({ eventsApplied: 1, sources: 1, pendingEvents: 0, pendingLegs: 0 });

      await coordinator.stop();
      expect(coordinator.getStats().sources).toBe(0);
      expect(() => source.push(RELAY, purchase(1, E18))).toThrow('is not running');
    });
  });
});
