// src/runtime.ts - Wires stores, registries, chain clients and the coordinator from a Config
import { Config } from './config';
import { ChainClientRegistry } from './chains/chain-client';
import { DestinationEndpoint } from './chains/destination-endpoint';
import { LocalChainClient } from './chains/local-chain-client';
import { SimulatedDexMigrator } from './chains/simulated-dex';
import { AllowListAuthorizer } from './coordinator/caller-authorizer';
import { ChainClientMigrator } from './coordinator/chain-client-migrator';
import { CrossChainCoordinator } from './coordinator/cross-chain-coordinator';
import { CurveManager } from './curve/curve-manager';
import { KnexLaunchStore } from './database/knex-store';
import { LaunchStore } from './database/launch-store';
import { MemoryLaunchStore } from './database/memory-store';
import { runMigrations } from './database/migrations/run-migration';
import { createDb, testConnection } from './database/postgres';
import { DeploymentRegistry } from './registry/deployment-registry';
import { LaunchRegistry } from './registry/launch-registry';
import { PushEventSource } from './sources/push-event-source';
import { ChainId } from './types';
import { KeyedSerializer } from './utils/keyed-serializer';
import { logger } from './utils/logger';

export interface Runtime {
  store: LaunchStore;
  authorizer: AllowListAuthorizer;
  curves: CurveManager;
  coordinator: CrossChainCoordinator;
  sources: Map<ChainId, PushEventSource>;
  endpoints: Map<ChainId, DestinationEndpoint>;
  close(): Promise<void>;
}

async function openStore(cfg: Config): Promise<LaunchStore> {
  if (cfg.STORE_DRIVER === 'memory') {
    return new MemoryLaunchStore();
  }

  const db = createDb(cfg);
  if (!(await testConnection(db))) {
    await db.destroy();
    throw new Error('PostgreSQL is not reachable');
  }
  await runMigrations(db);
  return new KnexLaunchStore(db);
}

/**
 * Builds a coordinator for every chain in CHAIN_IDS. Destination chains are simulated in
 * process: each gets its own endpoint, store and DEX stand-in behind a LocalChainClient.
 */
export async function buildRuntime(cfg: Config): Promise<Runtime> {
  const store = await openStore(cfg);
  const serializer = new KeyedSerializer();
  const authorizer = new AllowListAuthorizer(cfg.ADMIN_IDENTITY, cfg.AUTHORIZED_CALLERS);

  const clients = new ChainClientRegistry();
  const sources = new Map<ChainId, PushEventSource>();
  const endpoints = new Map<ChainId, DestinationEndpoint>();

  for (const chainId of cfg.CHAIN_IDS) {
    const endpoint = new DestinationEndpoint(chainId, {
      authorizer,
      store: new MemoryLaunchStore(),
      dexMigrator: new SimulatedDexMigrator()
    });
    endpoints.set(chainId, endpoint);
    clients.register(new LocalChainClient(endpoint));
    sources.set(chainId, new PushEventSource(chainId));
  }

  const curves = new CurveManager(
    store,
    new ChainClientMigrator(clients, cfg.RELAY_IDENTITY, cfg.retry),
    {
      fees: { platformFeeBps: cfg.PLATFORM_FEE_BPS },
      initialVirtualEth: cfg.INITIAL_VIRTUAL_ETH,
      initialVirtualTokens: cfg.INITIAL_VIRTUAL_TOKENS
    },
    serializer
  );

  const coordinator = new CrossChainCoordinator(
    {
      store,
      launches: new LaunchRegistry(store, { maxCreatorFeeBps: cfg.MAX_CREATOR_FEE_BPS }),
      curves,
      deployments: new DeploymentRegistry(store, serializer),
      clients,
      authorizer,
      serializer
    },
    {
      relayIdentity: cfg.RELAY_IDENTITY,
      retry: cfg.retry,
      fanoutConcurrency: cfg.FANOUT_CONCURRENCY,
      defaultCreatorFeeBps: cfg.DEFAULT_CREATOR_FEE_BPS
    }
  );
  sources.forEach(source => coordinator.attachSource(source));

  logger.info(`Runtime ready`, { store: cfg.STORE_DRIVER, chains: cfg.CHAIN_IDS.join(',') });

  return {
    store,
    authorizer,
    curves,
    coordinator,
    sources,
    endpoints,
    async close() {
      await coordinator.stop();
      await store.close();
    }
  };
}
