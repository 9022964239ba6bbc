// src/coordinator/cross-chain-coordinator.ts
import { EventEmitter } from 'events';
import PQueue from 'p-queue';
import { RetryPolicy } from '../config';
import { LAUNCH_CONSTANTS } from '../constants/launch-constants';
import { ChainClientRegistry } from '../chains/chain-client';
import { CurveManager } from '../curve/curve-manager';
import { LaunchStore } from '../database/launch-store';
import { DeploymentRegistry } from '../registry/deployment-registry';
import { LaunchRegistry, predictAddress } from '../registry/launch-registry';
import { SyncLedger } from '../registry/sync-ledger';
import { EventSource } from '../sources/base-event-source';
import {
  ChainEvent,
  ChainEventEnvelope,
  ChainId,
  CurveMigrationTriggeredEvent,
  CurveRecord,
  DeploymentRecord,
  Launch,
  LaunchId,
  MigrationRecord,
  SyncCursor,
  TokenCreatedEvent,
  TradeEvent
} from '../types';
import {
  AlreadyDeployedError,
  AlreadyMigratedError,
  CurvePausedError,
  LaunchpadError,
  StaleSequenceError,
  StateError,
  UnknownLaunchError,
  ValidationError,
  errorMessage,
  isLaunchpadError
} from '../types/errors';
import { KeyedSerializer } from '../utils/keyed-serializer';
import { logger, shortId } from '../utils/logger';
import { chainCall } from './chain-call';
import { CallerAuthorizer, requireAuthorized } from './caller-authorizer';
import { DeadLetter, DeadLetterQueue, LegKind } from './dead-letter-queue';
import { UnifiedPrice, computeUnifiedPrice } from './unified-price';

// Mirror trades already happened on-chain; slippage was enforced there
const ANY_SLIPPAGE_BPS = Number(LAUNCH_CONSTANTS.BPS_DENOMINATOR);

export interface CoordinatorDeps {
  store: LaunchStore;
  launches: LaunchRegistry;
  curves: CurveManager;
  deployments: DeploymentRegistry;
  clients: ChainClientRegistry;
  authorizer: CallerAuthorizer;
  deadLetters?: DeadLetterQueue;
  serializer?: KeyedSerializer;
}

export interface CoordinatorOptions {
  // Identity the coordinator presents to destination chains
  relayIdentity: string;
  retry: RetryPolicy;
  fanoutConcurrency: number;
  defaultCreatorFeeBps: number;
}

export type EventStatus = 'applied' | 'duplicate' | 'rejected';
export type LegStatus = 'ok' | 'skipped' | 'dead-lettered';

export interface LegOutcome {
  kind: LegKind;
  chainId: ChainId;
  status: LegStatus;
  deadLetterId?: string;
}

export interface EventOutcome {
  type: ChainEvent['type'];
  launchId: LaunchId;
  chainId: ChainId;
  status: EventStatus;
  reason?: string;
  legs: LegOutcome[];
}

export interface CoordinatorStats {
  eventsApplied: number;
  eventsDuplicate: number;
  eventsRejected: number;
  deployments: number;
  syncsApplied: number;
  syncsDropped: number;
  migrations: number;
  legsFailed: number;
  deadLetters: number;
  sources: number;
  pendingEvents: number;
  pendingLegs: number;
}

export interface PriceSyncedEvent {
  launchId: LaunchId;
  chainId: ChainId;
  seq: number;
  price: bigint;
  totalSupply: bigint;
}

export interface SyncDroppedEvent {
  launchId: LaunchId;
  chainId: ChainId;
  seq: number;
  lastAppliedSeq: number;
}

export interface EventRejectedEvent {
  envelope: ChainEventEnvelope;
  error: LaunchpadError;
}

export interface LaunchView {
  launch: Launch;
  curves: CurveRecord[];
  migrations: MigrationRecord[];
  deployments: DeploymentRecord[];
  cursors: SyncCursor[];
  unified: UnifiedPrice;
}

// An event whose effects are committed and whose legs are queued on the fan-out
interface AcceptedEvent {
  legs: Promise<LegOutcome[]>;
  statusOf: (legs: LegOutcome[]) => Exclude<EventStatus, 'rejected'>;
}

type Acceptance = { settled: true; outcome: EventOutcome } | { settled: false; accepted: AcceptedEvent };

function applied(legs: Promise<LegOutcome[]>): AcceptedEvent {
  return { legs, statusOf: () => 'applied' };
}

type LegTask = () => Promise<'ok' | 'skipped'>;

/**
 * Keeps every chain of a launch consistent from an at-least-once, unordered event stream.
 *
 * Events from one chain are checked and applied in delivery order by that chain's worker. The
 * worker only queues the resulting fan-out legs; they run in parallel on a shared queue, so a
 * slow destination never holds up later events. A leg that exhausts its retries is parked in
 * the dead-letter queue.
 */
export class CrossChainCoordinator extends EventEmitter {
  private workers: Map<ChainId, PQueue> = new Map();
  private inflight: Set<Promise<EventOutcome>> = new Set();
  private sources: Map<ChainId, { source: EventSource; unsubscribe: () => void }> = new Map();
  private fanout: PQueue;
  private ledger: SyncLedger;
  private serializer: KeyedSerializer;
  private deadLetters: DeadLetterQueue;
  private stats = {
    eventsApplied: 0,
    eventsDuplicate: 0,
    eventsRejected: 0,
    deployments: 0,
    syncsApplied: 0,
    syncsDropped: 0,
    migrations: 0,
    legsFailed: 0
  };

  constructor(
    private deps: CoordinatorDeps,
    private options: CoordinatorOptions
  ) {
    super();
    this.serializer = deps.serializer || new KeyedSerializer();
    this.deadLetters = deps.deadLetters || new DeadLetterQueue();
    this.ledger = new SyncLedger(deps.store, this.serializer);
    this.fanout = new PQueue({ concurrency: options.fanoutConcurrency });
  }

  attachSource(source: EventSource): void {
    if (this.sources.has(source.chainId)) {
      throw new ValidationError(`An event source is already attached for chain ${source.chainId}`);
    }

    const unsubscribe = source.onEvent(envelope => {
      this.submit(envelope).catch(error => {
        logger.error(`Unhandled failure processing ${envelope.event.type} from chain ${envelope.chainId}`, {
          error: errorMessage(error)
        });
      });
    });
    this.sources.set(source.chainId, { source, unsubscribe });
    logger.info(`Attached event source for chain ${source.chainId}`);
  }

  async start(): Promise<void> {
    await Promise.all(Array.from(this.sources.values()).map(({ source }) => source.start()));
    logger.info(`🚀 Coordinator started`, { chains: Array.from(this.sources.keys()).join(',') });
  }

  async stop(): Promise<void> {
    for (const { source, unsubscribe } of this.sources.values()) {
      unsubscribe();
      await source.stop();
    }
    this.sources.clear();
    await this.drain();
    logger.info('Coordinator stopped');
  }

  /**
   * Queues an event on its chain's worker. Events from the same chain are applied strictly in
   * submission order; the returned outcome resolves once the event's legs have settled.
   */
  submit(envelope: ChainEventEnvelope): Promise<EventOutcome> {
    let worker = this.workers.get(envelope.chainId);
    if (!worker) {
      worker = new PQueue({ concurrency: 1 });
      this.workers.set(envelope.chainId, worker);
    }

    const done = worker.add(() => this.accept(envelope)).then(acceptance => this.complete(envelope, acceptance));
    this.inflight.add(done);
    const forget = () => {
      this.inflight.delete(done);
    };
    void done.then(forget, forget);
    return done;
  }

  async drain(): Promise<void> {
    await Promise.all(Array.from(this.workers.values()).map(worker => worker.onIdle()));
    while (this.inflight.size > 0) {
      await Promise.allSettled(Array.from(this.inflight));
    }
    await this.fanout.onIdle();
  }

  // Applies an event and waits for its legs, bypassing the chain worker
  async handleEvent(envelope: ChainEventEnvelope): Promise<EventOutcome> {
    return this.complete(envelope, await this.accept(envelope));
  }

  private async accept(envelope: ChainEventEnvelope): Promise<Acceptance> {
    const { event, chainId } = envelope;

    try {
      requireAuthorized(this.deps.authorizer, envelope.callerIdentity, `deliver ${event.type}`);
      return { settled: false, accepted: await this.dispatch(chainId, event) };
    } catch (error) {
      return { settled: true, outcome: this.classifyFailure(envelope, error) };
    }
  }

  private async complete(envelope: ChainEventEnvelope, acceptance: Acceptance): Promise<EventOutcome> {
    if (acceptance.settled) return acceptance.outcome;

    const { event, chainId } = envelope;
    const legs = await acceptance.accepted.legs;
    const status = acceptance.accepted.statusOf(legs);
    const outcome: EventOutcome = { type: event.type, launchId: event.launchId, chainId, status, legs };

    if (status === 'applied') {
      this.stats.eventsApplied++;
    } else {
      this.stats.eventsDuplicate++;
    }
    this.emit('eventProcessed', outcome);
    return outcome;
  }

  private dispatch(chainId: ChainId, event: ChainEvent): Promise<AcceptedEvent> {
    switch (event.type) {
      case 'TokenCreated':
        return this.handleTokenCreated(chainId, event);
      case 'TokenPurchase':
      case 'TokenSale':
        return this.handleTrade(chainId, event);
      case 'CurveMigrationTriggered':
        return this.handleMigrationTriggered(chainId, event);
    }
  }

  private classifyFailure(envelope: ChainEventEnvelope, error: unknown): EventOutcome {
    if (!isLaunchpadError(error)) {
      throw error;
    }

    const { event, chainId } = envelope;
    const base = { type: event.type, launchId: event.launchId, chainId, reason: error.message, legs: [] };

    // Repeated or out-of-order deliveries are no-ops
    const harmless =
      error instanceof StaleSequenceError ||
      (error instanceof StateError && !(error instanceof UnknownLaunchError) && !(error instanceof CurvePausedError));

    if (harmless) {
      logger.debug(`Ignored ${event.type} for ${shortId(event.launchId)} from chain ${chainId}`, {
        code: error.code
      });
      this.stats.eventsDuplicate++;
      const outcome: EventOutcome = { ...base, status: 'duplicate' };
      this.emit('eventProcessed', outcome);
      return outcome;
    }

    if (error.errorClass === 'ARITHMETIC') {
      logger.error(`Curve arithmetic failed for ${shortId(event.launchId)} on chain ${chainId}`, {
        event: event.type,
        error: error.message
      });
    } else if (error.errorClass !== 'AUTHORIZATION') {
      // Authorization failures were already logged by requireAuthorized
      logger.warn(`Rejected ${event.type} from chain ${chainId}`, { code: error.code, error: error.message });
    }

    this.stats.eventsRejected++;
    const rejected: EventRejectedEvent = { envelope, error };
    this.emit('eventRejected', rejected);
    return { ...base, status: 'rejected' };
  }

  private async handleTokenCreated(chainId: ChainId, event: TokenCreatedEvent): Promise<AcceptedEvent> {
    if (event.originChainId !== chainId) {
      throw new ValidationError(`TokenCreated for chain ${event.originChainId} delivered from chain ${chainId}`);
    }

    const { launch, created } = await this.deps.launches.register({
      launchId: event.launchId,
      creator: event.creator,
      name: event.name,
      symbol: event.symbol,
      originChainId: event.originChainId,
      originToken: event.originToken,
      targetChainIds: event.targetChainIds,
      creatorFeeBps: event.creatorFeeBps ?? this.options.defaultCreatorFeeBps
    });

    for (const id of LaunchRegistry.chainsOf(launch)) {
      await this.deps.curves.initializeCurve(launch.launchId, id, launch.creatorFeeBps);
    }

    const targets = launch.targetChainIds.filter(id => id !== launch.originChainId);
    const legs = Promise.all(
      targets.map(target => this.runLeg('deploy', launch.launchId, target, () => this.deployTo(launch, target)))
    );

    return {
      legs,
      statusOf: settled => (created || settled.some(leg => leg.status === 'ok') ? 'applied' : 'duplicate')
    };
  }

  private async deployTo(launch: Launch, chainId: ChainId): Promise<'ok' | 'skipped'> {
    const client = this.deps.clients.get(chainId);

    const { record, created } = await this.deps.deployments.tryDeploy(launch.launchId, chainId, async salt => {
      try {
        return await chainCall(`deployToken(${chainId})`, this.options.retry, () =>
          client.deployToken({
            callerIdentity: this.options.relayIdentity,
            launchId: launch.launchId,
            name: launch.name,
            symbol: launch.symbol,
            creator: launch.creator,
            originToken: launch.originToken,
            originChainId: launch.originChainId
          })
        );
      } catch (error) {
        if (!(error instanceof AlreadyDeployedError)) throw error;
        // Deployed by an attempt whose reply never arrived; addresses follow from the salt
        return { tokenAddress: predictAddress(salt, 'token'), curveAddress: predictAddress(salt, 'curve') };
      }
    });

    if (!created) return 'skipped';
    this.stats.deployments++;
    this.emit('tokenDeployed', record);
    return 'ok';
  }

  private async handleTrade(chainId: ChainId, event: TradeEvent): Promise<AcceptedEvent> {
    const launch = await this.deps.launches.require(event.launchId);

    if (event.type === 'TokenPurchase') {
      const execution = await this.deps.curves.recordBuy({
        launchId: event.launchId,
        chainId,
        seq: event.seq,
        ethIn: event.ethIn,
        minTokensOut: 0n,
        maxSlippageBps: ANY_SLIPPAGE_BPS
      });
      this.reportDrift(chainId, event, execution.tokensOut, execution.price);

      if (execution.triggered) {
        // Migration is chain-local; no price sync for the threshold trade
        const leg = this.runLeg('migrate', event.launchId, chainId, () => this.runMigration(event.launchId, chainId));
        return applied(Promise.all([leg]));
      }
    } else {
      const execution = await this.deps.curves.sell({
        launchId: event.launchId,
        chainId,
        seq: event.seq,
        tokensIn: event.tokensIn,
        minEthOut: 0n,
        maxSlippageBps: ANY_SLIPPAGE_BPS
      });
      this.reportDrift(chainId, event, execution.ethOut, execution.price);
    }

    const targets = LaunchRegistry.chainsOf(launch).filter(id => id !== chainId);
    return this.broadcastPrice(launch.launchId, targets);
  }

  private reportDrift(chainId: ChainId, event: TradeEvent, mirrored: bigint, mirrorPrice: bigint): void {
    const reported = event.type === 'TokenPurchase' ? event.tokensOut : event.ethOut;
    if (reported !== mirrored || event.price !== mirrorPrice) {
      logger.debug(`Mirror drift on ${shortId(event.launchId)} chain ${chainId}`, {
        seq: event.seq,
        reported,
        mirrored,
        reportedPrice: event.price,
        mirrorPrice
      });
    }
  }

  private recordMigration(record: MigrationRecord): void {
    this.stats.migrations++;
    this.deadLetters.resolve('migrate', record.launchId, record.chainId);
    this.emit('migrationCompleted', record);
  }

  private async runMigration(launchId: LaunchId, chainId: ChainId): Promise<'ok' | 'skipped'> {
    try {
      const record = await this.deps.curves.retryMigration(launchId, chainId);
      this.recordMigration(record);
      return 'ok';
    } catch (error) {
      if (error instanceof AlreadyMigratedError) return 'skipped';
      throw error;
    }
  }

  private async handleMigrationTriggered(chainId: ChainId, event: CurveMigrationTriggeredEvent): Promise<AcceptedEvent> {
    const record = await this.deps.curves.reportMigration(event.launchId, chainId, {
      finalPrice: event.finalPrice,
      liquidityEth: event.liquidityEth,
      liquidityTokens: event.liquidityTokens
    });

    // A failed attempt is already parked for re-dispatch
    if (record.attempts > 0) {
      return { legs: Promise.resolve([]), statusOf: () => 'duplicate' };
    }

    const leg = this.runLeg('migrate', event.launchId, chainId, () => this.runMigration(event.launchId, chainId));
    return {
      legs: Promise.all([leg]),
      statusOf: settled => (settled.every(done => done.status === 'skipped') ? 'duplicate' : 'applied')
    };
  }

  /**
   * Queues the launch's current unified price to `targets` under one fresh sequence number.
   * Pricing and sequence allocation happen under a per-launch lock so a higher sequence never
   * carries an older price. Resolves once the legs are queued, not when they land.
   */
  private async broadcastPrice(launchId: LaunchId, targets: ChainId[]): Promise<AcceptedEvent> {
    if (targets.length === 0) return applied(Promise.resolve([]));

    const { seq, unified } = await this.serializer.run(`sync:${launchId}`, async () => {
      const unified = computeUnifiedPrice(await this.deps.curves.listCurves(launchId));
      const seq = await this.deps.store.nextSyncSequence(launchId);
      return { seq, unified };
    });

    return applied(
      Promise.all(
        targets.map(target => this.runLeg('sync', launchId, target, () => this.syncTo(launchId, target, seq, unified)))
      )
    );
  }

  private async syncTo(launchId: LaunchId, chainId: ChainId, seq: number, unified: UnifiedPrice): Promise<'ok' | 'skipped'> {
    const client = this.deps.clients.get(chainId);
    const result = await chainCall(`syncPrice(${chainId})`, this.options.retry, () =>
      client.syncPrice({
        callerIdentity: this.options.relayIdentity,
        launchId,
        newPrice: unified.price,
        totalSupply: unified.totalSupply,
        seq
      })
    );

    if (!result.applied) {
      this.stats.syncsDropped++;
      const dropped: SyncDroppedEvent = { launchId, chainId, seq, lastAppliedSeq: result.lastAppliedSeq };
      this.emit('syncDropped', dropped);
      return 'skipped';
    }

    await this.ledger.tryApply(launchId, chainId, {
      seq,
      timestamp: new Date(),
      price: unified.price,
      totalSupply: unified.totalSupply
    });
    this.stats.syncsApplied++;
    const synced: PriceSyncedEvent = { launchId, chainId, seq, price: unified.price, totalSupply: unified.totalSupply };
    this.emit('priceSynced', synced);
    return 'ok';
  }

  private runLeg(kind: LegKind, launchId: LaunchId, chainId: ChainId, task: LegTask): Promise<LegOutcome> {
    return this.fanout.add(async (): Promise<LegOutcome> => {
      try {
        const status = await task();
        this.deadLetters.resolve(kind, launchId, chainId);
        return { kind, chainId, status };
      } catch (error) {
        return this.deadLetter(kind, launchId, chainId, error);
      }
    });
  }

  private deadLetter(kind: LegKind, launchId: LaunchId, chainId: ChainId, error: unknown): LegOutcome {
    const entry = this.deadLetters.park({
      kind,
      launchId,
      chainId,
      error: errorMessage(error),
      errorCode: isLaunchpadError(error) ? error.code : 'UNEXPECTED'
    });
    this.stats.legsFailed++;
    logger.error(`❌ ${kind} leg for ${shortId(launchId)} on chain ${chainId} dead-lettered`, {
      id: entry.id,
      failures: entry.failures,
      error: entry.error
    });
    this.emit('legFailed', entry);
    return { kind, chainId, status: 'dead-lettered', deadLetterId: entry.id };
  }

  /**
   * Re-runs a parked leg. Returns null for an unknown id. A sync leg is re-sent with the
   * current unified price under a new sequence number rather than the one that failed.
   */
  async redispatch(id: string): Promise<LegOutcome | null> {
    const entry = this.deadLetters.get(id);
    if (!entry) return null;

    logger.info(`Re-dispatching ${entry.kind} leg ${entry.id}`, { failures: entry.failures });
    switch (entry.kind) {
      case 'deploy': {
        const launch = await this.deps.launches.require(entry.launchId);
        return this.runLeg('deploy', entry.launchId, entry.chainId, () => this.deployTo(launch, entry.chainId));
      }
      case 'sync': {
        const { legs } = await this.broadcastPrice(entry.launchId, [entry.chainId]);
        const [leg] = await legs;
        return leg;
      }
      case 'migrate':
        return this.runLeg('migrate', entry.launchId, entry.chainId, () =>
          this.runMigration(entry.launchId, entry.chainId)
        );
    }
  }

  listDeadLetters(): DeadLetter[] {
    return this.deadLetters.list();
  }

  async describeLaunch(launchId: LaunchId): Promise<LaunchView> {
    const launch = await this.deps.launches.require(launchId);
    const curves = await this.deps.curves.listCurves(launchId);

    return {
      launch,
      curves,
      migrations: await this.deps.curves.listMigrations(launchId),
      deployments: await this.deps.deployments.list(launchId),
      cursors: await this.ledger.list(launchId),
      unified: computeUnifiedPrice(curves)
    };
  }

  getStats(): CoordinatorStats {
    let pendingEvents = 0;
    for (const worker of this.workers.values()) {
      pendingEvents += worker.size + worker.pending;
    }

    return {
      ...this.stats,
      deadLetters: this.deadLetters.size,
      sources: this.sources.size,
      pendingEvents,
      pendingLegs: this.fanout.size + this.fanout.pending
    };
  }
}
