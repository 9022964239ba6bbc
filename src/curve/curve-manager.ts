// src/curve/curve-manager.ts
import { EventEmitter } from 'events';
import { LAUNCH_CONSTANTS } from '../constants/launch-constants';
import { LaunchStore, curveKey, curveKeyString } from '../database/launch-store';
import {
  ChainId,
  CurveKey,
  CurveRecord,
  CurveState,
  CurveStats,
  LaunchId,
  MigrationRecord,
  MigrationStatus
} from '../types';
import {
  AlreadyMigratedError,
  CurveMigratedError,
  CurvePausedError,
  LaunchpadError,
  MigrationNotTriggeredError,
  NetworkError,
  StaleSequenceError,
  UnknownLaunchError,
  ValidationError,
  errorMessage,
  isLaunchpadError
} from '../types/errors';
import { KeyedSerializer } from '../utils/keyed-serializer';
import { logger, shortId } from '../utils/logger';
import { LiquidityMigrator, MigrationOutcome, MigrationRequest } from './liquidity-migrator';
import { acceptsTrades, nextMigrationStatus } from './migration-machine';
import {
  BuyResult,
  FeeSchedule,
  SellResult,
  applyBuy,
  applySell,
  currentPrice,
  initialCurveState
} from './price-engine';

export interface CurveManagerOptions {
  fees: FeeSchedule;
  initialVirtualEth: bigint;
  initialVirtualTokens: bigint;
}

interface TradeRequest {
  launchId: LaunchId;
  chainId: ChainId;
  // Origin-chain sequence; trades at or below the curve's lastUpdateSeq are rejected as stale
  seq?: number;
  maxSlippageBps: number;
}

export interface BuyRequest extends TradeRequest {
  ethIn: bigint;
  minTokensOut: bigint;
}

export interface SellRequest extends TradeRequest {
  tokensIn: bigint;
  minEthOut: bigint;
}

export interface RecordedBuy extends BuyResult {
  triggered: MigrationRecord | null;
}

export interface BuyExecution extends BuyResult {
  migration: MigrationRecord | null;
  migrationError: LaunchpadError | null;
}

export interface MigrationReport {
  finalPrice: bigint;
  liquidityEth: bigint;
  liquidityTokens: bigint;
}

function activeMigration(key: CurveKey): MigrationRecord {
  return {
    ...key,
    status: 'ACTIVE',
    finalPrice: null,
    liquidityEth: null,
    liquidityTokens: null,
    liquidityPair: null,
    triggeredAt: null,
    migratedAt: null,
    attempts: 0,
    lastError: null
  };
}

function transition(record: MigrationRecord, event: Parameters<typeof nextMigrationStatus>[1]): MigrationStatus {
  const next = nextMigrationStatus(record.status, event);
  if (next === null) {
    if (record.status === 'MIGRATED') {
      throw new AlreadyMigratedError(`Curve ${shortId(record.launchId)} on ${record.chainId} is already migrated`);
    }
    throw new MigrationNotTriggeredError(
      `Curve ${shortId(record.launchId)} on ${record.chainId} cannot take ${event} from ${record.status}`
    );
  }
  return next;
}

/**
 * Owns every curve mirror and its migration lifecycle. Each (launchId, chainId) is mutated by
 * one writer at a time; state is validated and persisted before the migrator is called.
 */
export class CurveManager extends EventEmitter {
  private migrationsInFlight: Set<string> = new Set();

  constructor(
    private store: LaunchStore,
    private migrator: LiquidityMigrator,
    private options: CurveManagerOptions,
    private serializer: KeyedSerializer = new KeyedSerializer()
  ) {
    super();
  }

  private lockKey(key: CurveKey): string {
    return `curve:${curveKeyString(key)}`;
  }

  async initializeCurve(launchId: LaunchId, chainId: ChainId, creatorFeeBps: number): Promise<CurveRecord> {
    const key = curveKey(launchId, chainId);

    return this.serializer.run(this.lockKey(key), async () => {
      const state = initialCurveState(creatorFeeBps, this.options.initialVirtualEth, this.options.initialVirtualTokens);
      const stats: CurveStats = {
        tradeCount: 0,
        volumeEth: 0n,
        feesEth: 0n,
        paused: false,
        updatedAt: new Date()
      };
      const { record, created } = await this.store.insertCurve({ ...key, state, stats });

      if (created) {
        await this.store.saveMigration(activeMigration(key));
        logger.debug(`Initialized curve ${shortId(launchId)} on chain ${chainId}`);
      }
      return record;
    });
  }

  async getCurve(launchId: LaunchId, chainId: ChainId): Promise<CurveRecord | null> {
    return this.store.getCurve(curveKey(launchId, chainId));
  }

  async listCurves(launchId: LaunchId): Promise<CurveRecord[]> {
    return this.store.listCurves(launchId);
  }

  async getMigration(launchId: LaunchId, chainId: ChainId): Promise<MigrationRecord | null> {
    return this.store.getMigration(curveKey(launchId, chainId));
  }

  async listMigrations(launchId: LaunchId): Promise<MigrationRecord[]> {
    return this.store.listMigrations(launchId);
  }

  private async loadForTrade(key: CurveKey, seq: number | undefined): Promise<CurveRecord> {
    if (seq !== undefined && (!Number.isSafeInteger(seq) || seq <= 0)) {
      throw new ValidationError(`Trade seq ${seq} is not a positive safe integer`);
    }
    const curve = await this.store.getCurve(key);
    if (!curve) {
      throw new UnknownLaunchError(`No curve for ${shortId(key.launchId)} on chain ${key.chainId}`);
    }

    const migration = (await this.store.getMigration(key)) || activeMigration(key);
    if (!acceptsTrades(migration.status)) {
      throw new CurveMigratedError(`Curve ${shortId(key.launchId)} on ${key.chainId} is ${migration.status}`);
    }
    if (curve.stats.paused) {
      throw new CurvePausedError(`Curve ${shortId(key.launchId)} on ${key.chainId} is paused`);
    }
    if (seq !== undefined && seq <= curve.state.lastUpdateSeq) {
      throw new StaleSequenceError(seq, curve.state.lastUpdateSeq);
    }
    return curve;
  }

  private nextStats(stats: CurveStats, volume: bigint, fees: bigint): CurveStats {
    return {
      ...stats,
      tradeCount: stats.tradeCount + 1,
      volumeEth: stats.volumeEth + volume,
      feesEth: stats.feesEth + fees,
      updatedAt: new Date()
    };
  }

  private withSeq(state: CurveState, seq: number | undefined): CurveState {
    return seq === undefined ? state : { ...state, lastUpdateSeq: seq };
  }

  /**
   * Checks and records a buy under the curve's lock without calling the migrator. A buy that
   * reaches the supply ceiling comes back with the MIGRATION_TRIGGERED record in `triggered`.
   */
  async recordBuy(request: BuyRequest): Promise<RecordedBuy> {
    const key = curveKey(request.launchId, request.chainId);

    return this.serializer.run(this.lockKey(key), async () => {
      const curve = await this.loadForTrade(key, request.seq);
      const outcome = applyBuy(curve.state, request.ethIn, request.minTokensOut, request.maxSlippageBps, this.options.fees);
      const state = this.withSeq(outcome.state, request.seq);

      await this.store.saveCurve({
        ...key,
        state,
        stats: this.nextStats(curve.stats, outcome.ethUsed, outcome.fees.platformFee + outcome.fees.creatorFee)
      });

      let triggered: MigrationRecord | null = null;
      if (outcome.migrationTriggered) {
        triggered = await this.markTriggered(key, state, 'THRESHOLD_REACHED');
      }
      return { ...outcome, state, triggered };
    });
  }

  async buy(request: BuyRequest): Promise<BuyExecution> {
    const { triggered, ...result } = await this.recordBuy(request);

    if (!triggered) {
      return { ...result, migration: null, migrationError: null };
    }

    // Interactions after the new state is committed
    try {
      const migration = await this.migrate(request.launchId, request.chainId);
      return { ...result, migration, migrationError: null };
    } catch (error) {
      if (!isLaunchpadError(error)) throw error;
      const migration = await this.getMigration(request.launchId, request.chainId);
      return { ...result, migration, migrationError: error };
    }
  }

  async sell(request: SellRequest): Promise<SellResult> {
    const key = curveKey(request.launchId, request.chainId);

    return this.serializer.run(this.lockKey(key), async () => {
      const curve = await this.loadForTrade(key, request.seq);
      const outcome = applySell(curve.state, request.tokensIn, request.minEthOut, request.maxSlippageBps, this.options.fees);
      const state = this.withSeq(outcome.state, request.seq);

      await this.store.saveCurve({
        ...key,
        state,
        stats: this.nextStats(curve.stats, outcome.grossEthOut, outcome.fee)
      });
      return { ...outcome, state };
    });
  }

  private async markTriggered(
    key: CurveKey,
    state: CurveState,
    event: 'THRESHOLD_REACHED' | 'MIGRATION_REPORTED',
    report?: MigrationReport
  ): Promise<MigrationRecord> {
    const current = (await this.store.getMigration(key)) || activeMigration(key);
    const status = transition(current, event);

    const record: MigrationRecord = {
      ...current,
      status,
      finalPrice: report ? report.finalPrice : currentPrice(state),
      liquidityEth: report ? report.liquidityEth : state.virtualEth,
      liquidityTokens: report ? report.liquidityTokens : LAUNCH_CONSTANTS.TOTAL_SUPPLY - LAUNCH_CONSTANTS.CURVE_SUPPLY,
      triggeredAt: new Date()
    };
    await this.store.saveMigration(record);

    logger.info(`🎓 Curve ${shortId(key.launchId)} on chain ${key.chainId} reached migration`, {
      finalPrice: record.finalPrice,
      liquidityEth: record.liquidityEth
    });
    this.emit('migrationTriggered', record);
    return record;
  }

  /**
   * Runs the DEX migration for a curve in MIGRATION_TRIGGERED. The migrator is called at most
   * once per attempt; a MIGRATED curve or an attempt already in flight is rejected with
   * AlreadyMigratedError. A failed attempt leaves the curve in MIGRATION_TRIGGERED for retry.
   */
  async migrate(launchId: LaunchId, chainId: ChainId): Promise<MigrationRecord> {
    const key = curveKey(launchId, chainId);
    const flightKey = curveKeyString(key);

    if (this.migrationsInFlight.has(flightKey)) {
      throw new AlreadyMigratedError(`Migration of ${shortId(launchId)} on ${chainId} is already in progress`);
    }
    this.migrationsInFlight.add(flightKey);

    try {
      const request = await this.serializer.run(this.lockKey(key), async (): Promise<MigrationRequest> => {
        const record = await this.store.getMigration(key);
        if (!record) {
          throw new UnknownLaunchError(`No migration record for ${shortId(launchId)} on chain ${chainId}`);
        }
        transition(record, 'MIGRATION_COMPLETED');

        if (record.finalPrice === null || record.liquidityEth === null || record.liquidityTokens === null) {
          throw new MigrationNotTriggeredError(`Migration terms missing for ${shortId(launchId)} on ${chainId}`);
        }
        return {
          launchId,
          chainId,
          finalPrice: record.finalPrice,
          liquidityEth: record.liquidityEth,
          liquidityTokens: record.liquidityTokens
        };
      });

      let outcome: MigrationOutcome;
      try {
        outcome = await this.migrator.migrate(request);
      } catch (error) {
        outcome = { ok: false, error: errorMessage(error) };
      }

      return await this.serializer.run(this.lockKey(key), async () => {
        const record = (await this.store.getMigration(key)) || activeMigration(key);

        if (!outcome.ok) {
          const failed: MigrationRecord = {
            ...record,
            status: transition(record, 'MIGRATION_FAILED'),
            attempts: record.attempts + 1,
            lastError: outcome.error
          };
          await this.store.saveMigration(failed);
          logger.warn(`Migration of ${shortId(launchId)} on chain ${chainId} failed`, {
            attempt: failed.attempts,
            error: outcome.error
          });
          this.emit('migrationFailed', failed);
          throw new NetworkError(`DEX migration failed: ${outcome.error}`);
        }

        const migrated: MigrationRecord = {
          ...record,
          status: transition(record, 'MIGRATION_COMPLETED'),
          liquidityPair: outcome.liquidityPair,
          migratedAt: new Date(),
          attempts: record.attempts + 1,
          lastError: null
        };
        await this.store.saveMigration(migrated);
        logger.info(`Curve ${shortId(launchId)} on chain ${chainId} migrated`, { pair: outcome.liquidityPair });
        this.emit('migrated', migrated);
        return migrated;
      });
    } finally {
      this.migrationsInFlight.delete(flightKey);
    }
  }

  /**
   * Re-runs a DEX migration that failed earlier. Only a curve left in MIGRATION_TRIGGERED
   * qualifies.
   */
  async retryMigration(launchId: LaunchId, chainId: ChainId): Promise<MigrationRecord> {
    const record = await this.getMigration(launchId, chainId);
    if (!record) {
      throw new UnknownLaunchError(`No migration record for ${shortId(launchId)} on chain ${chainId}`);
    }
    if (record.status === 'MIGRATION_TRIGGERED' && record.attempts > 0) {
      logger.info(`Retrying migration of ${shortId(launchId)} on chain ${chainId}`, { attempts: record.attempts });
    }
    return this.migrate(launchId, chainId);
  }

  /**
   * Applies a migration the chain itself reported. An ACTIVE mirror adopts the reported terms;
   * a curve already past ACTIVE is left as is.
   */
  async reportMigration(launchId: LaunchId, chainId: ChainId, report: MigrationReport): Promise<MigrationRecord> {
    const key = curveKey(launchId, chainId);

    return this.serializer.run(this.lockKey(key), async () => {
      const curve = await this.store.getCurve(key);
      if (!curve) {
        throw new UnknownLaunchError(`No curve for ${shortId(launchId)} on chain ${chainId}`);
      }

      const record = (await this.store.getMigration(key)) || activeMigration(key);
      if (record.status === 'MIGRATED') {
        throw new AlreadyMigratedError(`Curve ${shortId(launchId)} on ${chainId} is already migrated`);
      }
      if (record.status === 'MIGRATION_TRIGGERED') {
        return record;
      }

      logger.warn(`Chain ${chainId} reported migration of ${shortId(launchId)} before the mirror reached it`, {
        mirrorSupply: curve.state.totalSupply
      });
      return this.markTriggered(key, curve.state, 'MIGRATION_REPORTED', report);
    });
  }

  async setPaused(launchId: LaunchId, chainId: ChainId, paused: boolean): Promise<CurveRecord> {
    const key = curveKey(launchId, chainId);

    return this.serializer.run(this.lockKey(key), async () => {
      const curve = await this.store.getCurve(key);
      if (!curve) {
        throw new UnknownLaunchError(`No curve for ${shortId(launchId)} on chain ${chainId}`);
      }
      const updated: CurveRecord = { ...curve, stats: { ...curve.stats, paused, updatedAt: new Date() } };
      await this.store.saveCurve(updated);
      logger.warn(`Curve ${shortId(launchId)} on chain ${chainId} ${paused ? 'paused' : 'unpaused'}`);
      return updated;
    });
  }
}
