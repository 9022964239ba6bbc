import { LaunchStore, curveKey, curveKeyString } from '../database/launch-store';
import { ChainId, LaunchId, SyncCursor } from '../types';
import { ValidationError } from '../types/errors';
import { KeyedSerializer } from '../utils/keyed-serializer';
import { logger, shortId } from '../utils/logger';

export interface SyncUpdate {
  seq: number;
  timestamp: Date;
  price: bigint;
  totalSupply: bigint;
}

export type SyncOutcome =
  | { applied: true; cursor: SyncCursor }
  | { applied: false; cursor: SyncCursor; reason: 'stale' | 'duplicate' };

function emptyCursor(launchId: LaunchId, chainId: ChainId): SyncCursor {
  return {
    launchId,
    chainId,
    lastAppliedSeq: 0,
    lastAppliedTimestamp: null,
    lastPrice: null,
    lastTotalSupply: null
  };
}

/**
 * High-water marks per (launchId, chainId). An update is applied only when its sequence is
 * strictly greater than the last applied one; anything else is dropped without error.
 */
export class SyncLedger {
  constructor(
    private store: LaunchStore,
    private serializer: KeyedSerializer = new KeyedSerializer()
  ) {}

  async get(launchId: LaunchId, chainId: ChainId): Promise<SyncCursor> {
    return (await this.store.getCursor(curveKey(launchId, chainId))) || emptyCursor(launchId, chainId);
  }

  async isFresh(launchId: LaunchId, chainId: ChainId, seq: number): Promise<boolean> {
    const cursor = await this.get(launchId, chainId);
    return seq > cursor.lastAppliedSeq;
  }

  /**
   * Gate `update` through the cursor. `effect` runs only for a fresh update and before the
   * cursor moves, so a throwing effect leaves the cursor where it was.
   */
  async tryApply(
    launchId: LaunchId,
    chainId: ChainId,
    update: SyncUpdate,
    effect?: () => Promise<void>
  ): Promise<SyncOutcome> {
    if (!Number.isSafeInteger(update.seq) || update.seq <= 0) {
      throw new ValidationError(`seq must be a positive integer, got ${update.seq}`);
    }

    const key = curveKey(launchId, chainId);
    return this.serializer.run<SyncOutcome>(`cursor:${curveKeyString(key)}`, async () => {
      const cursor = (await this.store.getCursor(key)) || emptyCursor(launchId, chainId);

      if (update.seq <= cursor.lastAppliedSeq) {
        const reason = update.seq === cursor.lastAppliedSeq ? 'duplicate' : 'stale';
        logger.debug(`Dropped ${reason} sync for ${shortId(launchId)} on ${chainId}`, {
          seq: update.seq,
          lastAppliedSeq: cursor.lastAppliedSeq
        });
        return { applied: false, cursor, reason };
      }

      if (effect) {
        await effect();
      }

      const next: SyncCursor = {
        ...key,
        lastAppliedSeq: update.seq,
        lastAppliedTimestamp: update.timestamp,
        lastPrice: update.price,
        lastTotalSupply: update.totalSupply
      };
      await this.store.saveCursor(next);
      return { applied: true, cursor: next };
    });
  }

  async list(launchId: LaunchId): Promise<SyncCursor[]> {
    return this.store.listCursors(launchId);
  }
}
