import { MemoryLaunchStore } from '../../database/memory-store';
import { ValidationError } from '../../types/errors';
import { SyncLedger, SyncUpdate } from '../sync-ledger';

const LAUNCH = '0x' + 'ef'.repeat(32);

function update(seq: number, price: bigint): SyncUpdate {
  return { seq, timestamp: new Date(1_700_000_000_000 + seq), price, totalSupply: BigInt(seq) * 1000n };
}

describe('SyncLedger', () => {
  let ledger: SyncLedger;

  beforeEach(() => {
    ledger = new SyncLedger(new MemoryLaunchStore());
  });

  test('starts every chain at sequence 0', async () => {
    expect(await ledger.get(LAUNCH, 10)).toEqual({
      launchId: LAUNCH,
      chainId: 10,
      lastAppliedSeq: 0,
      lastAppliedTimestamp: null,
      lastPrice: null,
      lastTotalSupply: null
    });
  });

  test('drops an older update that arrives late', async () => {
    const applied = await ledger.tryApply(LAUNCH, 10, update(7, 700n));
    expect(applied.applied).toBe(true);

    const late = await ledger.tryApply(LAUNCH, 10, update(5, 500n));
    expect(late).toMatchObject({ applied: false, reason: 'stale' });

    const cursor = await ledger.get(LAUNCH, 10);
    expect(cursor.lastAppliedSeq).toBe(7);
    expect(cursor.lastPrice).toBe(700n);
    expect(cursor.lastTotalSupply).toBe(7000n);
  });

  test('a replayed sequence is a duplicate', async () => {
    await ledger.tryApply(LAUNCH, 10, update(3, 300n));
    expect(await ledger.tryApply(LAUNCH, 10, update(3, 999n))).toMatchObject({ applied: false, reason: 'duplicate' });
    expect((await ledger.get(LAUNCH, 10)).lastPrice).toBe(300n);
  });

  test('keeps a cursor per chain', async () => {
    await ledger.tryApply(LAUNCH, 10, update(9, 900n));
    expect(await ledger.isFresh(LAUNCH, 56, 1)).toBe(true);
    expect(await ledger.isFresh(LAUNCH, 10, 9)).toBe(false);
  });

  test('runs the effect only for fresh updates', async () => {
    const effect = jest.fn(async () => undefined);

    await ledger.tryApply(LAUNCH, 10, update(2, 1n), effect);
    await ledger.tryApply(LAUNCH, 10, update(1, 1n), effect);

    expect(effect).toHaveBeenCalledTimes(1);
  });

  test('a failing effect leaves the cursor in place', async () => {
    await ledger.tryApply(LAUNCH, 10, update(1, 100n));
    await expect(
      ledger.tryApply(LAUNCH, 10, update(2, 200n), async () => {
        throw new Error('write failed');
      })
    ).rejects.toThrow('write failed');

    expect((await ledger.get(LAUNCH, 10)).lastAppliedSeq).toBe(1);
  });

  test('concurrent out-of-order updates end at the highest sequence', async () => {
    await Promise.all([4, 1, 3, 5, 2].map(seq => ledger.tryApply(LAUNCH, 10, update(seq, BigInt(seq)))));
    expect((await ledger.get(LAUNCH, 10)).lastAppliedSeq).toBe(5);
  });

  test('rejects non-positive sequences', async () => {
    await expect(ledger.tryApply(LAUNCH, 10, update(0, 1n))).rejects.toBeInstanceOf(ValidationError);
    await expect(ledger.tryApply(LAUNCH, 10, { ...update(1, 1n), seq: 1.5 })).rejects.toBeInstanceOf(ValidationError);
  });
});
