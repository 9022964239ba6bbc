import { LAUNCH_CONSTANTS } from '../../constants/launch-constants';
import { CurveRecord, DeploymentRecord, Launch, MigrationRecord, SyncCursor } from '../../types';
import {
  curveFromRow,
  curveToRow,
  cursorFromRow,
  cursorToRow,
  deploymentFromRow,
  deploymentToRow,
  launchFromRow,
  launchToRow,
  migrationFromRow,
  migrationToRow,
  toSeq
} from '../rows';

const LAUNCH = '0x' + '7c'.repeat(32);
const AT = new Date('2024-03-01T12:00:00Z');

describe('row mapping', () => {
  test('curves keep full 256-bit precision', () => {
    const record: CurveRecord = {
      launchId: LAUNCH,
      chainId: 10,
      state: {
        virtualEth: LAUNCH_CONSTANTS.U256_MAX,
        virtualTokens: LAUNCH_CONSTANTS.INITIAL_VIRTUAL_TOKENS,
        totalSupply: 1n,
        creatorFeeBps: 150,
        lastUpdateSeq: 42
      },
      stats: { tradeCount: 3, volumeEth: 10n ** 30n + 7n, feesEth: 0n, paused: true, updatedAt: AT }
    };

    const row = curveToRow(record);
    expect(row).toMatchObject({
      launch_id: LAUNCH,
      chain_id: 10,
      virtual_eth: '115792089237316195423570985008687907853269984665640564039457584007913129639935',
      virtual_tokens: '1073000000000000000000000000',
      last_update_seq: '42',
      volume_eth: '1000000000000000000000000000007'
    });
    expect(curveFromRow(row)).toEqual(record);
  });

  test('migrations map null terms both ways', () => {
    const active: MigrationRecord = {
      launchId: LAUNCH,
      chainId: 1,
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
    const migrated: MigrationRecord = {
      ...active,
      status: 'MIGRATED',
      finalPrice: 14_397_080_331n,
      liquidityEth: 3_930_402_930_402_930_404n,
      liquidityTokens: LAUNCH_CONSTANTS.LIQUIDITY_SUPPLY,
      liquidityPair: '0x' + '11'.repeat(20),
      triggeredAt: AT,
      migratedAt: AT,
      attempts: 2
    };

    expect(migrationToRow(active)).toMatchObject({ final_price: null, liquidity_eth: null });
    expect(migrationFromRow(migrationToRow(active))).toEqual(active);
    expect(migrationToRow(migrated).liquidity_tokens).toBe('200000000000000000000000000');
    expect(migrationFromRow(migrationToRow(migrated))).toEqual(migrated);
  });

  test('rejects statuses the store does not know', () => {
    const row = migrationToRow({
      launchId: LAUNCH,
      chainId: 1,
      status: 'ACTIVE',
      finalPrice: null,
      liquidityEth: null,
      liquidityTokens: null,
      liquidityPair: null,
      triggeredAt: null,
      migratedAt: null,
      attempts: 0,
      lastError: null
    });
    expect(() => migrationFromRow({ ...row, status: 'GRADUATED' })).toThrow('Unknown migration status in store: GRADUATED');

    const deployment: DeploymentRecord = {
      launchId: LAUNCH,
      chainId: 137,
      tokenAddress: null,
      curveAddress: null,
      salt: '0x' + '01'.repeat(32),
      status: 'FAILED',
      deployedAt: null,
      lastError: 'reverted'
    };
    expect(deploymentFromRow(deploymentToRow(deployment))).toEqual(deployment);
    expect(() => deploymentFromRow({ ...deploymentToRow(deployment), status: 'LOST' })).toThrow(
      'Unknown deployment status in store: LOST'
    );
  });

  test('launches start their sync sequence at zero and read back sorted targets', () => {
    const launch: Launch = {
      launchId: LAUNCH,
      creator: '0x' + '12'.repeat(20),
      name: 'Test Token',
      symbol: 'TEST',
      originChainId: 1,
      originToken: '0x' + '34'.repeat(20),
      targetChainIds: [10, 137],
      creatorFeeBps: 100,
      createdAt: AT
    };

    const row = launchToRow(launch);
    expect(row.sync_seq).toBe('0');
    expect(launchFromRow({ ...row, target_chain_ids: [137, 10] })).toEqual(launch);
  });

  test('cursors round trip', () => {
    const empty: SyncCursor = {
      launchId: LAUNCH,
      chainId: 10,
      lastAppliedSeq: 0,
      lastAppliedTimestamp: null,
      lastPrice: null,
      lastTotalSupply: null
    };
    const applied: SyncCursor = { ...empty, lastAppliedSeq: 9, lastAppliedTimestamp: AT, lastPrice: 938_045_416n, lastTotalSupply: 5n };

    expect(cursorFromRow(cursorToRow(empty))).toEqual(empty);
    expect(cursorToRow(applied)).toMatchObject({ last_applied_seq: '9', last_price: '938045416', last_total_supply: '5' });
    expect(cursorFromRow(cursorToRow(applied))).toEqual(applied);
  });

  test('sequences must fit a safe integer', () => {
    expect(toSeq('9007199254740991')).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => toSeq('9007199254740992')).toThrow('Stored sequence 9007199254740992 exceeds the safe integer range');
  });
});
