import { isMigrationStatus } from '../curve/migration-machine';
import {
  CurveKey,
  CurveRecord,
  DeploymentRecord,
  DeploymentStatus,
  Launch,
  MigrationRecord,
  MigrationStatus,
  SyncCursor
} from '../types';

// pg hands NUMERIC and BIGINT columns back as strings
export type Numeric = string;

export interface LaunchRow {
  launch_id: string;
  creator: string;
  name: string;
  symbol: string;
  origin_chain_id: number;
  origin_token: string;
  target_chain_ids: number[];
  creator_fee_bps: number;
  sync_seq: Numeric;
  created_at: Date;
}

export interface CurveRow {
  launch_id: string;
  chain_id: number;
  virtual_eth: Numeric;
  virtual_tokens: Numeric;
  total_supply: Numeric;
  creator_fee_bps: number;
  last_update_seq: Numeric;
  trade_count: number;
  volume_eth: Numeric;
  fees_eth: Numeric;
  paused: boolean;
  updated_at: Date;
}

export interface MigrationRow {
  launch_id: string;
  chain_id: number;
  status: string;
  final_price: Numeric | null;
  liquidity_eth: Numeric | null;
  liquidity_tokens: Numeric | null;
  liquidity_pair: string | null;
  triggered_at: Date | null;
  migrated_at: Date | null;
  attempts: number;
  last_error: string | null;
}

export interface DeploymentRow {
  launch_id: string;
  chain_id: number;
  token_address: string | null;
  curve_address: string | null;
  salt: string;
  status: string;
  deployed_at: Date | null;
  last_error: string | null;
}

export interface CursorRow {
  launch_id: string;
  chain_id: number;
  last_applied_seq: Numeric;
  last_applied_timestamp: Date | null;
  last_price: Numeric | null;
  last_total_supply: Numeric | null;
}

export const KEY_COLUMNS = ['launch_id', 'chain_id'];

function toNumeric(value: bigint | null): Numeric | null {
  return value === null ? null : value.toString();
}

function fromNumeric(value: Numeric | null): bigint | null {
  return value === null ? null : BigInt(value);
}

function requireNumeric(value: Numeric): bigint {
  return BigInt(value);
}

// Sequences are bigint columns; anything past 2^53 cannot be held as a number
export function toSeq(value: Numeric): number {
  const seq = Number(value);
  if (!Number.isSafeInteger(seq)) {
    throw new Error(`Stored sequence ${value} exceeds the safe integer range`);
  }
  return seq;
}

export function keyOf(key: CurveKey): { launch_id: string; chain_id: number } {
  return { launch_id: key.launchId, chain_id: key.chainId };
}

function parseMigrationStatus(value: string): MigrationStatus {
  if (!isMigrationStatus(value)) {
    throw new Error(`Unknown migration status in store: ${value}`);
  }
  return value;
}

const DEPLOYMENT_STATUSES: DeploymentStatus[] = ['PENDING', 'DEPLOYED', 'FAILED'];

function parseDeploymentStatus(value: string): DeploymentStatus {
  const status = DEPLOYMENT_STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new Error(`Unknown deployment status in store: ${value}`);
  }
  return status;
}

export function launchToRow(launch: Launch): LaunchRow {
  return {
    launch_id: launch.launchId,
    creator: launch.creator,
    name: launch.name,
    symbol: launch.symbol,
    origin_chain_id: launch.originChainId,
    origin_token: launch.originToken,
    target_chain_ids: launch.targetChainIds,
    creator_fee_bps: launch.creatorFeeBps,
    sync_seq: '0',
    created_at: launch.createdAt
  };
}

export function launchFromRow(row: LaunchRow): Launch {
  return {
    launchId: row.launch_id,
    creator: row.creator,
    name: row.name,
    symbol: row.symbol,
    originChainId: row.origin_chain_id,
    originToken: row.origin_token,
    targetChainIds: [...row.target_chain_ids].sort((a, b) => a - b),
    creatorFeeBps: row.creator_fee_bps,
    createdAt: row.created_at
  };
}

export function curveToRow(record: CurveRecord): CurveRow {
  return {
    ...keyOf(record),
    virtual_eth: record.state.virtualEth.toString(),
    virtual_tokens: record.state.virtualTokens.toString(),
    total_supply: record.state.totalSupply.toString(),
    creator_fee_bps: record.state.creatorFeeBps,
    last_update_seq: record.state.lastUpdateSeq.toString(),
    trade_count: record.stats.tradeCount,
    volume_eth: record.stats.volumeEth.toString(),
    fees_eth: record.stats.feesEth.toString(),
    paused: record.stats.paused,
    updated_at: record.stats.updatedAt
  };
}

export function curveFromRow(row: CurveRow): CurveRecord {
  return {
    launchId: row.launch_id,
    chainId: row.chain_id,
    state: {
      virtualEth: requireNumeric(row.virtual_eth),
      virtualTokens: requireNumeric(row.virtual_tokens),
      totalSupply: requireNumeric(row.total_supply),
      creatorFeeBps: row.creator_fee_bps,
      lastUpdateSeq: toSeq(row.last_update_seq)
    },
    stats: {
      tradeCount: row.trade_count,
      volumeEth: requireNumeric(row.volume_eth),
      feesEth: requireNumeric(row.fees_eth),
      paused: row.paused,
      updatedAt: row.updated_at
    }
  };
}

export function migrationToRow(record: MigrationRecord): MigrationRow {
  return {
    ...keyOf(record),
    status: record.status,
    final_price: toNumeric(record.finalPrice),
    liquidity_eth: toNumeric(record.liquidityEth),
    liquidity_tokens: toNumeric(record.liquidityTokens),
    liquidity_pair: record.liquidityPair,
    triggered_at: record.triggeredAt,
    migrated_at: record.migratedAt,
    attempts: record.attempts,
    last_error: record.lastError
  };
}

export function migrationFromRow(row: MigrationRow): MigrationRecord {
  return {
    launchId: row.launch_id,
    chainId: row.chain_id,
    status: parseMigrationStatus(row.status),
    finalPrice: fromNumeric(row.final_price),
    liquidityEth: fromNumeric(row.liquidity_eth),
    liquidityTokens: fromNumeric(row.liquidity_tokens),
    liquidityPair: row.liquidity_pair,
    triggeredAt: row.triggered_at,
    migratedAt: row.migrated_at,
    attempts: row.attempts,
    lastError: row.last_error
  };
}

export function deploymentToRow(record: DeploymentRecord): DeploymentRow {
  return {
    ...keyOf(record),
    token_address: record.tokenAddress,
    curve_address: record.curveAddress,
    salt: record.salt,
    status: record.status,
    deployed_at: record.deployedAt,
    last_error: record.lastError
  };
}

export function deploymentFromRow(row: DeploymentRow): DeploymentRecord {
  return {
    launchId: row.launch_id,
    chainId: row.chain_id,
    tokenAddress: row.token_address,
    curveAddress: row.curve_address,
    salt: row.salt,
    status: parseDeploymentStatus(row.status),
    deployedAt: row.deployed_at,
    lastError: row.last_error
  };
}

export function cursorToRow(cursor: SyncCursor): CursorRow {
  return {
    ...keyOf(cursor),
    last_applied_seq: cursor.lastAppliedSeq.toString(),
    last_applied_timestamp: cursor.lastAppliedTimestamp,
    last_price: toNumeric(cursor.lastPrice),
    last_total_supply: toNumeric(cursor.lastTotalSupply)
  };
}

export function cursorFromRow(row: CursorRow): SyncCursor {
  return {
    launchId: row.launch_id,
    chainId: row.chain_id,
    lastAppliedSeq: toSeq(row.last_applied_seq),
    lastAppliedTimestamp: row.last_applied_timestamp,
    lastPrice: fromNumeric(row.last_price),
    lastTotalSupply: fromNumeric(row.last_total_supply)
  };
}
