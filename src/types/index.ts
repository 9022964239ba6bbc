// src/types/index.ts

export type ChainId = number;
export type LaunchId = string;
export type Address = string;

/**
 * Identity of one token across every chain it is launched on. Immutable once registered.
 */
export interface Launch {
  launchId: LaunchId;
  creator: Address;
  name: string;
  symbol: string;
  originChainId: ChainId;
  // Token contract on the origin chain
  originToken: Address;
  targetChainIds: ChainId[];
  creatorFeeBps: number;
  createdAt: Date;
}

export interface CurveKey {
  launchId: LaunchId;
  chainId: ChainId;
}

export interface CurveState {
  virtualEth: bigint;
  virtualTokens: bigint;
  totalSupply: bigint;
  creatorFeeBps: number;
  lastUpdateSeq: number;
}

// Read-model counters kept next to the curve
export interface CurveStats {
  tradeCount: number;
  volumeEth: bigint;
  feesEth: bigint;
  paused: boolean;
  updatedAt: Date;
}

export interface CurveRecord extends CurveKey {
  state: CurveState;
  stats: CurveStats;
}

export type MigrationStatus = 'ACTIVE' | 'MIGRATION_TRIGGERED' | 'MIGRATED';

export interface MigrationRecord extends CurveKey {
  status: MigrationStatus;
  finalPrice: bigint | null;
  liquidityEth: bigint | null;
  liquidityTokens: bigint | null;
  liquidityPair: Address | null;
  triggeredAt: Date | null;
  migratedAt: Date | null;
  attempts: number;
  lastError: string | null;
}

export type DeploymentStatus = 'PENDING' | 'DEPLOYED' | 'FAILED';

export interface DeploymentRecord extends CurveKey {
  tokenAddress: Address | null;
  curveAddress: Address | null;
  salt: string;
  status: DeploymentStatus;
  deployedAt: Date | null;
  lastError: string | null;
}

export interface SyncCursor extends CurveKey {
  lastAppliedSeq: number;
  lastAppliedTimestamp: Date | null;
  lastPrice: bigint | null;
  lastTotalSupply: bigint | null;
}

export interface FeeSplit {
  platformFee: bigint;
  creatorFee: bigint;
  ethForCurve: bigint;
}

// Events delivered by a chain's emitter

export interface TokenCreatedEvent {
  type: 'TokenCreated';
  launchId: LaunchId;
  name: string;
  symbol: string;
  creator: Address;
  originChainId: ChainId;
  targetChainIds: ChainId[];
  originToken: Address;
  creatorFeeBps?: number;
}

export interface TokenPurchaseEvent {
  type: 'TokenPurchase';
  launchId: LaunchId;
  buyer: Address;
  ethIn: bigint;
  tokensOut: bigint;
  price: bigint;
  seq: number;
}

export interface TokenSaleEvent {
  type: 'TokenSale';
  launchId: LaunchId;
  seller: Address;
  tokensIn: bigint;
  ethOut: bigint;
  price: bigint;
  seq: number;
}

export interface CurveMigrationTriggeredEvent {
  type: 'CurveMigrationTriggered';
  launchId: LaunchId;
  finalPrice: bigint;
  liquidityEth: bigint;
  liquidityTokens: bigint;
}

export type ChainEvent =
  | TokenCreatedEvent
  | TokenPurchaseEvent
  | TokenSaleEvent
  | CurveMigrationTriggeredEvent;

export type TradeEvent = TokenPurchaseEvent | TokenSaleEvent;

/**
 * An event as handed to the coordinator: which chain it came from and who relayed it.
 */
export interface ChainEventEnvelope {
  chainId: ChainId;
  callerIdentity: Address;
  receivedAt: Date;
  event: ChainEvent;
}
