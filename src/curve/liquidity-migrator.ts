import { ChainId, LaunchId } from '../types';

export interface MigrationRequest {
  launchId: LaunchId;
  chainId: ChainId;
  finalPrice: bigint;
  liquidityEth: bigint;
  liquidityTokens: bigint;
}

export type MigrationOutcome =
  | { ok: true; liquidityPair: string | null; reference?: string }
  | { ok: false; error: string };

/**
 * Moves a completed curve's liquidity into a DEX pool. Opaque to the core: implementations
 * report failure through the result instead of throwing.
 */
export interface LiquidityMigrator {
  migrate(request: MigrationRequest): Promise<MigrationOutcome>;
}
