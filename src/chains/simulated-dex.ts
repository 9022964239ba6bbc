import { LiquidityMigrator, MigrationOutcome, MigrationRequest } from '../curve/liquidity-migrator';
import { deploymentSalt, predictAddress } from '../registry/launch-registry';
import { logger, shortId } from '../utils/logger';

/**
 * Stand-in DEX for simulation runs: "creates" a pool at an address derived from the
 * deployment salt. Real router integrations implement LiquidityMigrator outside this package.
 */
export class SimulatedDexMigrator implements LiquidityMigrator {
  private pools: Map<string, string> = new Map();

  async migrate(request: MigrationRequest): Promise<MigrationOutcome> {
    if (request.liquidityEth <= 0n || request.liquidityTokens <= 0n) {
      return { ok: false, error: 'Pool needs liquidity on both sides' };
    }

    const salt = deploymentSalt(request.launchId, request.chainId);
    const pair = predictAddress(salt, 'pair');
    this.pools.set(salt, pair);

    logger.info(`💧 Pool created for ${shortId(request.launchId)} on chain ${request.chainId}`, {
      pair,
      liquidityEth: request.liquidityEth,
      liquidityTokens: request.liquidityTokens
    });
    return { ok: true, liquidityPair: pair, reference: `sim-${salt.substring(2, 14)}` };
  }

  get poolCount(): number {
    return this.pools.size;
  }
}
