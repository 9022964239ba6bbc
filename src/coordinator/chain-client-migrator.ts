import { RetryPolicy } from '../config';
import { ChainClientRegistry } from '../chains/chain-client';
import { LiquidityMigrator, MigrationOutcome, MigrationRequest } from '../curve/liquidity-migrator';
import { AlreadyMigratedError, errorMessage } from '../types/errors';
import { logger, shortId } from '../utils/logger';
import { chainCall } from './chain-call';

// Routes a curve's migration to migrateToDEX on the chain the curve lives on
export class ChainClientMigrator implements LiquidityMigrator {
  constructor(
    private clients: ChainClientRegistry,
    private callerIdentity: string,
    private policy: RetryPolicy
  ) {}

  async migrate(request: MigrationRequest): Promise<MigrationOutcome> {
    try {
      const client = this.clients.get(request.chainId);
      const result = await chainCall(`migrateToDEX(${request.chainId})`, this.policy, () =>
        client.migrateToDEX({
          callerIdentity: this.callerIdentity,
          launchId: request.launchId,
          finalPrice: request.finalPrice,
          liquidityEth: request.liquidityEth,
          liquidityTokens: request.liquidityTokens
        })
      );
      return { ok: true, liquidityPair: result.liquidityPair, reference: result.reference };
    } catch (error) {
      if (error instanceof AlreadyMigratedError) {
        // An earlier attempt landed but its reply was lost
        logger.debug(`Chain ${request.chainId} already migrated ${shortId(request.launchId)}`);
        return { ok: true, liquidityPair: null, reference: 'already-migrated' };
      }
      return { ok: false, error: errorMessage(error) };
    }
  }
}
