import { CallerAuthorizer, requireAuthorized } from '../coordinator/caller-authorizer';
import { LiquidityMigrator } from '../curve/liquidity-migrator';
import { LaunchStore, curveKey } from '../database/launch-store';
import { DeploymentAddresses } from '../registry/deployment-registry';
import { deploymentSalt, predictAddress } from '../registry/launch-registry';
import { SyncLedger } from '../registry/sync-ledger';
import { ChainId, LaunchId, SyncCursor } from '../types';
import { AlreadyDeployedError, AlreadyMigratedError, NetworkError } from '../types/errors';
import { AddressValidator } from '../utils/address-validator';
import { KeyedSerializer } from '../utils/keyed-serializer';
import { logger, shortId } from '../utils/logger';
import {
  DeployTokenRequest,
  DexMigrationResult,
  MigrateToDexRequest,
  SyncPriceRequest,
  SyncPriceResult
} from './chain-client';

export interface DestinationEndpointDeps {
  authorizer: CallerAuthorizer;
  store: LaunchStore;
  dexMigrator: LiquidityMigrator;
}

/**
 * Receiving side of the cross-chain callbacks on one chain. Every call is checked against the
 * allow-list before anything is read or written.
 */
export class DestinationEndpoint {
  private ledger: SyncLedger;
  private serializer = new KeyedSerializer();

  constructor(
    readonly chainId: ChainId,
    private deps: DestinationEndpointDeps
  ) {
    this.ledger = new SyncLedger(deps.store, this.serializer);
  }

  async deployToken(request: DeployTokenRequest): Promise<DeploymentAddresses> {
    requireAuthorized(this.deps.authorizer, request.callerIdentity, 'deployToken');
    const launchId = AddressValidator.requireLaunchId(request.launchId);
    AddressValidator.requireText(request.name, 'name', 64);
    AddressValidator.requireText(request.symbol, 'symbol', 16);
    AddressValidator.requireAddress(request.creator, 'creator');
    AddressValidator.requireAddress(request.originToken, 'originToken');

    const salt = deploymentSalt(launchId, this.chainId);
    const addresses: DeploymentAddresses = {
      tokenAddress: predictAddress(salt, 'token'),
      curveAddress: predictAddress(salt, 'curve')
    };

    const { created } = await this.deps.store.insertDeployment({
      ...curveKey(launchId, this.chainId),
      ...addresses,
      salt,
      status: 'DEPLOYED',
      deployedAt: new Date(),
      lastError: null
    });
    if (!created) {
      throw new AlreadyDeployedError(`${shortId(launchId)} is already deployed on chain ${this.chainId}`);
    }

    logger.info(`Chain ${this.chainId}: deployed ${request.symbol} for ${shortId(launchId)}`, {
      origin: request.originChainId
    });
    return addresses;
  }

  async syncPrice(request: SyncPriceRequest): Promise<SyncPriceResult> {
    requireAuthorized(this.deps.authorizer, request.callerIdentity, 'syncPrice');
    const launchId = AddressValidator.requireLaunchId(request.launchId);

    const outcome = await this.ledger.tryApply(launchId, this.chainId, {
      seq: request.seq,
      timestamp: new Date(),
      price: request.newPrice,
      totalSupply: request.totalSupply
    });
    return { applied: outcome.applied, lastAppliedSeq: outcome.cursor.lastAppliedSeq };
  }

  async migrateToDEX(request: MigrateToDexRequest): Promise<DexMigrationResult> {
    requireAuthorized(this.deps.authorizer, request.callerIdentity, 'migrateToDEX');
    const launchId = AddressValidator.requireLaunchId(request.launchId);
    const key = curveKey(launchId, this.chainId);

    return this.serializer.run(`dex:${launchId}`, async () => {
      const existing = await this.deps.store.getMigration(key);
      if (existing && existing.status === 'MIGRATED') {
        throw new AlreadyMigratedError(`${shortId(launchId)} already migrated on chain ${this.chainId}`);
      }

      const outcome = await this.deps.dexMigrator.migrate({
        launchId,
        chainId: this.chainId,
        finalPrice: request.finalPrice,
        liquidityEth: request.liquidityEth,
        liquidityTokens: request.liquidityTokens
      });
      const attempts = existing ? existing.attempts + 1 : 1;

      if (!outcome.ok) {
        await this.deps.store.saveMigration({
          ...key,
          status: 'MIGRATION_TRIGGERED',
          finalPrice: request.finalPrice,
          liquidityEth: request.liquidityEth,
          liquidityTokens: request.liquidityTokens,
          liquidityPair: null,
          triggeredAt: existing?.triggeredAt || new Date(),
          migratedAt: null,
          attempts,
          lastError: outcome.error
        });
        throw new NetworkError(`DEX migration on chain ${this.chainId} failed: ${outcome.error}`);
      }

      await this.deps.store.saveMigration({
        ...key,
        status: 'MIGRATED',
        finalPrice: request.finalPrice,
        liquidityEth: request.liquidityEth,
        liquidityTokens: request.liquidityTokens,
        liquidityPair: outcome.liquidityPair,
        triggeredAt: existing?.triggeredAt || new Date(),
        migratedAt: new Date(),
        attempts,
        lastError: null
      });
      logger.info(`Chain ${this.chainId}: ${shortId(launchId)} migrated to DEX`, { pair: outcome.liquidityPair });
      return { liquidityPair: outcome.liquidityPair, reference: outcome.reference };
    });
  }

  async getCursor(launchId: LaunchId): Promise<SyncCursor> {
    return this.ledger.get(launchId, this.chainId);
  }
}
