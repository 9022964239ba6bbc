import { DeploymentAddresses } from '../registry/deployment-registry';
import { ChainId } from '../types';
import { sleep } from '../utils/retry';
import {
  ChainClient,
  DeployTokenRequest,
  DexMigrationResult,
  MigrateToDexRequest,
  SyncPriceRequest,
  SyncPriceResult
} from './chain-client';
import { DestinationEndpoint } from './destination-endpoint';

/**
 * ChainClient that calls a DestinationEndpoint in the same process. Used for simulation runs
 * and tests; `latencyMs` stands in for relay delay.
 */
export class LocalChainClient implements ChainClient {
  readonly chainId: ChainId;

  constructor(
    private endpoint: DestinationEndpoint,
    private latencyMs: number = 0
  ) {
    this.chainId = endpoint.chainId;
  }

  private async delay(): Promise<void> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
  }

  async deployToken(request: DeployTokenRequest): Promise<DeploymentAddresses> {
    await this.delay();
    return this.endpoint.deployToken(request);
  }

  async syncPrice(request: SyncPriceRequest): Promise<SyncPriceResult> {
    await this.delay();
    return this.endpoint.syncPrice(request);
  }

  async migrateToDEX(request: MigrateToDexRequest): Promise<DexMigrationResult> {
    await this.delay();
    return this.endpoint.migrateToDEX(request);
  }
}
