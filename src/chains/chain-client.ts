import { DeploymentAddresses } from '../registry/deployment-registry';
import { Address, ChainId, LaunchId } from '../types';
import { ValidationError } from '../types/errors';

export interface DeployTokenRequest {
  callerIdentity: Address;
  launchId: LaunchId;
  name: string;
  symbol: string;
  creator: Address;
  originToken: Address;
  originChainId: ChainId;
}

export interface SyncPriceRequest {
  callerIdentity: Address;
  launchId: LaunchId;
  newPrice: bigint;
  totalSupply: bigint;
  seq: number;
}

export interface SyncPriceResult {
  // false when the destination dropped the update as stale or duplicate
  applied: boolean;
  lastAppliedSeq: number;
}

export interface MigrateToDexRequest {
  callerIdentity: Address;
  launchId: LaunchId;
  finalPrice: bigint;
  liquidityEth: bigint;
  liquidityTokens: bigint;
}

export interface DexMigrationResult {
  // null when the pool address is not known to the caller
  liquidityPair: Address | null;
  reference?: string;
}

/**
 * Calls into one destination chain. Adapters talking to real nodes or relayers live outside
 * this package; failures that may succeed on retry should be thrown as NetworkError.
 */
export interface ChainClient {
  readonly chainId: ChainId;

  // Throws AlreadyDeployedError when the launch already has a deployment on this chain
  deployToken(request: DeployTokenRequest): Promise<DeploymentAddresses>;

  syncPrice(request: SyncPriceRequest): Promise<SyncPriceResult>;

  // Throws AlreadyMigratedError when the launch already migrated on this chain
  migrateToDEX(request: MigrateToDexRequest): Promise<DexMigrationResult>;
}

export class ChainClientRegistry {
  private clients: Map<ChainId, ChainClient> = new Map();

  constructor(clients: ChainClient[] = []) {
    clients.forEach(client => this.register(client));
  }

  register(client: ChainClient): void {
    this.clients.set(client.chainId, client);
  }

  has(chainId: ChainId): boolean {
    return this.clients.has(chainId);
  }

  get(chainId: ChainId): ChainClient {
    const client = this.clients.get(chainId);
    if (!client) {
      throw new ValidationError(`No chain client registered for chain ${chainId}`);
    }
    return client;
  }

  get chainIds(): ChainId[] {
    return Array.from(this.clients.keys()).sort((a, b) => a - b);
  }
}
