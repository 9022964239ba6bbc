import { LaunchStore, curveKey, curveKeyString } from '../database/launch-store';
import { ChainId, DeploymentRecord, LaunchId } from '../types';
import { errorMessage } from '../types/errors';
import { AddressValidator } from '../utils/address-validator';
import { KeyedSerializer } from '../utils/keyed-serializer';
import { logger, shortId } from '../utils/logger';
import { deploymentSalt } from './launch-registry';

export interface DeploymentAddresses {
  tokenAddress: string;
  curveAddress: string;
}

export type DeployFn = (salt: string) => Promise<DeploymentAddresses>;

export interface TryDeployResult {
  record: DeploymentRecord;
  created: boolean;
}

export interface BatchEntry extends DeploymentAddresses {
  launchId: LaunchId;
  chainId: ChainId;
  deployedAt?: Date;
}

export interface BatchResult {
  registered: number;
  skipped: number;
}

/**
 * At most one deployment per (launchId, chainId), however many times or however concurrently
 * the triggering event is delivered.
 */
export class DeploymentRegistry {
  constructor(
    private store: LaunchStore,
    private serializer: KeyedSerializer = new KeyedSerializer()
  ) {}

  /**
   * Compare-and-set deploy. A DEPLOYED record is returned untouched without calling deployFn.
   * A missing, PENDING or FAILED record leads to one deployFn call whose outcome is persisted;
   * a failure is recorded as FAILED and rethrown.
   */
  async tryDeploy(launchId: LaunchId, chainId: ChainId, deployFn: DeployFn): Promise<TryDeployResult> {
    const key = curveKey(launchId, chainId);

    return this.serializer.run(`deployment:${curveKeyString(key)}`, async () => {
      const existing = await this.store.getDeployment(key);
      if (existing && existing.status === 'DEPLOYED') {
        logger.debug(`Deployment for ${shortId(launchId)} on ${chainId} already exists`);
        return { record: existing, created: false };
      }

      const salt = deploymentSalt(launchId, chainId);
      const pending: DeploymentRecord = {
        ...key,
        tokenAddress: null,
        curveAddress: null,
        salt,
        status: 'PENDING',
        deployedAt: null,
        lastError: null
      };

      if (existing) {
        await this.store.saveDeployment(pending);
      } else {
        const inserted = await this.store.insertDeployment(pending);
        if (!inserted.created && inserted.record.status === 'DEPLOYED') {
          return { record: inserted.record, created: false };
        }
      }

      let addresses: DeploymentAddresses;
      try {
        addresses = await deployFn(salt);
      } catch (error) {
        await this.store.saveDeployment({ ...pending, status: 'FAILED', lastError: errorMessage(error) });
        throw error;
      }

      const deployed: DeploymentRecord = {
        ...pending,
        tokenAddress: AddressValidator.requireAddress(addresses.tokenAddress, 'tokenAddress'),
        curveAddress: AddressValidator.requireAddress(addresses.curveAddress, 'curveAddress'),
        status: 'DEPLOYED',
        deployedAt: new Date()
      };
      await this.store.saveDeployment(deployed);

      logger.info(`Deployed ${shortId(launchId)} on chain ${chainId}`, { token: deployed.tokenAddress });
      return { record: deployed, created: true };
    });
  }

  /**
   * Bulk pre-load of deployments that already exist on-chain. Keys that already hold a
   * DEPLOYED record are skipped.
   */
  async registerBatch(entries: BatchEntry[]): Promise<BatchResult> {
    const validated = entries.map(entry => ({
      key: curveKey(AddressValidator.requireLaunchId(entry.launchId), AddressValidator.requireChainId(entry.chainId)),
      tokenAddress: AddressValidator.requireAddress(entry.tokenAddress, 'tokenAddress'),
      curveAddress: AddressValidator.requireAddress(entry.curveAddress, 'curveAddress'),
      deployedAt: entry.deployedAt || new Date()
    }));

    const outcomes = await Promise.all(
      validated.map(entry =>
        this.serializer.run(`deployment:${curveKeyString(entry.key)}`, async () => {
          const existing = await this.store.getDeployment(entry.key);
          if (existing && existing.status === 'DEPLOYED') {
            return false;
          }

          const record: DeploymentRecord = {
            ...entry.key,
            tokenAddress: entry.tokenAddress,
            curveAddress: entry.curveAddress,
            salt: deploymentSalt(entry.key.launchId, entry.key.chainId),
            status: 'DEPLOYED',
            deployedAt: entry.deployedAt,
            lastError: null
          };
          if (existing) {
            await this.store.saveDeployment(record);
            return true;
          }
          return (await this.store.insertDeployment(record)).created;
        })
      )
    );

    const registered = outcomes.filter(Boolean).length;
    logger.info(`Batch registration: ${registered} registered, ${outcomes.length - registered} skipped`);
    return { registered, skipped: outcomes.length - registered };
  }

  async get(launchId: LaunchId, chainId: ChainId): Promise<DeploymentRecord | null> {
    return this.store.getDeployment(curveKey(launchId, chainId));
  }

  async list(launchId: LaunchId): Promise<DeploymentRecord[]> {
    return this.store.listDeployments(launchId);
  }
}
