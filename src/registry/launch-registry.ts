import crypto from 'crypto';
import { LaunchStore } from '../database/launch-store';
import { ChainId, Launch, LaunchId } from '../types';
import { UnknownLaunchError, ValidationError } from '../types/errors';
import { AddressValidator } from '../utils/address-validator';
import { logger, shortId } from '../utils/logger';

function sha256Hex(...parts: string[]): string {
  return crypto.createHash('sha256').update(parts.join('|')).digest('hex');
}

/**
 * Content-derived launch id: the same creator, nonce and timestamp always give the same id.
 */
export function deriveLaunchId(creator: string, nonce: number | bigint, timestamp: number): LaunchId {
  return `0x${sha256Hex(creator.toLowerCase(), nonce.toString(), timestamp.toString())}`;
}

/**
 * Deployment salt for one (launch, chain) pair. Independent of wall-clock time, so every
 * dispatch attempt for the same pair targets the same addresses.
 */
export function deploymentSalt(launchId: LaunchId, chainId: ChainId): string {
  return `0x${sha256Hex(launchId, chainId.toString())}`;
}

export function predictAddress(salt: string, role: 'token' | 'curve' | 'pair'): string {
  return `0x${sha256Hex(salt, role).substring(0, 40)}`;
}

export interface LaunchInput {
  launchId: LaunchId;
  creator: string;
  name: string;
  symbol: string;
  originChainId: ChainId;
  originToken: string;
  targetChainIds: ChainId[];
  creatorFeeBps: number;
}

export interface LaunchRegistryOptions {
  maxCreatorFeeBps: number;
}

export class LaunchRegistry {
  constructor(
    private store: LaunchStore,
    private options: LaunchRegistryOptions
  ) {}

  validate(input: LaunchInput): Launch {
    const launchId = AddressValidator.requireLaunchId(input.launchId);
    const creator = AddressValidator.requireAddress(input.creator, 'creator');
    const name = AddressValidator.requireText(input.name, 'name', 64);
    const symbol = AddressValidator.requireText(input.symbol, 'symbol', 16);
    const originChainId = AddressValidator.requireChainId(input.originChainId, 'originChainId');
    const originToken = AddressValidator.requireAddress(input.originToken, 'originToken');

    if (input.targetChainIds.length === 0) {
      throw new ValidationError('targetChainIds must not be empty');
    }
    const targets = Array.from(new Set(input.targetChainIds.map(id => AddressValidator.requireChainId(id, 'targetChainIds'))));

    if (
      !Number.isInteger(input.creatorFeeBps) ||
      input.creatorFeeBps < 0 ||
      input.creatorFeeBps > this.options.maxCreatorFeeBps
    ) {
      throw new ValidationError(`creatorFeeBps must be between 0 and ${this.options.maxCreatorFeeBps}`);
    }

    return {
      launchId,
      creator,
      name,
      symbol,
      originChainId,
      originToken,
      targetChainIds: targets.sort((a, b) => a - b),
      creatorFeeBps: input.creatorFeeBps,
      createdAt: new Date()
    };
  }

  /**
   * Registers a launch once. Re-registering the same payload returns the stored launch; a
   * different payload under an existing id is rejected.
   */
  async register(input: LaunchInput): Promise<{ launch: Launch; created: boolean }> {
    const candidate = this.validate(input);
    const { record, created } = await this.store.insertLaunch(candidate);

    if (!created && !sameLaunch(record, candidate)) {
      throw new ValidationError(`Launch ${input.launchId} already exists with different parameters`);
    }

    if (created) {
      logger.info(`Registered launch ${shortId(record.launchId)} (${record.symbol})`, {
        origin: record.originChainId,
        targets: record.targetChainIds.join(',')
      });
    }
    return { launch: record, created };
  }

  async get(launchId: LaunchId): Promise<Launch | null> {
    return this.store.getLaunch(launchId);
  }

  async require(launchId: LaunchId): Promise<Launch> {
    const launch = await this.store.getLaunch(launchId);
    if (!launch) {
      throw new UnknownLaunchError(`Unknown launch ${launchId}`);
    }
    return launch;
  }

  /**
   * Every chain a launch lives on: its origin plus its targets.
   */
  static chainsOf(launch: Launch): ChainId[] {
    return Array.from(new Set([launch.originChainId, ...launch.targetChainIds])).sort((a, b) => a - b);
  }
}

function sameLaunch(a: Launch, b: Launch): boolean {
  return (
    a.creator === b.creator &&
    a.name === b.name &&
    a.symbol === b.symbol &&
    a.originChainId === b.originChainId &&
    a.originToken === b.originToken &&
    a.creatorFeeBps === b.creatorFeeBps &&
    a.targetChainIds.length === b.targetChainIds.length &&
    a.targetChainIds.every((id, index) => id === b.targetChainIds[index])
  );
}
