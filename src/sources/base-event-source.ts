import { EventEmitter } from 'events';
import { ChainEvent, ChainEventEnvelope, ChainId } from '../types';
import { errorMessage } from '../types/errors';
import { logger } from '../utils/logger';

export type EnvelopeListener = (envelope: ChainEventEnvelope) => void;

/**
 * One chain's event stream as the coordinator sees it.
 */
export interface EventSource {
  readonly chainId: ChainId;
  start(): Promise<void>;
  stop(): Promise<void>;
  // Returns a function that removes the listener
  onEvent(listener: EnvelopeListener): () => void;
}

export abstract class BaseEventSource extends EventEmitter implements EventSource {
  protected isRunning: boolean = false;

  constructor(
    readonly chainId: ChainId,
    protected name: string
  ) {
    super();
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn(`Event source ${this.name} is already running`);
      return;
    }

    logger.info(`Starting ${this.name} event source for chain ${this.chainId}`);
    this.isRunning = true;

    try {
      await this.startStreaming();
    } catch (error) {
      logger.error(`Failed to start ${this.name} event source`, { error: errorMessage(error) });
      this.isRunning = false;
      throw error;
    }
  }

  async stop(): Promise<void> {
    logger.info(`Stopping ${this.name} event source`);
    this.isRunning = false;
    await this.stopStreaming();
  }

  onEvent(listener: EnvelopeListener): () => void {
    this.on('event', listener);
    return () => {
      this.off('event', listener);
    };
  }

  protected abstract startStreaming(): Promise<void>;
  protected abstract stopStreaming(): Promise<void>;

  protected emitChainEvent(callerIdentity: string, event: ChainEvent): ChainEventEnvelope {
    const envelope: ChainEventEnvelope = {
      chainId: this.chainId,
      callerIdentity,
      receivedAt: new Date(),
      event
    };

    logger.debug(`${event.type} received on ${this.name}`, { launchId: event.launchId });
    this.emit('event', envelope);
    return envelope;
  }
}
