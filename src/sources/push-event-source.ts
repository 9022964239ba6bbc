import { ChainEventEnvelope, ChainId } from '../types';
import { NetworkError } from '../types/errors';
import { BaseEventSource } from './base-event-source';
import { decodeChainEvent } from './event-codec';

/**
 * Event source fed from outside: the relay webhook in the HTTP API, or a test. Payloads are
 * decoded and validated before they reach any listener.
 */
export class PushEventSource extends BaseEventSource {
  constructor(chainId: ChainId, name: string = `push-${chainId}`) {
    super(chainId, name);
  }

  protected async startStreaming(): Promise<void> {
    // Nothing to connect to
  }

  protected async stopStreaming(): Promise<void> {
    // Nothing to disconnect
  }

  push(callerIdentity: string, payload: unknown): ChainEventEnvelope {
    if (!this.isRunning) {
      throw new NetworkError(`Event source ${this.name} is not running`);
    }
    return this.emitChainEvent(callerIdentity, decodeChainEvent(payload));
  }
}
