import { ChainId, LaunchId } from '../types';

export type LegKind = 'deploy' | 'sync' | 'migrate';

export interface DeadLetter {
  id: string;
  kind: LegKind;
  launchId: LaunchId;
  chainId: ChainId;
  error: string;
  errorCode: string;
  failures: number;
  firstFailedAt: Date;
  lastFailedAt: Date;
}

export interface ParkRequest {
  kind: LegKind;
  launchId: LaunchId;
  chainId: ChainId;
  error: string;
  errorCode: string;
}

/**
 * Fan-out legs that ran out of retries. One entry per (kind, launchId, chainId); a leg that
 * fails again while parked updates its entry instead of adding another. Entries live in
 * memory only and are gone after a restart.
 */
export class DeadLetterQueue {
  private entries: Map<string, DeadLetter> = new Map();
  private byId: Map<string, DeadLetter> = new Map();
  private counter = 0;

  private legKey(kind: LegKind, launchId: LaunchId, chainId: ChainId): string {
    return `${kind}:${launchId}:${chainId}`;
  }

  park(request: ParkRequest): DeadLetter {
    const key = this.legKey(request.kind, request.launchId, request.chainId);
    const now = new Date();
    const existing = this.entries.get(key);

    const entry: DeadLetter = existing
      ? {
          ...existing,
          error: request.error,
          errorCode: request.errorCode,
          failures: existing.failures + 1,
          lastFailedAt: now
        }
      : {
          id: `${request.kind}-${request.chainId}-${now.getTime()}-${++this.counter}`,
          ...request,
          failures: 1,
          firstFailedAt: now,
          lastFailedAt: now
        };

    this.entries.set(key, entry);
    this.byId.set(entry.id, entry);
    return entry;
  }

  // A leg that later succeeded no longer needs manual attention
  resolve(kind: LegKind, launchId: LaunchId, chainId: ChainId): boolean {
    const key = this.legKey(kind, launchId, chainId);
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.entries.delete(key);
    this.byId.delete(entry.id);
    return true;
  }

  get(id: string): DeadLetter | null {
    return this.byId.get(id) || null;
  }

  list(): DeadLetter[] {
    return Array.from(this.entries.values()).sort((a, b) => a.firstFailedAt.getTime() - b.firstFailedAt.getTime());
  }

  get size(): number {
    return this.entries.size;
  }
}
