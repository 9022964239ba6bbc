import { createMachine, StateValue } from 'xstate';
import { MigrationStatus } from '../types';

export const MIGRATION_STATES: MigrationStatus[] = ['ACTIVE', 'MIGRATION_TRIGGERED', 'MIGRATED'];

// Event types
type MigrationEvent =
  | { type: 'THRESHOLD_REACHED' }
  | { type: 'MIGRATION_REPORTED' }
  | { type: 'MIGRATION_COMPLETED' }
  | { type: 'MIGRATION_FAILED' };

type MigrationEventType = MigrationEvent['type'];

/**
 * Curve lifecycle: ACTIVE -> MIGRATION_TRIGGERED -> MIGRATED.
 *
 * The machine is only used as a transition table; records are persisted by CurveManager and
 * fed back through {@link nextMigrationStatus}, so no interpreter keeps state in memory.
 */
export const migrationMachine = createMachine<Record<string, never>, MigrationEvent>({
  id: 'curve-migration',
  predictableActionArguments: true,
  initial: 'ACTIVE',
  context: {},
  states: {
    ACTIVE: {
      on: {
        THRESHOLD_REACHED: 'MIGRATION_TRIGGERED',
        // Chain says it migrated before our mirror saw the threshold buy
        MIGRATION_REPORTED: 'MIGRATION_TRIGGERED'
      }
    },
    MIGRATION_TRIGGERED: {
      on: {
        MIGRATION_COMPLETED: 'MIGRATED',
        // Stay put so the DEX call can be retried
        MIGRATION_FAILED: 'MIGRATION_TRIGGERED'
      }
    },
    MIGRATED: {
      type: 'final'
    }
  }
});

export function isMigrationStatus(value: StateValue): value is MigrationStatus {
  return typeof value === 'string' && MIGRATION_STATES.some(status => status === value);
}

/**
 * Resolve the status that follows `status` on `eventType`, or null when the machine has no
 * such transition (e.g. anything out of MIGRATED).
 */
export function nextMigrationStatus(status: MigrationStatus, eventType: MigrationEventType): MigrationStatus | null {
  if (!migrationMachine.getStateNodeById(`curve-migration.${status}`).events.includes(eventType)) {
    return null;
  }

  const next = migrationMachine.transition(status, { type: eventType });
  return isMigrationStatus(next.value) ? next.value : null;
}

export function isTerminal(status: MigrationStatus): boolean {
  return migrationMachine.getStateNodeById(`curve-migration.${status}`).type === 'final';
}

export function acceptsTrades(status: MigrationStatus): boolean {
  return status === 'ACTIVE';
}

export type { MigrationEvent, MigrationEventType };
