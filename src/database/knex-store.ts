import { Knex } from 'knex';
import { CurveKey, CurveRecord, DeploymentRecord, Launch, LaunchId, MigrationRecord, SyncCursor } from '../types';
import { UnknownLaunchError } from '../types/errors';
import { InsertResult, LaunchStore } from './launch-store';
import {
  CurveRow,
  CursorRow,
  DeploymentRow,
  KEY_COLUMNS,
  LaunchRow,
  MigrationRow,
  Numeric,
  curveFromRow,
  curveToRow,
  cursorFromRow,
  cursorToRow,
  deploymentFromRow,
  deploymentToRow,
  keyOf,
  launchFromRow,
  launchToRow,
  migrationFromRow,
  migrationToRow,
  toSeq
} from './rows';

/**
 * Compare-and-set on top of an `ON CONFLICT DO NOTHING ... RETURNING` insert: an empty
 * RETURNING means another writer got there first, so the stored row wins.
 */
export async function insertOrRead<T>(
  record: T,
  insert: () => PromiseLike<unknown[]>,
  read: () => Promise<T | null>,
  label: string
): Promise<InsertResult<T>> {
  const inserted = await insert();
  if (inserted.length > 0) {
    return { record, created: true };
  }

  const existing = await read();
  if (!existing) {
    throw new UnknownLaunchError(`${label} vanished during insert`);
  }
  return { record: existing, created: false };
}

export function sequenceFromRows(rows: Array<{ sync_seq: Numeric }>, launchId: LaunchId): number {
  if (rows.length === 0) {
    throw new UnknownLaunchError(`Unknown launch ${launchId}`);
  }
  return toSeq(rows[0].sync_seq);
}

/**
 * LaunchStore on PostgreSQL. Compare-and-set inserts use ON CONFLICT DO NOTHING and fall back
 * to reading the row that won.
 */
export class KnexLaunchStore implements LaunchStore {
  constructor(private db: Knex) {}

  async insertLaunch(launch: Launch): Promise<InsertResult<Launch>> {
    return insertOrRead(
      launch,
      () => this.db<LaunchRow>('launches').insert(launchToRow(launch)).onConflict('launch_id').ignore().returning('launch_id'),
      () => this.getLaunch(launch.launchId),
      `Launch ${launch.launchId}`
    );
  }

  async getLaunch(launchId: LaunchId): Promise<Launch | null> {
    const row = await this.db<LaunchRow>('launches').where({ launch_id: launchId }).first();
    return row ? launchFromRow(row) : null;
  }

  async nextSyncSequence(launchId: LaunchId): Promise<number> {
    const result = await this.db.raw<{ rows: Array<{ sync_seq: Numeric }> }>(
      'UPDATE launches SET sync_seq = sync_seq + 1 WHERE launch_id = ? RETURNING sync_seq',
      [launchId]
    );

    return sequenceFromRows(result.rows, launchId);
  }

  async getCurve(key: CurveKey): Promise<CurveRecord | null> {
    const row = await this.db<CurveRow>('curve_states').where(keyOf(key)).first();
    return row ? curveFromRow(row) : null;
  }

  async insertCurve(record: CurveRecord): Promise<InsertResult<CurveRecord>> {
    return insertOrRead(
      record,
      () => this.db<CurveRow>('curve_states').insert(curveToRow(record)).onConflict(KEY_COLUMNS).ignore().returning('launch_id'),
      () => this.getCurve(record),
      `Curve ${record.launchId}:${record.chainId}`
    );
  }

  async saveCurve(record: CurveRecord): Promise<void> {
    await this.db<CurveRow>('curve_states').insert(curveToRow(record)).onConflict(KEY_COLUMNS).merge();
  }

  async listCurves(launchId: LaunchId): Promise<CurveRecord[]> {
    const rows = await this.db<CurveRow>('curve_states').where({ launch_id: launchId }).orderBy('chain_id');
    return rows.map(curveFromRow);
  }

  async getMigration(key: CurveKey): Promise<MigrationRecord | null> {
    const row = await this.db<MigrationRow>('migrations').where(keyOf(key)).first();
    return row ? migrationFromRow(row) : null;
  }

  async saveMigration(record: MigrationRecord): Promise<void> {
    await this.db<MigrationRow>('migrations').insert(migrationToRow(record)).onConflict(KEY_COLUMNS).merge();
  }

  async listMigrations(launchId: LaunchId): Promise<MigrationRecord[]> {
    const rows = await this.db<MigrationRow>('migrations').where({ launch_id: launchId }).orderBy('chain_id');
    return rows.map(migrationFromRow);
  }

  async getDeployment(key: CurveKey): Promise<DeploymentRecord | null> {
    const row = await this.db<DeploymentRow>('deployments').where(keyOf(key)).first();
    return row ? deploymentFromRow(row) : null;
  }

  async insertDeployment(record: DeploymentRecord): Promise<InsertResult<DeploymentRecord>> {
    return insertOrRead(
      record,
      () =>
        this.db<DeploymentRow>('deployments')
          .insert(deploymentToRow(record))
          .onConflict(KEY_COLUMNS)
          .ignore()
          .returning('launch_id'),
      () => this.getDeployment(record),
      `Deployment ${record.launchId}:${record.chainId}`
    );
  }

  async saveDeployment(record: DeploymentRecord): Promise<void> {
    await this.db<DeploymentRow>('deployments').insert(deploymentToRow(record)).onConflict(KEY_COLUMNS).merge();
  }

  async listDeployments(launchId: LaunchId): Promise<DeploymentRecord[]> {
    const rows = await this.db<DeploymentRow>('deployments').where({ launch_id: launchId }).orderBy('chain_id');
    return rows.map(deploymentFromRow);
  }

  async getCursor(key: CurveKey): Promise<SyncCursor | null> {
    const row = await this.db<CursorRow>('sync_cursors').where(keyOf(key)).first();
    return row ? cursorFromRow(row) : null;
  }

  async saveCursor(cursor: SyncCursor): Promise<void> {
    await this.db<CursorRow>('sync_cursors').insert(cursorToRow(cursor)).onConflict(KEY_COLUMNS).merge();
  }

  async listCursors(launchId: LaunchId): Promise<SyncCursor[]> {
    const rows = await this.db<CursorRow>('sync_cursors').where({ launch_id: launchId }).orderBy('chain_id');
    return rows.map(cursorFromRow);
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
