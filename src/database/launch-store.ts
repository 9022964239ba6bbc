import {
  ChainId,
  CurveKey,
  CurveRecord,
  DeploymentRecord,
  Launch,
  LaunchId,
  MigrationRecord,
  SyncCursor
} from '../types';

export interface InsertResult<T> {
  record: T;
  created: boolean;
}

/**
 * Persistence for the coordinator's five logical tables. Inserts are compare-and-set: when a row
 * already exists for the key the existing row is returned unchanged with `created: false`.
 *
 * Implementations need not lock; the registries serialize writers per key.
 */
export interface LaunchStore {
  // launches
  insertLaunch(launch: Launch): Promise<InsertResult<Launch>>;
  getLaunch(launchId: LaunchId): Promise<Launch | null>;
  nextSyncSequence(launchId: LaunchId): Promise<number>;

  // curve_states
  getCurve(key: CurveKey): Promise<CurveRecord | null>;
  insertCurve(record: CurveRecord): Promise<InsertResult<CurveRecord>>;
  saveCurve(record: CurveRecord): Promise<void>;
  listCurves(launchId: LaunchId): Promise<CurveRecord[]>;

  // migrations
  getMigration(key: CurveKey): Promise<MigrationRecord | null>;
  saveMigration(record: MigrationRecord): Promise<void>;
  listMigrations(launchId: LaunchId): Promise<MigrationRecord[]>;

  // deployments
  getDeployment(key: CurveKey): Promise<DeploymentRecord | null>;
  insertDeployment(record: DeploymentRecord): Promise<InsertResult<DeploymentRecord>>;
  saveDeployment(record: DeploymentRecord): Promise<void>;
  listDeployments(launchId: LaunchId): Promise<DeploymentRecord[]>;

  // sync_cursors
  getCursor(key: CurveKey): Promise<SyncCursor | null>;
  saveCursor(cursor: SyncCursor): Promise<void>;
  listCursors(launchId: LaunchId): Promise<SyncCursor[]>;

  close(): Promise<void>;
}

export function curveKeyString(key: CurveKey): string {
  return `${key.launchId}:${key.chainId}`;
}

export function curveKey(launchId: LaunchId, chainId: ChainId): CurveKey {
  return { launchId, chainId };
}
