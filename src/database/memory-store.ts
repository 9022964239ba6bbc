import {
  CurveKey,
  CurveRecord,
  DeploymentRecord,
  Launch,
  LaunchId,
  MigrationRecord,
  SyncCursor
} from '../types';
import { InsertResult, LaunchStore, curveKeyString } from './launch-store';

// Records are copied in and out so callers never hold a reference into the store
function cloneCurve(record: CurveRecord): CurveRecord {
  return { ...record, state: { ...record.state }, stats: { ...record.stats } };
}

function cloneLaunch(launch: Launch): Launch {
  return { ...launch, targetChainIds: [...launch.targetChainIds] };
}

function byChain<T extends CurveKey>(a: T, b: T): number {
  return a.chainId - b.chainId;
}

/**
 * In-process LaunchStore. Default store when STORE_DRIVER=memory and the one tests run against.
 */
export class MemoryLaunchStore implements LaunchStore {
  private launches: Map<LaunchId, Launch> = new Map();
  private syncSequences: Map<LaunchId, number> = new Map();
  private curves: Map<string, CurveRecord> = new Map();
  private migrations: Map<string, MigrationRecord> = new Map();
  private deployments: Map<string, DeploymentRecord> = new Map();
  private cursors: Map<string, SyncCursor> = new Map();

  async insertLaunch(launch: Launch): Promise<InsertResult<Launch>> {
    const existing = this.launches.get(launch.launchId);
    if (existing) {
      return { record: cloneLaunch(existing), created: false };
    }
    this.launches.set(launch.launchId, cloneLaunch(launch));
    return { record: cloneLaunch(launch), created: true };
  }

  async getLaunch(launchId: LaunchId): Promise<Launch | null> {
    const launch = this.launches.get(launchId);
    return launch ? cloneLaunch(launch) : null;
  }

  async nextSyncSequence(launchId: LaunchId): Promise<number> {
    const next = (this.syncSequences.get(launchId) || 0) + 1;
    this.syncSequences.set(launchId, next);
    return next;
  }

  async getCurve(key: CurveKey): Promise<CurveRecord | null> {
    const record = this.curves.get(curveKeyString(key));
    return record ? cloneCurve(record) : null;
  }

  async insertCurve(record: CurveRecord): Promise<InsertResult<CurveRecord>> {
    const key = curveKeyString(record);
    const existing = this.curves.get(key);
    if (existing) {
      return { record: cloneCurve(existing), created: false };
    }
    this.curves.set(key, cloneCurve(record));
    return { record: cloneCurve(record), created: true };
  }

  async saveCurve(record: CurveRecord): Promise<void> {
    this.curves.set(curveKeyString(record), cloneCurve(record));
  }

  async listCurves(launchId: LaunchId): Promise<CurveRecord[]> {
    return Array.from(this.curves.values())
      .filter(record => record.launchId === launchId)
      .sort(byChain)
      .map(cloneCurve);
  }

  async getMigration(key: CurveKey): Promise<MigrationRecord | null> {
    const record = this.migrations.get(curveKeyString(key));
    return record ? { ...record } : null;
  }

  async saveMigration(record: MigrationRecord): Promise<void> {
    this.migrations.set(curveKeyString(record), { ...record });
  }

  async listMigrations(launchId: LaunchId): Promise<MigrationRecord[]> {
    return Array.from(this.migrations.values())
      .filter(record => record.launchId === launchId)
      .sort(byChain)
      .map(record => ({ ...record }));
  }

  async getDeployment(key: CurveKey): Promise<DeploymentRecord | null> {
    const record = this.deployments.get(curveKeyString(key));
    return record ? { ...record } : null;
  }

  async insertDeployment(record: DeploymentRecord): Promise<InsertResult<DeploymentRecord>> {
    const key = curveKeyString(record);
    const existing = this.deployments.get(key);
    if (existing) {
      return { record: { ...existing }, created: false };
    }
    this.deployments.set(key, { ...record });
    return { record: { ...record }, created: true };
  }

  async saveDeployment(record: DeploymentRecord): Promise<void> {
    this.deployments.set(curveKeyString(record), { ...record });
  }

  async listDeployments(launchId: LaunchId): Promise<DeploymentRecord[]> {
    return Array.from(this.deployments.values())
      .filter(record => record.launchId === launchId)
      .sort(byChain)
      .map(record => ({ ...record }));
  }

  async getCursor(key: CurveKey): Promise<SyncCursor | null> {
    const cursor = this.cursors.get(curveKeyString(key));
    return cursor ? { ...cursor } : null;
  }

  async saveCursor(cursor: SyncCursor): Promise<void> {
    this.cursors.set(curveKeyString(cursor), { ...cursor });
  }

  async listCursors(launchId: LaunchId): Promise<SyncCursor[]> {
    return Array.from(this.cursors.values())
      .filter(cursor => cursor.launchId === launchId)
      .sort(byChain)
      .map(cursor => ({ ...cursor }));
  }

  async close(): Promise<void> {
    this.launches.clear();
    this.syncSequences.clear();
    this.curves.clear();
    this.migrations.clear();
    this.deployments.clear();
    this.cursors.clear();
  }
}
