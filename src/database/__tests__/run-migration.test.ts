import { readdirSync } from 'fs';
import { join } from 'path';
import { pendingMigrationFiles } from '../migrations/run-migration';

describe('pendingMigrationFiles', () => {
  test('orders numbered SQL files and skips applied ones', () => {
    const files = ['002_add_indexes.sql', 'run-migration.ts', '001_launchpad_core.sql', 'notes.sql', '003_Bad.sql'];

    expect(pendingMigrationFiles(new Set(), files)).toEqual(['001_launchpad_core.sql', '002_add_indexes.sql']);
    expect(pendingMigrationFiles(new Set(['001_launchpad_core']), files)).toEqual(['002_add_indexes.sql']);
  });

  test('finds the shipped schema', () => {
    const dir = join(__dirname, '..', 'migrations');
    expect(pendingMigrationFiles(new Set(), readdirSync(dir))).toEqual(['001_launchpad_core.sql']);
  });
});
