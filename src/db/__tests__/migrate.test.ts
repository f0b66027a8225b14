import { describe, expect, it } from 'vitest';
import { pendingMigrations } from '../migrate.js';

describe('pendingMigrations', () => {
  it('returns unapplied sql files in filename order', () => {
    const files = ['002_watchlist.sql', 'README.md', '001_wheels.sql', '003_snapshots.sql'];
    expect(pendingMigrations(files, new Set(['001_wheels.sql']))).toEqual(['002_watchlist.sql', '003_snapshots.sql']);
  });

  it('is empty once every file is recorded', () => {
    expect(pendingMigrations(['001_wheels.sql'], new Set(['001_wheels.sql']))).toEqual([]);
  });
});
