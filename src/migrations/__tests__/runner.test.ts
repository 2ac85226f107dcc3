import { describe, it, expect } from 'vitest';
import { openSqlite } from '../../db';
import { applyDialectHints, MigrationRunner, parseMigrationSource } from '../runner';

describe('applyDialectHints', () => {
  it('turns autoincrement keys into BIGSERIAL', () => {
    expect(applyDialectHints('  id INTEGER PRIMARY KEY AUTOINCREMENT,')).toBe('  id BIGSERIAL PRIMARY KEY,');
  });

  it('comments out PRAGMA lines', () => {
    expect(applyDialectHints('PRAGMA foreign_keys = ON;\nSELECT 1;')).toBe(
      '-- [pg-skip] PRAGMA foreign_keys = ON;\nSELECT 1;'
    );
  });
});

describe('parseMigrationSource', () => {
  it('splits at the DOWN marker', () => {
    expect(parseMigrationSource('CREATE TABLE t (id INTEGER);\n-- DOWN\nDROP TABLE t;\n')).toEqual({
      up: 'CREATE TABLE t (id INTEGER);',
      down: 'DROP TABLE t;',
    });
  });

  it('treats a file without a marker as up only', () => {
    expect(parseMigrationSource('SELECT 1;\n')).toEqual({ up: 'SELECT 1;', down: '' });
  });
});

describe('MigrationRunner', () => {
  it('applies the schema once and rolls it back', async () => {
    const db = openSqlite(':memory:');
    const runner = new MigrationRunner(db);

    const first = await runner.runAll();
    expect(first.failed).toBeNull();
    expect(first.applied).toEqual(['001_initial_schema']);
    expect(await runner.runAll()).toEqual({ applied: [], failed: null });

    const status = await runner.getStatus();
    expect(status.map((m) => [m.name, m.applied])).toEqual([['initial_schema', true]]);

    expect(await runner.rollbackLast()).toBe('001_initial_schema');
    const tables = await db.queryAll<{ name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'cards'`
    );
    expect(tables).toEqual([]);

    await db.close();
  });
});
