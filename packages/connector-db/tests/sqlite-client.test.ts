import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseError } from '@sysml-sql/core';
import { SqliteClient, afterBulkInsert, beforeBulkInsert, createBulkInsertTuning } from '../src/index.js';

const DDL = `
CREATE TABLE IF NOT EXISTS "elements" (
	"@id" TEXT NOT NULL PRIMARY KEY,
	"@type" TEXT NOT NULL,
	"declaredName" TEXT,
	"isLibraryElement" INTEGER
) STRICT;
CREATE TABLE IF NOT EXISTS "relations" (
	"@id" TEXT NOT NULL PRIMARY KEY,
	"@type" TEXT NOT NULL,
	"name" TEXT NOT NULL,
	"origin_id" TEXT NOT NULL REFERENCES "elements"("@id") DEFERRABLE INITIALLY DEFERRED,
	"target_id" TEXT NOT NULL REFERENCES "elements"("@id") DEFERRABLE INITIALLY DEFERRED
) STRICT;
`;

let client: SqliteClient;

beforeEach(() => {
  client = new SqliteClient({ path: ':memory:' });
  client.executeDdl(DDL);
});

afterEach(() => {
  client.close();
});

describe('SqliteClient', () => {
  it('reports table columns in declaration order', () => {
    expect(client.tableColumns('elements')).toEqual([
      { name: '@id', type: 'TEXT', notNull: true, primaryKey: true },
      { name: '@type', type: 'TEXT', notNull: true, primaryKey: false },
      { name: 'declaredName', type: 'TEXT', notNull: false, primaryKey: false },
      { name: 'isLibraryElement', type: 'INTEGER', notNull: false, primaryKey: false },
    ]);
    expect(client.tableColumns('missing')).toEqual([]);
  });

  it('replaces rows on conflicting keys', () => {
    const columns = ['@id', '@type', 'declaredName'];
    client.upsert('elements', columns, ['a', 'PartUsage', 'first']);
    client.upsert('elements', columns, ['a', 'PartUsage', 'second']);

    expect(client.count('elements')).toBe(1);
    expect(client.query('SELECT "declaredName" FROM "elements" WHERE "@id" = ?', ['a'])).toEqual([
      { declaredName: 'second' },
    ]);
  });

  it('deletes by key lists longer than one statement takes', () => {
    const ids = Array.from({ length: 1200 }, (_, i) => `e${i}`);
    client.beginTransaction();
    for (const id of ids) {
      client.upsert('elements', ['@id', '@type'], [id, 'PartUsage']);
    }
    client.commit();

    expect(client.deleteWhereIn('elements', '@id', ids.slice(0, 1100))).toBe(1100);
    expect(client.count('elements')).toBe(100);
    expect(client.hasKey('elements', '@id', 'e1150')).toBe(true);
    expect(client.hasKey('elements', '@id', 'e5')).toBe(false);
  });

  it('rolls back an open transaction', () => {
    client.beginTransaction();
    client.upsert('elements', ['@id', '@type'], ['a', 'PartUsage']);
    expect(client.inTransaction).toBe(true);
    client.rollback();

    expect(client.inTransaction).toBe(false);
    expect(client.count('elements')).toBe(0);
  });

  it('checks deferred foreign keys at commit', () => {
    client.beginTransaction();
    client.upsert('relations', ['@id', '@type', 'name', 'origin_id', 'target_id'], [
      'a/owner/b',
      'Reference',
      'owner',
      'a',
      'b',
    ]);

    expect(() => client.commit()).toThrow(DatabaseError);
    client.rollback();
    expect(client.count('relations')).toBe(0);
  });

  it('wraps failing statements in DatabaseError', () => {
    let caught: unknown;
    try {
      client.query('SELECT * FROM "nope"');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DatabaseError);
    if (caught instanceof DatabaseError) {
      expect(caught.code).toBe('STATEMENT_FAILED');
      expect(caught.context?.sqliteCode).toBe('SQLITE_ERROR');
    }
  });

  it('rejects a nested transaction', () => {
    client.beginTransaction();
    expect(() => client.beginTransaction()).toThrow(DatabaseError);
    client.rollback();
  });

  it('rejects mismatched column and value counts', () => {
    expect(() => client.upsert('elements', ['@id', '@type'], ['a'])).toThrow(
      'Upsert into elements: 2 columns but 1 values'
    );
  });
});

describe('bulk-insert pragmas', () => {
  it('turns synchronous writes off and back on', () => {
    beforeBulkInsert(client);
    expect(client.pragma('synchronous', true)).toBe(0);

    afterBulkInsert(client, { vacuum: true });
    expect(client.pragma('synchronous', true)).toBe(1);
  });

  it('only resets the pragmas after a rollback', () => {
    const tuning = createBulkInsertTuning(client);
    tuning.before();
    expect(client.pragma('synchronous', true)).toBe(0);

    tuning.after({ committed: false, vacuum: true });
    expect(client.pragma('synchronous', true)).toBe(1);
  });
});
