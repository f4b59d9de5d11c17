import { DatabaseError, type QueryConfig } from 'pg';
import { describe, expect, it, vi } from 'vitest';
import { withPooledTransaction, withTransaction } from '../src/index.js';
import { fakeClient, queryResult, sentSql } from './helpers.js';

const serializationFailure = (): DatabaseError => {
  const error = new DatabaseError('could not serialize access', 0, 'error');
  error.code = '40001';
  return error;
};

describe('withTransaction', () => {
  it('should run the body between BEGIN and COMMIT on the client', async () => {
    const client = fakeClient();

    await withTransaction(client, {}, async (txn) => {
      await txn.insert('foo', { bar: 'baz' });
    });

    expect(sentSql(client)).toEqual(['BEGIN', 'INSERT INTO "foo" ("bar") VALUES ($1)', 'COMMIT']);
  });

  it('should retry serialization failures reported as pg.DatabaseError', async () => {
    let failed = false;
    const client = fakeClient(async (config: QueryConfig) => {
      if (config.text.startsWith('INSERT') && !failed) {
        failed = true;
        throw serializationFailure();
      }
      return queryResult();
    });

    await withTransaction(client, { isolation: 'serializable', retry: true }, async (txn) => {
      await txn.insert('foo', { bar: 'baz' });
    });

    expect(sentSql(client)).toEqual([
      'BEGIN TRANSACTION ISOLATION LEVEL SERIALIZABLE',
      'INSERT INTO "foo" ("bar") VALUES ($1)',
      'ROLLBACK',
      'BEGIN TRANSACTION ISOLATION LEVEL SERIALIZABLE',
      'INSERT INTO "foo" ("bar") VALUES ($1)',
      'COMMIT',
    ]);
  });

  it('should escape bulk-insert values with the client', async () => {
    const client = fakeClient();

    await withTransaction(client, {}, async (txn) => {
      await txn.bulkInsert('foo', ['bar'], [["it's"]]);
    });

    expect(client.escapeLiteral).toHaveBeenCalledWith("it's");
    expect(client.escapeIdentifier).toHaveBeenCalledWith('foo');
    expect(sentSql(client)[2]).toBe(`INSERT INTO "foo" ("bar") VALUES ('it''s')`);
  });
});

describe('withPooledTransaction', () => {
  it('should release the client after committing', async () => {
    const client = fakeClient();
    const pool = { connect: vi.fn(async () => client) };

    await withPooledTransaction(pool, {}, async (txn) => {
      await txn.exec('SELECT 1');
    });

    expect(pool.connect).toHaveBeenCalledTimes(1);
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(sentSql(client)).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
  });

  it('should release the client after a failure', async () => {
    const client = fakeClient();
    const pool = { connect: vi.fn(async () => client) };

    await expect(
      withPooledTransaction(pool, {}, () => {
        throw new Error('body failed');
      }),
    ).rejects.toThrow('body failed');

    expect(client.release).toHaveBeenCalledTimes(1);
    expect(sentSql(client)).toEqual(['BEGIN', 'ROLLBACK']);
  });
});
