import { describe, expect, it } from 'vitest';
import { InvalidArgumentError, runTransaction, upsertSql } from '../../src/index.js';
import { createScriptedConnection, serializationFailure, uniqueViolation } from '../../src/testing/index.js';

const { sql: UPSERT } = upsertSql('foo', 'wombat', { bar: 'baz', wombat: 42 });

describe('Transaction.upsert', () => {
  it('should resolve with the affected row', async () => {
    const conn = createScriptedConnection()
      .expect('BEGIN')
      .expect(UPSERT, { params: ['baz', 42], rows: [{ bar: 'baz', wombat: 42 }] })
      .expect('COMMIT');
    let row: unknown;

    await runTransaction(conn, {}, async (txn) => {
      row = await txn.upsert('foo', 'wombat', { bar: 'baz', wombat: 42 });
    });

    expect(row).toEqual({ bar: 'baz', wombat: 42 });
    expect(conn.statements()).toEqual(['BEGIN', UPSERT, 'COMMIT']);
  });

  it('should retry once after a unique violation', async () => {
    const conn = createScriptedConnection()
      .expect('BEGIN')
      .expectFailure(UPSERT, uniqueViolation())
      .expect(UPSERT, { rows: [{ bar: 'baz', wombat: 42 }] })
      .expect('COMMIT');
    let row: unknown;

    await runTransaction(conn, {}, async (txn) => {
      row = await txn.upsert('foo', 'wombat', { bar: 'baz', wombat: 42 });
    });

    expect(row).toEqual({ bar: 'baz', wombat: 42 });
    expect(conn.statements()).toEqual(['BEGIN', UPSERT, UPSERT, 'COMMIT']);
  });

  it('should roll back when the retry also fails', async () => {
    const second = uniqueViolation('still duplicated');
    const conn = createScriptedConnection()
      .expect('BEGIN')
      .expectFailure(UPSERT, uniqueViolation())
      .expectFailure(UPSERT, second)
      .expect('ROLLBACK');

    await expect(
      runTransaction(conn, {}, async (txn) => {
        await txn.upsert('foo', 'wombat', { bar: 'baz', wombat: 42 });
      }),
    ).rejects.toBe(second);

    expect(conn.statements()).toEqual(['BEGIN', UPSERT, UPSERT, 'ROLLBACK']);
  });

  it('should reject with the retry failure when it is not a unique violation', async () => {
    const second = serializationFailure();
    const conn = createScriptedConnection()
      .expect('BEGIN')
      .expectFailure(UPSERT, uniqueViolation())
      .expectFailure(UPSERT, second)
      .expect('ROLLBACK');

    await expect(
      runTransaction(conn, {}, async (txn) => {
        await expect(txn.upsert('foo', 'wombat', { bar: 'baz', wombat: 42 })).rejects.toBe(second);
      }),
    ).rejects.toBe(second);

    expect(conn.statements()).toEqual(['BEGIN', UPSERT, UPSERT, 'ROLLBACK']);
  });

  it('should not leave an unhandled rejection when an unawaited upsert fails', async () => {
    const failure = serializationFailure();
    const conn = createScriptedConnection().expect('BEGIN').expectFailure(UPSERT, failure).expect('COMMIT');
    const unhandled: unknown[] = [];
    const onUnhandled = (reason: unknown) => {
      unhandled.push(reason);
    };
    process.on('unhandledRejection', onUnhandled);

    try {
      await expect(
        runTransaction(conn, {}, (txn) => {
          void txn.upsert('foo', 'wombat', { bar: 'baz', wombat: 42 });
        }),
      ).rejects.toBe(failure);
      await new Promise((resolve) => setTimeout(resolve, 10));
    } finally {
      process.off('unhandledRejection', onUnhandled);
    }

    expect(unhandled).toEqual([]);
    expect(conn.statements()).toEqual(['BEGIN', UPSERT, 'COMMIT']);
  });

  it('should not retry other failures', async () => {
    const failure = serializationFailure();
    const conn = createScriptedConnection().expect('BEGIN').expectFailure(UPSERT, failure).expect('ROLLBACK');

    await expect(
      runTransaction(conn, {}, async (txn) => {
        await txn.upsert('foo', 'wombat', { bar: 'baz', wombat: 42 });
      }),
    ).rejects.toBe(failure);

    expect(conn.statements()).toEqual(['BEGIN', UPSERT, 'ROLLBACK']);
  });

  it('should honour a custom error classifier', async () => {
    const conn = createScriptedConnection()
      .expect('BEGIN')
      .expectFailure(UPSERT, new Error('duplicate'))
      .expect(UPSERT)
      .expect('COMMIT');
    const classifyError = (error: unknown) =>
      error instanceof Error && error.message === 'duplicate' ? ('unique-violation' as const) : ('other' as const);

    await runTransaction(conn, { classifyError }, async (txn) => {
      await txn.upsert('foo', 'wombat', { bar: 'baz', wombat: 42 });
    });

    expect(conn.statements()).toEqual(['BEGIN', UPSERT, UPSERT, 'COMMIT']);
  });

  it('should reject a key missing from the data before sending anything', async () => {
    const conn = createScriptedConnection().expect('BEGIN').expect('ROLLBACK');

    await expect(
      runTransaction(conn, {}, async (txn) => {
        await txn.upsert('foo', 'id', { bar: 'baz' });
      }),
    ).rejects.toThrow(InvalidArgumentError);

    expect(conn.statements()).toEqual(['BEGIN', 'ROLLBACK']);
  });
});
