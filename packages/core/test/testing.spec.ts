import { describe, expect, it } from 'vitest';
import {
  createScriptedConnection,
  ScriptedDatabaseError,
  serializationFailure,
  UnexpectedCommandError,
  uniqueViolation,
} from '../src/testing/index.js';

describe('createScriptedConnection', () => {
  it('should answer expected commands with scripted rows', async () => {
    const conn = createScriptedConnection().expect('SELECT 1', { rows: [{ one: 1 }] });

    await expect(conn.execute('SELECT 1', [])).resolves.toEqual({ rows: [{ one: 1 }], rowCount: 1 });
    expect(conn.pending()).toBe(0);
  });

  it('should use an explicit row count', async () => {
    const conn = createScriptedConnection().expect('DELETE FROM "foo"', { rowCount: 3 });

    await expect(conn.execute('DELETE FROM "foo"', [])).resolves.toEqual({ rows: [], rowCount: 3 });
  });

  it('should match patterns', async () => {
    const conn = createScriptedConnection().expect(/^SAVEPOINT "/);

    await expect(conn.execute('SAVEPOINT "abc"', [])).resolves.toEqual({ rows: [], rowCount: 0 });
  });

  it('should fail scripted failures with the given error', async () => {
    const failure = uniqueViolation();
    const conn = createScriptedConnection().expectFailure('INSERT', failure);

    await expect(conn.execute('INSERT', [])).rejects.toBe(failure);
  });

  it('should reject commands the script does not expect', async () => {
    const conn = createScriptedConnection().expect('BEGIN');

    await expect(conn.execute('COMMIT', [])).rejects.toThrow('Expected BEGIN undefined, received COMMIT []');
    await expect(conn.execute('ROLLBACK', [])).rejects.toThrow(UnexpectedCommandError);
  });

  it('should check parameters when given', async () => {
    const conn = createScriptedConnection().expect('SELECT $1', { params: [1] });

    await expect(conn.execute('SELECT $1', [2])).rejects.toThrow('Expected SELECT $1 [1], received SELECT $1 [2]');
  });

  it('should record submissions and settlements in order', async () => {
    const conn = createScriptedConnection()
      .expect('SELECT slow', { latencyMs: 10 })
      .expect('SELECT fast');

    await Promise.all([conn.execute('SELECT slow', []), conn.execute('SELECT fast', ['x'])]);

    expect(conn.executed).toEqual([
      { sql: 'SELECT slow', params: [] },
      { sql: 'SELECT fast', params: ['x'] },
    ]);
    expect(conn.events).toEqual([
      { type: 'submit', sql: 'SELECT slow' },
      { type: 'submit', sql: 'SELECT fast' },
      { type: 'settle', sql: 'SELECT fast', ok: true },
      { type: 'settle', sql: 'SELECT slow', ok: true },
    ]);
  });
});

describe('database error helpers', () => {
  it('should carry SQLSTATE codes', () => {
    expect(uniqueViolation()).toBeInstanceOf(ScriptedDatabaseError);
    expect(uniqueViolation().code).toBe('23505');
    expect(serializationFailure().code).toBe('40001');
    expect(serializationFailure('custom').message).toBe('custom');
  });
});
