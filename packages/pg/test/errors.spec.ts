import { DatabaseError } from 'pg';
import { describe, expect, it } from 'vitest';
import { classifyPgError } from '../src/index.js';

const databaseError = (code: string): DatabaseError => {
  const error = new DatabaseError('server error', 0, 'error');
  error.code = code;
  return error;
};

describe('classifyPgError', () => {
  it('should classify unique violations', () => {
    expect(classifyPgError(databaseError('23505'))).toBe('unique-violation');
  });

  it('should classify serialization failures', () => {
    expect(classifyPgError(databaseError('40001'))).toBe('serialization-failure');
  });

  it('should classify other server errors as other', () => {
    expect(classifyPgError(databaseError('42P01'))).toBe('other');
  });

  it('should only trust pg.DatabaseError', () => {
    expect(classifyPgError({ code: '23505' })).toBe('other');
    expect(classifyPgError(new Error('Connection terminated unexpectedly'))).toBe('other');
  });
});
