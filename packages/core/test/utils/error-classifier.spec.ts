import { describe, expect, it } from 'vitest';
import { classifyBySqlState, getSqlState } from '../../src/index.js';

describe('getSqlState', () => {
  it('should read a string code property', () => {
    expect(getSqlState({ code: '23505' })).toBe('23505');
  });

  it('should ignore values without a string code', () => {
    expect(getSqlState(new Error('timeout'))).toBeUndefined();
    expect(getSqlState({ code: 23505 })).toBeUndefined();
    expect(getSqlState(null)).toBeUndefined();
    expect(getSqlState('23505')).toBeUndefined();
  });
});

describe('classifyBySqlState', () => {
  it('should classify unique violations', () => {
    expect(classifyBySqlState({ code: '23505' })).toBe('unique-violation');
  });

  it('should classify serialization failures', () => {
    expect(classifyBySqlState({ code: '40001' })).toBe('serialization-failure');
  });

  it('should classify everything else as other', () => {
    expect(classifyBySqlState({ code: '40P01' })).toBe('other');
    expect(classifyBySqlState(new Error('connection reset'))).toBe('other');
  });
});
