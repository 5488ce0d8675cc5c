import { describe, expect, it } from 'vitest';
import { parseValue } from './config.js';

describe('parseValue', () => {
  it('reads JSON values', () => {
    expect(parseValue('5')).toBe(5);
    expect(parseValue('true')).toBe(true);
    expect(parseValue('["machine-b"]')).toEqual(['machine-b']);
  });

  it('falls back to the raw string', () => {
    expect(parseValue('dynamo')).toBe('dynamo');
  });
});
