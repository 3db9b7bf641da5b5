import { describe, it, expect } from 'vitest';
import { getFlag, getIntFlag, hasFlag } from './cli-args.js';
import { ValidationError } from './errors.js';

describe('cli flags', () => {
  const args = ['--server', 'http://relay.test', '--local', '--batch', '25', '--name'];

  it('reads the value after a flag', () => {
    expect(getFlag(args, '--server')).toBe('http://relay.test');
    expect(getFlag(args, '--name')).toBeUndefined();
    expect(getFlag(['--code', '--name', 'x'], '--code')).toBeUndefined();
  });

  it('detects bare flags', () => {
    expect(hasFlag(args, '--local')).toBe(true);
    expect(hasFlag(args, '--remote')).toBe(false);
  });

  it('parses bounded integers', () => {
    expect(getIntFlag(args, '--batch', 10, 1)).toBe(25);
    expect(getIntFlag(args, '--poll-seconds', 5, 1)).toBe(5);
    expect(() => getIntFlag(['--batch', '0'], '--batch', 10, 1))
      .toThrow(new ValidationError({ '--batch': 'Must be an integer of at least 1' }));
  });

  it('rejects integers above the upper bound', () => {
    expect(getIntFlag(['--batch', '100'], '--batch', 10, 1, 100)).toBe(100);
    expect(() => getIntFlag(['--batch', '101'], '--batch', 10, 1, 100))
      .toThrow(new ValidationError({ '--batch': 'Must be an integer between 1 and 100' }));
  });
});
