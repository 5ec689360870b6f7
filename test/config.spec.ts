import { describe, expect, it } from 'vitest';
import { intFromEnv } from '../src/config';

describe('intFromEnv', () => {
  it('parses integer settings', () => {
    expect(intFromEnv('300', 600)).toBe(300);
    expect(intFromEnv('0', 1)).toBe(0);
  });

  it('falls back to the default when unset or not a number', () => {
    expect(intFromEnv(undefined, 600)).toBe(600);
    expect(intFromEnv('', 1)).toBe(1);
    expect(intFromEnv('lots', 1)).toBe(1);
  });
});
