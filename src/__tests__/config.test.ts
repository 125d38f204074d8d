import { describe, it, expect, vi, afterEach } from 'vitest';
import { intFromEnv } from '../config.js';

describe('intFromEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('uses the default when unset or blank', () => {
    vi.stubEnv('WARDEN_TEST_LIMIT', '  ');
    expect(intFromEnv('WARDEN_TEST_LIMIT', 10)).toBe(10);
    expect(intFromEnv('WARDEN_TEST_UNSET', 7)).toBe(7);
  });

  it('parses whole numbers, zero included', () => {
    vi.stubEnv('WARDEN_TEST_LIMIT', '0');
    expect(intFromEnv('WARDEN_TEST_LIMIT', 10)).toBe(0);
    vi.stubEnv('WARDEN_TEST_LIMIT', ' 25 ');
    expect(intFromEnv('WARDEN_TEST_LIMIT', 10)).toBe(25);
  });

  it('rejects values that are not whole numbers in range', () => {
    vi.stubEnv('WARDEN_TEST_LIMIT', 'ten');
    expect(() => intFromEnv('WARDEN_TEST_LIMIT', 10)).toThrow('WARDEN_TEST_LIMIT must be a whole number >= 0 (got "ten")');
    vi.stubEnv('WARDEN_TEST_LIMIT', '2.5');
    expect(() => intFromEnv('WARDEN_TEST_LIMIT', 10)).toThrow('must be a whole number');
    vi.stubEnv('WARDEN_TEST_LIMIT', '-1');
    expect(() => intFromEnv('WARDEN_TEST_LIMIT', 10)).toThrow('must be a whole number');
    vi.stubEnv('WARDEN_TEST_LIMIT', '0');
    expect(() => intFromEnv('WARDEN_TEST_LIMIT', 60, 1)).toThrow('WARDEN_TEST_LIMIT must be a whole number >= 1 (got "0")');
  });

  it('stops loading when a safety limit is mistyped', async () => {
    vi.stubEnv('MAX_ACTIONS_PER_HOUR', 'ten');
    vi.resetModules();

    await expect(import('../config.js')).rejects.toThrow('MAX_ACTIONS_PER_HOUR must be a whole number >= 0 (got "ten")');
  });

  it('loads cooldowns from the environment', async () => {
    vi.stubEnv('COOLDOWN_DISK_CLEANUP_MIN', '90');
    vi.resetModules();

    const { config } = await import('../config.js');

    expect(config.cooldownMinutes.disk_cleanup).toBe(90);
  });
});
