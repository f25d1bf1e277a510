import { describe, expect, it } from 'vitest';
import { minLevelFromEnv } from '@/services/logger';

describe('minLevelFromEnv', () => {
  it('reads a known level name', () => {
    expect(minLevelFromEnv({ LOG_LEVEL: ' Debug ' })).toBe(2);
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(minLevelFromEnv({ LOG_LEVEL: 'constructor' })).toBe(3);
    expect(minLevelFromEnv({ LOG_LEVEL: '__proto__', VITEST: 'true' })).toBe(5);
  });

  it('defaults to info outside the test runner', () => {
    expect(minLevelFromEnv({})).toBe(3);
  });
});
