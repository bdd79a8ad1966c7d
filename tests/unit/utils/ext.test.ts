/**
 * Collaborator Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { FixedClock, SystemClock, UUIDGenerator } from '../../../src/utils/ext';

describe('collaborators', () => {
  it('FixedClock should return copies of the same instant', () => {
    const clock = new FixedClock(new Date('2024-05-01T10:00:00Z'));
    const first = clock.now();
    first.setFullYear(2000);

    expect(clock.now().toISOString()).toBe('2024-05-01T10:00:00.000Z');
  });

  it('SystemClock should return the current time', () => {
    const before = Date.now();
    const now = new SystemClock().now().getTime();

    expect(now).toBeGreaterThanOrEqual(before);
    expect(now).toBeLessThanOrEqual(Date.now());
  });

  it('UUIDGenerator should not repeat identifiers', () => {
    const generator = new UUIDGenerator();
    const ids = new Set(Array.from({ length: 50 }, () => generator.generateID()));

    expect(ids.size).toBe(50);
  });
});
