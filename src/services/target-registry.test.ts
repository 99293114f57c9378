import { describe, it, expect } from 'vitest';
import { BASE_TIME, hoursAfter } from '../test/helpers';
import { RecentTargetRegistry } from './target-registry';

function registryAt(start: Date) {
  const clock = { now: start };
  const registry = new RecentTargetRegistry({ now: () => clock.now });
  return { registry, clock };
}

describe('RecentTargetRegistry', () => {
  it('keeps an entry for the retention window', () => {
    const { registry, clock } = registryAt(BASE_TIME);
    registry.record('c1', 'u1');

    clock.now = hoursAfter(BASE_TIME, 6 * 24);
    expect(registry.lastTargeted('c1', 'u1')).toEqual(BASE_TIME);
  });

  it('hides an entry 8 days after it was written, even before any prune', () => {
    const { registry, clock } = registryAt(BASE_TIME);
    registry.record('c1', 'u1');

    clock.now = hoursAfter(BASE_TIME, 8 * 24);
    expect(registry.lastTargeted('c1', 'u1')).toBeUndefined();
    expect(registry.entries('c1')).toEqual([]);
    expect(registry.wasRecentlyTargeted('c1', 'u1', 24 * 30)).toBe(false);
  });

  it('checks the exclusion window in hours', () => {
    const { registry, clock } = registryAt(BASE_TIME);
    registry.record('c1', 'u1');

    clock.now = hoursAfter(BASE_TIME, 1);
    expect(registry.wasRecentlyTargeted('c1', 'u1', 24)).toBe(true);

    clock.now = hoursAfter(BASE_TIME, 25);
    expect(registry.wasRecentlyTargeted('c1', 'u1', 24)).toBe(false);
  });

  it('keeps communities separate', () => {
    const { registry } = registryAt(BASE_TIME);
    registry.record('c1', 'u1');

    expect(registry.wasRecentlyTargeted('c2', 'u1', 24)).toBe(false);
    expect(registry.entries('c2')).toEqual([]);
  });

  it('reports selection stats', () => {
    const { registry, clock } = registryAt(BASE_TIME);
    registry.record('c1', 'u1');
    clock.now = hoursAfter(BASE_TIME, 30);
    registry.record('c1', 'u2');
    clock.now = hoursAfter(BASE_TIME, 36);

    const stats = registry.stats('c1');
    expect(stats.totalRecentTargets).toBe(2);
    expect(stats.targetsInLast24h).toBe(1);
    expect(stats.oldestTargetAgeHours).toBeCloseTo(36);
  });

  it('reports zero stats for an unknown community', () => {
    const { registry } = registryAt(BASE_TIME);
    expect(registry.stats('nowhere')).toEqual({
      totalRecentTargets: 0,
      targetsInLast24h: 0,
      oldestTargetAgeHours: 0,
    });
  });

  it('prunes expired entries on write to the same community', () => {
    const { registry, clock } = registryAt(BASE_TIME);
    registry.record('c1', 'u1');

    clock.now = hoursAfter(BASE_TIME, 8 * 24);
    registry.record('c1', 'u2');

    expect(registry.entries('c1').map(entry => entry.userId)).toEqual(['u2']);
  });

  it('sweeps every community and drops empty ones', () => {
    const { registry, clock } = registryAt(BASE_TIME);
    registry.record('c1', 'u1');
    clock.now = hoursAfter(BASE_TIME, 24);
    registry.record('c2', 'u2');

    clock.now = hoursAfter(BASE_TIME, 7.5 * 24);
    expect(registry.pruneAll()).toBe(1);
    expect(registry.communityCount()).toBe(1);
    expect(registry.entries('c2').map(entry => entry.userId)).toEqual(['u2']);
  });

  it('resets one community', () => {
    const { registry } = registryAt(BASE_TIME);
    registry.record('c1', 'u1');
    registry.record('c2', 'u1');

    registry.reset('c1');
    expect(registry.stats('c1').totalRecentTargets).toBe(0);
    expect(registry.stats('c2').totalRecentTargets).toBe(1);
  });
});
