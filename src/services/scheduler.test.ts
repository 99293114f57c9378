import { afterEach, describe, it, expect, vi } from 'vitest';
import { BASE_TIME, hoursAfter } from '../test/helpers';
import { Scheduler } from './scheduler';
import { RecentTargetRegistry } from './target-registry';

const { schedule, validate } = vi.hoisted(() => ({ schedule: vi.fn(), validate: vi.fn() }));

vi.mock('node-cron', () => ({ schedule, validate }));

function staleRegistry() {
  const clock = { now: BASE_TIME };
  const registry = new RecentTargetRegistry({ now: () => clock.now });
  registry.record('c1', 'u1');
  registry.record('c2', 'u2');
  clock.now = hoursAfter(BASE_TIME, 8 * 24);
  return registry;
}

afterEach(() => {
  vi.restoreAllMocks();
  schedule.mockReset();
  validate.mockReset();
});

describe('Scheduler', () => {
  it('schedules the registry sweep and stops it', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const stop = vi.fn();
    validate.mockReturnValue(true);
    schedule.mockReturnValue({ stop });
    const registry = staleRegistry();
    const scheduler = new Scheduler(registry, '*/5 * * * *');

    scheduler.start();
    expect(schedule).toHaveBeenCalledWith('*/5 * * * *', expect.any(Function));
    expect(scheduler.isRunning()).toBe(true);

    const sweep = schedule.mock.calls[0][1];
    sweep();
    expect(registry.communityCount()).toBe(0);

    scheduler.stop();
    expect(stop).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning()).toBe(false);
  });

  it('does not schedule twice', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    validate.mockReturnValue(true);
    schedule.mockReturnValue({ stop: vi.fn() });
    const scheduler = new Scheduler(staleRegistry(), '0 * * * *');

    scheduler.start();
    scheduler.start();

    expect(schedule).toHaveBeenCalledTimes(1);
  });

  it('skips an invalid cron expression', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    validate.mockReturnValue(false);
    const scheduler = new Scheduler(staleRegistry(), 'every tuesday');

    scheduler.start();

    expect(schedule).not.toHaveBeenCalled();
    expect(scheduler.isRunning()).toBe(false);
    expect(error).toHaveBeenCalledWith('[scheduler] Invalid sweep cron "every tuesday", registry sweep disabled');
  });

  it('reports how many entries a sweep removed', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const scheduler = new Scheduler(staleRegistry(), '0 * * * *');

    expect(scheduler.runSweep()).toBe(2);
  });
});
