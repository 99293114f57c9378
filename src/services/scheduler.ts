import * as cron from 'node-cron';
import { config } from '../config';
import { RecentTargetRegistry } from './target-registry';

/**
 * Scheduler handles the registry sweep: expired recent-target entries are
 * dropped for every community, including ones that have gone quiet and so
 * never prune themselves on write.
 */
export class Scheduler {
  private registry: RecentTargetRegistry;
  private cronExpression: string;
  private sweepTask: cron.ScheduledTask | null = null;

  constructor(registry: RecentTargetRegistry, cronExpression: string = config.schedule.registrySweepCron) {
    this.registry = registry;
    this.cronExpression = cronExpression;
  }

  start(): void {
    if (this.sweepTask) return;

    if (!cron.validate(this.cronExpression)) {
      console.error(`[scheduler] Invalid sweep cron "${this.cronExpression}", registry sweep disabled`);
      return;
    }

    this.sweepTask = cron.schedule(this.cronExpression, () => {
      this.runSweep();
    });
    console.log(`[scheduler] Registry sweep active (cron: ${this.cronExpression})`);
  }

  stop(): void {
    if (this.sweepTask) {
      this.sweepTask.stop();
      this.sweepTask = null;
    }
    console.log('[scheduler] Stopped');
  }

  isRunning(): boolean {
    return this.sweepTask !== null;
  }

  /**
   * Run a single sweep. Also callable directly by an operator or a test.
   */
  runSweep(): number {
    try {
      const removed = this.registry.pruneAll();
      console.log(
        `[scheduler] Registry sweep removed ${removed} expired entries (${this.registry.communityCount()} communities left)`
      );
      return removed;
    } catch (error) {
      console.error('[scheduler] Error in registry sweep:', error);
      return 0;
    }
  }
}
