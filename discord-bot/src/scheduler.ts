import cron from 'node-cron';
import { describeError } from './errors.js';

export type Cadence =
  | { kind: 'interval'; minutes: number }
  | { kind: 'daily'; times: string[]; timezone: string };

export function cadenceMs(cadence: Cadence): number | null {
  return cadence.kind === 'interval' ? cadence.minutes * 60_000 : null;
}

/** Cron expressions that fire on the given cadence, one per time-of-day for daily cadences. */
export function cronExpressions(cadence: Cadence): string[] {
  if (cadence.kind === 'interval') {
    const { minutes } = cadence;
    if (minutes === 1) return ['* * * * *'];
    if (minutes === 60) return ['0 * * * *'];
    return [`*/${minutes} * * * *`];
  }
  return cadence.times.map(t => {
    const [h, m] = t.split(':').map(Number);
    return `${m} ${h} * * *`;
  });
}

export type CronTask = { stop(): void };

export type ScheduleFn = (expression: string, fn: () => void, options: { timezone: string }) => CronTask;

const cronSchedule: ScheduleFn = (expression, fn, options) => cron.schedule(expression, fn, options);

/**
 * Fires `tick` on a fixed cadence. A firing that lands while the previous tick
 * is still running is skipped, not queued; missed firings are never replayed.
 * Errors thrown by `tick` are logged and do not stop the schedule.
 */
export class PollScheduler {
  private tasks: CronTask[] = [];
  private inFlight: Promise<void> | null = null;

  constructor(
    readonly name: string,
    readonly cadence: Cadence,
    private readonly tick: () => Promise<unknown>,
    private readonly schedule: ScheduleFn = cronSchedule,
  ) {}

  get running() {
    return this.tasks.length > 0;
  }

  start() {
    if (this.running) return;
    const timezone = this.cadence.kind === 'daily' ? this.cadence.timezone : 'UTC';
    this.tasks = cronExpressions(this.cadence).map(expr =>
      this.schedule(
        expr,
        () => {
          void this.runNow();
        },
        { timezone },
      ),
    );
    console.log(`Scheduling ${this.name} with cron '${cronExpressions(this.cadence).join("', '")}' TZ '${timezone}'`);
  }

  /** Runs a tick now unless one is in flight. Resolves true if this call ran the tick. */
  async runNow(): Promise<boolean> {
    if (this.inFlight) {
      console.warn(`[${this.name}] Previous tick still running; skipping this one`);
      return false;
    }
    const run = (async () => {
      try {
        await this.tick();
      } catch (err) {
        console.error(`[${this.name}] Tick failed`, { err: describeError(err) });
      }
    })();
    this.inFlight = run;
    try {
      await run;
    } finally {
      this.inFlight = null;
    }
    return true;
  }

  /** Stops future firings and waits for an in-flight tick to finish. */
  async stop() {
    for (const task of this.tasks) task.stop();
    this.tasks = [];
    if (this.inFlight) await this.inFlight;
  }
}
