import { currentMonth } from '../domain/computations.js';
import { createLogger } from '../logger.js';

const log = createLogger('scheduler');

/** Decides whether a job should run at `now`, given when it last ran (null: never) */
export type DueRule = (now: Date, lastRun: Date | null) => boolean;

export interface ScheduledJob {
  name: string;
  due: DueRule;
  run: () => Promise<unknown>;
}

/** Where job start times survive a restart */
export interface RunHistory {
  lastRun: (name: string) => Date | null;
  record: (name: string, at: Date) => void;
}

interface JobState {
  job: ScheduledJob;
  lastRun: Date | null;
  running: boolean;
}

/** Due when never run, or once `ms` have passed since the last run */
export function every(ms: number): DueRule {
  return (now, lastRun) => lastRun === null || now.getTime() - lastRun.getTime() >= ms;
}

/** Due when never run, or on the first tick in a later calendar month (UTC) */
export function monthly(): DueRule {
  return (now, lastRun) => lastRun === null || currentMonth(now) !== currentMonth(lastRun);
}

/**
 * Process-wide ticking loop. Each tick starts every due job that is not
 * still running from an earlier tick. A job's failure is logged and the
 * job stays scheduled.
 */
export class Scheduler {
  private readonly jobs: JobState[] = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly tickMs: number,
    private readonly history?: RunHistory,
  ) {}

  /** Registers a job, resuming from its recorded last run if there is one */
  register(job: ScheduledJob): void {
    const lastRun = this.history?.lastRun(job.name) ?? null;
    this.jobs.push({ job, lastRun, running: false });
    log.debug(`Registered job ${job.name}, last run ${lastRun?.toISOString() ?? 'never'}`);
  }

  async tick(now: Date = new Date()): Promise<void> {
    const started = this.jobs
      .filter((state) => !state.running && state.job.due(now, state.lastRun))
      .map((state) => this.runJob(state, now));
    await Promise.all(started);
  }

  /** Ticks once right away, then on every interval */
  start(): void {
    if (this.timer) return;
    const onTick = () => {
      this.tick().catch((error: unknown) => log.error('Scheduler tick failed:', error));
    };
    this.timer = setInterval(onTick, this.tickMs);
    this.timer.unref();
    log.info(`Scheduler started with ${this.jobs.length} job(s), tick ${this.tickMs}ms`);
    onTick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async runJob(state: JobState, now: Date): Promise<void> {
    state.running = true;
    state.lastRun = now;
    log.debug(`Running job ${state.job.name}`);
    try {
      this.history?.record(state.job.name, now);
      await state.job.run();
    } catch (error) {
      log.error(`Job ${state.job.name} failed:`, error);
    } finally {
      state.running = false;
    }
  }
}
