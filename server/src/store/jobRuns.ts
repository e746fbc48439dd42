import type { Db } from '../db.js';
import type { RunHistory } from '../jobs/scheduler.js';

/** Last start time of each scheduled job, kept across restarts */
export function createJobRunStore(db: Db): RunHistory {
  const select = db.prepare<[string], { last_run_at: string }>(
    'SELECT last_run_at FROM job_runs WHERE name = ?',
  );
  const upsert = db.prepare(`
    INSERT INTO job_runs (name, last_run_at) VALUES (?, ?)
    ON CONFLICT(name) DO UPDATE SET last_run_at = excluded.last_run_at
  `);

  return {
    lastRun(name) {
      const row = select.get(name);
      return row ? new Date(row.last_run_at) : null;
    },
    record(name, at) {
      upsert.run(name, at.toISOString());
    },
  };
}
