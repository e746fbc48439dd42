import { summarizeBudget, todayIso } from '../domain/computations.js';
import { DEFAULT_ALERT_THRESHOLD, type Budget } from '../domain/types.js';
import { createLogger } from '../logger.js';
import type { NotificationSink } from '../notifications/sinks.js';
import type { BudgetStore, TransactionStore } from '../store/index.js';

const log = createLogger('alerts');

export interface AlertSweepDeps {
  budgets: Pick<BudgetStore, 'listActive' | 'markAlerted'>;
  transactions: Pick<TransactionStore, 'listForCategory'>;
  sink: NotificationSink;
}

export interface AlertSweepOptions {
  threshold?: number;
  /** 0 re-alerts on every sweep */
  cooldownMs?: number;
  now?: Date;
}

export interface SweepResult {
  evaluated: number;
  alerted: number;
  failed: number;
  suppressed: number;
}

function inCooldown(budget: Budget, cooldownMs: number, now: Date): boolean {
  if (cooldownMs <= 0 || budget.lastAlertedAt === null) return false;
  return now.getTime() - Date.parse(budget.lastAlertedAt) < cooldownMs;
}

/**
 * One pass over every active budget of every user. Budgets at or above the
 * threshold are sent to the sink; a failed send is logged and the pass
 * moves on to the next budget.
 */
export async function runBudgetAlertSweep(
  deps: AlertSweepDeps,
  options: AlertSweepOptions = {},
): Promise<SweepResult> {
  const threshold = options.threshold ?? DEFAULT_ALERT_THRESHOLD;
  const cooldownMs = options.cooldownMs ?? 0;
  const now = options.now ?? new Date();

  const result: SweepResult = { evaluated: 0, alerted: 0, failed: 0, suppressed: 0 };
  const budgets = deps.budgets.listActive(todayIso(now));

  for (const budget of budgets) {
    const txns = deps.transactions.listForCategory(budget.userId, budget.categoryId);
    const status = summarizeBudget(budget, txns);
    result.evaluated++;

    if (status.percentageUsed < threshold) continue;

    if (inCooldown(budget, cooldownMs, now)) {
      result.suppressed++;
      continue;
    }

    try {
      await deps.sink.sendBudgetAlert({
        userId: budget.userId,
        budgetId: budget.id,
        budgetName: budget.name,
        percentageUsed: status.percentageUsed,
      });
    } catch (error) {
      result.failed++;
      log.error(`Failed to send alert for budget ${budget.id}:`, error);
      continue;
    }

    result.alerted++;
    try {
      deps.budgets.markAlerted(budget.id, now);
    } catch (error) {
      log.error(`Sent alert for budget ${budget.id} but could not record it:`, error);
    }
  }

  log.info('Budget alert sweep finished', result);
  return result;
}
