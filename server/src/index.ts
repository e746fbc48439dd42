import process from 'process';

import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './config.js';
import { openDatabase } from './db.js';
import { runBudgetAlertSweep } from './jobs/budgetAlerts.js';
import { runMonthlyReports } from './jobs/monthlyReports.js';
import { every, monthly, Scheduler } from './jobs/scheduler.js';
import { logger, setLogLevel } from './logger.js';
import { LoggingNotificationSink, LoggingReportSink } from './notifications/sinks.js';
import { createJobRunStore, createStores } from './store/index.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    logger.fatal('Invalid configuration:', error);
    process.exit(1);
  }
}

function main(): void {
  const config = readConfig();
  setLogLevel(config.logLevel);

  const db = openDatabase(config.databasePath);
  const stores = createStores(db);

  const scheduler = new Scheduler(config.schedulerTickMs, createJobRunStore(db));
  const notifications = new LoggingNotificationSink();
  const reports = new LoggingReportSink();

  scheduler.register({
    name: 'budget-alert-sweep',
    due: every(config.alertSweepIntervalMs),
    run: () => runBudgetAlertSweep(
      { budgets: stores.budgets, transactions: stores.transactions, sink: notifications },
      { threshold: config.alertThreshold, cooldownMs: config.alertCooldownMs },
    ),
  });
  scheduler.register({
    name: 'monthly-reports',
    due: monthly(),
    run: () => runMonthlyReports({ transactions: stores.transactions, sink: reports }),
  });

  const app = createApp(stores, { maxPageSize: config.maxPageSize });
  const server = app.listen(config.port, () => {
    logger.info(`API server running on http://localhost:${config.port}`);
  });
  scheduler.start();

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    scheduler.stop();
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
