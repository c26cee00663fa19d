import { Api } from 'grammy';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { MIGRATIONS_FOLDER, closeDb, createDb, createTrackedItemStore } from '@stayhound/shared';
import { createDefaultRegistry, resolveFetchers } from '@stayhound/listing-scraper';
import { TASK_NAMES, createAgent } from './agent.js';
import { loadConfig, toAgentSettings } from './config.js';
import { createControlServer } from './http.js';
import { createTelegramNotifier } from './notifier.js';
import { Scheduler } from './scheduler/scheduler.js';
import { createShutdownHandler } from './shutdown.js';

const DRAIN_TIMEOUT_MS = 30_000;

async function main() {
  const config = loadConfig();
  const db = createDb(config.databaseUrl);

  console.log('Running database migrations...');
  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
  console.log('Migrations complete');

  const registry = createDefaultRegistry({ booking: { proxyUrl: config.proxyUrl } });
  const agent = createAgent({
    store: createTrackedItemStore(db),
    fetchers: resolveFetchers(registry, config.sources),
    notifier: createTelegramNotifier(new Api(config.telegramBotToken), config.telegramChatId),
    criteria: config.criteria,
    settings: toAgentSettings(config),
  });

  if (config.runMode === 'once') {
    try {
      const summary = await agent.searchAndProcess();
      console.log(JSON.stringify(summary, null, 2));
      if (summary.error) process.exitCode = 1;
    } finally {
      await closeDb(db);
    }
    return;
  }

  const scheduler = new Scheduler({ tickIntervalMs: config.schedule.tickSeconds * 1000 });
  agent.registerTasks(scheduler);

  const server = createControlServer({
    getStatus: () => agent.getStatus(),
    runNow: () => scheduler.triggerTask(TASK_NAMES.search),
    testNotify: () => agent.testNotify(),
  });
  server.listen(config.httpPort);

  const shutdown = createShutdownHandler({
    scheduler,
    server,
    closeDb: () => closeDb(db),
    drainTimeoutMs: DRAIN_TIMEOUT_MS,
  });
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  scheduler.start();
  console.log(`Agent service started, control surface on port ${config.httpPort}`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
