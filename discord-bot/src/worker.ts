import type { Client } from 'discord.js';
import { buildApp, type App } from './app.js';
import { startCommandBot } from './cmd.js';
import { loadConfig, loadEnvFiles } from './config.js';
import { describeError } from './errors.js';

async function runOnce(app: App) {
  const [events, trains, summary] = await Promise.all([
    app.announcers.events.tick(),
    app.announcers.trains.tick(),
    app.summary.run(),
  ]);
  console.log('Worker run complete', {
    events: events.announced.length,
    trains: trains.announced.length,
    summary: summary.status,
  });
}

async function main() {
  loadEnvFiles();
  const app = await buildApp(loadConfig());

  if (app.config.runOnce) {
    await runOnce(app);
    await app.close();
    return;
  }

  for (const scheduler of app.schedulers) scheduler.start();

  let client: Client | null = null;
  try {
    client = await startCommandBot(app);
  } catch (err) {
    // schedulers keep running without the command surface
    console.error('Command bot failed to start', { err: describeError(err) });
  }

  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}; waiting for in-flight ticks`);
    await app.close();
    await client?.destroy();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch(err => {
      console.error('Shutdown failed', { err: describeError(err) });
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

main().catch(err => {
  console.error('Worker failed to start', err);
  process.exit(1);
});
