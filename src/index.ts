import { Events } from 'discord.js';
import { createClient, runMonitor } from './bot.js';
import { configWarnings, loadConfig } from './config.js';
import { ConfigError } from './errors.js';
import { MonitorOrchestrator } from './monitors/index.js';
import { DiscordAlerter } from './services/alerter.js';
import { HttpPageFetcher } from './services/page-fetcher.js';
import type { Config } from './types.js';
import { createLogger, errorMessage, setLogLevel } from './utils/logger.js';

const log = createLogger('Main');

function readConfig(): Config | null {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        log.error(issue);
      }
      return null;
    }
    throw error;
  }
}

async function main(): Promise<void> {
  log.info('Starting Deal Watch Bot...');

  const config = readConfig();
  if (!config) {
    log.error('Configuration invalid, not starting');
    process.exitCode = 1;
    return;
  }

  setLogLevel(config.logLevel);
  for (const warning of configWarnings(config)) {
    log.warn(warning);
  }
  log.info(`Configuration loaded (${config.categories.length} categories)`);

  const client = createClient();
  const monitor = new MonitorOrchestrator(new DiscordAlerter(client), new HttpPageFetcher(config.source), config);
  const shutdownController = new AbortController();

  client.once(Events.ClientReady, (readyClient) => {
    log.info(`Logged in as ${readyClient.user.tag}`);

    runMonitor(monitor, client, shutdownController.signal).catch((error: unknown) => {
      log.error(`Monitor crashed: ${errorMessage(error)}`);
      process.exitCode = 1;
    });
  });

  const shutdown = () => {
    log.info('Shutting down...');
    shutdownController.abort();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await client.login(config.discord.token);
}

main().catch((error: unknown) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
