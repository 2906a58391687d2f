import { Client, GatewayIntentBits } from 'discord.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Bot');

export function createClient(): Client {
  return new Client({
    intents: [GatewayIntentBits.Guilds],
  });
}

export interface Startable {
  start(signal?: AbortSignal): Promise<void>;
}

/**
 * Runs the monitor once the client is ready and destroys the client when the
 * monitor returns. A shutdown requested before ready skips the monitor.
 */
export async function runMonitor(
  monitor: Startable,
  client: Pick<Client, 'destroy'>,
  signal: AbortSignal,
): Promise<void> {
  try {
    if (signal.aborted) {
      log.info('Shutdown requested before ready, not starting monitor');
      return;
    }
    await monitor.start(signal);
  } finally {
    await client.destroy();
  }
}
