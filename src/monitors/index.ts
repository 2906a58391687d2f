import { setTimeout as delay } from 'node:timers/promises';
import { STARTUP_NOTICE } from '../services/alert-composer.js';
import type { MessageSink } from '../services/alerter.js';
import { CategoryPipeline } from '../services/category-pipeline.js';
import type { PageFetcher } from '../services/page-fetcher.js';
import type { AlertMessage, Config, PassSummary } from '../types.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const log = createLogger('Monitor');

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface MonitorOptions {
  /** Idle slice between schedule checks. */
  tickMs?: number;
  /** Pause after each successful delivery. */
  pacingMs?: number;
  now?: () => number;
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
};

export class MonitorOrchestrator {
  private sink: MessageSink;
  private config: Config;
  private pipeline: CategoryPipeline;
  private tickMs: number;
  private pacingMs: number;
  private now: () => number;
  private sleep: Sleep;
  private controller: AbortController | null = null;
  private lastPassAt: number | null = null;
  private lastSummary: PassSummary | null = null;

  constructor(sink: MessageSink, fetcher: PageFetcher, config: Config, options: MonitorOptions = {}) {
    this.sink = sink;
    this.config = config;
    this.tickMs = options.tickMs ?? 2000;
    this.pacingMs = options.pacingMs ?? 600;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.pipeline = new CategoryPipeline(fetcher, config.run, config.source.baseUrl, () => new Date(this.now()));
  }

  /**
   * Sends the startup notice, runs a pass straight away, then keeps checking
   * every tick whether the poll interval has elapsed since the previous pass
   * finished. Resolves once {@link stop} is called or `signal` aborts.
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.controller) {
      log.warn('Monitor is already running');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) controller.abort();

    const intervalMs = this.config.run.pollIntervalMinutes * 60_000;
    log.info(
      `Starting monitor for ${this.config.categories.length} categories (interval: ${this.config.run.pollIntervalMinutes} min)`,
    );

    try {
      await this.sendStartupNotice();
      if (!controller.signal.aborted) await this.runScheduledPass();

      while (!controller.signal.aborted) {
        await this.sleep(this.tickMs, controller.signal);
        if (controller.signal.aborted) break;

        if (this.lastPassAt === null || this.now() - this.lastPassAt >= intervalMs) {
          await this.runScheduledPass();
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.controller = null;
      log.info('Stopped monitor');
    }
  }

  stop(): void {
    this.controller?.abort();
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  getLastSummary(): PassSummary | null {
    return this.lastSummary;
  }

  /** One sequential sweep over every configured category. */
  async runPass(): Promise<PassSummary> {
    const summary: PassSummary = {
      categoriesChecked: 0,
      categoriesFailed: 0,
      listingsFound: 0,
      alertsComposed: 0,
      alertsSent: 0,
      alertsFailed: 0,
      startedAt: new Date(this.now()).toISOString(),
      finishedAt: '',
    };

    log.info('Running deal check...');

    for (const target of this.config.categories) {
      summary.categoriesChecked++;

      try {
        const result = await this.pipeline.process(target);
        if (result.fetchFailed) summary.categoriesFailed++;
        summary.listingsFound += result.listingsFound;
        summary.alertsComposed += result.messages.length;

        for (const message of result.messages) {
          if (await this.dispatch(message)) {
            summary.alertsSent++;
            await this.sleep(this.pacingMs);
          } else {
            summary.alertsFailed++;
          }
        }
      } catch (error) {
        summary.categoriesFailed++;
        log.warn(`Error checking ${target.name}: ${errorMessage(error)}`);
      }
    }

    summary.finishedAt = new Date(this.now()).toISOString();
    this.lastSummary = summary;
    log.info(`Sent ${summary.alertsSent} alert(s).`);
    return summary;
  }

  private async runScheduledPass(): Promise<void> {
    try {
      await this.runPass();
    } catch (error) {
      log.error(`Deal check failed: ${errorMessage(error)}`);
    } finally {
      this.lastPassAt = this.now();
    }
  }

  private async dispatch(message: AlertMessage): Promise<boolean> {
    try {
      await this.sink.deliver(this.config.discord.alertChannelId, message.text);
      return true;
    } catch (error) {
      log.warn(`Failed to send alert for "${message.listing.title}" (${message.category}): ${errorMessage(error)}`);
      return false;
    }
  }

  private async sendStartupNotice(): Promise<void> {
    try {
      await this.sink.deliver(this.config.discord.alertChannelId, STARTUP_NOTICE);
    } catch (error) {
      log.error(`Failed to send startup message: ${errorMessage(error)}`);
    }
  }
}
