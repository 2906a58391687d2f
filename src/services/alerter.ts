import type { Client } from 'discord.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Alerter');

/** Anything that can deliver a plain-text message to a recipient. */
export interface MessageSink {
  deliver(recipient: string, text: string): Promise<void>;
}

interface SendableChannel {
  send(content: string): Promise<unknown>;
}

export class DiscordAlerter implements MessageSink {
  private client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  async deliver(channelId: string, text: string): Promise<void> {
    const channel = await this.getChannel(channelId);
    if (!channel) {
      throw new Error(`Channel ${channelId} is not a text channel the bot can post to`);
    }

    await channel.send(text);
    log.debug(`Delivered message to channel ${channelId}`);
  }

  private async getChannel(channelId: string): Promise<SendableChannel | null> {
    const channel = await this.client.channels.fetch(channelId);
    if (channel?.isTextBased() && 'send' in channel) {
      return channel;
    }
    return null;
  }
}
