import { Channel } from '../config/types';
import { ChannelOutbound } from './types';

/** Dispatches each send to the adapter registered for its channel */
export class OutboundRouter implements ChannelOutbound {
  constructor(private readonly adapters: Record<Channel, ChannelOutbound>) {}

  async sendMessage(conversationKey: string, text: string, channel: Channel, signal?: AbortSignal): Promise<void> {
    await this.adapters[channel].sendMessage(conversationKey, text, channel, signal);
  }

  async sendTyping(conversationKey: string, channel: Channel): Promise<void> {
    await this.adapters[channel].sendTyping?.(conversationKey, channel);
  }
}
