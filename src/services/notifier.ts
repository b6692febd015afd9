import { Client } from 'discord.js';
import { ChannelId, Notifier, PlaybackEvent } from '../types';
import { formatEvent } from '../utils';

export default class DiscordNotifier implements Notifier {
    constructor(private readonly client: Client) {}

    async notify(channelId: ChannelId, event: PlaybackEvent): Promise<void> {
        const channel = await this.client.channels.fetch(channelId);
        if (!channel || !channel.isSendable()) {
            console.warn(`[notifier] channel ${channelId} is not sendable, dropping ${event.kind}`);
            return;
        }
        await channel.send(formatEvent(event));
    }
}
