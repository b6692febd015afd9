import {
    DiscordGatewayAdapterCreator,
    entersState,
    getVoiceConnection,
    joinVoiceChannel,
    VoiceConnection,
    VoiceConnectionStatus,
} from '@discordjs/voice';
import { Client, VoiceBasedChannel } from 'discord.js';
import { ChannelId, TransportHandle, TransportProvider } from '../types';
import { TransportError } from '../utils/errors';

export const READY_TIMEOUT_MS = 10_000;
export const RECONNECT_TIMEOUT_MS = 5_000;

const isLive = (connection: VoiceConnection) =>
    connection.state.status !== VoiceConnectionStatus.Disconnected &&
    connection.state.status !== VoiceConnectionStatus.Destroyed;

async function fetchVoiceChannel(client: Client, channelId: ChannelId): Promise<VoiceBasedChannel> {
    const channel = await client.channels.fetch(channelId).catch((e: unknown) => {
        throw new TransportError('notAVoiceDestination', `Channel ${channelId} could not be found.`, e);
    });
    if (!channel || !channel.isVoiceBased()) {
        throw new TransportError('notAVoiceDestination', 'That is not a voice channel.');
    }
    return channel;
}

export class DiscordTransportHandle implements TransportHandle {
    private currentChannelId: ChannelId;

    constructor(
        private readonly client: Client,
        private readonly connection: VoiceConnection,
        channelId: ChannelId,
    ) {
        this.currentChannelId = channelId;
        this.connection.on(VoiceConnectionStatus.Disconnected, () => {
            void this.recover();
        });
    }

    get channelId(): ChannelId {
        return this.currentChannelId;
    }

    isConnected(): boolean {
        return isLive(this.connection);
    }

    async move(channelId: ChannelId): Promise<void> {
        const channel = await fetchVoiceChannel(this.client, channelId);
        const moved = this.connection.rejoin({ channelId: channel.id, selfDeaf: true, selfMute: false });
        if (!moved) {
            throw new TransportError('connectFailed', `Could not move to ${channel.name}.`);
        }
        this.currentChannelId = channel.id;
        console.log(`[DiscordTransport] guild=${channel.guild.id} moved to ${channel.name}`);
    }

    async disconnect(): Promise<void> {
        if (this.connection.state.status === VoiceConnectionStatus.Destroyed) return;
        this.connection.destroy();
    }

    // a move or a brief network drop passes through Signalling/Connecting; a kick does not
    private async recover(): Promise<void> {
        console.log(`[DiscordTransport] channel=${this.currentChannelId} Voice connection disconnected`);
        try {
            await Promise.race([
                entersState(this.connection, VoiceConnectionStatus.Signalling, RECONNECT_TIMEOUT_MS),
                entersState(this.connection, VoiceConnectionStatus.Connecting, RECONNECT_TIMEOUT_MS),
            ]);
        } catch {
            console.log(`[DiscordTransport] channel=${this.currentChannelId} Voice connection destroyed after timeout`);
            if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
                this.connection.destroy();
            }
        }
    }
}

export default class DiscordTransportProvider implements TransportProvider {
    constructor(private readonly client: Client) {}

    async connect(channelId: ChannelId): Promise<TransportHandle> {
        const channel = await fetchVoiceChannel(this.client, channelId);
        const guildId = channel.guild.id;

        let existing = getVoiceConnection(guildId);
        if (existing && !isLive(existing)) {
            console.log(`[DiscordTransport] guild=${guildId} Dropping dead voice connection`);
            existing.destroy();
            existing = undefined;
        }
        if (existing && existing.joinConfig.channelId !== channel.id) {
            throw new TransportError('alreadyConnectedElsewhere', 'Already connected to another voice channel in this server.');
        }

        console.log(`[DiscordTransport] guild=${guildId} Creating new voice connection to ${channel.name}`);
        const connection = existing ?? joinVoiceChannel({
            channelId: channel.id,
            guildId,
            adapterCreator: channel.guild.voiceAdapterCreator as DiscordGatewayAdapterCreator,
            selfDeaf: true,
        });

        try {
            await entersState(connection, VoiceConnectionStatus.Ready, READY_TIMEOUT_MS);
        } catch (e) {
            connection.destroy();
            throw new TransportError('connectFailed', `Could not connect to ${channel.name}.`, e);
        }
        return new DiscordTransportHandle(this.client, connection, channel.id);
    }
}
