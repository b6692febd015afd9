import ChannelPlayer from '../audio/channelPlayer';
import PlaybackRegistry from '../audio/playbackRegistry';
import { createQueueEntry, QueueEntry } from '../audio/queueEntry';
import {
    ChannelId,
    Notifier,
    PlaybackHandle,
    PlaybackStatus,
    SourceResolver,
    TransportHandle,
    TransportProvider,
    UserId,
    VoteOutcome,
} from '../types';
import { TransportError } from '../utils/errors';
import { KeyedTaskQueue } from '../utils/taskQueue';

export interface MusicServiceOptions {
    transport: TransportProvider;
    /** resolvers are per guild, since a source plays through that guild's connection */
    resolverFor: (guildId: string) => SourceResolver;
    notifier?: Notifier;
    quorum?: number;
}

export interface PlayRequest {
    guildId: string;
    requesterId: UserId;
    /** where "enqueued" / "now playing" messages go */
    textChannelId: ChannelId;
    voiceChannelId: ChannelId | null;
    query: string;
}

/**
 * The operations the command layer invokes. Each guild has at most one
 * ChannelPlayer; asynchronous operations for a guild run one at a time.
 */
export default class MusicService {
    readonly registry: PlaybackRegistry;
    private readonly transport: TransportProvider;
    private readonly resolverFor: (guildId: string) => SourceResolver;
    private readonly tasks = new KeyedTaskQueue();

    constructor(options: MusicServiceOptions) {
        this.transport = options.transport;
        this.resolverFor = options.resolverFor;
        const { notifier, quorum } = options;
        this.registry = new PlaybackRegistry((guildId) => new ChannelPlayer(guildId, { notifier, quorum }));
    }

    /** Connects to a voice channel; fails if already connected to a different one. */
    join(guildId: string, voiceChannelId: ChannelId): Promise<ChannelPlayer> {
        return this.tasks.run(guildId, async () => {
            const transport = this.liveTransport(guildId);
            if (transport && transport.channelId !== voiceChannelId) {
                throw new TransportError('alreadyConnectedElsewhere', 'Already connected to another voice channel in this server.');
            }
            return this.connect(guildId, voiceChannelId);
        });
    }

    /** Connects to the caller's voice channel, moving there if connected elsewhere. */
    summon(guildId: string, voiceChannelId: ChannelId | null): Promise<ChannelPlayer> {
        return this.tasks.run(guildId, () => this.summonNow(guildId, voiceChannelId));
    }

    enqueue(guildId: string, requesterId: UserId, source: PlaybackHandle, notifyChannelId: ChannelId = guildId): QueueEntry {
        const entry = createQueueEntry(requesterId, notifyChannelId, source);
        this.registry.getOrCreate(guildId).enqueue(entry);
        return entry;
    }

    /**
     * Resolves the query, makes sure the bot is in voice, then enqueues. The
     * resolve happens first so a failure at any step leaves the guild untouched.
     */
    play(request: PlayRequest): Promise<QueueEntry> {
        const { guildId, requesterId, textChannelId, voiceChannelId, query } = request;
        return this.tasks.run(guildId, async () => {
            const source = await this.resolverFor(guildId).resolve(query);
            if (!this.liveTransport(guildId)) {
                await this.summonNow(guildId, voiceChannelId);
            }
            return this.enqueue(guildId, requesterId, source, textChannelId);
        });
    }

    pause(guildId: string): boolean {
        return this.registry.get(guildId)?.pause() ?? false;
    }

    resume(guildId: string): boolean {
        return this.registry.get(guildId)?.resume() ?? false;
    }

    voteSkip(guildId: string, voterId: UserId): VoteOutcome {
        return this.registry.get(guildId)?.voteSkip(voterId) ?? { kind: 'nothingPlaying' };
    }

    setVolume(guildId: string, percent: number): number | null {
        return this.registry.get(guildId)?.setVolume(percent) ?? null;
    }

    status(guildId: string): PlaybackStatus {
        return this.registry.get(guildId)?.status() ?? { state: 'idle' };
    }

    upcoming(guildId: string): readonly QueueEntry[] {
        return this.registry.get(guildId)?.upcoming() ?? [];
    }

    /** Idempotent; a guild without a player is left alone. */
    stop(guildId: string): Promise<void> {
        return this.tasks.run(guildId, async () => {
            const player = this.registry.remove(guildId);
            if (!player) return;
            await player.stop();
            console.log(`[MusicService] guild=${guildId} stopped and left voice`);
        });
    }

    async unload(): Promise<void> {
        const guilds = this.registry.keys();
        console.log(`[MusicService] Unloading ${guilds.length} player(s)`);
        await Promise.all(guilds.map((guildId) => this.stop(guildId)));
    }

    private async summonNow(guildId: string, voiceChannelId: ChannelId | null): Promise<ChannelPlayer> {
        if (!voiceChannelId) {
            throw new TransportError('noVoiceChannel', 'You must be in a voice channel to play music.');
        }
        const player = this.registry.get(guildId);
        const transport = this.liveTransport(guildId);
        if (player && transport) {
            if (transport.channelId !== voiceChannelId) {
                await transport.move(voiceChannelId);
            }
            return player;
        }
        return this.connect(guildId, voiceChannelId);
    }

    private async connect(guildId: string, voiceChannelId: ChannelId): Promise<ChannelPlayer> {
        const existing = this.registry.get(guildId);
        if (existing && this.liveTransport(guildId)?.channelId === voiceChannelId) return existing;
        if (existing?.transport) {
            console.log(`[MusicService] guild=${guildId} voice connection lost, reconnecting`);
        }

        // connect before creating anything so a failure leaves no player behind
        const handle = await this.transport.connect(voiceChannelId);
        const player = this.registry.getOrCreate(guildId);
        player.attachTransport(handle);
        console.log(`[MusicService] guild=${guildId} joined voice channel ${voiceChannelId}`);
        return player;
    }

    /** The guild's transport, unless its connection has dropped. */
    private liveTransport(guildId: string): TransportHandle | null {
        const transport = this.registry.get(guildId)?.transport;
        return transport?.isConnected() ? transport : null;
    }
}
