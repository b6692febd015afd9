import type { QueueEntry } from '../audio/queueEntry';
import type MusicService from '../services/music';

export type ChannelId = string;
export type UserId = string;

export type CompletionCallback = (error?: Error) => void;

/**
 * One resolved, playable media source. `start` may be called once; the
 * callback it receives fires exactly once, on natural end, on `stop()` or on
 * a playback error.
 */
export interface PlaybackHandle {
    readonly title: string;
    readonly durationSeconds: number | null;
    /** 0.0 - 2.0 */
    volume: number;
    start(onFinish: CompletionCallback): void;
    pause(): void;
    resume(): void;
    stop(): void;
    isFinished(): boolean;
}

export interface TransportHandle {
    readonly channelId: ChannelId;
    /** false once the connection has dropped and could not recover */
    isConnected(): boolean;
    move(channelId: ChannelId): Promise<void>;
    disconnect(): Promise<void>;
}

export interface TransportProvider {
    connect(channelId: ChannelId): Promise<TransportHandle>;
}

export interface SourceResolver {
    resolve(query: string): Promise<PlaybackHandle>;
}

export type PlaybackEvent =
    | { kind: 'enqueued'; entry: QueueEntry; position: number }
    | { kind: 'nowPlaying'; entry: QueueEntry }
    | { kind: 'voteRecorded'; entry: QueueEntry; votes: number; required: number }
    | { kind: 'skipped'; entry: QueueEntry; reason: 'requester' | 'quorum' };

export interface Notifier {
    notify(channelId: ChannelId, event: PlaybackEvent): Promise<void> | void;
}

export type SkipDecision =
    | { kind: 'forced' }
    | { kind: 'alreadyVoted'; votes: number }
    | { kind: 'voteRecorded'; votes: number; required: number }
    | { kind: 'quorumReached'; votes: number };

export type VoteOutcome = SkipDecision | { kind: 'nothingPlaying' };

export type PlaybackStatus =
    | { state: 'idle' }
    | { state: 'playing'; entry: QueueEntry }
    | { state: 'paused'; entry: QueueEntry };

export interface CommandContext {
    guildId: string;
    userId: UserId;
    textChannelId: ChannelId;
    /** voice channel the invoking member is in, if any */
    voiceChannelId: ChannelId | null;
    options: {
        query?: string;
        volume?: number;
        channelId?: ChannelId;
    };
    defer(): Promise<void>;
    reply(content: string): Promise<void>;
}

export interface Command {
    name: string;
    description: string;
    execute(context: CommandContext, music: MusicService): Promise<void>;
}
