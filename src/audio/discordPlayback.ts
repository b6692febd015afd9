import {
    AudioPlayer,
    AudioPlayerStatus,
    AudioResource,
    createAudioPlayer,
    getVoiceConnection,
    NoSubscriberBehavior,
} from '@discordjs/voice';
import { CompletionCallback, PlaybackHandle } from '../types';
import { toError } from '../utils/errors';
import { MAX_VOLUME } from './channelPlayer';

export interface DiscordPlaybackOptions {
    guildId: string;
    title: string;
    durationSeconds: number | null;
    volume: number;
    /** opens the stream; called once, on start */
    load: () => Promise<AudioResource>;
}

const clampVolume = (value: number) => Math.min(Math.max(value, 0), MAX_VOLUME);

/**
 * A PlaybackHandle backed by its own @discordjs/voice AudioPlayer, subscribed
 * to the guild's voice connection when it starts.
 */
export default class DiscordPlaybackHandle implements PlaybackHandle {
    readonly guildId: string;
    readonly title: string;
    readonly durationSeconds: number | null;
    private readonly player: AudioPlayer;
    private readonly load: () => Promise<AudioResource>;
    private resource: AudioResource | null = null;
    private level: number;
    private onFinish: CompletionCallback | null = null;
    private finished = false;
    // AudioPlayer.pause() only takes effect while Playing; reapplied on that transition
    private pauseRequested = false;

    constructor(options: DiscordPlaybackOptions) {
        this.guildId = options.guildId;
        this.title = options.title;
        this.durationSeconds = options.durationSeconds;
        this.level = clampVolume(options.volume);
        this.load = options.load;
        this.player = createAudioPlayer({ behaviors: { noSubscriber: NoSubscriberBehavior.Pause } });
    }

    get volume(): number {
        return this.level;
    }

    set volume(value: number) {
        this.level = clampVolume(value);
        this.resource?.volume?.setVolume(this.level);
    }

    start(onFinish: CompletionCallback) {
        if (this.onFinish) {
            throw new Error(`Track already started: ${this.title}`);
        }
        this.onFinish = onFinish;
        this.setupPlayerListeners();
        getVoiceConnection(this.guildId)?.subscribe(this.player);

        this.load()
            .then((resource) => {
                if (this.finished) {
                    // stopped while the stream was opening
                    resource.playStream.destroy();
                    return;
                }
                this.resource = resource;
                resource.volume?.setVolume(this.level);
                this.player.play(resource);
                console.log(`[DiscordPlayback] guild=${this.guildId} ▶️ Started playing: ${this.title}`);
            })
            .catch((e) => {
                console.error(`[DiscordPlayback] guild=${this.guildId} Failed to open stream for ${this.title}:`, e);
                this.finish(toError(e));
            });
    }

    pause() {
        this.pauseRequested = true;
        this.player.pause();
    }

    resume() {
        this.pauseRequested = false;
        this.player.unpause();
    }

    stop() {
        this.finish();
        this.player.stop(true);
    }

    isFinished(): boolean {
        return this.finished;
    }

    private setupPlayerListeners() {
        this.player.on('stateChange', (oldState, newState) => {
            console.log(`[DiscordPlayback] guild=${this.guildId} Player state: ${oldState.status} -> ${newState.status}`);
            if (newState.status === AudioPlayerStatus.Idle && oldState.status !== AudioPlayerStatus.Idle) {
                this.finish();
            } else if (newState.status === AudioPlayerStatus.Playing && this.pauseRequested) {
                this.player.pause();
            }
        });

        this.player.on('error', (e) => {
            console.error(`[DiscordPlayback] guild=${this.guildId} Player error:`, e.message);
            this.finish(e);
        });
    }

    private finish(error?: Error) {
        if (this.finished) return;
        this.finished = true;
        this.onFinish?.(error);
    }
}
