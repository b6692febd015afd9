import { EventEmitter, once } from 'events';
import {
    ChannelId,
    Notifier,
    PlaybackEvent,
    PlaybackStatus,
    TransportHandle,
    UserId,
    VoteOutcome,
} from '../types';
import { QueueEntry } from './queueEntry';
import { arbitrateSkip, assertQuorum, DEFAULT_SKIP_QUORUM } from './skipVote';
import { TeardownError, toError } from '../utils/errors';

export const MAX_VOLUME = 2;

export interface ChannelPlayerOptions {
    quorum?: number;
    notifier?: Notifier;
}

type Settle = (error?: Error) => void;

/**
 * Playback state for one channel: a FIFO queue, the entry currently playing
 * and the skip votes cast against it. A single scheduling loop, started with
 * `start()`, is the only code that moves entries out of the queue.
 */
export default class ChannelPlayer {
    readonly channelId: ChannelId;
    readonly quorum: number;

    private readonly queue: QueueEntry[] = [];
    private current: QueueEntry | null = null;
    private paused = false;
    private readonly skipVotes = new Set<UserId>();
    private transportHandle: TransportHandle | null = null;
    private readonly notifier: Notifier | null;

    private readonly events = new EventEmitter();
    private readonly abort = new AbortController();
    private settleCurrent: Settle | null = null;
    private loop: Promise<void> | null = null;
    private stopped = false;

    constructor(channelId: ChannelId, options: ChannelPlayerOptions = {}) {
        const quorum = options.quorum ?? DEFAULT_SKIP_QUORUM;
        assertQuorum(quorum);
        this.channelId = channelId;
        this.quorum = quorum;
        this.notifier = options.notifier ?? null;
    }

    get transport(): TransportHandle | null {
        return this.transportHandle;
    }

    get votes(): number {
        return this.skipVotes.size;
    }

    get isStopped(): boolean {
        return this.stopped;
    }

    attachTransport(handle: TransportHandle) {
        this.transportHandle = handle;
    }

    start() {
        if (this.loop || this.stopped) return;
        this.loop = this.run().catch((e) => {
            console.error(`[ChannelPlayer] channel=${this.channelId} scheduling loop crashed:`, e);
        });
    }

    enqueue(entry: QueueEntry) {
        if (this.stopped) {
            throw new Error(`Channel player ${this.channelId} has been stopped`);
        }
        this.queue.push(entry);
        console.log(`[ChannelPlayer] channel=${this.channelId} Added to queue [${this.queue.length}]: ${entry.source.title}`);
        this.notify(entry.channel, { kind: 'enqueued', entry, position: this.queue.length });
        this.events.emit('enqueue');
    }

    upcoming(): readonly QueueEntry[] {
        return [...this.queue];
    }

    isPlaying(): boolean {
        return this.current !== null && !this.current.source.isFinished();
    }

    status(): PlaybackStatus {
        if (!this.current) return { state: 'idle' };
        return this.paused
            ? { state: 'paused', entry: this.current }
            : { state: 'playing', entry: this.current };
    }

    pause(): boolean {
        if (!this.current || this.paused || !this.isPlaying()) return false;
        this.current.source.pause();
        this.paused = true;
        return true;
    }

    resume(): boolean {
        if (!this.current || !this.paused) return false;
        this.current.source.resume();
        this.paused = false;
        return true;
    }

    /** Returns the applied volume, or null when nothing is playing. */
    setVolume(percent: number): number | null {
        if (!Number.isFinite(percent)) {
            throw new RangeError(`Volume must be a number, got ${percent}`);
        }
        if (!this.current || !this.isPlaying()) return null;
        const volume = Math.min(Math.max(percent / 100, 0), MAX_VOLUME);
        this.current.source.volume = volume;
        return volume;
    }

    forceSkip(): boolean {
        this.skipVotes.clear();
        const entry = this.current;
        if (!entry || entry.source.isFinished()) return false;

        try {
            entry.source.stop();
        } catch (e) {
            // a source that cannot stop is treated as finished
            console.error(`[ChannelPlayer] channel=${this.channelId} stop failed for ${entry.source.title}:`, e);
            this.settleCurrent?.(toError(e));
        }
        return true;
    }

    voteSkip(voter: UserId): VoteOutcome {
        const entry = this.current;
        if (!entry || !this.isPlaying()) {
            return { kind: 'nothingPlaying' };
        }

        const decision = arbitrateSkip({
            voter,
            requester: entry.requester,
            votes: this.skipVotes,
            quorum: this.quorum,
        });

        switch (decision.kind) {
            case 'forced':
                this.notify(entry.channel, { kind: 'skipped', entry, reason: 'requester' });
                this.forceSkip();
                break;
            case 'quorumReached':
                this.skipVotes.add(voter);
                this.notify(entry.channel, { kind: 'skipped', entry, reason: 'quorum' });
                this.forceSkip();
                break;
            case 'voteRecorded':
                this.skipVotes.add(voter);
                this.notify(entry.channel, { kind: 'voteRecorded', entry, votes: decision.votes, required: decision.required });
                break;
            case 'alreadyVoted':
                break;
        }
        return decision;
    }

    /**
     * Stops the current source, drops the queue, ends the loop and disconnects.
     * Teardown failures are logged; the returned promise always resolves.
     */
    async stop(): Promise<void> {
        if (this.stopped) return;
        this.stopped = true;
        console.log(`[ChannelPlayer] channel=${this.channelId} Stopping playback`);

        this.queue.length = 0;
        this.skipVotes.clear();
        if (this.current) {
            this.haltSource(this.current);
        }

        this.abort.abort();
        await this.loop;

        const transport = this.transportHandle;
        this.transportHandle = null;
        if (transport) {
            try {
                await transport.disconnect();
            } catch (e) {
                console.error(`[ChannelPlayer] channel=${this.channelId}`, new TeardownError('transport', e));
            }
        }
    }

    private async run(): Promise<void> {
        const { signal } = this.abort;
        while (!signal.aborted) {
            const entry = await this.nextEntry(signal);
            if (!entry) break;
            await this.playEntry(entry, signal);
        }
        console.log(`[ChannelPlayer] channel=${this.channelId} scheduling loop exited`);
    }

    private async nextEntry(signal: AbortSignal): Promise<QueueEntry | null> {
        while (this.queue.length === 0) {
            try {
                await once(this.events, 'enqueue', { signal });
            } catch (e) {
                if (signal.aborted) return null;
                throw e;
            }
        }
        return this.queue.shift() ?? null;
    }

    private async playEntry(entry: QueueEntry, signal: AbortSignal): Promise<void> {
        // stop() may land between the dequeue and here; the entry must not start
        if (signal.aborted) return;

        this.current = entry;
        this.paused = false;
        this.skipVotes.clear();

        // completion slot for this entry only; late callbacks from earlier entries settle their own slot
        let settle: Settle = () => undefined;
        const finished = new Promise<Error | undefined>((resolve) => {
            const onAbort = () => resolve(undefined);
            signal.addEventListener('abort', onAbort, { once: true });
            settle = (error) => {
                signal.removeEventListener('abort', onAbort);
                resolve(error);
            };
        });
        this.settleCurrent = settle;

        console.log(`[ChannelPlayer] channel=${this.channelId} Now playing: ${entry.source.title}`);
        this.notify(entry.channel, { kind: 'nowPlaying', entry });

        try {
            entry.source.start((error) => settle(error));
        } catch (e) {
            settle(toError(e));
        }

        const error = await finished;
        if (error) {
            console.error(`[ChannelPlayer] channel=${this.channelId} ${entry.source.title} ended with error, advancing:`, error.message);
        }
        // on abort, stop() has already halted this entry

        this.settleCurrent = null;
        this.current = null;
        this.paused = false;
        this.skipVotes.clear();
    }

    private haltSource(entry: QueueEntry) {
        if (entry.source.isFinished()) return;
        try {
            entry.source.stop();
        } catch (e) {
            console.error(`[ChannelPlayer] channel=${this.channelId}`, new TeardownError('source', e));
        }
    }

    private notify(channelId: ChannelId, event: PlaybackEvent) {
        const notifier = this.notifier;
        if (!notifier) return;
        try {
            Promise.resolve(notifier.notify(channelId, event)).catch((e) => {
                console.error(`[ChannelPlayer] channel=${this.channelId} notify ${event.kind} failed:`, e);
            });
        } catch (e) {
            console.error(`[ChannelPlayer] channel=${this.channelId} notify ${event.kind} failed:`, e);
        }
    }
}
