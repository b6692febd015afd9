import ChannelPlayer from './channelPlayer';
import { ChannelId } from '../types';

export type ChannelPlayerFactory = (channelId: ChannelId) => ChannelPlayer;

export default class PlaybackRegistry {
    private readonly players = new Map<ChannelId, ChannelPlayer>();

    constructor(private readonly create: ChannelPlayerFactory = (channelId) => new ChannelPlayer(channelId)) {}

    get size(): number {
        return this.players.size;
    }

    get(channelId: ChannelId): ChannelPlayer | null {
        return this.players.get(channelId) ?? null;
    }

    has(channelId: ChannelId): boolean {
        return this.players.has(channelId);
    }

    keys(): ChannelId[] {
        return [...this.players.keys()];
    }

    /**
     * Lookup, construction, loop start and insertion run in one synchronous
     * step, so every caller for a channel gets the same player.
     */
    getOrCreate(channelId: ChannelId): ChannelPlayer {
        let player = this.players.get(channelId);
        if (!player) {
            player = this.create(channelId);
            this.players.set(channelId, player);
            player.start();
            console.log(`[PlaybackRegistry] Created player for channel=${channelId}`);
        }
        return player;
    }

    /** Detaches the player; the caller is responsible for stopping it. */
    remove(channelId: ChannelId): ChannelPlayer | null {
        const player = this.players.get(channelId);
        if (!player) return null;
        this.players.delete(channelId);
        return player;
    }
}
