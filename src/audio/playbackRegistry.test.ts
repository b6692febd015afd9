import ChannelPlayer from './channelPlayer';
import PlaybackRegistry from './playbackRegistry';
import { createQueueEntry } from './queueEntry';
import { FakeSource, flush } from '../testing/fakes';

describe('PlaybackRegistry', () => {
    let registry: PlaybackRegistry;
    let created: string[];

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        created = [];
        registry = new PlaybackRegistry((channelId) => {
            created.push(channelId);
            return new ChannelPlayer(channelId);
        });
    });

    afterEach(async () => {
        await Promise.all(registry.keys().map((channelId) => registry.remove(channelId)?.stop()));
        jest.restoreAllMocks();
    });

    test('creates a player once per channel and starts its loop', async () => {
        const first = registry.getOrCreate('voice-1');
        const again = registry.getOrCreate('voice-1');
        const other = registry.getOrCreate('voice-2');

        expect(again).toBe(first);
        expect(other).not.toBe(first);
        expect(created).toEqual(['voice-1', 'voice-2']);

        const source = new FakeSource('A');
        first.enqueue(createQueueEntry('alice', 'text-1', source));
        await flush();
        expect(source.starts).toBe(1);
    });

    test('concurrent first enqueues for one channel share a single player', async () => {
        const sources = Array.from({ length: 5 }, (_, i) => new FakeSource(`song-${i}`));

        await Promise.all(sources.map(async (source) => {
            await Promise.resolve();
            registry.getOrCreate('voice-1').enqueue(createQueueEntry('alice', 'text-1', source));
        }));
        await flush();

        const player = registry.get('voice-1');
        expect(created).toEqual(['voice-1']);
        expect(player?.status()).toEqual({ state: 'playing', entry: expect.objectContaining({ source: sources[0] }) });
        expect(player?.upcoming().map((entry) => entry.source.title)).toEqual(['song-1', 'song-2', 'song-3', 'song-4']);
    });

    test('remove detaches the player and returns it once', () => {
        const player = registry.getOrCreate('voice-1');

        expect(registry.remove('voice-1')).toBe(player);
        expect(registry.has('voice-1')).toBe(false);
        expect(registry.remove('voice-1')).toBeNull();
        expect(registry.size).toBe(0);
        return player.stop();
    });

    test('get returns null for unknown channels', () => {
        expect(registry.get('voice-9')).toBeNull();
        expect(registry.keys()).toEqual([]);
    });
});
