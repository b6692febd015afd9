import { commands } from './index';
import { buildCommandData } from './deploy-commands';
import { buildQueueList } from './queue';
import MusicService from '../services/music';
import { Command, CommandContext } from '../types';
import { createQueueEntry } from '../audio/queueEntry';
import { fakeContext, FakeSource, FakeTransportProvider, flush } from '../testing/fakes';

const run = async (name: string, music: MusicService, overrides: Partial<CommandContext> = {}) => {
    const command: Command | undefined = commands.get(name);
    if (!command) throw new Error(`unknown command ${name}`);
    const context = fakeContext(overrides);
    await command.execute(context, music);
    return context.replies;
};

describe('commands', () => {
    let transport: FakeTransportProvider;
    let music: MusicService;

    const queueSongs = async (...titles: string[]) => {
        const sources = titles.map((title) => new FakeSource(title, { durationSeconds: 65 }));
        for (const source of sources) {
            music.enqueue('guild-1', 'alice', source, 'text-1');
        }
        await flush();
        return sources;
    };

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        transport = new FakeTransportProvider();
        music = new MusicService({ transport, resolverFor: () => ({ resolve: async () => new FakeSource('unused') }) });
    });

    afterEach(async () => {
        await music.unload();
        jest.restoreAllMocks();
    });

    test('registers every command under its name', () => {
        expect([...commands.keys()]).toEqual(['join', 'summon', 'play', 'pause', 'resume', 'stop', 'skip', 'volume', 'playing', 'queue']);
    });

    test('builds slash command definitions with their options', () => {
        const data = buildCommandData();
        const play = data.find((command) => command.name === 'play');
        const volume = data.find((command) => command.name === 'volume');

        expect(data).toHaveLength(10);
        expect(play?.options).toEqual([expect.objectContaining({ name: 'query', required: true })]);
        expect(volume?.options).toEqual([expect.objectContaining({ name: 'value', min_value: 0, max_value: 200 })]);
    });

    test('join uses the given channel, or the caller\'s', async () => {
        expect(await run('join', music, { options: { channelId: 'voice-2' } })).toEqual(['Ready to play audio in <#voice-2>']);
        expect(transport.handles.map((handle) => handle.channelId)).toEqual(['voice-2']);

        expect(await run('join', music, { guildId: 'guild-2' })).toEqual(['Ready to play audio in <#voice-1>']);
        expect(await run('join', music, { guildId: 'guild-3', voiceChannelId: null })).toEqual(['You are not in a voice channel.']);
    });

    test('summon brings the bot to the caller', async () => {
        await run('join', music, { voiceChannelId: 'voice-2' });

        expect(await run('summon', music)).toEqual(['Joined <#voice-1>']);
        expect(transport.handles[0].channelId).toBe('voice-1');
        expect(await run('summon', music, { voiceChannelId: null })).toEqual(['You are not in a voice channel.']);
    });

    test('pause and resume report what happened', async () => {
        expect(await run('pause', music)).toEqual(['Nothing is playing.']);
        await queueSongs('Song A');

        expect(await run('pause', music)).toEqual(['Paused.']);
        expect(await run('resume', music)).toEqual(['Resumed.']);
        expect(await run('resume', music)).toEqual(['Nothing is paused.']);
    });

    test('skip replies with the vote outcome', async () => {
        expect(await run('skip', music)).toEqual(['Not playing any music right now...']);
        await queueSongs('Song A', 'Song B');

        expect(await run('skip', music, { userId: 'bob' })).toEqual(['Skip vote added, currently at [1/3]']);
        expect(await run('skip', music, { userId: 'bob' })).toEqual(['You have already voted to skip this song.']);
        expect(await run('skip', music)).toEqual(['Requester requested skipping song...']);
    });

    test('volume sets the level of the current song', async () => {
        expect(await run('volume', music, { options: { volume: 50 } })).toEqual(['Nothing is playing.']);
        const [source] = await queueSongs('Song A');

        expect(await run('volume', music, { options: { volume: 150 } })).toEqual(['Set the volume to 150%']);
        expect(source.volume).toBe(1.5);
        expect(await run('volume', music)).toEqual(['Give a volume between 0 and 200.']);
    });

    test('playing shows the current song', async () => {
        expect(await run('playing', music)).toEqual(['Not playing any music right now...']);
        await queueSongs('Song A');

        expect(await run('playing', music)).toEqual(['Now playing **Song A** requested by <@alice> [length: 1m 5s]']);
        music.pause('guild-1');
        expect(await run('playing', music)).toEqual(['Paused **Song A** requested by <@alice> [length: 1m 5s]']);
    });

    test('queue lists the upcoming songs', async () => {
        expect(await run('queue', music)).toEqual(['Now playing: Nothing\nNo tracks in queue.']);
        await queueSongs('Song A', 'Song B', 'Song C');

        expect(await run('queue', music)).toEqual(['Now playing: Song A\n1. Song B\n2. Song C']);
    });

    test('buildQueueList numbers the entries', () => {
        const entries = Array.from({ length: 3 }, (_, i) => createQueueEntry('alice', 'text-1', new FakeSource(`Song ${i}`)));
        expect(buildQueueList(entries)).toBe('1. Song 0\n2. Song 1\n3. Song 2');
    });

    test('queue summarises a long list', async () => {
        await queueSongs(...Array.from({ length: 13 }, (_, i) => `Song ${i}`));

        const [reply] = await run('queue', music);
        const lines = reply.split('\n');
        expect(lines[0]).toBe('Now playing: Song 0');
        expect(lines[1]).toBe('1. Song 1');
        expect(lines[10]).toBe('10. Song 10');
        expect(lines[11]).toBe('...and 2 more');
    });

    test('stop leaves the channel once', async () => {
        expect(await run('stop', music)).toEqual(['No music playing.']);
        await run('join', music);

        expect(await run('stop', music)).toEqual(['Music stopped. Leaving channel.']);
        expect(transport.handles[0].disconnects).toBe(1);
        expect(await run('stop', music)).toEqual(['No music playing.']);
    });
});
