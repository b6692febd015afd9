import { CommandContext } from '../types';
import MusicService from '../services/music';

export const name = 'play';
export const description = 'Queue a song from a YouTube link';

export const execute = async (context: CommandContext, music: MusicService) => {
    const query = context.options.query?.trim();
    if (!query) {
        return context.reply('Tell me what to play.');
    }

    // resolving can take longer than the interaction timeout
    await context.defer();
    console.log('[play] guild=', context.guildId, 'query=', query);

    const entry = await music.play({
        guildId: context.guildId,
        requesterId: context.userId,
        textChannelId: context.textChannelId,
        voiceChannelId: context.voiceChannelId,
        query,
    });
    await context.reply(`Queued **${entry.source.title}**`);
};
