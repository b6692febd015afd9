import { CommandContext } from '../types';
import MusicService from '../services/music';

export const name = 'join';
export const description = 'Join a voice channel (yours if none is given)';

export const execute = async (context: CommandContext, music: MusicService) => {
    const channelId = context.options.channelId ?? context.voiceChannelId;
    if (!channelId) {
        return context.reply('You are not in a voice channel.');
    }
    await music.join(context.guildId, channelId);
    await context.reply(`Ready to play audio in <#${channelId}>`);
};
