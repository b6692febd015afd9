import { CommandContext } from '../types';
import MusicService from '../services/music';

export const name = 'summon';
export const description = 'Bring the bot to your voice channel';

export const execute = async (context: CommandContext, music: MusicService) => {
    if (!context.voiceChannelId) {
        return context.reply('You are not in a voice channel.');
    }
    await music.summon(context.guildId, context.voiceChannelId);
    await context.reply(`Joined <#${context.voiceChannelId}>`);
};
