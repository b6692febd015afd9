import { CommandContext } from '../types';
import MusicService from '../services/music';

export const name = 'volume';
export const description = 'Set the volume of the current song (0-200)';

export const execute = async (context: CommandContext, music: MusicService) => {
    const percent = context.options.volume;
    if (percent === undefined) {
        return context.reply('Give a volume between 0 and 200.');
    }
    const applied = music.setVolume(context.guildId, percent);
    if (applied === null) {
        return context.reply('Nothing is playing.');
    }
    await context.reply(`Set the volume to ${Math.round(applied * 100)}%`);
};
