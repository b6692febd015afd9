import { CommandContext } from '../types';
import MusicService from '../services/music';

export const name = 'stop';
export const description = 'Stop the music, clear the queue and leave';

export const execute = async (context: CommandContext, music: MusicService) => {
    if (!music.registry.has(context.guildId)) {
        return context.reply('No music playing.');
    }
    await music.stop(context.guildId);
    await context.reply('Music stopped. Leaving channel.');
};
