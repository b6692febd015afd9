import { CommandContext } from '../types';
import MusicService from '../services/music';

export const name = 'pause';
export const description = 'Pause the current song';

export const execute = async (context: CommandContext, music: MusicService) => {
    const paused = music.pause(context.guildId);
    await context.reply(paused ? 'Paused.' : 'Nothing is playing.');
};
