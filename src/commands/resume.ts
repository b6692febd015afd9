import { CommandContext } from '../types';
import MusicService from '../services/music';

export const name = 'resume';
export const description = 'Resume the paused song';

export const execute = async (context: CommandContext, music: MusicService) => {
    const resumed = music.resume(context.guildId);
    await context.reply(resumed ? 'Resumed.' : 'Nothing is paused.');
};
