import { CommandContext } from '../types';
import MusicService from '../services/music';
import { describeEntry } from '../audio/queueEntry';

export const name = 'playing';
export const description = 'Show the current song';

export const execute = async (context: CommandContext, music: MusicService) => {
    const status = music.status(context.guildId);
    if (status.state === 'idle') {
        return context.reply('Not playing any music right now...');
    }
    const prefix = status.state === 'paused' ? 'Paused' : 'Now playing';
    await context.reply(`${prefix} ${describeEntry(status.entry)}`);
};
