import { CommandContext } from '../types';
import MusicService from '../services/music';
import { formatVoteOutcome } from '../utils';

export const name = 'skip';
export const description = 'Vote to skip the current song (the requester skips right away)';

export const execute = async (context: CommandContext, music: MusicService) => {
    const outcome = music.voteSkip(context.guildId, context.userId);
    await context.reply(formatVoteOutcome(outcome));
};
