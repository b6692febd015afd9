import { CommandContext } from '../types';
import MusicService from '../services/music';
import { QueueEntry } from '../audio/queueEntry';

export const name = 'queue';
export const description = 'Show the queue';

const MAX_QUEUE_TO_SHOW = 10;

export function buildQueueList(entries: readonly QueueEntry[]): string {
    return entries.map((entry, i) => `${i + 1}. ${entry.source.title}`).join('\n');
}

export const execute = async (context: CommandContext, music: MusicService) => {
    const status = music.status(context.guildId);
    const upcoming = music.upcoming(context.guildId);

    const nowPlaying = status.state === 'idle' ? 'Nothing' : status.entry.source.title;
    const more = upcoming.length > MAX_QUEUE_TO_SHOW ? `\n...and ${upcoming.length - MAX_QUEUE_TO_SHOW} more` : '';
    let queueStr = buildQueueList(upcoming.slice(0, MAX_QUEUE_TO_SHOW)) + more;
    if (!queueStr.trim()) queueStr = 'No tracks in queue.';

    await context.reply(`Now playing: ${nowPlaying}\n${queueStr}`);
};
