import { ChannelId, PlaybackHandle, UserId } from '../types';

export interface QueueEntry {
    readonly requester: UserId;
    readonly channel: ChannelId;
    readonly source: PlaybackHandle;
}

export function createQueueEntry(requester: UserId, channel: ChannelId, source: PlaybackHandle): QueueEntry {
    return Object.freeze({ requester, channel, source });
}

export function formatDuration(totalSeconds: number): string {
    const minutes = Math.floor(totalSeconds / 60);
    const seconds = Math.floor(totalSeconds % 60);
    return `${minutes}m ${seconds}s`;
}

export function describeEntry(entry: QueueEntry): string {
    let text = `**${entry.source.title}** requested by <@${entry.requester}>`;
    const duration = entry.source.durationSeconds;
    if (duration) {
        text += ` [length: ${formatDuration(duration)}]`;
    }
    return text;
}
