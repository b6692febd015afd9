import { createAudioResource, StreamType } from '@discordjs/voice';
import playdl from 'play-dl';
import DiscordPlaybackHandle from '../audio/discordPlayback';
import { PlaybackHandle, SourceResolver } from '../types';
import { ResolutionError } from '../utils/errors';

// play-dl reports the same stream kinds @discordjs/voice knows, as its own enum
export function toVoiceStreamType(type: string): StreamType {
    switch (type) {
        case 'raw':
            return StreamType.Raw;
        case 'ogg/opus':
            return StreamType.OggOpus;
        case 'webm/opus':
            return StreamType.WebmOpus;
        case 'opus':
            return StreamType.Opus;
        default:
            return StreamType.Arbitrary;
    }
}

/** Resolves direct YouTube video links. Title search is not supported. */
export default class PlayDlResolver implements SourceResolver {
    constructor(
        private readonly guildId: string,
        private readonly volume: number,
    ) {}

    async resolve(query: string): Promise<PlaybackHandle> {
        const url = query.trim();
        const kind = await playdl.validate(url).catch((e: unknown) => {
            throw new ResolutionError(url, e);
        });
        if (kind !== 'yt_video') {
            throw new ResolutionError(url, new Error('only YouTube video links are supported'));
        }

        const info = await playdl.video_basic_info(url).catch((e: unknown) => {
            console.error('[youtube] video_basic_info error', e);
            throw new ResolutionError(url, e);
        });

        const details = info.video_details;
        console.log(`[youtube] resolved ${url} -> ${details.title ?? url}`);
        return new DiscordPlaybackHandle({
            guildId: this.guildId,
            title: details.title ?? url,
            durationSeconds: details.durationInSec > 0 ? details.durationInSec : null,
            volume: this.volume,
            load: async () => {
                const stream = await playdl.stream(url);
                return createAudioResource(stream.stream, {
                    inputType: toVoiceStreamType(stream.type),
                    inlineVolume: true,
                });
            },
        });
    }
}
