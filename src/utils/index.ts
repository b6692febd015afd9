import { describeEntry } from '../audio/queueEntry';
import { PlaybackEvent, VoteOutcome } from '../types';
import { ResolutionError, TransportError } from './errors';

export const GENERIC_ERROR = 'There was an error executing this command!';

export const formatEvent = (event: PlaybackEvent): string => {
    switch (event.kind) {
        case 'enqueued':
            return `Enqueued ${describeEntry(event.entry)} (position ${event.position})`;
        case 'nowPlaying':
            return `Now playing ${describeEntry(event.entry)}`;
        case 'voteRecorded':
            return `Skip vote added, currently at [${event.votes}/${event.required}]`;
        case 'skipped':
            return event.reason === 'requester'
                ? `<@${event.entry.requester}> skipped **${event.entry.source.title}**`
                : `Skip vote passed, skipping **${event.entry.source.title}**`;
    }
};

export const formatVoteOutcome = (outcome: VoteOutcome): string => {
    switch (outcome.kind) {
        case 'nothingPlaying':
            return 'Not playing any music right now...';
        case 'forced':
            return 'Requester requested skipping song...';
        case 'quorumReached':
            return 'Skip vote passed, skipping song...';
        case 'voteRecorded':
            return `Skip vote added, currently at [${outcome.votes}/${outcome.required}]`;
        case 'alreadyVoted':
            return 'You have already voted to skip this song.';
    }
};

/** Message shown to the user for a failed command. */
export const describeError = (error: unknown): string => {
    if (error instanceof TransportError || error instanceof ResolutionError) {
        return error.message;
    }
    return GENERIC_ERROR;
};
