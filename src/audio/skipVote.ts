import { SkipDecision, UserId } from '../types';

export const DEFAULT_SKIP_QUORUM = 3;

export interface SkipBallot {
    voter: UserId;
    /** requester of the entry being voted on */
    requester: UserId;
    votes: ReadonlySet<UserId>;
    quorum: number;
}

export function assertQuorum(quorum: number): void {
    if (!Number.isInteger(quorum) || quorum < 1) {
        throw new RangeError(`Skip quorum must be a positive integer, got ${quorum}`);
    }
}

/**
 * Decides what a skip request does. Never mutates `votes`; the caller records
 * the vote for `voteRecorded` and `quorumReached`.
 */
export function arbitrateSkip({ voter, requester, votes, quorum }: SkipBallot): SkipDecision {
    assertQuorum(quorum);

    if (voter === requester) {
        return { kind: 'forced' };
    }
    if (votes.has(voter)) {
        return { kind: 'alreadyVoted', votes: votes.size };
    }

    const total = votes.size + 1;
    if (total >= quorum) {
        return { kind: 'quorumReached', votes: total };
    }
    return { kind: 'voteRecorded', votes: total, required: quorum };
}
