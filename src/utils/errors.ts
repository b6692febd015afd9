export type TransportFailure =
    | 'alreadyConnectedElsewhere'
    | 'notAVoiceDestination'
    | 'noVoiceChannel'
    | 'connectFailed';

export class TransportError extends Error {
    readonly reason: TransportFailure;

    constructor(reason: TransportFailure, message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'TransportError';
        this.reason = reason;
    }
}

export class ResolutionError extends Error {
    readonly query: string;

    constructor(query: string, cause?: unknown) {
        const detail = cause instanceof Error ? cause.message : 'unsupported source';
        super(`Could not play "${query}": ${detail}`, { cause });
        this.name = 'ResolutionError';
        this.query = query;
    }
}

/** Failure while stopping a source or disconnecting. Logged, never thrown. */
export class TeardownError extends Error {
    readonly step: 'source' | 'transport';

    constructor(step: 'source' | 'transport', cause: unknown) {
        super(`Teardown of ${step} failed: ${toError(cause).message}`, { cause });
        this.name = 'TeardownError';
        this.step = step;
    }
}

export const toError = (value: unknown): Error => {
    return value instanceof Error ? value : new Error(String(value));
};
