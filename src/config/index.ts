import { DEFAULT_SKIP_QUORUM } from '../audio/skipVote';
import { MAX_VOLUME } from '../audio/channelPlayer';

export interface Config {
    DISCORD_TOKEN: string;
    DISCORD_CLIENT_ID: string;
    DISCORD_GUILD_ID: string;
    SKIP_QUORUM: number;
    DEFAULT_VOLUME: number;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, valid: (value: number) => boolean, expected: string): number {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!valid(value)) {
        throw new Error(`${name} must be ${expected}, got "${raw}"`);
    }
    return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    return {
        DISCORD_TOKEN: env.DISCORD_TOKEN || '',
        DISCORD_CLIENT_ID: env.DISCORD_CLIENT_ID || '',
        DISCORD_GUILD_ID: env.DISCORD_GUILD_ID || '',
        SKIP_QUORUM: readNumber(env, 'SKIP_QUORUM', DEFAULT_SKIP_QUORUM, (n) => Number.isInteger(n) && n >= 1, 'a positive integer'),
        DEFAULT_VOLUME: readNumber(env, 'DEFAULT_VOLUME', 0.6, (n) => n >= 0 && n <= MAX_VOLUME, `between 0 and ${MAX_VOLUME}`),
    };
}
