import { loadConfig } from './index';

describe('loadConfig', () => {
    test('uses defaults when only the credentials are set', () => {
        expect(loadConfig({ DISCORD_TOKEN: 'test-token', DISCORD_CLIENT_ID: 'client-1' })).toEqual({
            DISCORD_TOKEN: 'test-token',
            DISCORD_CLIENT_ID: 'client-1',
            DISCORD_GUILD_ID: '',
            SKIP_QUORUM: 3,
            DEFAULT_VOLUME: 0.6,
        });
    });

    test('reads the quorum and the default volume', () => {
        const config = loadConfig({ SKIP_QUORUM: ' 5 ', DEFAULT_VOLUME: '1.5', DISCORD_GUILD_ID: 'guild-1' });

        expect(config.SKIP_QUORUM).toBe(5);
        expect(config.DEFAULT_VOLUME).toBe(1.5);
        expect(config.DISCORD_GUILD_ID).toBe('guild-1');
    });

    test('rejects a quorum that is not a positive integer', () => {
        expect(() => loadConfig({ SKIP_QUORUM: '0' })).toThrow('SKIP_QUORUM must be a positive integer, got "0"');
        expect(() => loadConfig({ SKIP_QUORUM: 'three' })).toThrow('SKIP_QUORUM must be a positive integer, got "three"');
        expect(() => loadConfig({ SKIP_QUORUM: '2.5' })).toThrow('SKIP_QUORUM must be a positive integer, got "2.5"');
    });

    test('rejects a default volume out of range', () => {
        expect(() => loadConfig({ DEFAULT_VOLUME: '3' })).toThrow('DEFAULT_VOLUME must be between 0 and 2, got "3"');
        expect(() => loadConfig({ DEFAULT_VOLUME: 'loud' })).toThrow('DEFAULT_VOLUME must be between 0 and 2, got "loud"');
    });
});
