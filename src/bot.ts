import 'dotenv/config';
import { ChatInputCommandInteraction, Client, GatewayIntentBits } from 'discord.js';
import { loadConfig } from './config';
import handleReady from './events/ready';
import MusicService from './services/music';
import DiscordTransportProvider from './audio/discordTransport';
import DiscordNotifier from './services/notifier';
import PlayDlResolver from './services/youtube';
import { commands } from './commands';
import { CommandContext } from './types';
import { describeError } from './utils';

const config = loadConfig();

const client = new Client({
    intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildVoiceStates,
    ],
});

const music = new MusicService({
    transport: new DiscordTransportProvider(client),
    notifier: new DiscordNotifier(client),
    resolverFor: (guildId) => new PlayDlResolver(guildId, config.DEFAULT_VOLUME),
    quorum: config.SKIP_QUORUM,
});

function toCommandContext(interaction: ChatInputCommandInteraction<'cached'>): CommandContext {
    const reply = async (content: string) => {
        if (interaction.deferred || interaction.replied) {
            await interaction.editReply(content);
        } else {
            await interaction.reply(content);
        }
    };
    return {
        guildId: interaction.guildId,
        userId: interaction.user.id,
        textChannelId: interaction.channelId,
        voiceChannelId: interaction.member.voice.channelId,
        options: {
            query: interaction.options.getString('query') ?? undefined,
            volume: interaction.options.getInteger('value') ?? undefined,
            channelId: interaction.options.getChannel('channel')?.id,
        },
        defer: async () => {
            await interaction.deferReply();
        },
        reply,
    };
}

client.on('interactionCreate', async (interaction) => {
    if (!interaction.isChatInputCommand()) return;

    const command = commands.get(interaction.commandName);
    if (!command) return;

    if (!interaction.inCachedGuild()) {
        await interaction.reply({ content: 'Command only for servers.', ephemeral: true });
        return;
    }

    try {
        await command.execute(toCommandContext(interaction), music);
    } catch (error) {
        console.error('Error executing command:', error);
        try {
            if (interaction.deferred || interaction.replied) {
                await interaction.followUp({ content: describeError(error), ephemeral: true });
            } else {
                await interaction.reply({ content: describeError(error), ephemeral: true });
            }
        } catch (e) {
            console.error('Failed to send error message:', e);
        }
    }
});

async function shutdown(signal: string) {
    console.log(`[bot] ${signal} received, leaving voice channels`);
    await music.unload();
    await client.destroy();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
        shutdown(signal).catch((e) => {
            console.error('[bot] shutdown failed:', e);
            process.exitCode = 1;
        });
    });
}

handleReady(client);

client.login(config.DISCORD_TOKEN).catch((e) => {
    console.error('[bot] login failed:', e);
    process.exitCode = 1;
});
