import 'dotenv/config';
import { ChannelType, REST, Routes, SlashCommandBuilder } from 'discord.js';
import { loadConfig } from '../config';
import { commands } from './index';

export function buildCommandData() {
    return [...commands.values()].map((command) => {
        const builder = new SlashCommandBuilder().setName(command.name).setDescription(command.description);
        switch (command.name) {
            case 'play':
                builder.addStringOption(opt => opt.setName('query').setDescription('YouTube link').setRequired(true));
                break;
            case 'volume':
                builder.addIntegerOption(opt => opt.setName('value').setDescription('Percent, 0-200').setMinValue(0).setMaxValue(200).setRequired(true));
                break;
            case 'join':
                builder.addChannelOption(opt => opt.setName('channel').setDescription('Voice channel to join')
                    .addChannelTypes(ChannelType.GuildVoice, ChannelType.GuildStageVoice));
                break;
        }
        return builder.toJSON();
    });
}

async function deploy() {
    const config = loadConfig();
    const rest = new REST({ version: '10' }).setToken(config.DISCORD_TOKEN);
    await rest.put(
        Routes.applicationGuildCommands(config.DISCORD_CLIENT_ID, config.DISCORD_GUILD_ID),
        { body: buildCommandData() },
    );
    console.log('Commands registered!');
}

if (require.main === module) {
    deploy().catch((e) => {
        console.error('[deploy-commands] failed:', e);
        process.exitCode = 1;
    });
}
