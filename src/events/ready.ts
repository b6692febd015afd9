import { Client, Events } from 'discord.js';

export default function handleReady(client: Client) {
    client.once(Events.ClientReady, (ready) => {
        console.log(`Logged in as ${ready.user.tag}, serving ${ready.guilds.cache.size} server(s)`);
    });
}
