import {
  Client,
  Events,
  GatewayIntentBits,
  REST,
  Routes,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import type { BotConfig } from "../config.js";
import { onReady } from "./events/ready.js";
import { onInteractionCreate } from "./events/interactionCreate.js";
import { commands, type CommandContext } from "./commands/index.js";
import { logger } from "../logger.js";

export function createDiscordClient(ctx: CommandContext): Client {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMembers, // Role names for permission checks
    ],
  });

  client.once(Events.ClientReady, (ready) => {
    onReady(ready, ctx.config).catch((err) => {
      logger.error({ err }, "Failed to register slash commands");
    });
  });
  client.on(Events.InteractionCreate, (interaction) => {
    onInteractionCreate(interaction, ctx).catch((err) => {
      logger.error({ err }, "Unhandled error while handling interaction");
    });
  });

  return client;
}

/** Registers to GUILD_ID when configured (instant), otherwise globally. */
export async function registerSlashCommands(client: Client<true>, config: BotConfig) {
  const rest = new REST({ version: "10" }).setToken(config.discord.token);
  const commandData: RESTPostAPIChatInputApplicationCommandsJSONBody[] =
    commands.map((cmd) => cmd.data.toJSON());

  const route = config.discord.guildId
    ? Routes.applicationGuildCommands(client.application.id, config.discord.guildId)
    : Routes.applicationCommands(client.application.id);

  await rest.put(route, { body: commandData });

  logger.info(
    { guildId: config.discord.guildId ?? null },
    `Registered ${commandData.length} slash commands`
  );
}
