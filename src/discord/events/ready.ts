import type { Client } from "discord.js";
import type { BotConfig } from "../../config.js";
import { registerSlashCommands } from "../client.js";
import { logger } from "../../logger.js";

export async function onReady(client: Client<true>, config: BotConfig) {
  logger.info(`Bot logged in as ${client.user.tag}`);
  client.user.setActivity("/contribute | /warn");
  await registerSlashCommands(client, config);
}
