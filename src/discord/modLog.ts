import type { EmbedBuilder, Guild } from "discord.js";
import { logger } from "../logger.js";

/**
 * Posts to the configured moderation log channel. Best effort: a missing
 * channel or a failed send never fails the command that triggered it.
 */
export async function sendModLog(
  guild: Guild,
  channelId: string | undefined,
  embed: EmbedBuilder
): Promise<void> {
  if (!channelId) return;

  const channel = guild.channels.cache.get(channelId);
  if (!channel?.isTextBased()) {
    logger.warn({ guildId: guild.id, channelId }, "Moderation log channel not found or not text-based");
    return;
  }

  try {
    await channel.send({ embeds: [embed] });
  } catch (err) {
    logger.warn({ err, guildId: guild.id, channelId }, "Could not post to moderation log channel");
  }
}
