import {
  DiscordAPIError,
  RESTJSONErrorCodes,
  type RepliableInteraction,
} from "discord.js";
import { isClubBotError } from "../errors.js";
import { logger } from "../logger.js";

export const SERVER_ONLY = "This command can only be used in a server.";
export const GENERIC_FAILURE = "An error occurred while executing this command.";
export const STORAGE_BUSY = "The database is busy right now. Please try again in a moment.";

export async function replyEphemeral(
  interaction: RepliableInteraction,
  content: string
): Promise<void> {
  const reply = { content, ephemeral: true };
  if (interaction.replied || interaction.deferred) {
    await interaction.followUp(reply);
  } else {
    await interaction.reply(reply);
  }
}

export function isMissingPermissions(err: unknown): boolean {
  return (
    err instanceof DiscordAPIError &&
    err.code === RESTJSONErrorCodes.MissingPermissions
  );
}

/**
 * Turns an error thrown while handling an interaction into a reply.
 * Forbidden, conflict and invalid-input errors carry a message meant
 * for the user; anything else is logged and answered generically.
 */
export async function replyWithError(
  interaction: RepliableInteraction,
  err: unknown,
  fallback: string = GENERIC_FAILURE
): Promise<void> {
  let content = fallback;
  if (isClubBotError(err)) {
    if (err.kind === "transient_storage") {
      logger.warn({ err, operation: err.operation }, "Storage busy while handling interaction");
      content = STORAGE_BUSY;
    } else {
      content = err.message;
    }
  } else {
    logger.error({ err, userId: interaction.user.id }, "Error handling interaction");
  }
  await replyEphemeral(interaction, content);
}
