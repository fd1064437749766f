import type { Interaction } from "discord.js";
import { commands, type CommandContext } from "../commands/index.js";
import { authorize, callerFromMember } from "../../auth/permissions.js";
import {
  CONTRIBUTION_MODAL_ID,
  handleContributionModal,
} from "../modals/contributionModal.js";
import { replyWithError } from "../replies.js";
import { logger } from "../../logger.js";

export async function onInteractionCreate(
  interaction: Interaction,
  ctx: CommandContext
) {
  if (interaction.isModalSubmit()) {
    if (interaction.customId !== CONTRIBUTION_MODAL_ID) return;
    try {
      await handleContributionModal(interaction, ctx.contributions);
    } catch (err) {
      await replyWithError(
        interaction,
        err,
        "⚠️ Something went wrong while saving your contribution. Please try again later."
      );
    }
    return;
  }

  if (!interaction.isChatInputCommand()) return;

  const command = commands.find(
    (cmd) => cmd.data.name === interaction.commandName
  );

  if (!command) {
    logger.warn(`Unknown command: ${interaction.commandName}`);
    return;
  }

  const subcommand = interaction.options.getSubcommand(false);
  logger.info(
    {
      userId: interaction.user.id,
      guildId: interaction.guildId,
      command: subcommand
        ? `${interaction.commandName} ${subcommand}`
        : interaction.commandName,
    },
    "Command invoked"
  );

  try {
    authorize(command.access, callerFromMember(interaction.member), ctx.config.roles);
    await command.execute(interaction, ctx);
  } catch (err) {
    await replyWithError(interaction, err);
  }
}
