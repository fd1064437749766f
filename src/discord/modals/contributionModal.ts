import {
  ActionRowBuilder,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
  type ModalSubmitInteraction,
} from "discord.js";
import type { ContributionService } from "../../services/contributionService.js";
import { logger } from "../../logger.js";

export const CONTRIBUTION_MODAL_ID = "contribution:submit";

export function buildContributionModal(): ModalBuilder {
  const description = new TextInputBuilder()
    .setCustomId("description")
    .setLabel("What did you work on?")
    .setStyle(TextInputStyle.Paragraph)
    .setRequired(true)
    .setMaxLength(2000)
    .setPlaceholder("Describe your contribution in detail...");

  const links = new TextInputBuilder()
    .setCustomId("links")
    .setLabel("Links (GitHub, docs, etc.)")
    .setStyle(TextInputStyle.Short)
    .setRequired(false)
    .setMaxLength(500)
    .setPlaceholder("Optional links to your work");

  return new ModalBuilder()
    .setCustomId(CONTRIBUTION_MODAL_ID)
    .setTitle("Submit Contribution")
    .addComponents(
      new ActionRowBuilder<TextInputBuilder>().addComponents(description),
      new ActionRowBuilder<TextInputBuilder>().addComponents(links)
    );
}

export async function handleContributionModal(
  interaction: ModalSubmitInteraction,
  contributions: ContributionService
): Promise<void> {
  const description = interaction.fields.getTextInputValue("description").trim();
  const links = interaction.fields.getTextInputValue("links").trim() || null;

  const contribution = contributions.submit({
    userId: interaction.user.id,
    username: interaction.user.username,
    description,
    links,
  });

  logger.info(
    { userId: interaction.user.id, contributionId: contribution.id },
    "Contribution submitted"
  );

  await interaction.reply({
    content:
      "✅ Thank you! Your contribution has been recorded and will be reviewed by HR.",
    ephemeral: true,
  });
}
