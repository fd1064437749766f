import {
  Colors,
  EmbedBuilder,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from "discord.js";
import type { Contribution } from "../../db/schema.js";
import type { BotCommand, CommandContext } from "./index.js";
import { EMBED_MAX_FIELDS, contributionField } from "../format.js";
import { logger } from "../../logger.js";

function contributionsEmbed(title: string, list: Contribution[]): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(title)
    .setColor(Colors.Blurple)
    .addFields(list.slice(0, EMBED_MAX_FIELDS).map(contributionField));
  if (list.length > EMBED_MAX_FIELDS) {
    embed.setFooter({ text: `Showing ${EMBED_MAX_FIELDS} of ${list.length}` });
  }
  return embed;
}

async function review(
  interaction: ChatInputCommandInteraction,
  ctx: CommandContext,
  decision: "approve" | "reject"
) {
  const id = interaction.options.getInteger("contribution_id", true);
  const updated =
    decision === "approve"
      ? ctx.contributions.approve(id, interaction.user.id)
      : ctx.contributions.reject(id, interaction.user.id);

  if (!updated) {
    await interaction.reply({
      content: `No contribution with ID \`${id}\` was found.`,
      ephemeral: true,
    });
    return;
  }

  logger.info(
    { contributionId: id, reviewerId: interaction.user.id, status: updated.status },
    "Contribution reviewed"
  );

  await interaction.reply({
    content:
      decision === "approve"
        ? `✅ Contribution \`${id}\` from <@${updated.userId}> has been approved.`
        : `❌ Contribution \`${id}\` from <@${updated.userId}> has been rejected.`,
    ephemeral: true,
  });
}

export const contributionsCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("contributions")
    .setDescription("HR tools for managing member contributions.")
    .addSubcommand((sub) =>
      sub
        .setName("list")
        .setDescription("List contributions. Optionally filter by member.")
        .addUserOption((opt) =>
          opt.setName("member").setDescription("Only show this member's contributions")
        )
        .addIntegerOption((opt) =>
          opt
            .setName("limit")
            .setDescription("How many to show (default 10)")
            .setMinValue(1)
            .setMaxValue(50)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName("latest")
        .setDescription("List the latest contributions.")
        .addIntegerOption((opt) =>
          opt
            .setName("limit")
            .setDescription("How many to show (default 10)")
            .setMinValue(1)
            .setMaxValue(25)
        )
    )
    .addSubcommand((sub) =>
      sub.setName("pending").setDescription("List contributions awaiting review.")
    )
    .addSubcommand((sub) =>
      sub
        .setName("approve")
        .setDescription("Approve a contribution by ID.")
        .addIntegerOption((opt) =>
          opt
            .setName("contribution_id")
            .setDescription("ID of the contribution")
            .setRequired(true)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName("reject")
        .setDescription("Reject a contribution by ID.")
        .addIntegerOption((opt) =>
          opt
            .setName("contribution_id")
            .setDescription("ID of the contribution")
            .setRequired(true)
        )
    ),
  access: "hr",

  async execute(interaction, ctx) {
    const sub = interaction.options.getSubcommand();

    if (sub === "list") {
      const member = interaction.options.getUser("member");
      const limit = interaction.options.getInteger("limit") ?? 10;
      const list = member
        ? ctx.contributions.listByUser(member.id, limit)
        : ctx.contributions.listAll(limit);

      if (list.length === 0) {
        await interaction.reply({
          content: "No contributions found for the given criteria.",
          ephemeral: true,
        });
        return;
      }

      const title = member
        ? `Contributions by ${member.username} (latest ${list.length})`
        : `All contributions (latest ${list.length})`;
      await interaction.reply({
        embeds: [contributionsEmbed(title, list)],
        ephemeral: true,
      });
    } else if (sub === "latest") {
      const limit = interaction.options.getInteger("limit") ?? undefined;
      const list = ctx.contributions.listLatest(limit);

      if (list.length === 0) {
        await interaction.reply({
          content: "There are no contributions yet.",
          ephemeral: true,
        });
        return;
      }

      await interaction.reply({
        embeds: [contributionsEmbed(`Latest ${list.length} contributions`, list)],
        ephemeral: true,
      });
    } else if (sub === "pending") {
      const list = ctx.contributions.listPending();

      if (list.length === 0) {
        await interaction.reply({
          content: "No contributions are waiting for review.",
          ephemeral: true,
        });
        return;
      }

      await interaction.reply({
        embeds: [contributionsEmbed(`${list.length} pending contributions`, list)],
        ephemeral: true,
      });
    } else if (sub === "approve" || sub === "reject") {
      await review(interaction, ctx, sub);
    }
  },
};
