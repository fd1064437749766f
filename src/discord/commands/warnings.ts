import { Colors, EmbedBuilder, SlashCommandBuilder } from "discord.js";
import type { BotCommand } from "./index.js";
import { SERVER_ONLY } from "../replies.js";
import { EMBED_FIELD_VALUE_LIMIT, EMBED_MAX_FIELDS, truncate } from "../format.js";

export const warningsCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("warnings")
    .setDescription("View warnings for a member.")
    .addUserOption((opt) =>
      opt
        .setName("member")
        .setDescription("Member whose warnings to view")
        .setRequired(true)
    ),
  access: "staff",

  async execute(interaction, ctx) {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: SERVER_ONLY, ephemeral: true });
      return;
    }

    const user = interaction.options.getUser("member", true);
    const warnings = ctx.moderation.listWarnings(interaction.guildId, user.id);

    if (warnings.length === 0) {
      await interaction.reply({
        content: `<@${user.id}> has no recorded warnings.`,
        ephemeral: true,
      });
      return;
    }

    const embed = new EmbedBuilder()
      .setTitle(`Warnings for ${user.username}`)
      .setColor(Colors.Orange)
      .addFields(
        warnings.slice(0, EMBED_MAX_FIELDS).map((w) => ({
          name: `Warning #${w.id}`,
          value: truncate(
            `Issued by <@${w.moderatorId}> at ${w.timestamp}\nReason: ${w.reason}`,
            EMBED_FIELD_VALUE_LIMIT
          ),
        }))
      );

    await interaction.reply({ embeds: [embed], ephemeral: true });
  },
};
