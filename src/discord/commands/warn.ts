import { Colors, EmbedBuilder, SlashCommandBuilder } from "discord.js";
import type { BotCommand } from "./index.js";
import { SERVER_ONLY } from "../replies.js";
import { sendModLog } from "../modLog.js";
import { EMBED_FIELD_VALUE_LIMIT, REASON_MAX_LENGTH, truncate } from "../format.js";
import { logger } from "../../logger.js";

export const warnCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("warn")
    .setDescription("Issue a warning to a member.")
    .addUserOption((opt) =>
      opt.setName("member").setDescription("Member to warn").setRequired(true)
    )
    .addStringOption((opt) =>
      opt
        .setName("reason")
        .setDescription("Reason for the warning")
        .setRequired(true)
        .setMaxLength(REASON_MAX_LENGTH)
    ),
  access: "staff",

  async execute(interaction, ctx) {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: SERVER_ONLY, ephemeral: true });
      return;
    }

    const member = interaction.options.getMember("member");
    const reason = interaction.options.getString("reason", true);

    if (!member) {
      await interaction.reply({
        content: "That user is not a member of this server.",
        ephemeral: true,
      });
      return;
    }

    if (member.id === interaction.user.id) {
      await interaction.reply({ content: "You cannot warn yourself.", ephemeral: true });
      return;
    }

    const { warning } = ctx.moderation.warn(
      interaction.guildId,
      member.id,
      interaction.user.id,
      reason
    );
    logger.info(
      { guildId: interaction.guildId, userId: member.id, warningId: warning.id },
      "Member warned"
    );

    await interaction.reply({
      content: `⚠️ <@${member.id}> has been warned. Reason: ${reason}`,
      ephemeral: true,
    });

    await sendModLog(
      interaction.guild,
      ctx.config.moderation.logChannelId,
      new EmbedBuilder()
        .setTitle("Member warned")
        .setDescription(`<@${member.id}> was warned by <@${interaction.user.id}>`)
        .setColor(Colors.Orange)
        .addFields({ name: "Reason", value: truncate(reason, EMBED_FIELD_VALUE_LIMIT) })
    );
  },
};
