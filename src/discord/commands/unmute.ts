import { Colors, EmbedBuilder, SlashCommandBuilder } from "discord.js";
import type { BotCommand } from "./index.js";
import { SERVER_ONLY, isMissingPermissions } from "../replies.js";
import { sendModLog } from "../modLog.js";
import { EMBED_FIELD_VALUE_LIMIT, REASON_MAX_LENGTH, truncate } from "../format.js";

export const unmuteCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("unmute")
    .setDescription("Remove timeout from a member.")
    .addUserOption((opt) =>
      opt.setName("member").setDescription("Member to unmute").setRequired(true)
    )
    .addStringOption((opt) =>
      opt
        .setName("reason")
        .setDescription("Reason for unmuting")
        .setMaxLength(REASON_MAX_LENGTH)
    ),
  access: "staff",

  async execute(interaction, ctx) {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: SERVER_ONLY, ephemeral: true });
      return;
    }

    const member = interaction.options.getMember("member");
    const reason = interaction.options.getString("reason");

    if (!member) {
      await interaction.reply({
        content: "That user is not a member of this server.",
        ephemeral: true,
      });
      return;
    }

    try {
      await member.timeout(null, reason ?? "Unmuted by staff");
    } catch (err) {
      if (!isMissingPermissions(err)) throw err;
      await interaction.reply({
        content: "I do not have permission to unmute that member.",
        ephemeral: true,
      });
      return;
    }

    await interaction.reply({
      content: `🔊 <@${member.id}> has been unmuted.`,
      ephemeral: true,
    });

    ctx.moderation.recordAction({
      guildId: interaction.guildId,
      userId: member.id,
      moderatorId: interaction.user.id,
      action: "unmute",
      reason,
    });

    const embed = new EmbedBuilder()
      .setTitle("Member unmuted")
      .setDescription(`<@${member.id}> was unmuted by <@${interaction.user.id}>`)
      .setColor(Colors.Green);
    if (reason) {
      embed.addFields({ name: "Reason", value: truncate(reason, EMBED_FIELD_VALUE_LIMIT) });
    }
    await sendModLog(interaction.guild, ctx.config.moderation.logChannelId, embed);
  },
};
