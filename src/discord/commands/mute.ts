import { Colors, EmbedBuilder, SlashCommandBuilder } from "discord.js";
import type { BotCommand } from "./index.js";
import { SERVER_ONLY, isMissingPermissions } from "../replies.js";
import { sendModLog } from "../modLog.js";
import { EMBED_FIELD_VALUE_LIMIT, REASON_MAX_LENGTH, truncate } from "../format.js";

export const muteCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("mute")
    .setDescription("Temporarily timeout a member.")
    .addUserOption((opt) =>
      opt.setName("member").setDescription("Member to mute").setRequired(true)
    )
    .addIntegerOption((opt) =>
      opt
        .setName("duration_minutes")
        .setDescription("Duration of the timeout in minutes")
        .setRequired(true)
        .setMinValue(1)
        .setMaxValue(10080)
    )
    .addStringOption((opt) =>
      opt
        .setName("reason")
        .setDescription("Reason for the mute")
        .setMaxLength(REASON_MAX_LENGTH)
    ),
  access: "staff",

  async execute(interaction, ctx) {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: SERVER_ONLY, ephemeral: true });
      return;
    }

    const member = interaction.options.getMember("member");
    const minutes = interaction.options.getInteger("duration_minutes", true);
    const reason = interaction.options.getString("reason");

    if (!member) {
      await interaction.reply({
        content: "That user is not a member of this server.",
        ephemeral: true,
      });
      return;
    }

    if (member.id === interaction.user.id) {
      await interaction.reply({ content: "You cannot mute yourself.", ephemeral: true });
      return;
    }

    try {
      await member.timeout(minutes * 60 * 1000, reason ?? "Muted by staff");
    } catch (err) {
      if (!isMissingPermissions(err)) throw err;
      await interaction.reply({
        content: "I do not have permission to mute that member.",
        ephemeral: true,
      });
      return;
    }

    await interaction.reply({
      content: `🔇 <@${member.id}> has been muted for ${minutes} minutes.`,
      ephemeral: true,
    });

    ctx.moderation.recordAction({
      guildId: interaction.guildId,
      userId: member.id,
      moderatorId: interaction.user.id,
      action: "mute",
      reason,
      details: `duration_minutes=${minutes}`,
    });

    const embed = new EmbedBuilder()
      .setTitle("Member muted")
      .setDescription(`<@${member.id}> was muted by <@${interaction.user.id}>`)
      .setColor(Colors.Red)
      .addFields({ name: "Duration", value: `${minutes} minutes`, inline: true });
    if (reason) {
      embed.addFields({ name: "Reason", value: truncate(reason, EMBED_FIELD_VALUE_LIMIT) });
    }
    await sendModLog(interaction.guild, ctx.config.moderation.logChannelId, embed);
  },
};
