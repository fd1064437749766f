import { Colors, EmbedBuilder, SlashCommandBuilder } from "discord.js";
import type { BotCommand } from "./index.js";
import { SERVER_ONLY } from "../replies.js";
import { sendModLog } from "../modLog.js";

export const clearCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("clear")
    .setDescription("Bulk delete a number of recent messages from the current channel.")
    .addIntegerOption((opt) =>
      opt
        .setName("amount")
        .setDescription("Number of recent messages to delete (max 100).")
        .setRequired(true)
        .setMinValue(1)
        .setMaxValue(100)
    ),
  access: "staff",

  async execute(interaction, ctx) {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: SERVER_ONLY, ephemeral: true });
      return;
    }

    const channel = interaction.channel;
    if (!channel) {
      await interaction.reply({
        content: "This command can only be used in text channels.",
        ephemeral: true,
      });
      return;
    }

    const amount = interaction.options.getInteger("amount", true);

    // Deleting can take a moment
    await interaction.deferReply({ ephemeral: true });

    // Messages older than two weeks cannot be bulk deleted and are skipped.
    const deleted = await channel.bulkDelete(amount, true);

    await interaction.editReply(`🧹 Deleted ${deleted.size} messages.`);

    ctx.moderation.recordAction({
      guildId: interaction.guildId,
      userId: null,
      moderatorId: interaction.user.id,
      action: "clear",
      details: `amount=${amount}`,
    });

    await sendModLog(
      interaction.guild,
      ctx.config.moderation.logChannelId,
      new EmbedBuilder()
        .setTitle("Messages cleared")
        .setDescription(
          `<@${interaction.user.id}> cleared ${deleted.size} messages in <#${channel.id}>.`
        )
        .setColor(Colors.Blurple)
    );
  },
};
