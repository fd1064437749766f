import { Colors, EmbedBuilder, SlashCommandBuilder } from "discord.js";
import type { BotCommand } from "./index.js";
import { callerFromMember, isHr, isStaff } from "../../auth/permissions.js";
import { SERVER_ONLY } from "../replies.js";
import { helpFields } from "../help.js";

export const helpCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("help")
    .setDescription("View all available bot commands organized by category."),
  access: "everyone",

  async execute(interaction, ctx) {
    const caller = callerFromMember(interaction.member);
    if (!caller) {
      await interaction.reply({ content: SERVER_ONLY, ephemeral: true });
      return;
    }

    const embed = new EmbedBuilder()
      .setTitle("🤖 Club Bot - Command Help")
      .setDescription("All available commands organized by category.")
      .setColor(Colors.Blurple)
      .addFields(
        helpFields({
          hr: isHr(caller, ctx.config.roles),
          staff: isStaff(caller, ctx.config.roles),
        })
      )
      .setFooter({ text: "Use slash commands (/) to access these commands in Discord." });

    await interaction.reply({ embeds: [embed], ephemeral: true });
  },
};
