import { SlashCommandBuilder } from "discord.js";
import type { BotCommand } from "./index.js";
import { buildContributionModal } from "../modals/contributionModal.js";

export const contributeCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("contribute")
    .setDescription("Submit a private contribution to the HR team."),
  access: "everyone",

  async execute(interaction) {
    await interaction.showModal(buildContributionModal());
  },
};
