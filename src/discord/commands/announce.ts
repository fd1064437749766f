import {
  ChannelType,
  EmbedBuilder,
  PermissionFlagsBits,
  SlashCommandBuilder,
} from "discord.js";
import type { BotCommand } from "./index.js";
import { SERVER_ONLY, isMissingPermissions } from "../replies.js";
import { announcementStyle, announcementStyles, announcementTypes } from "../format.js";
import { logger } from "../../logger.js";

const MAX_MESSAGE_LENGTH = 2000;

export const announceCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("announce")
    .setDescription("Send an announcement to a specific channel.")
    .addChannelOption((opt) =>
      opt
        .setName("channel")
        .setDescription("The channel where the announcement will be sent")
        .addChannelTypes(ChannelType.GuildText)
        .setRequired(true)
    )
    .addStringOption((opt) =>
      opt
        .setName("announcement_type")
        .setDescription("Type of announcement")
        .setRequired(true)
        .addChoices(
          ...announcementTypes.map((type) => ({
            name: announcementStyles[type].label,
            value: type,
          }))
        )
    )
    .addStringOption((opt) =>
      opt
        .setName("message")
        .setDescription("The announcement message to send")
        .setRequired(true)
    )
    .addBooleanOption((opt) =>
      opt
        .setName("ping_everyone")
        .setDescription("Whether to ping @everyone (default: False)")
    ),
  access: "staff",

  async execute(interaction) {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: SERVER_ONLY, ephemeral: true });
      return;
    }

    const channel = interaction.options.getChannel("channel", true, [ChannelType.GuildText]);
    const type = interaction.options.getString("announcement_type", true);
    const message = interaction.options.getString("message", true);
    let pingEveryone = interaction.options.getBoolean("ping_everyone") ?? false;

    const me = interaction.guild.members.me;
    if (!me || !channel.permissionsFor(me).has(PermissionFlagsBits.SendMessages)) {
      await interaction.reply({
        content: `❌ I do not have permission to send messages in <#${channel.id}>.`,
        ephemeral: true,
      });
      return;
    }

    if (message.length > MAX_MESSAGE_LENGTH) {
      await interaction.reply({
        content: `❌ The announcement message is too long. Maximum length is ${MAX_MESSAGE_LENGTH} characters.`,
        ephemeral: true,
      });
      return;
    }

    let note = "";
    if (
      pingEveryone &&
      !channel.permissionsFor(interaction.member).has(PermissionFlagsBits.MentionEveryone)
    ) {
      pingEveryone = false;
      note = " You do not have permission to mention @everyone, so it was sent without a ping.";
    }

    const style = announcementStyle(type);
    const embed = new EmbedBuilder()
      .setTitle(`${style.emoji} ${style.title}`)
      .setDescription(message)
      .setColor(style.color)
      .setTimestamp()
      .setFooter({
        text: `Announced by ${interaction.member.displayName}`,
        iconURL: interaction.member.displayAvatarURL(),
      });

    try {
      await channel.send({
        content: pingEveryone ? "@everyone" : undefined,
        embeds: [embed],
      });
    } catch (err) {
      if (!isMissingPermissions(err)) throw err;
      await interaction.reply({
        content: `❌ I do not have permission to send messages in <#${channel.id}>.`,
        ephemeral: true,
      });
      return;
    }

    logger.info(
      { guildId: interaction.guildId, channelId: channel.id, type, by: interaction.user.id },
      "Announcement sent"
    );
    await interaction.reply({
      content: `✅ Announcement sent to <#${channel.id}>!${note}`,
      ephemeral: true,
    });
  },
};
