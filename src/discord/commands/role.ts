import {
  Colors,
  EmbedBuilder,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from "discord.js";
import type { BotCommand, CommandContext } from "./index.js";
import type { ClubRole } from "../../db/schema.js";
import { ConflictError } from "../../errors.js";
import {
  EMBED_FIELD_NAME_LIMIT,
  EMBED_FIELD_VALUE_LIMIT,
  memberMentionFields,
  truncate,
} from "../format.js";
import { logger } from "../../logger.js";

const ROLE_NAME_MAX_LENGTH = 100;
const ROLE_DESCRIPTION_MAX_LENGTH = 1000;

async function reply(interaction: ChatInputCommandInteraction, content: string) {
  await interaction.reply({ content, ephemeral: true });
}

async function replyEmbed(interaction: ChatInputCommandInteraction, embed: EmbedBuilder) {
  await interaction.reply({ embeds: [embed], ephemeral: true });
}

/** Resolves the `role` or `name` option, replying when it does not exist. */
async function findRole(
  interaction: ChatInputCommandInteraction,
  ctx: CommandContext,
  option: "role" | "name"
): Promise<ClubRole | undefined> {
  const name = interaction.options.getString(option, true);
  const role = ctx.roles.getRoleByName(name);
  if (!role) {
    await reply(interaction, `❌ Role \`${name}\` not found.`);
  }
  return role;
}

export const roleCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("role")
    .setDescription("HR tools for managing club organizational roles.")
    .addSubcommand((sub) =>
      sub
        .setName("create")
        .setDescription("Create a new club organizational role.")
        .addStringOption((opt) =>
          opt
            .setName("name")
            .setDescription("Name of the role (must be unique)")
            .setRequired(true)
            .setMaxLength(ROLE_NAME_MAX_LENGTH)
        )
        .addStringOption((opt) =>
          opt
            .setName("description")
            .setDescription("Optional description of the role")
            .setMaxLength(ROLE_DESCRIPTION_MAX_LENGTH)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName("delete")
        .setDescription("Delete a club organizational role.")
        .addStringOption((opt) =>
          opt
            .setName("name")
            .setDescription("Name of the role to delete")
            .setRequired(true)
            .setMaxLength(ROLE_NAME_MAX_LENGTH)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName("assign")
        .setDescription("Assign a club role to a member.")
        .addUserOption((opt) =>
          opt
            .setName("user")
            .setDescription("Member to assign the role to")
            .setRequired(true)
        )
        .addStringOption((opt) =>
          opt
            .setName("role")
            .setDescription("Name of the club role")
            .setRequired(true)
            .setMaxLength(ROLE_NAME_MAX_LENGTH)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName("remove")
        .setDescription("Remove a club role from a member.")
        .addUserOption((opt) =>
          opt
            .setName("user")
            .setDescription("Member to remove the role from")
            .setRequired(true)
        )
        .addStringOption((opt) =>
          opt
            .setName("role")
            .setDescription("Name of the club role")
            .setRequired(true)
            .setMaxLength(ROLE_NAME_MAX_LENGTH)
        )
    )
    .addSubcommand((sub) =>
      sub.setName("list").setDescription("List all club organizational roles.")
    )
    .addSubcommand((sub) =>
      sub
        .setName("members")
        .setDescription("List all members with a specific club role.")
        .addStringOption((opt) =>
          opt
            .setName("role")
            .setDescription("Name of the club role")
            .setRequired(true)
            .setMaxLength(ROLE_NAME_MAX_LENGTH)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName("user")
        .setDescription("List all club roles assigned to a specific user.")
        .addUserOption((opt) =>
          opt
            .setName("user")
            .setDescription("Member whose roles to view")
            .setRequired(true)
        )
    ),
  access: "hr",

  async execute(interaction, ctx) {
    const sub = interaction.options.getSubcommand();

    if (sub === "create") {
      const name = interaction.options.getString("name", true);
      const description = interaction.options.getString("description");

      if (ctx.roles.getRoleByName(name)) {
        await reply(interaction, `❌ A role named \`${name}\` already exists.`);
        return;
      }

      let role: ClubRole;
      try {
        role = ctx.roles.createRole(name, description);
      } catch (err) {
        // Lost a race with another create between the lookup and the insert.
        if (err instanceof ConflictError) {
          await reply(interaction, `❌ A role named \`${name}\` already exists.`);
          return;
        }
        throw err;
      }

      logger.info({ roleId: role.id, name, by: interaction.user.id }, "Club role created");
      const embed = new EmbedBuilder()
        .setTitle("✅ Role Created")
        .setDescription(`Created role \`${role.name}\` (ID: ${role.id})`)
        .setColor(Colors.Green);
      if (role.description) {
        embed.addFields({
          name: "Description",
          value: truncate(role.description, EMBED_FIELD_VALUE_LIMIT),
        });
      }
      await replyEmbed(interaction, embed);
    } else if (sub === "delete") {
      const role = await findRole(interaction, ctx, "name");
      if (!role) return;

      if (ctx.roles.deleteRole(role.id)) {
        logger.info({ roleId: role.id, name: role.name, by: interaction.user.id }, "Club role deleted");
        await reply(
          interaction,
          `✅ Role \`${role.name}\` has been deleted. All member assignments have been removed.`
        );
      } else {
        await reply(interaction, `❌ Failed to delete role \`${role.name}\`.`);
      }
    } else if (sub === "assign") {
      const user = interaction.options.getUser("user", true);
      const role = await findRole(interaction, ctx, "role");
      if (!role) return;

      const alreadyAssigned = `❌ <@${user.id}> already has the role \`${role.name}\`.`;
      if (ctx.roles.isMemberAssigned(user.id, role.id)) {
        await reply(interaction, alreadyAssigned);
        return;
      }

      try {
        ctx.roles.assignRole(user.id, role.id, interaction.user.id);
      } catch (err) {
        if (err instanceof ConflictError) {
          await reply(interaction, alreadyAssigned);
          return;
        }
        throw err;
      }

      await replyEmbed(
        interaction,
        new EmbedBuilder()
          .setTitle("✅ Role Assigned")
          .setDescription(`<@${user.id}> has been assigned the role \`${role.name}\`.`)
          .setColor(Colors.Green)
      );
    } else if (sub === "remove") {
      const user = interaction.options.getUser("user", true);
      const role = await findRole(interaction, ctx, "role");
      if (!role) return;

      if (!ctx.roles.removeRole(user.id, role.id)) {
        await reply(interaction, `❌ <@${user.id}> does not have the role \`${role.name}\`.`);
        return;
      }

      await replyEmbed(
        interaction,
        new EmbedBuilder()
          .setTitle("✅ Role Removed")
          .setDescription(`<@${user.id}> no longer has the role \`${role.name}\`.`)
          .setColor(Colors.Orange)
      );
    } else if (sub === "list") {
      const roles = ctx.roles.listAllRoles();
      if (roles.length === 0) {
        await reply(interaction, "No club roles have been created yet.");
        return;
      }

      const embed = new EmbedBuilder()
        .setTitle("Club Organizational Roles")
        .setColor(Colors.Blurple);
      for (const role of roles.slice(0, 25)) {
        const count = ctx.roles.getRoleMembers(role.id).length;
        let value = `ID: \`${role.id}\` • ${count} member(s)`;
        if (role.description) value += `\n${role.description}`;
        embed.addFields({
          name: truncate(role.name, EMBED_FIELD_NAME_LIMIT),
          value: truncate(value, EMBED_FIELD_VALUE_LIMIT),
        });
      }
      await replyEmbed(interaction, embed);
    } else if (sub === "members") {
      const role = await findRole(interaction, ctx, "role");
      if (!role) return;

      const memberIds = ctx.roles.getRoleMembers(role.id);
      if (memberIds.length === 0) {
        await reply(interaction, `No members have been assigned the role \`${role.name}\`.`);
        return;
      }

      await replyEmbed(
        interaction,
        new EmbedBuilder()
          .setTitle(`Members with role: ${role.name}`)
          .setDescription(`Total: ${memberIds.length} member(s)`)
          .setColor(Colors.Blurple)
          .addFields(memberMentionFields(memberIds).slice(0, 25))
      );
    } else if (sub === "user") {
      const user = interaction.options.getUser("user", true);
      const roles = ctx.roles.getMemberRoles(user.id);

      if (roles.length === 0) {
        await reply(interaction, `<@${user.id}> has no assigned club roles.`);
        return;
      }

      const embed = new EmbedBuilder()
        .setTitle(`Club Roles for ${user.displayName}`)
        .setDescription(`Total: ${roles.length} role(s)`)
        .setColor(Colors.Blurple);
      for (const role of roles.slice(0, 25)) {
        let value = `ID: \`${role.id}\``;
        if (role.description) value += `\n${role.description}`;
        embed.addFields({
          name: truncate(role.name, EMBED_FIELD_NAME_LIMIT),
          value: truncate(value, EMBED_FIELD_VALUE_LIMIT),
        });
      }
      await replyEmbed(interaction, embed);
    }
  },
};
