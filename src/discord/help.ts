import type { APIEmbedField } from "discord.js";

const memberCommands = [
  "**`/contribute`**",
  "Submit a contribution to the HR team via a private modal.",
  "• Opens a form with description and optional links",
  "• All members can use this command",
].join("\n");

const hrCommands = [
  ["/contributions list [member] [limit]", "View all contributions or filter by a specific member."],
  ["/contributions latest [limit]", "View the latest contributions submitted."],
  ["/contributions pending", "View contributions still waiting for review."],
  ["/contributions approve <contribution_id>", "Approve a contribution by its ID."],
  ["/contributions reject <contribution_id>", "Reject a contribution by its ID."],
  ["/role create <name> [description]", "Create a new club organizational role."],
  ["/role delete <name>", "Delete a club role (removes all member assignments)."],
  ["/role assign <user> <role>", "Assign a club role to a member."],
  ["/role remove <user> <role>", "Remove a club role from a member."],
  ["/role list", "List all club organizational roles."],
  ["/role members <role>", "List all members with a specific role."],
  ["/role user <user>", "View all roles assigned to a specific user."],
] as const;

const staffCommands = [
  ["/mute <member> <duration_minutes> [reason]", "Temporarily timeout a member (1-10080 minutes)."],
  ["/unmute <member> [reason]", "Remove timeout from a member."],
  ["/warn <member> <reason>", "Issue a warning to a member."],
  ["/warnings <member>", "View all warnings for a specific member."],
  ["/clear <amount>", "Bulk delete recent messages (1-100) from the current channel."],
] as const;

const announcementCommands = [
  "**`/announce <channel> <announcement_type> <message> [ping_everyone]`**",
  "Send an announcement to a specific channel.",
  "• Types: General, Event, Important, Update, Reminder, Welcome",
  "• Optional: Ping @everyone (requires permission)",
].join("\n");

function usageList(entries: ReadonlyArray<readonly [string, string]>): string {
  return entries.map(([usage, text]) => `**\`${usage}\`**\n${text}`).join("\n\n");
}

/** Help embed fields for a caller, hiding tiers they cannot use. */
export function helpFields(tier: { hr: boolean; staff: boolean }): APIEmbedField[] {
  const fields: APIEmbedField[] = [
    { name: "📝 Member Commands", value: memberCommands, inline: false },
  ];

  if (tier.hr) {
    fields.push({ name: "👔 HR Commands", value: usageList(hrCommands), inline: false });
  }

  if (tier.staff) {
    fields.push(
      { name: "🛡️ Moderation Commands", value: usageList(staffCommands), inline: false },
      { name: "📢 Announcement Commands", value: announcementCommands, inline: false }
    );
  }

  if (!tier.hr && !tier.staff) {
    fields.push({
      name: "ℹ️ Note",
      value:
        "Some commands are restricted to HR and Staff roles. " +
        "Contact a staff member if you need assistance.",
      inline: false,
    });
  }

  return fields;
}
