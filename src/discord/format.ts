import { Colors, type APIEmbedField } from "discord.js";
import type { Contribution } from "../db/schema.js";
import { formatTimestampForDisplay } from "../util/time.js";

export const EMBED_FIELD_NAME_LIMIT = 256;
export const EMBED_FIELD_VALUE_LIMIT = 1024;
// Longest free-text reason a moderation command accepts.
export const REASON_MAX_LENGTH = 1000;
export const EMBED_MAX_FIELDS = 25;

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}

export function contributionStatusLabel(
  contribution: Pick<Contribution, "approved" | "status">
): string {
  if (contribution.approved) return "✅ Approved";
  if (contribution.status === "pending") return "⏳ Pending";
  return "❌ Rejected";
}

export function contributionField(contribution: Contribution): APIEmbedField {
  let value =
    `${contributionStatusLabel(contribution)} • ${formatTimestampForDisplay(contribution.timestamp)}\n` +
    `ID: \`${contribution.id}\`\n${contribution.description}`;
  if (contribution.links) {
    value += `\nLinks: ${contribution.links}`;
  }
  return {
    name: `<@${contribution.userId}> (\`${contribution.username}\`)`,
    value: truncate(value, EMBED_FIELD_VALUE_LIMIT),
    inline: false,
  };
}

/**
 * Lists member mentions in one field, or in numbered fields of 20 once
 * there are more than 25.
 */
export function memberMentionFields(userIds: readonly string[]): APIEmbedField[] {
  const mentions = userIds.map((id) => `<@${id}>`);
  if (mentions.length <= 25) {
    return [{ name: "Members", value: mentions.join("\n") || "None", inline: false }];
  }

  const chunkSize = 20;
  const fields: APIEmbedField[] = [];
  for (let i = 0; i < mentions.length; i += chunkSize) {
    const chunk = mentions.slice(i, i + chunkSize);
    fields.push({
      name: `Members (${i + 1}-${Math.min(i + chunkSize, mentions.length)})`,
      value: chunk.join("\n"),
      inline: false,
    });
  }
  return fields;
}

export const announcementTypes = [
  "general",
  "event",
  "important",
  "update",
  "reminder",
  "welcome",
] as const;
export type AnnouncementType = (typeof announcementTypes)[number];

export const announcementStyles: Record<
  AnnouncementType,
  { label: string; title: string; emoji: string; color: number }
> = {
  general: { label: "General", title: "General Announcement", emoji: "📢", color: Colors.Blue },
  event: { label: "Event", title: "Event Announcement", emoji: "🎉", color: Colors.Green },
  important: { label: "Important", title: "Important Announcement", emoji: "⚠️", color: Colors.Red },
  update: { label: "Update", title: "Update Announcement", emoji: "🔄", color: Colors.Orange },
  reminder: { label: "Reminder", title: "Reminder", emoji: "⏰", color: Colors.Gold },
  welcome: { label: "Welcome", title: "Welcome Announcement", emoji: "👋", color: Colors.Blurple },
};

export function isAnnouncementType(value: string): value is AnnouncementType {
  return announcementTypes.some((type) => type === value);
}

/** Unknown types fall back to the general style. */
export function announcementStyle(type: string) {
  const key = type.toLowerCase();
  return announcementStyles[isAnnouncementType(key) ? key : "general"];
}
