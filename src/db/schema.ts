import {
  sqliteTable,
  text,
  integer,
  primaryKey,
} from "drizzle-orm/sqlite-core";

export const contributionStatuses = ["pending", "approved", "rejected"] as const;
export type ContributionStatus = (typeof contributionStatuses)[number];

export const contributions = sqliteTable("contributions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: text("user_id").notNull(),
  username: text("username").notNull(),
  description: text("description").notNull(),
  links: text("links"),
  timestamp: text("timestamp").notNull(),
  approved: integer("approved", { mode: "boolean" }).notNull().default(false),
  status: text("status", { enum: contributionStatuses })
    .notNull()
    .default("pending"),
  reviewedBy: text("reviewed_by"),
  reviewedAt: text("reviewed_at"),
});

export const warnings = sqliteTable("warnings", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  guildId: text("guild_id").notNull(),
  userId: text("user_id").notNull(),
  moderatorId: text("moderator_id").notNull(),
  reason: text("reason").notNull(),
  timestamp: text("timestamp").notNull(),
});

export const moderationActions = ["mute", "unmute", "warn", "clear"] as const;
export type ModerationAction = (typeof moderationActions)[number];

export const moderationLogs = sqliteTable("moderation_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  guildId: text("guild_id").notNull(),
  userId: text("user_id"), // null for bulk actions such as clear
  moderatorId: text("moderator_id").notNull(),
  action: text("action", { enum: moderationActions }).notNull(),
  reason: text("reason"),
  details: text("details"),
  timestamp: text("timestamp").notNull(),
});

export const clubRoles = sqliteTable("club_roles", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull().unique(),
  description: text("description"),
});

export const memberRoles = sqliteTable(
  "member_roles",
  {
    userId: text("user_id").notNull(),
    roleId: integer("role_id")
      .notNull()
      .references(() => clubRoles.id, { onDelete: "cascade" }),
    assignedAt: text("assigned_at").notNull(),
    assignedBy: text("assigned_by").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.userId, table.roleId] }),
  })
);

export type Contribution = typeof contributions.$inferSelect;
export type Warning = typeof warnings.$inferSelect;
export type ModerationLog = typeof moderationLogs.$inferSelect;
export type ClubRole = typeof clubRoles.$inferSelect;
export type MemberRole = typeof memberRoles.$inferSelect;
