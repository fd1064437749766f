import { and, desc, eq } from "drizzle-orm";
import type { Db } from "../client.js";
import {
  moderationLogs,
  type ModerationAction,
  type ModerationLog,
} from "../schema.js";

export interface NewModerationLog {
  guildId: string;
  userId?: string | null;
  moderatorId: string;
  action: ModerationAction;
  reason?: string | null;
  details?: string | null;
  timestamp: string;
}

export function addModerationLog(db: Db, input: NewModerationLog): ModerationLog {
  return db
    .insert(moderationLogs)
    .values({
      guildId: input.guildId,
      userId: input.userId ?? null,
      moderatorId: input.moderatorId,
      action: input.action,
      reason: input.reason ?? null,
      details: input.details ?? null,
      timestamp: input.timestamp,
    })
    .returning()
    .get();
}

export function getModerationLogById(db: Db, id: number): ModerationLog | undefined {
  return db.select().from(moderationLogs).where(eq(moderationLogs.id, id)).get();
}

export interface ModerationLogFilter {
  userId?: string;
  limit?: number;
}

export function listModerationLogs(
  db: Db,
  guildId: string,
  filter: ModerationLogFilter = {}
): ModerationLog[] {
  const query = db
    .select()
    .from(moderationLogs)
    .where(
      filter.userId === undefined
        ? eq(moderationLogs.guildId, guildId)
        : and(
            eq(moderationLogs.guildId, guildId),
            eq(moderationLogs.userId, filter.userId)
          )
    )
    .orderBy(desc(moderationLogs.timestamp), desc(moderationLogs.id));
  return filter.limit === undefined ? query.all() : query.limit(filter.limit).all();
}
