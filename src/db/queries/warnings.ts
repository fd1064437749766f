import { and, desc, eq } from "drizzle-orm";
import type { Db } from "../client.js";
import { warnings, type Warning } from "../schema.js";

export interface NewWarning {
  guildId: string;
  userId: string;
  moderatorId: string;
  reason: string;
  timestamp: string;
}

export function addWarning(db: Db, input: NewWarning): Warning {
  return db.insert(warnings).values(input).returning().get();
}

export function getWarningById(db: Db, id: number): Warning | undefined {
  return db.select().from(warnings).where(eq(warnings.id, id)).get();
}

export function listWarningsForUser(
  db: Db,
  guildId: string,
  userId: string
): Warning[] {
  return db
    .select()
    .from(warnings)
    .where(and(eq(warnings.guildId, guildId), eq(warnings.userId, userId)))
    .orderBy(desc(warnings.timestamp), desc(warnings.id))
    .all();
}
