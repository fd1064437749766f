import { asc, eq } from "drizzle-orm";
import type { Db } from "../client.js";
import { clubRoles, type ClubRole } from "../schema.js";
import { ConflictError, isUniqueViolation } from "../../errors.js";

export function createClubRole(
  db: Db,
  name: string,
  description?: string | null
): ClubRole {
  try {
    return db
      .insert(clubRoles)
      .values({ name, description: description ?? null })
      .returning()
      .get();
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new ConflictError(`A role named "${name}" already exists.`, {
        operation: "createClubRole",
        cause: err,
      });
    }
    throw err;
  }
}

export function getClubRoleById(db: Db, id: number): ClubRole | undefined {
  return db.select().from(clubRoles).where(eq(clubRoles.id, id)).get();
}

export function getClubRoleByName(db: Db, name: string): ClubRole | undefined {
  return db.select().from(clubRoles).where(eq(clubRoles.name, name)).get();
}

export function listClubRoles(db: Db): ClubRole[] {
  return db.select().from(clubRoles).orderBy(asc(clubRoles.name)).all();
}

/**
 * Deletes the role. Its member_roles rows go with it through the
 * ON DELETE CASCADE foreign key, inside the same statement.
 */
export function deleteClubRole(db: Db, id: number): boolean {
  return db.delete(clubRoles).where(eq(clubRoles.id, id)).run().changes > 0;
}
