import { and, asc, eq } from "drizzle-orm";
import type { Db } from "../client.js";
import {
  clubRoles,
  memberRoles,
  type ClubRole,
  type MemberRole,
} from "../schema.js";
import { ConflictError, isUniqueViolation } from "../../errors.js";

export interface NewMemberRole {
  userId: string;
  roleId: number;
  assignedBy: string;
  assignedAt: string;
}

export function assignMemberRole(db: Db, input: NewMemberRole): MemberRole {
  try {
    return db.insert(memberRoles).values(input).returning().get();
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new ConflictError(
        `Member ${input.userId} already has role ${input.roleId}.`,
        { operation: "assignMemberRole", cause: err }
      );
    }
    throw err;
  }
}

function byPair(userId: string, roleId: number) {
  return and(eq(memberRoles.userId, userId), eq(memberRoles.roleId, roleId));
}

export function getMemberRole(
  db: Db,
  userId: string,
  roleId: number
): MemberRole | undefined {
  return db.select().from(memberRoles).where(byPair(userId, roleId)).get();
}

export function removeMemberRole(db: Db, userId: string, roleId: number): boolean {
  return db.delete(memberRoles).where(byPair(userId, roleId)).run().changes > 0;
}

export function listRolesForMember(db: Db, userId: string): ClubRole[] {
  return db
    .select({
      id: clubRoles.id,
      name: clubRoles.name,
      description: clubRoles.description,
    })
    .from(clubRoles)
    .innerJoin(memberRoles, eq(memberRoles.roleId, clubRoles.id))
    .where(eq(memberRoles.userId, userId))
    .orderBy(asc(clubRoles.name))
    .all();
}

export function listMembersWithRole(db: Db, roleId: number): string[] {
  return db
    .select({ userId: memberRoles.userId })
    .from(memberRoles)
    .where(eq(memberRoles.roleId, roleId))
    .orderBy(asc(memberRoles.assignedAt), asc(memberRoles.userId))
    .all()
    .map((row) => row.userId);
}
