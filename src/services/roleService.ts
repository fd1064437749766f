import type { Store } from "../db/client.js";
import type { ClubRole, MemberRole } from "../db/schema.js";
import {
  assignMemberRole,
  createClubRole,
  deleteClubRole,
  getClubRoleById,
  getClubRoleByName,
  getMemberRole,
  listClubRoles,
  listMembersWithRole,
  listRolesForMember,
  removeMemberRole,
} from "../db/queries/index.js";
import { utcNowIso } from "../util/time.js";
import type { ServiceOptions } from "./contributionService.js";

/**
 * Club roles are organizational labels kept in our own tables, separate
 * from Discord's guild roles.
 */
export class RoleService {
  private readonly now: () => string;

  constructor(
    private readonly store: Store,
    options: ServiceOptions = {}
  ) {
    this.now = options.now ?? utcNowIso;
  }

  /** @throws ConflictError when a role with that name exists */
  createRole(name: string, description?: string | null): ClubRole {
    return this.store.use(
      (db) => createClubRole(db, name, description),
      "roles.createRole"
    );
  }

  getRoleByName(name: string): ClubRole | undefined {
    return this.store.use((db) => getClubRoleByName(db, name), "roles.getRoleByName");
  }

  getRoleById(id: number): ClubRole | undefined {
    return this.store.use((db) => getClubRoleById(db, id), "roles.getRoleById");
  }

  listAllRoles(): ClubRole[] {
    return this.store.use((db) => listClubRoles(db), "roles.listAllRoles");
  }

  /** Also drops every assignment of the role. False if it did not exist. */
  deleteRole(id: number): boolean {
    return this.store.use((db) => deleteClubRole(db, id), "roles.deleteRole");
  }

  /** @throws ConflictError when the member already holds the role */
  assignRole(userId: string, roleId: number, assignedBy: string): MemberRole {
    return this.store.use(
      (db) =>
        assignMemberRole(db, {
          userId,
          roleId,
          assignedBy,
          assignedAt: this.now(),
        }),
      "roles.assignRole"
    );
  }

  removeRole(userId: string, roleId: number): boolean {
    return this.store.use(
      (db) => removeMemberRole(db, userId, roleId),
      "roles.removeRole"
    );
  }

  getMemberRoles(userId: string): ClubRole[] {
    return this.store.use(
      (db) => listRolesForMember(db, userId),
      "roles.getMemberRoles"
    );
  }

  getRoleMembers(roleId: number): string[] {
    return this.store.use(
      (db) => listMembersWithRole(db, roleId),
      "roles.getRoleMembers"
    );
  }

  isMemberAssigned(userId: string, roleId: number): boolean {
    return this.store.use(
      (db) => getMemberRole(db, userId, roleId) !== undefined,
      "roles.isMemberAssigned"
    );
  }
}
