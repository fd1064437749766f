import type { APIInteractionGuildMember, GuildMember } from "discord.js";
import type { BotConfig } from "../config.js";
import { ForbiddenError } from "../errors.js";

/** Anything that can report the names of the roles it holds. */
export interface HasRoles {
  roles(): ReadonlySet<string>;
}

export type RoleNames = BotConfig["roles"];

export type AccessLevel = "everyone" | "staff" | "hr";

/** A null caller means the command was not invoked from a server. */
export type Caller = HasRoles | null;

export function isHr(caller: Caller, names: RoleNames): boolean {
  return caller !== null && caller.roles().has(names.hr);
}

// HR counts as staff.
export function isStaff(caller: Caller, names: RoleNames): boolean {
  return (
    caller !== null &&
    (isHr(caller, names) || caller.roles().has(names.staff))
  );
}

/**
 * Throws ForbiddenError unless the caller may run a command at `level`.
 * Restricted levels always reject callers outside a server.
 */
export function authorize(level: AccessLevel, caller: Caller, names: RoleNames): void {
  if (level === "everyone") return;

  if (caller === null) {
    throw new ForbiddenError("This command can only be used in a server.", {
      operation: `authorize:${level}`,
    });
  }

  if (level === "hr" && !isHr(caller, names)) {
    throw new ForbiddenError("You do not have permission to use this HR command.", {
      operation: "authorize:hr",
    });
  }

  if (level === "staff" && !isStaff(caller, names)) {
    throw new ForbiddenError("You do not have permission to use this staff command.", {
      operation: "authorize:staff",
    });
  }
}

export function callerFromRoleNames(names: Iterable<string>): HasRoles {
  const set: ReadonlySet<string> = new Set(names);
  return { roles: () => set };
}

/**
 * Adapts an interaction member. Members delivered without a role cache
 * (uncached guilds) only carry role ids, so they cannot be checked by name.
 */
export function callerFromMember(
  member: GuildMember | APIInteractionGuildMember | null
): Caller {
  if (!member || !("cache" in member.roles)) return null;
  return callerFromRoleNames(member.roles.cache.map((role) => role.name));
}
