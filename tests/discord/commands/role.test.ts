import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { roleCommand } from "../../../src/discord/commands/role.js";
import type { CommandContext } from "../../../src/discord/commands/index.js";
import { loadConfig } from "../../../src/config.js";
import { ContributionService } from "../../../src/services/contributionService.js";
import { RoleService } from "../../../src/services/roleService.js";
import { ModerationService } from "../../../src/services/moderationService.js";
import { createTestStore, steppingClock, type TestStore } from "../../helpers/store.js";
import { fakeChatInput, fakeUser } from "../../helpers/discord.js";
import { onInteractionCreate } from "../../../src/discord/events/interactionCreate.js";

describe("/role", () => {
  let t: TestStore;
  let ctx: CommandContext;

  beforeEach(() => {
    t = createTestStore();
    const now = steppingClock();
    ctx = {
      config: loadConfig({ DISCORD_TOKEN: "test-token" }),
      contributions: new ContributionService(t.store, { now }),
      roles: new RoleService(t.store, { now }),
      moderation: new ModerationService(t.store, { now }),
    };
  });

  afterEach(() => t.cleanup());

  it("is restricted to HR", () => {
    expect(roleCommand.access).toBe("hr");
    expect(roleCommand.data.toJSON().options?.map((o) => o.name)).toEqual([
      "create",
      "delete",
      "assign",
      "remove",
      "list",
      "members",
      "user",
    ]);
  });

  it("creates a role and refuses a duplicate", async () => {
    const first = fakeChatInput({ commandName: "role", subcommand: "create", strings: { name: "Mentor" } });
    await roleCommand.execute(first.interaction, ctx);
    expect(ctx.roles.getRoleByName("Mentor")).toEqual({ id: 1, name: "Mentor", description: null });

    const second = fakeChatInput({ commandName: "role", subcommand: "create", strings: { name: "Mentor" } });
    await roleCommand.execute(second.interaction, ctx);
    expect(second.reply).toHaveBeenCalledWith({
      content: "❌ A role named `Mentor` already exists.",
      ephemeral: true,
    });
  });

  it("reports an existing assignment from the pre-check", async () => {
    const role = ctx.roles.createRole("Mentor");
    ctx.roles.assignRole("123", role.id, "100");

    const { interaction, reply } = fakeChatInput({
      commandName: "role",
      subcommand: "assign",
      strings: { role: "Mentor" },
      users: { user: fakeUser("123") },
    });
    await roleCommand.execute(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "❌ <@123> already has the role `Mentor`.",
      ephemeral: true,
    });
  });

  it("reports a conflict raised by storage the same way", async () => {
    const role = ctx.roles.createRole("Mentor");
    ctx.roles.assignRole("123", role.id, "100");
    vi.spyOn(ctx.roles, "isMemberAssigned").mockReturnValue(false);

    const { interaction, reply } = fakeChatInput({
      commandName: "role",
      subcommand: "assign",
      strings: { role: "Mentor" },
      users: { user: fakeUser("123") },
    });
    await roleCommand.execute(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "❌ <@123> already has the role `Mentor`.",
      ephemeral: true,
    });
    expect(ctx.roles.getRoleMembers(role.id)).toEqual(["123"]);
  });

  it("replies when the role does not exist", async () => {
    const { interaction, reply } = fakeChatInput({
      commandName: "role",
      subcommand: "members",
      strings: { role: "Ghost" },
    });
    await roleCommand.execute(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({ content: "❌ Role `Ghost` not found.", ephemeral: true });
  });

  it("deletes a role and its assignments", async () => {
    const role = ctx.roles.createRole("Mentor");
    ctx.roles.assignRole("123", role.id, "100");

    const { interaction, reply } = fakeChatInput({
      commandName: "role",
      subcommand: "delete",
      strings: { name: "Mentor" },
    });
    await roleCommand.execute(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "✅ Role `Mentor` has been deleted. All member assignments have been removed.",
      ephemeral: true,
    });
    expect(ctx.roles.getMemberRoles("123")).toEqual([]);
  });

  it("says when a member does not hold the role being removed", async () => {
    ctx.roles.createRole("Mentor");

    const { interaction, reply } = fakeChatInput({
      commandName: "role",
      subcommand: "remove",
      strings: { role: "Mentor" },
      users: { user: fakeUser("123") },
    });
    await roleCommand.execute(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "❌ <@123> does not have the role `Mentor`.",
      ephemeral: true,
    });
  });

  it("caps name and description lengths", () => {
    const create = roleCommand.data.toJSON().options?.find((o) => o.name === "create");
    expect(create).toMatchObject({
      options: [
        { name: "name", max_length: 100 },
        { name: "description", max_length: 1000 },
      ],
    });
  });

  it("truncates a stored description that is longer than an embed field", async () => {
    const longDescription = "d".repeat(1100);

    const create = fakeChatInput({
      commandName: "role",
      subcommand: "create",
      strings: { name: "Mentor", description: longDescription },
    });
    await onInteractionCreate(create.interaction, ctx);

    expect(create.reply).toHaveBeenCalledWith({
      embeds: [
        expect.objectContaining({
          data: expect.objectContaining({
            title: "✅ Role Created",
            fields: [{ name: "Description", value: "d".repeat(1024) }],
          }),
        }),
      ],
      ephemeral: true,
    });

    const list = fakeChatInput({ commandName: "role", subcommand: "list" });
    await onInteractionCreate(list.interaction, ctx);

    const listed = `ID: \`1\` • 0 member(s)\n${longDescription}`.slice(0, 1024);
    expect(list.reply).toHaveBeenCalledWith({
      embeds: [
        expect.objectContaining({
          data: expect.objectContaining({
            fields: [{ name: "Mentor", value: listed }],
          }),
        }),
      ],
      ephemeral: true,
    });
  });
});
