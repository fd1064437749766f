import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { onInteractionCreate } from "../../../src/discord/events/interactionCreate.js";
import type { CommandContext } from "../../../src/discord/commands/index.js";
import { loadConfig } from "../../../src/config.js";
import { ContributionService } from "../../../src/services/contributionService.js";
import { RoleService } from "../../../src/services/roleService.js";
import { ModerationService } from "../../../src/services/moderationService.js";
import { TransientStorageError } from "../../../src/errors.js";
import { createTestStore, type TestStore } from "../../helpers/store.js";
import { fakeChatInput } from "../../helpers/discord.js";

describe("onInteractionCreate", () => {
  let t: TestStore;
  let ctx: CommandContext;

  beforeEach(() => {
    t = createTestStore();
    ctx = {
      config: loadConfig({ DISCORD_TOKEN: "test-token" }),
      contributions: new ContributionService(t.store),
      roles: new RoleService(t.store),
      moderation: new ModerationService(t.store),
    };
  });

  afterEach(() => t.cleanup());

  it("rejects restricted commands used outside a server", async () => {
    const { interaction, reply } = fakeChatInput({
      commandName: "role",
      subcommand: "list",
      roleNames: null,
    });
    await onInteractionCreate(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "This command can only be used in a server.",
      ephemeral: true,
    });
  });

  it("rejects staff from HR commands before running them", async () => {
    const listAllRoles = vi.spyOn(ctx.roles, "listAllRoles");
    const { interaction, reply } = fakeChatInput({
      commandName: "role",
      subcommand: "list",
      roleNames: ["Staff"],
    });
    await onInteractionCreate(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "You do not have permission to use this HR command.",
      ephemeral: true,
    });
    expect(listAllRoles).not.toHaveBeenCalled();
  });

  it("runs the command for an authorized caller", async () => {
    const { interaction, reply } = fakeChatInput({
      commandName: "role",
      subcommand: "list",
      roleNames: ["HR"],
    });
    await onInteractionCreate(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "No club roles have been created yet.",
      ephemeral: true,
    });
  });

  it("answers storage contention with a retry hint", async () => {
    vi.spyOn(ctx.roles, "listAllRoles").mockImplementation(() => {
      throw new TransientStorageError("Database is busy (SQLITE_BUSY)");
    });
    const { interaction, reply } = fakeChatInput({ commandName: "role", subcommand: "list" });
    await onInteractionCreate(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "The database is busy right now. Please try again in a moment.",
      ephemeral: true,
    });
  });

  it("answers unexpected failures generically", async () => {
    vi.spyOn(ctx.roles, "listAllRoles").mockImplementation(() => {
      throw new Error("disk on fire");
    });
    const { interaction, reply } = fakeChatInput({ commandName: "role", subcommand: "list" });
    await onInteractionCreate(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "An error occurred while executing this command.",
      ephemeral: true,
    });
  });

  it("ignores unknown commands", async () => {
    const { interaction, reply } = fakeChatInput({ commandName: "nope" });
    await onInteractionCreate(interaction, ctx);

    expect(reply).not.toHaveBeenCalled();
  });
});
