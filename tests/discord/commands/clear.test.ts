import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Collection } from "discord.js";
import { clearCommand } from "../../../src/discord/commands/clear.js";
import type { CommandContext } from "../../../src/discord/commands/index.js";
import { createTestStore, type TestStore } from "../../helpers/store.js";
import { createTestContext } from "../../helpers/context.js";
import { fakeChatInput, fakeTextChannel } from "../../helpers/discord.js";

describe("/clear", () => {
  let t: TestStore;
  let ctx: CommandContext;

  beforeEach(() => {
    t = createTestStore();
    ctx = createTestContext(t.store);
  });

  afterEach(() => t.cleanup());

  it("bulk deletes and records a log entry without a target user", async () => {
    const channel = fakeTextChannel("777");
    const { interaction, deferReply, editReply } = fakeChatInput({
      commandName: "clear",
      integers: { amount: 5 },
      channel,
    });
    await clearCommand.execute(interaction, ctx);

    expect(deferReply).toHaveBeenCalledWith({ ephemeral: true });
    expect(channel.bulkDelete).toHaveBeenCalledWith(5, true);
    expect(editReply).toHaveBeenCalledWith("🧹 Deleted 5 messages.");
    expect(ctx.moderation.listLogs("guild-1")).toEqual([
      expect.objectContaining({
        userId: null,
        moderatorId: "100",
        action: "clear",
        reason: null,
        details: "amount=5",
      }),
    ]);
  });

  it("reports the number of messages actually deleted", async () => {
    const channel = fakeTextChannel("777");
    channel.bulkDelete.mockImplementationOnce(async () => new Collection([["1", { id: "1" }]]));
    const { interaction, editReply } = fakeChatInput({
      commandName: "clear",
      integers: { amount: 50 },
      channel,
    });
    await clearCommand.execute(interaction, ctx);

    expect(editReply).toHaveBeenCalledWith("🧹 Deleted 1 messages.");
  });

  it("needs a channel", async () => {
    const { interaction, reply } = fakeChatInput({
      commandName: "clear",
      integers: { amount: 5 },
    });
    await clearCommand.execute(interaction, ctx);

    expect(reply).toHaveBeenCalledWith({
      content: "This command can only be used in text channels.",
      ephemeral: true,
    });
    expect(ctx.moderation.listLogs("guild-1")).toEqual([]);
  });
});
