import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for everything but the token", () => {
    const config = loadConfig({ DISCORD_TOKEN: "test-token" });

    expect(config).toEqual({
      discord: { token: "test-token", guildId: undefined },
      roles: { hr: "HR", staff: "Staff" },
      moderation: { logChannelId: undefined },
      database: { path: "club_bot.db" },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      DISCORD_TOKEN: "test-token",
      GUILD_ID: "111",
      HR_ROLE_NAME: "People Team",
      STAFF_ROLE_NAME: "Moderators",
      LOG_CHANNEL_ID: "222",
      DATABASE_PATH: "/tmp/club.db",
    });

    expect(config.discord.guildId).toBe("111");
    expect(config.roles).toEqual({ hr: "People Team", staff: "Moderators" });
    expect(config.moderation.logChannelId).toBe("222");
    expect(config.database.path).toBe("/tmp/club.db");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ DISCORD_TOKEN: "test-token", HR_ROLE_NAME: "  ", GUILD_ID: "" });

    expect(config.roles.hr).toBe("HR");
    expect(config.discord.guildId).toBeUndefined();
  });

  it("throws when the token is missing", () => {
    expect(() => loadConfig({})).toThrow(
      "Missing required environment variable: DISCORD_TOKEN"
    );
  });

  it("rejects an in-memory database path", () => {
    expect(() => loadConfig({ DISCORD_TOKEN: "test-token", DATABASE_PATH: ":memory:" })).toThrow(
      "DATABASE_PATH must name a file; in-memory databases are not supported"
    );
  });
});
