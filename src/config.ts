import "dotenv/config";

export interface BotConfig {
  discord: {
    token: string;
    guildId?: string;
  };
  roles: {
    hr: string;
    staff: string;
  };
  moderation: {
    logChannelId?: string;
  };
  database: {
    path: string;
  };
}

export type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

// Each store operation opens its own connection, so the database must be a file.
function databasePath(env: Env): string {
  const path = optional(env, "DATABASE_PATH") ?? "club_bot.db";
  if (path === ":memory:") {
    throw new Error("DATABASE_PATH must name a file; in-memory databases are not supported");
  }
  return path;
}

export function loadConfig(env: Env = process.env): BotConfig {
  return {
    discord: {
      token: required(env, "DISCORD_TOKEN"),
      guildId: optional(env, "GUILD_ID"),
    },
    roles: {
      hr: optional(env, "HR_ROLE_NAME") ?? "HR",
      staff: optional(env, "STAFF_ROLE_NAME") ?? "Staff",
    },
    moderation: {
      logChannelId: optional(env, "LOG_CHANNEL_ID"),
    },
    database: {
      path: databasePath(env),
    },
  };
}
