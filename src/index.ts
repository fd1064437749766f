import { loadConfig } from "./config.js";
import { createStore, migrate } from "./db/client.js";
import { createDiscordClient } from "./discord/client.js";
import { ContributionService } from "./services/contributionService.js";
import { RoleService } from "./services/roleService.js";
import { ModerationService } from "./services/moderationService.js";
import { logger } from "./logger.js";

async function main() {
  logger.info("Starting club-bot...");

  const config = loadConfig();
  const store = createStore(config.database.path);

  migrate(store);
  logger.info({ path: store.path }, "Database migrations applied");

  const discord = createDiscordClient({
    config,
    contributions: new ContributionService(store),
    roles: new RoleService(store),
    moderation: new ModerationService(store),
  });
  await discord.login(config.discord.token);
}

main().catch((err) => {
  logger.fatal(err, "Failed to start bot");
  process.exit(1);
});
