import type {
  ChatInputCommandInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import type { BotConfig } from "../../config.js";
import type { AccessLevel } from "../../auth/permissions.js";
import type { ContributionService } from "../../services/contributionService.js";
import type { RoleService } from "../../services/roleService.js";
import type { ModerationService } from "../../services/moderationService.js";
import { contributeCommand } from "./contribute.js";
import { contributionsCommand } from "./contributions.js";
import { roleCommand } from "./role.js";
import { muteCommand } from "./mute.js";
import { unmuteCommand } from "./unmute.js";
import { warnCommand } from "./warn.js";
import { warningsCommand } from "./warnings.js";
import { clearCommand } from "./clear.js";
import { announceCommand } from "./announce.js";
import { helpCommand } from "./help.js";

export interface CommandContext {
  config: BotConfig;
  contributions: ContributionService;
  roles: RoleService;
  moderation: ModerationService;
}

export interface BotCommand {
  data: {
    readonly name: string;
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  /** Checked by the dispatcher before execute runs. */
  access: AccessLevel;
  execute: (
    interaction: ChatInputCommandInteraction,
    ctx: CommandContext
  ) => Promise<void>;
}

export const commands: BotCommand[] = [
  contributeCommand,
  contributionsCommand,
  roleCommand,
  muteCommand,
  unmuteCommand,
  warnCommand,
  warningsCommand,
  clearCommand,
  announceCommand,
  helpCommand,
];
