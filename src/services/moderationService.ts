import type { Store } from "../db/client.js";
import type { ModerationAction, ModerationLog, Warning } from "../db/schema.js";
import {
  addModerationLog,
  addWarning,
  getModerationLogById,
  listModerationLogs,
  listWarningsForUser,
  type ModerationLogFilter,
} from "../db/queries/index.js";
import { utcNowIso } from "../util/time.js";
import type { ServiceOptions } from "./contributionService.js";
import { assertLimit } from "./validation.js";

export interface RecordActionInput {
  guildId: string;
  userId?: string | null;
  moderatorId: string;
  action: Exclude<ModerationAction, "warn">;
  reason?: string | null;
  details?: string | null;
}

export class ModerationService {
  private readonly now: () => string;

  constructor(
    private readonly store: Store,
    options: ServiceOptions = {}
  ) {
    this.now = options.now ?? utcNowIso;
  }

  /** Stores the warning and its audit entry in one transaction. */
  warn(
    guildId: string,
    userId: string,
    moderatorId: string,
    reason: string
  ): { warning: Warning; log: ModerationLog } {
    const timestamp = this.now();
    return this.store.use(
      (db) =>
        db.transaction((tx) => {
          const warning = addWarning(tx, {
            guildId,
            userId,
            moderatorId,
            reason,
            timestamp,
          });
          const log = addModerationLog(tx, {
            guildId,
            userId,
            moderatorId,
            action: "warn",
            reason,
            details: `warning_id=${warning.id}`,
            timestamp,
          });
          return { warning, log };
        }),
      "moderation.warn"
    );
  }

  recordAction(input: RecordActionInput): ModerationLog {
    return this.store.use(
      (db) => addModerationLog(db, { ...input, timestamp: this.now() }),
      "moderation.recordAction"
    );
  }

  listWarnings(guildId: string, userId: string): Warning[] {
    return this.store.use(
      (db) => listWarningsForUser(db, guildId, userId),
      "moderation.listWarnings"
    );
  }

  getLog(id: number): ModerationLog | undefined {
    return this.store.use((db) => getModerationLogById(db, id), "moderation.getLog");
  }

  listLogs(guildId: string, filter: ModerationLogFilter = {}): ModerationLog[] {
    assertLimit(filter.limit, "moderation.listLogs");
    return this.store.use(
      (db) => listModerationLogs(db, guildId, filter),
      "moderation.listLogs"
    );
  }
}
