import type { Store } from "../db/client.js";
import type { Contribution } from "../db/schema.js";
import {
  createContribution,
  getContributionById,
  listAllContributions,
  listContributionsByUser,
  listPendingContributions,
  updateContributionStatus,
} from "../db/queries/index.js";
import { utcNowIso } from "../util/time.js";
import { assertLimit } from "./validation.js";

export interface SubmitContributionInput {
  userId: string;
  username: string;
  description: string;
  links?: string | null;
}

export interface ServiceOptions {
  now?: () => string;
}

export const DEFAULT_LATEST_LIMIT = 10;

export class ContributionService {
  private readonly now: () => string;

  constructor(
    private readonly store: Store,
    options: ServiceOptions = {}
  ) {
    this.now = options.now ?? utcNowIso;
  }

  submit(input: SubmitContributionInput): Contribution {
    return this.store.use(
      (db) => createContribution(db, { ...input, timestamp: this.now() }),
      "contributions.submit"
    );
  }

  getById(id: number): Contribution | undefined {
    return this.store.use(
      (db) => getContributionById(db, id),
      "contributions.getById"
    );
  }

  listByUser(userId: string, limit?: number): Contribution[] {
    assertLimit(limit, "contributions.listByUser");
    return this.store.use(
      (db) => listContributionsByUser(db, userId, limit),
      "contributions.listByUser"
    );
  }

  listAll(limit?: number): Contribution[] {
    assertLimit(limit, "contributions.listAll");
    return this.store.use(
      (db) => listAllContributions(db, limit),
      "contributions.listAll"
    );
  }

  listLatest(limit: number = DEFAULT_LATEST_LIMIT): Contribution[] {
    assertLimit(limit, "contributions.listLatest");
    return this.store.use(
      (db) => listAllContributions(db, limit),
      "contributions.listLatest"
    );
  }

  listPending(): Contribution[] {
    return this.store.use(
      (db) => listPendingContributions(db),
      "contributions.listPending"
    );
  }

  /** Returns undefined when no contribution has that id. */
  approve(id: number, reviewerId: string): Contribution | undefined {
    return this.store.use(
      (db) =>
        updateContributionStatus(db, id, {
          status: "approved",
          reviewerId,
          reviewedAt: this.now(),
        }),
      "contributions.approve"
    );
  }

  /** Returns undefined when no contribution has that id. */
  reject(id: number, reviewerId: string): Contribution | undefined {
    return this.store.use(
      (db) =>
        updateContributionStatus(db, id, {
          status: "rejected",
          reviewerId,
          reviewedAt: this.now(),
        }),
      "contributions.reject"
    );
  }
}
