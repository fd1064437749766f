import { desc, eq } from "drizzle-orm";
import type { Db } from "../client.js";
import {
  contributions,
  type Contribution,
  type ContributionStatus,
} from "../schema.js";

export interface NewContribution {
  userId: string;
  username: string;
  description: string;
  links?: string | null;
  timestamp: string;
}

export function createContribution(db: Db, input: NewContribution): Contribution {
  return db
    .insert(contributions)
    .values({
      userId: input.userId,
      username: input.username,
      description: input.description,
      links: input.links ?? null,
      timestamp: input.timestamp,
      approved: false,
      status: "pending",
    })
    .returning()
    .get();
}

export function getContributionById(db: Db, id: number): Contribution | undefined {
  return db.select().from(contributions).where(eq(contributions.id, id)).get();
}

// Newest first. Rows written in the same millisecond fall back to insertion order.
const newestFirst = [desc(contributions.timestamp), desc(contributions.id)] as const;

export function listContributionsByUser(
  db: Db,
  userId: string,
  limit?: number
): Contribution[] {
  const query = db
    .select()
    .from(contributions)
    .where(eq(contributions.userId, userId))
    .orderBy(...newestFirst);
  return limit === undefined ? query.all() : query.limit(limit).all();
}

export function listAllContributions(db: Db, limit?: number): Contribution[] {
  const query = db.select().from(contributions).orderBy(...newestFirst);
  return limit === undefined ? query.all() : query.limit(limit).all();
}

export function listPendingContributions(db: Db): Contribution[] {
  return db
    .select()
    .from(contributions)
    .where(eq(contributions.status, "pending"))
    .orderBy(...newestFirst)
    .all();
}

export interface ContributionReview {
  status: Exclude<ContributionStatus, "pending">;
  reviewerId: string;
  reviewedAt: string;
}

/**
 * Sets status, approved, reviewed_by and reviewed_at in one statement.
 * Returns undefined when no contribution has that id.
 */
export function updateContributionStatus(
  db: Db,
  id: number,
  review: ContributionReview
): Contribution | undefined {
  return db
    .update(contributions)
    .set({
      status: review.status,
      approved: review.status === "approved",
      reviewedBy: review.reviewerId,
      reviewedAt: review.reviewedAt,
    })
    .where(eq(contributions.id, id))
    .returning()
    .get();
}
