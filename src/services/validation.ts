import { InvalidInputError } from "../errors.js";

export function assertLimit(limit: number | undefined, operation: string): void {
  if (limit === undefined) return;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidInputError(`limit must be a positive integer, got ${limit}`, {
      operation,
    });
  }
}
