import { ValidationErrors } from "../errors";

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parses an ISO 8601 timestamp with an explicit offset into epoch milliseconds.
 */
export function parseTimestamp(value: string): number {
  if (!ISO_TIMESTAMP.test(value)) {
    throw new ValidationErrors.InvalidTimestampError({ observedAt: value });
  }

  const parsed = Date.parse(value);
  if (isNaN(parsed)) {
    throw new ValidationErrors.InvalidTimestampError({ observedAt: value });
  }

  return parsed;
}

export function toIso(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export const systemClock = (): number => Date.now();
