/**
 * @buildmeta/core - Common Zod schemas
 */

import { z } from 'zod';

// ============================================================================
// Error Response Schemas
// ============================================================================

export const ErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// ============================================================================
// Wire-stable enums
// ============================================================================

/**
 * Build result codes. The integer values are what older clients send and
 * parse; never renumber or reorder them.
 */
export const BadgeResult = {
  Starting: 0,
  Failure: 1,
  Warning: 2,
  Success: 3,
  Skipped: 4,
} as const;

export type BadgeResult = (typeof BadgeResult)[keyof typeof BadgeResult];

export const BadgeResultSchema = z.union([
  z.literal(BadgeResult.Starting),
  z.literal(BadgeResult.Failure),
  z.literal(BadgeResult.Warning),
  z.literal(BadgeResult.Success),
  z.literal(BadgeResult.Skipped),
]);

/**
 * User vote codes. Same stability rule as {@link BadgeResult}.
 */
export const UserVote = {
  None: 0,
  CompileSuccess: 1,
  CompileFailure: 2,
  Good: 3,
  Bad: 4,
} as const;

export type UserVote = (typeof UserVote)[keyof typeof UserVote];

export const UserVoteSchema = z.union([
  z.literal(UserVote.None),
  z.literal(UserVote.CompileSuccess),
  z.literal(UserVote.CompileFailure),
  z.literal(UserVote.Good),
  z.literal(UserVote.Bad),
]);

/**
 * Decode a stored result code. Returns null when the value is not a known
 * code; callers decide how to report that.
 */
export function decodeBadgeResult(value: unknown): BadgeResult | null {
  const parsed = BadgeResultSchema.safeParse(toCode(value));
  return parsed.success ? parsed.data : null;
}

export function decodeUserVote(value: unknown): UserVote | null {
  const parsed = UserVoteSchema.safeParse(toCode(value));
  return parsed.success ? parsed.data : null;
}

function toCode(value: unknown): unknown {
  return typeof value === 'bigint' ? Number(value) : value;
}
