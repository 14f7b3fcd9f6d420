/**
 * @buildmeta/core - Metadata protocol Zod schemas
 *
 * Field names are PascalCase on the wire; the existing clients depend on it.
 * These schemas double as runtime validation for the HTTP layer and as the
 * source of the wire types.
 */

import { z } from 'zod';
import { BadgeResultSchema, UserVoteSchema } from './common';

// ============================================================================
// Writes
// ============================================================================

/**
 * POST /api/build body. `Project` is the full `//domain/stream/project` path.
 */
export const CreateBadgeRequestSchema = z.object({
  ChangeNumber: z.number().int(),
  BuildType: z.string(),
  Result: BadgeResultSchema,
  Url: z.string(),
  Project: z.string(),
});

export type CreateBadgeRequest = z.infer<typeof CreateBadgeRequestSchema>;

/**
 * POST /api/metadata body. With `Stream`, the project path is
 * `<Stream>/<Project>`; without it, `Project` is the full path.
 * `null` is accepted wherever a field is optional and means "not provided".
 */
export const UpdateMetadataRequestSchema = z.object({
  Stream: z.string().nullish(),
  Project: z.string(),
  Change: z.number().int(),
  UserName: z.string().min(1),
  Synced: z.boolean().nullish(),
  Vote: UserVoteSchema.nullish(),
  Investigating: z.boolean().nullish(),
  Starred: z.boolean().nullish(),
  Comment: z.string().nullish(),
});

export type UpdateMetadataRequest = z.infer<
  typeof UpdateMetadataRequestSchema
>;

// ============================================================================
// Reads
// ============================================================================

export const GetMetadataQuerySchema = z.object({
  stream: z.string().min(1),
  project: z.string().min(1).optional(),
  minchange: z.coerce.number().int(),
  maxchange: z.coerce.number().int().optional(),
  sequence: z.coerce.number().int().min(0).optional(),
});

export type GetMetadataQuery = z.infer<typeof GetMetadataQuerySchema>;

export const UserDataResponseSchema = z.object({
  User: z.string(),
  SyncTime: z.number().int().nullable(),
  Vote: UserVoteSchema.nullable(),
  Comment: z.string(),
  Investigating: z.boolean().nullable(),
  Starred: z.boolean().nullable(),
});

export type UserDataResponse = z.infer<typeof UserDataResponseSchema>;

export const BadgeDataResponseSchema = z.object({
  Name: z.string(),
  Url: z.string(),
  State: BadgeResultSchema,
});

export type BadgeDataResponse = z.infer<typeof BadgeDataResponseSchema>;

export const MetadataResponseSchema = z.object({
  Project: z.string(),
  Change: z.number().int(),
  Users: z.array(UserDataResponseSchema),
  Badges: z.array(BadgeDataResponseSchema),
});

export type MetadataResponse = z.infer<typeof MetadataResponseSchema>;

export const MetadataListResponseSchema = z.object({
  SequenceNumber: z.number().int(),
  Items: z.array(MetadataResponseSchema),
});

export type MetadataListResponse = z.infer<typeof MetadataListResponseSchema>;

// ============================================================================
// Legacy v1 reads
// ============================================================================

export const LatestQuerySchema = z.object({
  project: z.string(),
});

export const LatestResponseSchema = z.object({
  Version: z.number().int().nullable(),
  LastEventId: z.number().int(),
  LastCommentId: z.number().int(),
  LastBuildId: z.number().int(),
});

export type LatestResponse = z.infer<typeof LatestResponseSchema>;

export const BuildIndexQuerySchema = z.object({
  project: z.string(),
  lastbuildid: z.coerce.number().int(),
});

export const BadgeResponseSchema = z.object({
  Id: z.number().int(),
  ChangeNumber: z.number().int(),
  AddedAt: z.string(),
  BuildType: z.string(),
  Result: BadgeResultSchema,
  Url: z.string(),
  Project: z.string(),
});

export type BadgeResponse = z.infer<typeof BadgeResponseSchema>;
