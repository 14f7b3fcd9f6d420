/**
 * @buildmeta/server - User events
 *
 * One row per (project, user, change) holding the user's cumulative review
 * state. Each submission merges into the stored state field by field.
 */

import { decodeUserVote, type UserVote } from '@buildmeta/core';
import type { ChangeWindow } from './badges';
import type { DbExecutor, ServerMetadataDialect } from './dialect/types';
import { coerceIsoString } from './dialect/helpers';
import { MetadataStorageError } from './errors';

export interface UserEventPatch {
  /** `true` stamps the sync time; `false` leaves it as it was. */
  synced?: boolean;
  vote?: UserVote;
  investigating?: boolean;
  starred?: boolean;
  comment?: string;
}

export interface SubmitUserEventInput extends UserEventPatch {
  /** Full `//domain/stream/project` path */
  path: string;
  change: number;
  user: string;
}

export interface UserEventState {
  syncedAt: string | null;
  vote: UserVote | null;
  investigating: boolean | null;
  starred: boolean | null;
  comment: string | null;
}

export interface UserEventRow extends UserEventState {
  id: number;
  sequence: number;
  change: number;
  user: string;
  updatedAt: string;
}

export const EMPTY_USER_EVENT_STATE: UserEventState = {
  syncedAt: null,
  vote: null,
  investigating: null,
  starred: null,
  comment: null,
};

/**
 * Provided fields replace stored ones; omitted fields keep them. A sync
 * time, once set, can only move forward to a newer sync.
 */
export function mergeUserEventState(
  previous: UserEventState,
  patch: UserEventPatch,
  nowIso: string
): UserEventState {
  return {
    syncedAt: patch.synced === true ? nowIso : previous.syncedAt,
    vote: patch.vote ?? previous.vote,
    investigating: patch.investigating ?? previous.investigating,
    starred: patch.starred ?? previous.starred,
    comment: patch.comment ?? previous.comment,
  };
}

type StoredUserEvent = {
  id: number;
  sequence: number;
  change_number: number;
  user_name: string;
  updated_at: string;
  synced_at: string | null;
  vote: number | null;
  investigating: number | null;
  starred: number | null;
  comment: string | null;
};

function decodeRow(
  dialect: ServerMetadataDialect,
  row: StoredUserEvent
): UserEventRow {
  let vote: UserVote | null = null;
  if (row.vote !== null) {
    vote = decodeUserVote(row.vote);
    if (vote === null) {
      throw new MetadataStorageError(
        `Invalid vote ${String(row.vote)} stored for user event ${row.id}`
      );
    }
  }
  return {
    id: row.id,
    sequence: row.sequence,
    change: row.change_number,
    user: row.user_name,
    updatedAt: coerceIsoString(row.updated_at),
    syncedAt: row.synced_at === null ? null : coerceIsoString(row.synced_at),
    vote,
    investigating: dialect.dbToBoolean(row.investigating),
    starred: dialect.dbToBoolean(row.starred),
    comment: row.comment,
  };
}

const USER_EVENT_COLUMNS = [
  'id',
  'sequence',
  'change_number',
  'user_name',
  'updated_at',
  'synced_at',
  'vote',
  'investigating',
  'starred',
  'comment',
] as const;

export async function findUserEvent(
  db: DbExecutor,
  dialect: ServerMetadataDialect,
  args: { projectId: number; user: string; change: number }
): Promise<UserEventRow | undefined> {
  const row = await db
    .selectFrom('user_events')
    .select(USER_EVENT_COLUMNS)
    .where('project_id', '=', args.projectId)
    .where('user_name', '=', args.user)
    .where('change_number', '=', args.change)
    .executeTakeFirst();
  return row ? decodeRow(dialect, row) : undefined;
}

/**
 * Read-modify-write of one user's state. Must run inside the exclusive
 * gate and a transaction.
 */
export async function upsertUserEvent(
  db: DbExecutor,
  dialect: ServerMetadataDialect,
  args: {
    projectId: number;
    user: string;
    change: number;
    sequence: number;
    patch: UserEventPatch;
    nowIso: string;
  }
): Promise<{ id: number; state: UserEventState }> {
  const existing = await findUserEvent(db, dialect, args);
  const state = mergeUserEventState(
    existing ?? EMPTY_USER_EVENT_STATE,
    args.patch,
    args.nowIso
  );
  const columns = {
    sequence: args.sequence,
    updated_at: args.nowIso,
    synced_at: state.syncedAt,
    vote: state.vote,
    investigating: dialect.booleanToDb(state.investigating),
    starred: dialect.booleanToDb(state.starred),
    comment: state.comment,
  };

  if (existing) {
    await db
      .updateTable('user_events')
      .set(columns)
      .where('id', '=', existing.id)
      .execute();
    return { id: existing.id, state };
  }

  const inserted = await db
    .insertInto('user_events')
    .values({
      project_id: args.projectId,
      change_number: args.change,
      user_name: args.user,
      ...columns,
    })
    .executeTakeFirstOrThrow();
  return { id: Number(inserted.insertId ?? 0), state };
}

/**
 * User events of one project inside the window, ascending by sequence.
 */
export async function readUserEventRows(
  db: DbExecutor,
  dialect: ServerMetadataDialect,
  projectId: number,
  window: ChangeWindow
): Promise<UserEventRow[]> {
  let query = db
    .selectFrom('user_events')
    .select(USER_EVENT_COLUMNS)
    .where('project_id', '=', projectId)
    .where('change_number', '>=', window.minChange);
  if (window.maxChange !== undefined) {
    query = query.where('change_number', '<=', window.maxChange);
  }
  if (window.sinceSequence !== undefined) {
    query = query.where('sequence', '>', window.sinceSequence);
  }
  const rows = await query.orderBy('sequence', 'asc').execute();
  return rows.map((row) => decodeRow(dialect, row));
}
