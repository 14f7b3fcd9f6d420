/**
 * @buildmeta/server - Badge rows
 *
 * Badges are append-only: one row per reported build result.
 */

import { type BadgeResult, decodeBadgeResult } from '@buildmeta/core';
import type { DbExecutor } from './dialect/types';
import { coerceIsoString } from './dialect/helpers';
import { MetadataStorageError } from './errors';

export interface SubmitBadgeInput {
  /** Full `//domain/stream/project` path */
  path: string;
  change: number;
  buildType: string;
  result: BadgeResult;
  url: string;
}

export interface BadgeRow {
  id: number;
  sequence: number;
  change: number;
  addedAt: string;
  buildType: string;
  result: BadgeResult;
  url: string;
}

/**
 * Change and sequence filter shared by badge and user-event fetches.
 */
export interface ChangeWindow {
  minChange: number;
  maxChange?: number;
  sinceSequence?: number;
}

export async function insertBadge(
  db: DbExecutor,
  args: {
    projectId: number;
    sequence: number;
    change: number;
    buildType: string;
    result: BadgeResult;
    url: string;
    addedAt: string;
  }
): Promise<number> {
  const inserted = await db
    .insertInto('badges')
    .values({
      sequence: args.sequence,
      change_number: args.change,
      added_at: args.addedAt,
      build_type: args.buildType,
      result: args.result,
      url: args.url,
      project_id: args.projectId,
    })
    .executeTakeFirstOrThrow();
  return Number(inserted.insertId ?? 0);
}

function decodeRow(row: {
  id: number;
  sequence: number;
  change_number: number;
  added_at: string;
  build_type: string;
  result: number;
  url: string;
}): BadgeRow {
  const result = decodeBadgeResult(row.result);
  if (result === null) {
    throw new MetadataStorageError(
      `Invalid build result ${String(row.result)} stored for badge ${row.id}`
    );
  }
  return {
    id: row.id,
    sequence: row.sequence,
    change: row.change_number,
    addedAt: coerceIsoString(row.added_at),
    buildType: row.build_type,
    result,
    url: row.url,
  };
}

/**
 * Badges of one project inside the window, ascending by sequence.
 */
export async function readBadgeRows(
  db: DbExecutor,
  projectId: number,
  window: ChangeWindow
): Promise<BadgeRow[]> {
  let query = db
    .selectFrom('badges')
    .select([
      'id',
      'sequence',
      'change_number',
      'added_at',
      'build_type',
      'result',
      'url',
    ])
    .where('project_id', '=', projectId)
    .where('change_number', '>=', window.minChange);
  if (window.maxChange !== undefined) {
    query = query.where('change_number', '<=', window.maxChange);
  }
  if (window.sinceSequence !== undefined) {
    query = query.where('sequence', '>', window.sinceSequence);
  }
  const rows = await query.orderBy('sequence', 'asc').execute();
  return rows.map(decodeRow);
}

/**
 * Badges of one project with a row id above `lastId`, ascending by id.
 */
export async function readBadgesAfterId(
  db: DbExecutor,
  projectId: number,
  lastId: number
): Promise<BadgeRow[]> {
  const rows = await db
    .selectFrom('badges')
    .select([
      'id',
      'sequence',
      'change_number',
      'added_at',
      'build_type',
      'result',
      'url',
    ])
    .where('project_id', '=', projectId)
    .where('id', '>', lastId)
    .orderBy('id', 'asc')
    .execute();
  return rows.map(decodeRow);
}

export async function readLatestBadgeId(
  db: DbExecutor,
  projectId: number
): Promise<number> {
  const row = await db
    .selectFrom('badges')
    .select('id')
    .where('project_id', '=', projectId)
    .orderBy('id', 'desc')
    .limit(1)
    .executeTakeFirst();
  return row?.id ?? 0;
}
