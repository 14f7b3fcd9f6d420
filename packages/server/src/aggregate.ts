/**
 * @buildmeta/server - Metadata aggregation
 *
 * Folds badge rows and user-event rows into one record per
 * (project, change). Sub-lists keep the ascending sequence order the rows
 * were fetched in; records are not sorted further.
 */

import type { BadgeResult, UserVote } from '@buildmeta/core';
import { type BadgeRow, type ChangeWindow, readBadgeRows } from './badges';
import type { DbExecutor, ServerMetadataDialect } from './dialect/types';
import { isoToUnixSeconds } from './dialect/helpers';
import { formatProjectPath, listProjects, type ProjectRecord } from './projects';
import { readUserEventRows, type UserEventRow } from './user-events';

export interface MetadataQuery extends ChangeWindow {
  stream: string;
  project?: string;
}

export interface AggregateBadge {
  name: string;
  url: string;
  state: BadgeResult;
}

export interface AggregateUser {
  user: string;
  /** Unix seconds of the last sync, if any */
  syncTime: number | null;
  vote: UserVote | null;
  comment: string;
  investigating: boolean | null;
  starred: boolean | null;
}

export interface AggregateRecord {
  /** `<stream>/<project>` */
  project: string;
  change: number;
  users: AggregateUser[];
  badges: AggregateBadge[];
}

export interface MetadataQueryResult {
  /** Greatest sequence among the rows returned; 0 when nothing matched */
  sequenceNumber: number;
  items: AggregateRecord[];
}

export interface ProjectFold {
  records: AggregateRecord[];
  maxSequence: number;
}

/**
 * Fold one project's rows. Badge rows are visited first, then user rows; the
 * first row seen for a change creates its record.
 */
export function foldProjectRows(
  projectPath: string,
  badges: readonly BadgeRow[],
  users: readonly UserEventRow[]
): ProjectFold {
  const byChange = new Map<number, AggregateRecord>();
  let maxSequence = 0;

  const recordFor = (change: number): AggregateRecord => {
    let record = byChange.get(change);
    if (!record) {
      record = { project: projectPath, change, users: [], badges: [] };
      byChange.set(change, record);
    }
    return record;
  };

  for (const badge of badges) {
    recordFor(badge.change).badges.push({
      name: badge.buildType,
      url: badge.url,
      state: badge.result,
    });
    maxSequence = Math.max(maxSequence, badge.sequence);
  }

  for (const row of users) {
    recordFor(row.change).users.push({
      user: row.user,
      syncTime: isoToUnixSeconds(row.syncedAt),
      vote: row.vote,
      comment: row.comment ?? '',
      investigating: row.investigating,
      starred: row.starred,
    });
    maxSequence = Math.max(maxSequence, row.sequence);
  }

  return { records: Array.from(byChange.values()), maxSequence };
}

async function fetchProject(
  db: DbExecutor,
  dialect: ServerMetadataDialect,
  project: ProjectRecord,
  window: ChangeWindow
): Promise<ProjectFold> {
  const badges = await readBadgeRows(db, project.projectId, window);
  const users = await readUserEventRows(
    db,
    dialect,
    project.projectId,
    window
  );
  return foldProjectRows(formatProjectPath(project), badges, users);
}

/**
 * Run the aggregation query. The caller holds the gate in shared mode.
 * The signal is checked between projects.
 */
export async function queryMetadata(
  db: DbExecutor,
  dialect: ServerMetadataDialect,
  query: MetadataQuery,
  options?: { signal?: AbortSignal }
): Promise<MetadataQueryResult> {
  const projects = await listProjects(db, {
    stream: query.stream,
    project: query.project,
  });
  const window: ChangeWindow = {
    minChange: query.minChange,
    maxChange: query.maxChange,
    sinceSequence: query.sinceSequence,
  };

  const items: AggregateRecord[] = [];
  let sequenceNumber = 0;
  for (const project of projects) {
    options?.signal?.throwIfAborted();
    const fold = await fetchProject(db, dialect, project, window);
    items.push(...fold.records);
    sequenceNumber = Math.max(sequenceNumber, fold.maxSequence);
  }

  return { sequenceNumber, items };
}
