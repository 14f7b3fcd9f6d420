/**
 * @buildmeta/server - database schema types
 *
 * Three tables:
 * - projects: (stream, project) identity → integer id
 * - badges: append-only build results, one row per report
 * - user_events: one mutable row per (project, user, change)
 */

import type { Generated } from 'kysely';

export interface ProjectsTable {
  project_id: Generated<number>;
  /** Lowercased `//domain/stream-name` */
  stream: string;
  /** Lowercased remainder of the path after the stream */
  project: string;
}

export interface BadgesTable {
  /** Row id; only the legacy v1 endpoints use it as a cursor */
  id: Generated<number>;
  /** Global write sequence shared with user_events */
  sequence: number;
  change_number: number;
  added_at: string;
  build_type: string;
  /** Wire code of the build result */
  result: number;
  url: string;
  project_id: number;
}

export interface UserEventsTable {
  id: Generated<number>;
  project_id: number;
  change_number: number;
  user_name: string;
  /** Re-assigned on every mutation */
  sequence: number;
  updated_at: string;
  synced_at: string | null;
  /** Wire code of the vote */
  vote: number | null;
  /** Dialect boolean encoding (0/1 on SQLite) */
  investigating: number | null;
  starred: number | null;
  comment: string | null;
}

/**
 * Database interface for the metadata tables.
 */
export interface MetadataCoreDb {
  projects: ProjectsTable;
  badges: BadgesTable;
  user_events: UserEventsTable;
}
