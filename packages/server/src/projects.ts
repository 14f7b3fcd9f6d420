/**
 * @buildmeta/server - Project resolution
 *
 * A project path looks like `//<domain>/<stream-name>/<project...>`. The
 * stream is `//<domain>/<stream-name>`; the rest is the project name. Both
 * halves are stored lowercased.
 */

import type { DbExecutor } from './dialect/types';
import { InvalidProjectPathError, MetadataStorageError } from './errors';

export interface ProjectIdentity {
  stream: string;
  project: string;
}

export interface ProjectRecord extends ProjectIdentity {
  projectId: number;
}

export function parseProjectPath(path: string): ProjectIdentity {
  if (!path.startsWith('//')) {
    throw new InvalidProjectPathError(path, 'expected a leading "//"');
  }
  const domainEnd = path.indexOf('/', 2);
  const streamEnd = domainEnd === -1 ? -1 : path.indexOf('/', domainEnd + 1);
  if (streamEnd === -1) {
    throw new InvalidProjectPathError(path, 'no stream delimiter');
  }
  const project = path.slice(streamEnd + 1);
  if (project.length === 0) {
    throw new InvalidProjectPathError(path, 'empty project name');
  }
  return {
    stream: path.slice(0, streamEnd).toLowerCase(),
    project: project.toLowerCase(),
  };
}

export function formatProjectPath(identity: ProjectIdentity): string {
  return `${identity.stream}/${identity.project}`;
}

/**
 * Return the id for an identity, inserting the project on first use. The
 * insert relies on the unique (stream, project) index instead of a prior
 * lookup, so concurrent callers converge on one row.
 */
export async function upsertProject(
  db: DbExecutor,
  identity: ProjectIdentity
): Promise<number> {
  await db
    .insertInto('projects')
    .values({ stream: identity.stream, project: identity.project })
    .onConflict((oc) => oc.columns(['stream', 'project']).doNothing())
    .execute();

  const projectId = await findProjectId(db, identity);
  if (projectId === undefined) {
    throw new MetadataStorageError(
      `Project ${formatProjectPath(identity)} missing after upsert`
    );
  }
  return projectId;
}

export async function findProjectId(
  db: DbExecutor,
  identity: ProjectIdentity
): Promise<number | undefined> {
  const row = await db
    .selectFrom('projects')
    .select('project_id')
    .where('stream', '=', identity.stream.toLowerCase())
    .where('project', '=', identity.project.toLowerCase())
    .executeTakeFirst();
  return row?.project_id;
}

/**
 * Projects of a stream, optionally narrowed to one project name, by id.
 */
export async function listProjects(
  db: DbExecutor,
  args: { stream: string; project?: string }
): Promise<ProjectRecord[]> {
  let query = db
    .selectFrom('projects')
    .select(['project_id', 'stream', 'project'])
    .where('stream', '=', args.stream.toLowerCase());
  if (args.project !== undefined) {
    query = query.where('project', '=', args.project.toLowerCase());
  }
  const rows = await query.orderBy('project_id', 'asc').execute();
  return rows.map((row) => ({
    projectId: row.project_id,
    stream: row.stream,
    project: row.project,
  }));
}
