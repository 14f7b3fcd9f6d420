import { UserVote } from '@buildmeta/core';
import type { Kysely } from 'kysely';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createBetterSqlite3Db } from '../../dialect-better-sqlite3/src';
import { createSqliteServerDialect } from '../../server-dialect-sqlite/src';
import { ensureMetadataSchema } from './migrate';
import { parseProjectPath, upsertProject } from './projects';
import type { MetadataCoreDb } from './schema';
import {
  EMPTY_USER_EVENT_STATE,
  findUserEvent,
  mergeUserEventState,
  upsertUserEvent,
} from './user-events';

const EARLIER = '2026-03-01T10:00:00.000Z';
const LATER = '2026-03-01T11:00:00.000Z';

describe('mergeUserEventState', () => {
  it('keeps stored fields the patch leaves out', () => {
    const previous = {
      syncedAt: EARLIER,
      vote: UserVote.Good,
      investigating: true,
      starred: false,
      comment: 'flaky on linux',
    };

    expect(mergeUserEventState(previous, { starred: true }, LATER)).toEqual({
      ...previous,
      starred: true,
    });
  });

  it('stamps the sync time only when synced is true', () => {
    const previous = { ...EMPTY_USER_EVENT_STATE, syncedAt: EARLIER };

    expect(
      mergeUserEventState(previous, { synced: true }, LATER).syncedAt
    ).toBe(LATER);
    expect(
      mergeUserEventState(previous, { synced: false }, LATER).syncedAt
    ).toBe(EARLIER);
  });

  it('lets explicit false values replace stored flags', () => {
    const previous = {
      ...EMPTY_USER_EVENT_STATE,
      investigating: true,
      starred: true,
    };

    expect(
      mergeUserEventState(
        previous,
        { investigating: false, starred: false },
        LATER
      )
    ).toMatchObject({ investigating: false, starred: false });
  });
});

describe('upsertUserEvent', () => {
  const dialect = createSqliteServerDialect();
  let db: Kysely<MetadataCoreDb>;
  let projectId: number;

  beforeEach(async () => {
    db = createBetterSqlite3Db<MetadataCoreDb>({ path: ':memory:' });
    await ensureMetadataSchema(db, dialect);
    projectId = await upsertProject(db, parseProjectPath('//depot/main/engine'));
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('keeps one row per user and change', async () => {
    const first = await upsertUserEvent(db, dialect, {
      projectId,
      user: 'alice',
      change: 42,
      sequence: 10,
      patch: { vote: UserVote.CompileFailure, investigating: true },
      nowIso: EARLIER,
    });
    const second = await upsertUserEvent(db, dialect, {
      projectId,
      user: 'alice',
      change: 42,
      sequence: 11,
      patch: { comment: 'looking' },
      nowIso: LATER,
    });

    expect(second.id).toBe(first.id);
    const stored = await findUserEvent(db, dialect, {
      projectId,
      user: 'alice',
      change: 42,
    });
    expect(stored).toEqual({
      id: first.id,
      sequence: 11,
      change: 42,
      user: 'alice',
      updatedAt: LATER,
      syncedAt: null,
      vote: UserVote.CompileFailure,
      investigating: true,
      starred: null,
      comment: 'looking',
    });
  });

  it('stores flags as integers', async () => {
    await upsertUserEvent(db, dialect, {
      projectId,
      user: 'bob',
      change: 7,
      sequence: 1,
      patch: { starred: false },
      nowIso: EARLIER,
    });

    const raw = await db
      .selectFrom('user_events')
      .select(['starred', 'investigating'])
      .executeTakeFirstOrThrow();
    expect(raw).toEqual({ starred: 0, investigating: null });
  });
});
