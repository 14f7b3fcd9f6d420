import {
  BadgeResult,
  configureTelemetry,
  getTelemetry,
  type MetadataTelemetry,
  UserVote,
} from '@buildmeta/core';
import { type Kysely, sql } from 'kysely';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createBetterSqlite3Db } from '../../dialect-better-sqlite3/src';
import { createSqliteServerDialect } from '../../server-dialect-sqlite/src';
import { createMetadataEngine, type MetadataEngine } from './engine';
import { InvalidProjectPathError, MetadataStorageError } from './errors';
import { ConsistencyGate } from './gate';
import { ensureMetadataSchema } from './migrate';
import type { MetadataCoreDb } from './schema';

const NOW = new Date('2026-04-01T12:00:00.000Z');
const PATH = '//depot/main/engine';

function steppingClock(start: number) {
  let value = start;
  return () => {
    value += 10;
    return value;
  };
}

describe('MetadataEngine', () => {
  const dialect = createSqliteServerDialect();
  let db: Kysely<MetadataCoreDb>;
  let engine: MetadataEngine;

  beforeEach(async () => {
    db = createBetterSqlite3Db<MetadataCoreDb>({ path: ':memory:' });
    await ensureMetadataSchema(db, dialect);
    engine = createMetadataEngine({
      db,
      dialect,
      sequenceClock: steppingClock(1000),
      now: () => NOW,
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  function badge(change: number, buildType: string, result: BadgeResult) {
    return engine.submitBadge({
      path: PATH,
      change,
      buildType,
      result,
      url: `http://ci.test/${change}/${buildType}`,
    });
  }

  it('groups badges by change', async () => {
    await badge(1, 'Editor', BadgeResult.Success);
    await badge(1, 'Game', BadgeResult.Failure);
    await badge(1, 'Tests', BadgeResult.Starting);
    const last = await badge(2, 'Editor', BadgeResult.Warning);

    const result = await engine.query({ stream: '//depot/main', minChange: 0 });

    expect(result.sequenceNumber).toBe(last.sequence);
    expect(result.items).toEqual([
      {
        project: PATH,
        change: 1,
        users: [],
        badges: [
          {
            name: 'Editor',
            url: 'http://ci.test/1/Editor',
            state: BadgeResult.Success,
          },
          {
            name: 'Game',
            url: 'http://ci.test/1/Game',
            state: BadgeResult.Failure,
          },
          {
            name: 'Tests',
            url: 'http://ci.test/1/Tests',
            state: BadgeResult.Starting,
          },
        ],
      },
      {
        project: PATH,
        change: 2,
        users: [],
        badges: [
          {
            name: 'Editor',
            url: 'http://ci.test/2/Editor',
            state: BadgeResult.Warning,
          },
        ],
      },
    ]);
  });

  it('assigns strictly increasing sequences across both write kinds', async () => {
    const sequences = [
      (await badge(1, 'Editor', BadgeResult.Success)).sequence,
      (await engine.submitUserEvent({ path: PATH, change: 1, user: 'alice' }))
        .sequence,
      (await badge(2, 'Editor', BadgeResult.Success)).sequence,
    ];

    expect(sequences).toEqual([1010, 1020, 1030]);
  });

  it('hands out distinct sequences to concurrent writers', async () => {
    const results = await Promise.all(
      Array.from({ length: 8 }, (_, i) =>
        badge(i + 1, 'Editor', BadgeResult.Success)
      )
    );

    const sequences = results.map((r) => r.sequence);
    expect(new Set(sequences).size).toBe(8);
    const projects = await db.selectFrom('projects').selectAll().execute();
    expect(projects).toHaveLength(1);
  });

  it('reports the gate queue depth before each operation', async () => {
    const previous = getTelemetry();
    const gauges: Array<{ name: string; value: number; kind: unknown }> = [];
    const telemetry: MetadataTelemetry = {
      ...previous,
      tracer: {
        startSpan(_options, callback) {
          return callback({
            setAttribute() {},
            setAttributes() {},
            setStatus() {},
          });
        },
      },
      metrics: {
        ...previous.metrics,
        gauge(name, value, options) {
          gauges.push({ name, value, kind: options?.attributes?.kind });
        },
      },
    };
    configureTelemetry(telemetry);
    try {
      await Promise.all([
        badge(1, 'Editor', BadgeResult.Success),
        badge(1, 'Game', BadgeResult.Success),
        engine.submitUserEvent({ path: PATH, change: 1, user: 'alice' }),
      ]);
      await engine.query({ stream: '//depot/main', minChange: 0 });
    } finally {
      configureTelemetry(previous);
    }

    expect(gauges).toEqual([
      { name: 'metadata.gate.queued', value: 0, kind: 'badge' },
      { name: 'metadata.gate.queued', value: 0, kind: 'badge' },
      { name: 'metadata.gate.queued', value: 1, kind: 'user_event' },
      { name: 'metadata.gate.queued', value: 0, kind: 'query' },
    ]);
  });

  it('never repeats a sequence across engines sharing a gate', async () => {
    const gate = new ConsistencyGate();
    const stalled = () => 1000;
    const first = createMetadataEngine({
      db,
      dialect,
      gate,
      sequenceClock: stalled,
    });
    const second = createMetadataEngine({
      db,
      dialect,
      gate,
      sequenceClock: stalled,
    });
    const input = {
      path: PATH,
      change: 1,
      buildType: 'Editor',
      result: BadgeResult.Success,
      url: 'http://ci.test/1',
    };

    const sequences = [
      (await first.submitBadge(input)).sequence,
      (await second.submitBadge(input)).sequence,
      (await first.submitBadge(input)).sequence,
      (await second.submitUserEvent({ path: PATH, change: 1, user: 'alice' }))
        .sequence,
    ];

    expect(sequences).toEqual([1000, 1001, 1002, 1003]);
  });

  it('merges user submissions into one entry', async () => {
    await engine.submitUserEvent({
      path: PATH,
      change: 5,
      user: 'alice',
      vote: UserVote.Good,
    });
    await engine.submitUserEvent({
      path: PATH,
      change: 5,
      user: 'alice',
      synced: true,
      starred: true,
    });

    const result = await engine.query({ stream: '//depot/main', minChange: 5 });

    expect(result.items).toEqual([
      {
        project: PATH,
        change: 5,
        badges: [],
        users: [
          {
            user: 'alice',
            syncTime: Math.floor(NOW.getTime() / 1000),
            vote: UserVote.Good,
            comment: '',
            investigating: null,
            starred: true,
          },
        ],
      },
    ]);
  });

  it('returns only rows written after the cursor', async () => {
    await badge(10, 'Editor', BadgeResult.Success);
    await badge(11, 'Editor', BadgeResult.Success);
    const first = await engine.query({ stream: '//depot/main', minChange: 0 });

    const written = await engine.submitUserEvent({
      path: PATH,
      change: 10,
      user: 'bob',
      comment: 'fixed in 12',
    });
    const delta = await engine.query({
      stream: '//depot/main',
      minChange: 0,
      sinceSequence: first.sequenceNumber,
    });

    expect(delta.sequenceNumber).toBe(written.sequence);
    expect(delta.sequenceNumber).toBeGreaterThan(first.sequenceNumber);
    expect(delta.items).toHaveLength(1);
    expect(delta.items[0]).toMatchObject({
      change: 10,
      badges: [],
      users: [{ user: 'bob', comment: 'fixed in 12' }],
    });

    const empty = await engine.query({
      stream: '//depot/main',
      minChange: 0,
      sinceSequence: delta.sequenceNumber,
    });
    expect(empty).toEqual({ sequenceNumber: 0, items: [] });
  });

  it('filters by change range, project and stream case', async () => {
    await badge(1, 'Editor', BadgeResult.Success);
    await badge(5, 'Editor', BadgeResult.Success);
    await badge(9, 'Editor', BadgeResult.Success);
    await engine.submitBadge({
      path: '//depot/main/tools',
      change: 5,
      buildType: 'Lint',
      result: BadgeResult.Skipped,
      url: 'http://ci.test/tools',
    });

    const ranged = await engine.query({
      stream: '//DEPOT/Main',
      minChange: 2,
      maxChange: 8,
    });
    expect(ranged.items.map((i) => `${i.project}@${i.change}`)).toEqual([
      '//depot/main/engine@5',
      '//depot/main/tools@5',
    ]);

    const single = await engine.query({
      stream: '//depot/main',
      project: 'Tools',
      minChange: 0,
    });
    expect(single.items.map((i) => i.project)).toEqual(['//depot/main/tools']);
  });

  it('returns nothing for an unknown stream', async () => {
    await badge(1, 'Editor', BadgeResult.Success);

    expect(
      await engine.query({ stream: '//depot/other', minChange: 0 })
    ).toEqual({ sequenceNumber: 0, items: [] });
  });

  it('rejects malformed paths without writing', async () => {
    await expect(
      engine.submitBadge({
        path: 'depot/main/engine',
        change: 1,
        buildType: 'Editor',
        result: BadgeResult.Success,
        url: 'http://ci.test',
      })
    ).rejects.toBeInstanceOf(InvalidProjectPathError);
    await expect(
      engine.submitUserEvent({ path: '//depot/main', change: 1, user: 'a' })
    ).rejects.toBeInstanceOf(InvalidProjectPathError);

    expect(await db.selectFrom('projects').selectAll().execute()).toEqual([]);
    expect(await db.selectFrom('badges').selectAll().execute()).toEqual([]);
    expect(await db.selectFrom('user_events').selectAll().execute()).toEqual(
      []
    );
  });

  it('leaves no partial write behind when a write fails', async () => {
    await sql`DROP TABLE badges`.execute(db);

    await expect(
      badge(1, 'Editor', BadgeResult.Success)
    ).rejects.toBeInstanceOf(MetadataStorageError);
    expect(await db.selectFrom('projects').selectAll().execute()).toEqual([]);
  });

  it('reports stored codes it cannot decode as storage errors', async () => {
    await badge(1, 'Editor', BadgeResult.Success);
    await db.updateTable('badges').set({ result: 99 }).execute();

    await expect(
      engine.query({ stream: '//depot/main', minChange: 0 })
    ).rejects.toBeInstanceOf(MetadataStorageError);
  });

  it('abandons a query whose client went away', async () => {
    await badge(1, 'Editor', BadgeResult.Success);
    const controller = new AbortController();
    controller.abort();

    await expect(
      engine.query(
        { stream: '//depot/main', minChange: 0 },
        { signal: controller.signal }
      )
    ).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('resolves existing projects without creating new ones', async () => {
    const { projectId } = await badge(1, 'Editor', BadgeResult.Success);

    expect(await engine.resolveProject('//Depot/Main', 'Engine')).toBe(
      projectId
    );
    expect(
      await engine.resolveProject('//depot/main', 'missing')
    ).toBeUndefined();
    expect(await db.selectFrom('projects').selectAll().execute()).toHaveLength(
      1
    );
  });

  describe('legacy build index', () => {
    it('reports the latest badge id', async () => {
      expect(await engine.readLatest(PATH)).toEqual({
        version: null,
        lastEventId: 0,
        lastCommentId: 0,
        lastBuildId: 0,
      });

      await badge(1, 'Editor', BadgeResult.Success);
      await badge(2, 'Editor', BadgeResult.Success);

      expect((await engine.readLatest(PATH)).lastBuildId).toBe(2);
    });

    it('lists badges after a row id', async () => {
      await badge(1, 'Editor', BadgeResult.Success);
      await badge(2, 'Game', BadgeResult.Failure);

      expect(await engine.listBadgesSince('//Depot/Main/Engine', 1)).toEqual([
        {
          id: 2,
          changeNumber: 2,
          addedAt: NOW.toISOString(),
          buildType: 'Game',
          result: BadgeResult.Failure,
          url: 'http://ci.test/2/Game',
          project: PATH,
        },
      ]);
    });
  });
});
