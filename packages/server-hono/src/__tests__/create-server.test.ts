import {
  configureTelemetry,
  createDefaultTelemetry,
  resetTelemetry,
} from '@buildmeta/core';
import {
  ensureMetadataSchema,
  type MetadataCoreDb,
} from '@buildmeta/server';
import type { Kysely } from 'kysely';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createBetterSqlite3Db } from '../../../dialect-better-sqlite3/src';
import { createSqliteServerDialect } from '../../../server-dialect-sqlite/src';
import { createMetadataServer, normalizeRequestRoot } from '../create-server';

describe('normalizeRequestRoot', () => {
  it.each([
    [undefined, '/'],
    ['', '/'],
    ['/', '/'],
    ['/buildmeta/', '/buildmeta'],
    ['buildmeta', '/buildmeta'],
    ['/tools/buildmeta', '/tools/buildmeta'],
  ])('maps %s to %s', (input, expected) => {
    expect(normalizeRequestRoot(input)).toBe(expected);
  });
});

describe('createMetadataServer', () => {
  const dialect = createSqliteServerDialect();
  let db: Kysely<MetadataCoreDb>;

  beforeEach(async () => {
    configureTelemetry(createDefaultTelemetry({ write: () => {} }));
    db = createBetterSqlite3Db<MetadataCoreDb>({ path: ':memory:' });
    await ensureMetadataSchema(db, dialect);
  });

  afterEach(async () => {
    resetTelemetry();
    await db.destroy();
  });

  it('mounts every route under the request root', async () => {
    const { app } = createMetadataServer({
      db,
      dialect,
      requestRoot: '/buildmeta/',
    });

    expect((await app.request('/buildmeta/health')).status).toBe(200);
    expect((await app.request('/buildmeta/api/event')).status).toBe(200);
    expect((await app.request('/api/event')).status).toBe(404);
  });

  it('also answers health checks outside the request root', async () => {
    const { app } = createMetadataServer({
      db,
      dialect,
      requestRoot: '/meta',
    });

    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('');
  });

  it('guards client routes with the user credential', async () => {
    const { app } = createMetadataServer({
      db,
      dialect,
      userAuth: 'viewer:test-secret',
    });

    expect((await app.request('/api/event')).status).toBe(401);
    const ok = await app.request('/api/event', {
      headers: { authorization: `Basic ${btoa('viewer:test-secret')}` },
    });
    expect(ok.status).toBe(200);
    expect((await app.request('/health')).status).toBe(200);
  });

  it('compares the whole decoded credential', async () => {
    const { app } = createMetadataServer({
      db,
      dialect,
      userAuth: 'sharedtoken',
    });

    const ok = await app.request('/api/event', {
      headers: { authorization: `Basic ${btoa('sharedtoken')}` },
    });
    expect(ok.status).toBe(200);

    const denied = await app.request('/api/event', {
      headers: { authorization: `Basic ${btoa('shared:token')}` },
    });
    expect(denied.status).toBe(401);
    expect(denied.headers.get('www-authenticate')).toBe(
      'Basic realm="buildmeta"'
    );
  });

  it('leaves badge submission open without a CI credential', async () => {
    const { app, engine } = createMetadataServer({ db, dialect });

    const res = await app.request('/api/build', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        ChangeNumber: 3,
        BuildType: 'Editor',
        Result: 0,
        Url: 'http://ci.test/3',
        Project: '//depot/main/engine',
      }),
    });

    expect(res.status).toBe(200);
    expect(await engine.resolveProject('//depot/main', 'engine')).toBe(1);
  });
});
