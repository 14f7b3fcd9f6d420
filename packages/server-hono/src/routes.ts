/**
 * @buildmeta/server-hono - Metadata routes for Hono
 *
 * Provides:
 * - GET  /health
 * - GET  /api/latest, /api/build          (legacy build index)
 * - GET  /api/event, /api/comment, /api/issues (retired, always empty)
 * - GET  /api/metadata                    (aggregated delta query)
 * - POST /api/metadata                    (user event)
 * - POST /api/build, /api/Build           (CI badge)
 */

import {
  BuildIndexQuerySchema,
  captureMetadataException,
  CreateBadgeRequestSchema,
  createTimer,
  type ErrorResponse,
  GetMetadataQuerySchema,
  type BadgeResponse,
  type LatestResponse,
  LatestQuerySchema,
  logMetadataEvent,
  type MetadataListResponse,
  UpdateMetadataRequestSchema,
} from '@buildmeta/core';
import {
  type AggregateRecord,
  InvalidProjectPathError,
  isAbortError,
  MetadataStorageError,
  type MetadataEngine,
} from '@buildmeta/server';
import { zValidator } from '@hono/zod-validator';
import type { Context, MiddlewareHandler } from 'hono';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';

export interface CreateMetadataRoutesOptions {
  engine: MetadataEngine;
  /** Guards the routes used by desktop clients. */
  userAuth: MiddlewareHandler;
  /** Guards badge submission from build machines. */
  ciAuth: MiddlewareHandler;
}

/**
 * Validation failures share the error envelope of every other 400.
 */
function invalidRequest(
  result: { success: boolean; error?: ZodError },
  c: Context
): Response | undefined {
  if (result.success || !result.error) return undefined;
  const message = result.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  const body: ErrorResponse = { error: 'INVALID_REQUEST', message };
  return c.json(body, 400);
}

function toWireRecord(record: AggregateRecord) {
  return {
    Project: record.project,
    Change: record.change,
    Users: record.users.map((user) => ({
      User: user.user,
      SyncTime: user.syncTime,
      Vote: user.vote,
      Comment: user.comment,
      Investigating: user.investigating,
      Starred: user.starred,
    })),
    Badges: record.badges.map((badge) => ({
      Name: badge.name,
      Url: badge.url,
      State: badge.state,
    })),
  };
}

export function createMetadataRoutes(
  options: CreateMetadataRoutesOptions
): Hono {
  const { engine, userAuth, ciAuth } = options;
  const routes = new Hono();

  routes.onError((error, c) => {
    if (error instanceof HTTPException) {
      return error.getResponse();
    }
    if (error instanceof InvalidProjectPathError) {
      return c.json({ error: error.code, message: error.message }, 400);
    }
    if (isAbortError(error)) {
      logMetadataEvent({
        event: 'metadata.route.aborted',
        level: 'debug',
        method: c.req.method,
        path: c.req.path,
      });
      return c.json({ error: 'REQUEST_ABORTED' }, 503);
    }
    captureMetadataException(error, {
      event: 'metadata.route.unhandled',
      method: c.req.method,
      path: c.req.path,
    });
    if (error instanceof MetadataStorageError) {
      return c.json({ error: error.code }, 500);
    }
    return c.json({ error: 'INTERNAL_ERROR' }, 500);
  });

  routes.use('*', async (c, next) => {
    const elapsed = createTimer();
    await next();
    logMetadataEvent({
      event: 'metadata.http.request',
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: elapsed(),
    });
  });

  // -------------------------------------------------------------------------
  // GET /health
  // -------------------------------------------------------------------------

  routes.get('/health', (c) => c.body(null, 200));

  // -------------------------------------------------------------------------
  // Legacy build index
  // -------------------------------------------------------------------------

  routes.get(
    '/api/latest',
    userAuth,
    zValidator('query', LatestQuerySchema, invalidRequest),
    async (c) => {
      const { project } = c.req.valid('query');
      const latest = await engine.readLatest(project);
      const response: LatestResponse = {
        Version: latest.version,
        LastEventId: latest.lastEventId,
        LastCommentId: latest.lastCommentId,
        LastBuildId: latest.lastBuildId,
      };
      return c.json(response, 200);
    }
  );

  routes.get(
    '/api/build',
    userAuth,
    zValidator('query', BuildIndexQuerySchema, invalidRequest),
    async (c) => {
      const { project, lastbuildid } = c.req.valid('query');
      const badges = await engine.listBadgesSince(project, lastbuildid, {
        signal: c.req.raw.signal,
      });
      const response: BadgeResponse[] = badges.map((badge) => ({
        Id: badge.id,
        ChangeNumber: badge.changeNumber,
        AddedAt: badge.addedAt,
        BuildType: badge.buildType,
        Result: badge.result,
        Url: badge.url,
        Project: badge.project,
      }));
      return c.json(response, 200);
    }
  );

  for (const retired of ['/api/event', '/api/comment', '/api/issues']) {
    routes.get(retired, userAuth, (c) => c.json([], 200));
  }

  // -------------------------------------------------------------------------
  // Metadata
  // -------------------------------------------------------------------------

  routes.get(
    '/api/metadata',
    userAuth,
    zValidator('query', GetMetadataQuerySchema, invalidRequest),
    async (c) => {
      const query = c.req.valid('query');
      const result = await engine.query(
        {
          stream: query.stream,
          project: query.project,
          minChange: query.minchange,
          maxChange: query.maxchange,
          sinceSequence: query.sequence,
        },
        { signal: c.req.raw.signal }
      );
      const response: MetadataListResponse = {
        SequenceNumber: result.sequenceNumber,
        Items: result.items.map(toWireRecord),
      };
      return c.json(response, 200);
    }
  );

  routes.post(
    '/api/metadata',
    userAuth,
    zValidator('json', UpdateMetadataRequestSchema, invalidRequest),
    async (c) => {
      const body = c.req.valid('json');
      const path = body.Stream ? `${body.Stream}/${body.Project}` : body.Project;
      await engine.submitUserEvent({
        path,
        change: body.Change,
        user: body.UserName,
        synced: body.Synced ?? undefined,
        vote: body.Vote ?? undefined,
        investigating: body.Investigating ?? undefined,
        starred: body.Starred ?? undefined,
        comment: body.Comment ?? undefined,
      });
      return c.body(null, 200);
    }
  );

  // -------------------------------------------------------------------------
  // CI badges (older build scripts post to /api/Build)
  // -------------------------------------------------------------------------

  for (const badgePath of ['/api/build', '/api/Build']) {
    routes.post(
      badgePath,
      ciAuth,
      zValidator('json', CreateBadgeRequestSchema, invalidRequest),
      async (c) => {
        const body = c.req.valid('json');
        await engine.submitBadge({
          path: body.Project,
          change: body.ChangeNumber,
          buildType: body.BuildType,
          result: body.Result,
          url: body.Url,
        });
        return c.body(null, 200);
      }
    );
  }

  return routes;
}
