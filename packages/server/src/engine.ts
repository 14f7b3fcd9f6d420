/**
 * @buildmeta/server - Metadata engine
 *
 * Entry point for every client-visible operation. Writes hold the gate
 * exclusively and run in one transaction; reads hold it shared.
 */

import {
  countMetadataMetric,
  createTimer,
  distributionMetadataMetric,
  gaugeMetadataMetric,
  logMetadataEvent,
  startMetadataSpan,
} from '@buildmeta/core';
import type { Kysely } from 'kysely';
import {
  type MetadataQuery,
  type MetadataQueryResult,
  queryMetadata,
} from './aggregate';
import {
  insertBadge,
  readBadgesAfterId,
  readLatestBadgeId,
  type SubmitBadgeInput,
} from './badges';
import type { ServerMetadataDialect } from './dialect/types';
import { withStorageErrors } from './errors';
import { ConsistencyGate } from './gate';
import {
  findProjectId,
  formatProjectPath,
  parseProjectPath,
  upsertProject,
} from './projects';
import type { MetadataCoreDb } from './schema';
import { type MicrosecondClock, SequenceAllocator } from './sequence';
import {
  type SubmitUserEventInput,
  type UserEventPatch,
  upsertUserEvent,
} from './user-events';

export interface MetadataEngineOptions {
  db: Kysely<MetadataCoreDb>;
  dialect: ServerMetadataDialect;
  /** Share a gate between engines writing to the same store. */
  gate?: ConsistencyGate;
  /** Source of sequence values, microseconds since the Unix epoch. */
  sequenceClock?: MicrosecondClock;
  /** Source of stored timestamps. */
  now?: () => Date;
}

export interface WriteResult {
  projectId: number;
  sequence: number;
}

export interface UserEventWriteResult extends WriteResult {
  id: number;
}

export interface LatestBuildInfo {
  version: number | null;
  lastEventId: number;
  lastCommentId: number;
  lastBuildId: number;
}

export interface LegacyBadge {
  id: number;
  changeNumber: number;
  addedAt: string;
  buildType: string;
  result: SubmitBadgeInput['result'];
  url: string;
  project: string;
}

export interface ReadOptions {
  /** Abandons the remaining work when the client goes away. */
  signal?: AbortSignal;
}

export class MetadataEngine {
  readonly db: Kysely<MetadataCoreDb>;
  readonly dialect: ServerMetadataDialect;
  readonly gate: ConsistencyGate;
  readonly #sequences: SequenceAllocator;
  readonly #now: () => Date;

  constructor(options: MetadataEngineOptions) {
    this.db = options.db;
    this.dialect = options.dialect;
    this.gate = options.gate ?? new ConsistencyGate();
    this.#sequences = new SequenceAllocator(
      options.dialect,
      options.sequenceClock
    );
    this.#now = options.now ?? (() => new Date());
  }

  #recordGateQueue(kind: 'badge' | 'user_event' | 'query'): void {
    gaugeMetadataMetric('metadata.gate.queued', this.gate.state.queued, {
      attributes: { kind },
    });
  }

  async submitBadge(input: SubmitBadgeInput): Promise<WriteResult> {
    const identity = parseProjectPath(input.path);
    const elapsed = createTimer();

    return startMetadataSpan(
      { name: 'metadata.badge.submit', op: 'metadata.write' },
      async (span) => {
        this.#recordGateQueue('badge');
        const result = await this.gate.write(() =>
          withStorageErrors('submit badge', () =>
            this.dialect.executeInTransaction(this.db, async (trx) => {
              const projectId = await upsertProject(trx, identity);
              const sequence = await this.#sequences.next(trx);
              await insertBadge(trx, {
                projectId,
                sequence,
                change: input.change,
                buildType: input.buildType,
                result: input.result,
                url: input.url,
                addedAt: this.#now().toISOString(),
              });
              return { projectId, sequence };
            })
          )
        );

        const durationMs = elapsed();
        span.setAttributes({ sequence: result.sequence, duration_ms: durationMs });
        span.setStatus('ok');
        countMetadataMetric('metadata.writes', 1, {
          attributes: { kind: 'badge' },
        });
        distributionMetadataMetric('metadata.write.duration_ms', durationMs, {
          unit: 'millisecond',
          attributes: { kind: 'badge' },
        });
        logMetadataEvent({
          event: 'metadata.badge.submitted',
          level: 'debug',
          project: formatProjectPath(identity),
          change: input.change,
          buildType: input.buildType,
          result: input.result,
          sequence: result.sequence,
          durationMs,
        });
        return result;
      }
    );
  }

  async submitUserEvent(
    input: SubmitUserEventInput
  ): Promise<UserEventWriteResult> {
    const identity = parseProjectPath(input.path);
    const elapsed = createTimer();
    const { change, user } = input;
    const patch: UserEventPatch = {
      synced: input.synced,
      vote: input.vote,
      investigating: input.investigating,
      starred: input.starred,
      comment: input.comment,
    };

    return startMetadataSpan(
      { name: 'metadata.user_event.submit', op: 'metadata.write' },
      async (span) => {
        this.#recordGateQueue('user_event');
        const result = await this.gate.write(() =>
          withStorageErrors('submit user event', () =>
            this.dialect.executeInTransaction(this.db, async (trx) => {
              const projectId = await upsertProject(trx, identity);
              const sequence = await this.#sequences.next(trx);
              const { id } = await upsertUserEvent(trx, this.dialect, {
                projectId,
                user,
                change,
                sequence,
                patch,
                nowIso: this.#now().toISOString(),
              });
              return { projectId, sequence, id };
            })
          )
        );

        const durationMs = elapsed();
        span.setAttributes({ sequence: result.sequence, duration_ms: durationMs });
        span.setStatus('ok');
        countMetadataMetric('metadata.writes', 1, {
          attributes: { kind: 'user_event' },
        });
        distributionMetadataMetric('metadata.write.duration_ms', durationMs, {
          unit: 'millisecond',
          attributes: { kind: 'user_event' },
        });
        logMetadataEvent({
          event: 'metadata.user_event.submitted',
          level: 'debug',
          project: formatProjectPath(identity),
          change,
          user,
          sequence: result.sequence,
          durationMs,
        });
        return result;
      }
    );
  }

  async query(
    query: MetadataQuery,
    options?: ReadOptions
  ): Promise<MetadataQueryResult> {
    const elapsed = createTimer();
    const signal = options?.signal;

    return startMetadataSpan(
      { name: 'metadata.query', op: 'metadata.read' },
      async (span) => {
        this.#recordGateQueue('query');
        const result = await this.gate.read(
          () =>
            withStorageErrors('metadata query', () =>
              queryMetadata(this.db, this.dialect, query, { signal })
            ),
          signal
        );

        const durationMs = elapsed();
        span.setAttributes({
          item_count: result.items.length,
          duration_ms: durationMs,
        });
        span.setStatus('ok');
        distributionMetadataMetric('metadata.query.duration_ms', durationMs, {
          unit: 'millisecond',
        });
        distributionMetadataMetric(
          'metadata.query.items',
          result.items.length
        );
        logMetadataEvent({
          event: 'metadata.query',
          level: 'debug',
          stream: query.stream,
          project: query.project,
          minChange: query.minChange,
          maxChange: query.maxChange,
          sinceSequence: query.sinceSequence,
          sequenceNumber: result.sequenceNumber,
          rowCount: result.items.length,
          durationMs,
        });
        return result;
      }
    );
  }

  /**
   * Lookup without creating; used by read paths.
   */
  async resolveProject(
    stream: string,
    project: string
  ): Promise<number | undefined> {
    return withStorageErrors('resolve project', () =>
      findProjectId(this.db, { stream, project })
    );
  }

  async readLatest(path: string): Promise<LatestBuildInfo> {
    const identity = parseProjectPath(path);
    const lastBuildId = await this.gate.read(() =>
      withStorageErrors('read latest', async () => {
        const projectId = await findProjectId(this.db, identity);
        return projectId === undefined
          ? 0
          : readLatestBadgeId(this.db, projectId);
      })
    );
    return { version: null, lastEventId: 0, lastCommentId: 0, lastBuildId };
  }

  async listBadgesSince(
    path: string,
    lastBuildId: number,
    options?: ReadOptions
  ): Promise<LegacyBadge[]> {
    const identity = parseProjectPath(path);
    const projectPath = formatProjectPath(identity);
    const rows = await this.gate.read(
      () =>
        withStorageErrors('list badges', async () => {
          const projectId = await findProjectId(this.db, identity);
          return projectId === undefined
            ? []
            : readBadgesAfterId(this.db, projectId, lastBuildId);
        }),
      options?.signal
    );
    return rows.map((row) => ({
      id: row.id,
      changeNumber: row.change,
      addedAt: row.addedAt,
      buildType: row.buildType,
      result: row.result,
      url: row.url,
      project: projectPath,
    }));
  }
}

export function createMetadataEngine(
  options: MetadataEngineOptions
): MetadataEngine {
  return new MetadataEngine(options);
}
