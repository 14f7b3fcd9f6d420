/**
 * @buildmeta/server - Sequence allocation
 *
 * Every accepted write gets a sequence number from one domain shared by
 * badges and user events. Values are Unix time in microseconds, clamped so
 * they always exceed both the previous value and the largest sequence in the
 * store. The store is read on every call, so a restart or another engine
 * writing through the same gate never causes a repeat.
 *
 * Only call `next()` while holding the gate exclusively.
 */

import type { DbExecutor, ServerMetadataDialect } from './dialect/types';

export type MicrosecondClock = () => number;

export const systemMicrosecondClock: MicrosecondClock = () =>
  Math.floor((performance.timeOrigin + performance.now()) * 1000);

export class SequenceAllocator {
  readonly #dialect: ServerMetadataDialect;
  readonly #clock: MicrosecondClock;
  #last: number | null = null;

  constructor(
    dialect: ServerMetadataDialect,
    clock: MicrosecondClock = systemMicrosecondClock
  ) {
    this.#dialect = dialect;
    this.#clock = clock;
  }

  /** Last value handed out by this allocator, null before first use. */
  get last(): number | null {
    return this.#last;
  }

  async next(db: DbExecutor): Promise<number> {
    const stored = await this.#dialect.readMaxSequence(db);
    const floor = Math.max(stored, this.#last ?? 0);
    const candidate = Math.max(this.#clock(), floor + 1);
    if (!Number.isSafeInteger(candidate)) {
      throw new RangeError(`Sequence ${candidate} is not a safe integer`);
    }
    this.#last = candidate;
    return candidate;
  }
}
