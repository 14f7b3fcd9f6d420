/**
 * @buildmeta/server - Consistency gate
 *
 * Async read/write lock shared by every request of one engine. Writes hold it
 * exclusively, so they are serialized with each other and with reads; reads
 * share it. Waiters are granted in FIFO order: once a writer is queued,
 * readers arriving later queue behind it.
 */

export type GateRelease = () => void;

type GateMode = 'read' | 'write';

interface GateWaiter {
  mode: GateMode;
  grant: () => void;
}

export interface GateState {
  readers: number;
  writing: boolean;
  queued: number;
}

export class ConsistencyGate {
  #readers = 0;
  #writing = false;
  #queue: GateWaiter[] = [];

  get state(): GateState {
    return {
      readers: this.#readers,
      writing: this.#writing,
      queued: this.#queue.length,
    };
  }

  /**
   * Acquire the gate in shared mode. A signal that fires while waiting
   * removes the waiter and rejects with the signal's reason.
   */
  async acquireRead(signal?: AbortSignal): Promise<GateRelease> {
    signal?.throwIfAborted();
    if (!this.#writing && this.#queue.length === 0) {
      this.#readers += 1;
      return this.#createRelease('read');
    }
    await this.#enqueue('read', signal);
    return this.#createRelease('read');
  }

  /**
   * Acquire the gate exclusively. Writes are never cancelled once requested.
   */
  async acquireWrite(): Promise<GateRelease> {
    if (!this.#writing && this.#readers === 0 && this.#queue.length === 0) {
      this.#writing = true;
      return this.#createRelease('write');
    }
    await this.#enqueue('write');
    return this.#createRelease('write');
  }

  async read<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquireRead(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async write<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  #enqueue(mode: GateMode, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.#queue.indexOf(waiter);
        if (index !== -1) {
          this.#queue.splice(index, 1);
          // A queued writer may have been holding back readers behind it.
          this.#drain();
        }
        reject(signal?.reason);
      };
      const waiter: GateWaiter = {
        mode,
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      this.#queue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  #createRelease(mode: GateMode): GateRelease {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'write') {
        this.#writing = false;
      } else {
        this.#readers -= 1;
      }
      this.#drain();
    };
  }

  #drain(): void {
    while (this.#queue.length > 0) {
      const next = this.#queue[0];
      if (!next) return;
      if (next.mode === 'write') {
        if (this.#writing || this.#readers > 0) return;
        this.#queue.shift();
        this.#writing = true;
        next.grant();
        return;
      }
      if (this.#writing) return;
      this.#queue.shift();
      this.#readers += 1;
      next.grant();
    }
  }
}
