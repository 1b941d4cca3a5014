import { EventEmitter } from 'node:events';
import type { Signal } from './alphabet.js';

/** A (signal, revision) pair exactly as it was committed. Never mutated. */
export interface Snapshot {
  readonly signal: Signal;
  readonly revision: number;
}

/**
 * How a long-poll ended.
 * - changed: the revision moved past the caller's baseline
 * - timeout: nothing was committed within the wait window
 * - cancelled: the caller's AbortSignal fired (usually a closed connection)
 *
 * Every outcome carries the snapshot current at the moment it settled.
 */
export type WaitOutcome =
  | { status: 'changed'; snapshot: Snapshot }
  | { status: 'timeout'; snapshot: Snapshot }
  | { status: 'cancelled'; snapshot: Snapshot };

export type ChangeListener = (snapshot: Snapshot) => void;

interface Waiter {
  resume(snapshot: Snapshot): void;
}

/**
 * Wakes long-poll waiters and stream subscribers when the store commits.
 *
 * Node runs every method here on one thread, and none of them awaits, so
 * "read the revision, then register" in waitForChange cannot interleave with
 * notify(). A waiter either sees the new revision up front or is already in
 * the set when the wave goes out.
 */
export class ChangeNotifier {
  private readonly waiters = new Set<Waiter>();
  private readonly emitter = new EventEmitter();

  constructor(private readonly read: () => Snapshot) {
    // One listener per open viewer tab
    this.emitter.setMaxListeners(100);
  }

  /** Number of long-polls currently suspended. */
  get pendingCount(): number {
    return this.waiters.size;
  }

  /** Number of stream subscribers. */
  get subscriberCount(): number {
    return this.emitter.listenerCount('change');
  }

  /**
   * Resolve once the revision differs from `baseline`, the timeout elapses, or
   * `signal` aborts, whichever comes first. A baseline that does not match the
   * current revision resolves right away: either the caller is behind, or it
   * remembers a revision from before a restart.
   */
  waitForChange(baseline: number, timeoutMs: number, signal?: AbortSignal): Promise<WaitOutcome> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
    }

    const current = this.read();
    if (current.revision !== baseline) {
      return Promise.resolve<WaitOutcome>({ status: 'changed', snapshot: current });
    }
    if (signal?.aborted) {
      return Promise.resolve<WaitOutcome>({ status: 'cancelled', snapshot: current });
    }

    return new Promise<WaitOutcome>((resolve) => {
      const waiter: Waiter = {
        resume: (snapshot) => finish({ status: 'changed', snapshot }),
      };

      const onAbort = (): void => finish({ status: 'cancelled', snapshot: this.read() });

      const timer = setTimeout(() => {
        finish({ status: 'timeout', snapshot: this.read() });
      }, timeoutMs);

      const finish = (outcome: WaitOutcome): void => {
        // First of change, timeout and abort wins; the others find nothing to do
        if (!this.waiters.delete(waiter)) return;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      this.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Resume every registered waiter with `snapshot`, then emit it to subscribers.
   * Waiters are only registered at the current revision, so all of them are behind.
   */
  notify(snapshot: Snapshot): void {
    for (const waiter of [...this.waiters]) {
      waiter.resume(snapshot);
    }
    this.emitter.emit('change', snapshot);
  }

  /**
   * A listener that throws is logged and skipped; the commit that triggered it
   * still stands and the remaining listeners still run.
   */
  subscribe(listener: ChangeListener): () => void {
    const guarded = (snapshot: Snapshot): void => {
      try {
        listener(snapshot);
      } catch (err) {
        process.stderr.write(`[signal] Change listener failed at revision ${snapshot.revision}: ${String(err)}\n`);
      }
    };
    this.emitter.on('change', guarded);
    return () => {
      this.emitter.off('change', guarded);
    };
  }
}
