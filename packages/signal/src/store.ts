import {
  CLEAR_MARKER,
  formatSignal,
  isDigit,
  isSectionLetter,
  type Digit,
  type SectionLetter,
} from './alphabet.js';
import { InvalidInputError } from './errors.js';
import { ChangeNotifier, type ChangeListener, type Snapshot, type WaitOutcome } from './notifier.js';

export interface MutationResult {
  snapshot: Snapshot;
  /** False when the mutation was a no-op and nobody was notified. */
  changed: boolean;
}

export interface WaitOptions {
  timeoutMs: number;
  /** Abort to withdraw the wait, e.g. when the HTTP connection closes. */
  signal?: AbortSignal;
}

/**
 * The single authoritative holder of the current signal and its revision.
 *
 * Create one per process and hand it to whatever serves requests. Mutations
 * are synchronous and commit a new frozen snapshot, so readers only ever see
 * pairs that existed as a discrete state.
 */
export class SignalStore {
  private letter: SectionLetter | null = null;
  private snapshot: Snapshot = Object.freeze<Snapshot>({ signal: CLEAR_MARKER, revision: 0 });
  private readonly notifier = new ChangeNotifier(() => this.snapshot);

  get(): Snapshot {
    return this.snapshot;
  }

  /** Show `letter` on its own. Commits even when that letter is already showing. */
  setLetter(letter: SectionLetter): MutationResult {
    if (!isSectionLetter(letter)) {
      throw new InvalidInputError('letter', letter);
    }
    return this.commit(letter, null);
  }

  /**
   * Put `digit` after the current letter, replacing any digit already there.
   * Without a letter there is nothing to number, so this is a no-op.
   */
  appendDigit(digit: Digit): MutationResult {
    if (!isDigit(digit)) {
      throw new InvalidInputError('digit', digit);
    }
    if (this.letter === null) {
      return { snapshot: this.snapshot, changed: false };
    }
    return this.commit(this.letter, digit);
  }

  clear(): MutationResult {
    if (this.letter === null) {
      return { snapshot: this.snapshot, changed: false };
    }
    return this.commit(null, null);
  }

  waitForChange(baseline: number, options: WaitOptions): Promise<WaitOutcome> {
    return this.notifier.waitForChange(baseline, options.timeoutMs, options.signal);
  }

  subscribe(listener: ChangeListener): () => void {
    return this.notifier.subscribe(listener);
  }

  get pendingWaiters(): number {
    return this.notifier.pendingCount;
  }

  get subscribers(): number {
    return this.notifier.subscriberCount;
  }

  private commit(letter: SectionLetter | null, digit: Digit | null): MutationResult {
    this.letter = letter;
    this.snapshot = Object.freeze<Snapshot>({
      signal: formatSignal(letter, digit),
      revision: this.snapshot.revision + 1,
    });
    this.notifier.notify(this.snapshot);
    return { snapshot: this.snapshot, changed: true };
  }
}
