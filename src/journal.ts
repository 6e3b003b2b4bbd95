/**
 * Stablecoin Engine - State Journal
 *
 * Gives every public call all-or-nothing semantics across the ledgers,
 * the event log and the token balances it touches. Stores record an undo
 * step for each write made inside a scope; a failed scope replays its
 * steps newest first. A call pays only for the entries it writes.
 *
 * Usage:
 *   const journal = new StateJournal();
 *   journal.atomic(() => {
 *     journal.setEntry(balances, user, amount);
 *     token.transferFrom(engine, user, engine, amount); // throws → entry undone
 *   });
 */

import { moduleLogger } from "./logger";

const log = moduleLogger("journal");

type Undo = () => void;
type CommitHook = () => void;

export class StateJournal {
  private readonly undoLog: Undo[] = [];
  private readonly pendingHooks: CommitHook[] = [];
  private depth = 0;

  /** True while an atomic scope is open */
  get inScope(): boolean {
    return this.depth > 0;
  }

  /** Undo steps a failure of the open scopes would replay */
  get pendingWrites(): number {
    return this.undoLog.length;
  }

  /** Record how to reverse a write. Outside a scope writes are final and nothing is kept. */
  recordUndo(undo: Undo): void {
    if (this.depth > 0) {
      this.undoLog.push(undo);
    }
  }

  /** `map.set(key, value)`, undone by restoring the previous value or removing the key */
  setEntry<K, V extends bigint | object>(map: Map<K, V>, key: K, value: V): void {
    const previous = map.get(key);
    map.set(key, value);
    this.recordUndo(previous === undefined ? () => map.delete(key) : () => map.set(key, previous));
  }

  /**
   * Run `fn` so that either all of its recorded writes persist, or none do.
   * The error that aborted the scope is rethrown as-is. `fn` must be synchronous.
   */
  atomic<T>(fn: () => T): T {
    const undoMark = this.undoLog.length;
    const hookMark = this.pendingHooks.length;
    this.depth++;

    let result: T;
    try {
      result = fn();
    } catch (err) {
      while (this.undoLog.length > undoMark) {
        this.undoLog.pop()?.();
      }
      this.pendingHooks.length = hookMark;
      this.depth--;
      throw err;
    }

    this.depth--;
    if (this.depth === 0) {
      this.undoLog.length = 0;
      this.flushHooks();
    }
    return result;
  }

  /** Run `hook` once the outermost scope commits (immediately if none is open) */
  onCommit(hook: CommitHook): void {
    if (this.depth === 0) {
      this.runHook(hook);
      return;
    }
    this.pendingHooks.push(hook);
  }

  private flushHooks(): void {
    const hooks = this.pendingHooks.splice(0, this.pendingHooks.length);
    for (const hook of hooks) {
      this.runHook(hook);
    }
  }

  // Hooks run after commit: failures are logged, never rethrown.
  private runHook(hook: CommitHook): void {
    try {
      hook();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.error(`Commit hook failed: ${msg}`);
    }
  }
}
