/**
 * @accrual/ledger — Transaction boundaries.
 *
 * Every public operation is all-or-nothing. Participants are checkpointed
 * before the operation and rolled back (in reverse order) if it throws.
 * The re-entrancy guard rejects any nested entry while an operation is
 * in progress, including calls made from a settlement-rail callback.
 */

import type { Checkpointable, Rollback } from "./types.js";
import { StateConflictError } from "./types.js";

/**
 * Checkpoint every participant. The returned rollback restores them all,
 * last participant first.
 */
export function checkpointAll(participants: readonly Checkpointable[]): Rollback {
  const rollbacks = participants.map((p) => p.checkpoint());
  return () => {
    for (let i = rollbacks.length - 1; i >= 0; i--) {
      rollbacks[i]?.();
    }
  };
}

/**
 * Run `fn` against checkpointed participants. On throw, every participant
 * is restored and the error is rethrown.
 */
export function runAtomically<T>(participants: readonly Checkpointable[], fn: () => T): T {
  const rollback = checkpointAll(participants);
  try {
    return fn();
  } catch (err) {
    rollback();
    throw err;
  }
}

/**
 * Serializes state-mutating entry points.
 */
export class ReentrancyGuard {
  private _active: string | undefined;

  /** Name of the operation in progress, if any. */
  get active(): string | undefined {
    return this._active;
  }

  get locked(): boolean {
    return this._active !== undefined;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this._active !== undefined) {
      throw new StateConflictError(
        "REENTRANT_CALL",
        `Cannot enter "${operation}" while "${this._active}" is in progress`,
      );
    }

    this._active = operation;
    try {
      return fn();
    } finally {
      this._active = undefined;
    }
  }
}
