/**
 * @accrual/ledger — In-memory asset book.
 *
 * Process-local settlement rails for one asset. Suitable for:
 * - Unit and integration tests
 * - Simulations of native and fungible-token payment flows
 *
 * Behaviours a real asset can exhibit are switchable:
 * - fee-on-transfer (a basis-point cut is burned from each transfer)
 * - recipients that reject incoming transfers
 * - a synchronous post-transfer callback (recipient hooks, re-entrancy)
 */

import type { AccountId, Amount, BasisPoints } from "@accrual/types";
import { applyBps, assertAmount, assertBasisPoints } from "./money-math.js";
import type { AssetBook, Rollback } from "./types.js";

/** Called after balances move, before `transfer` returns. */
export type TransferHook = (from: AccountId, to: AccountId, amount: Amount) => void;

export interface InMemoryAssetBookOptions {
  /** Basis points burned from every transfer. Default: 0 */
  readonly transferFeeBps?: BasisPoints;
}

export class InMemoryAssetBook implements AssetBook {
  private _balances = new Map<AccountId, Amount>();
  private _rejecting = new Set<AccountId>();
  private _transferFeeBps: BasisPoints;
  private _hook: TransferHook | undefined;

  constructor(options?: InMemoryAssetBookOptions) {
    const fee = options?.transferFeeBps ?? 0;
    assertBasisPoints(fee, undefined, "transferFeeBps");
    this._transferFeeBps = fee;
  }

  // ─── Setup ──────────────────────────────────────────────────────────

  /** Credit `amount` to `holder` out of thin air (test funding). */
  mint(holder: AccountId, amount: Amount): void {
    assertAmount(amount);
    this._balances.set(holder, this.balanceOf(holder) + amount);
  }

  setTransferFee(bps: BasisPoints): void {
    assertBasisPoints(bps, undefined, "transferFeeBps");
    this._transferFeeBps = bps;
  }

  /** Make `holder` refuse (or accept again) incoming transfers. */
  rejectIncoming(holder: AccountId, reject = true): void {
    if (reject) {
      this._rejecting.add(holder);
    } else {
      this._rejecting.delete(holder);
    }
  }

  onTransfer(hook: TransferHook | undefined): void {
    this._hook = hook;
  }

  // ─── AssetBook ──────────────────────────────────────────────────────

  balanceOf(holder: AccountId): Amount {
    return this._balances.get(holder) ?? 0n;
  }

  transfer(from: AccountId, to: AccountId, amount: Amount): boolean {
    assertAmount(amount);

    const available = this.balanceOf(from);
    if (available < amount || this._rejecting.has(to)) {
      return false;
    }

    const fee = applyBps(amount, this._transferFeeBps);
    this._balances.set(from, available - amount);
    this._balances.set(to, this.balanceOf(to) + amount - fee);

    this._hook?.(from, to, amount);
    return true;
  }

  checkpoint(): Rollback {
    const balances = new Map(this._balances);
    return () => {
      this._balances = new Map(balances);
    };
  }

  /** Sum of all balances (fees burned are gone). */
  get totalHeld(): Amount {
    let total = 0n;
    for (const balance of this._balances.values()) {
      total += balance;
    }
    return total;
  }
}
