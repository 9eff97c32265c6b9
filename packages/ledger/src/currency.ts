/**
 * @accrual/ledger — Currency abstraction.
 *
 * One capture/transfer/balance interface over either the native asset or a
 * single fungible token. The ledger's own account (`holder`) keeps the
 * funds; all movements go through the asset book.
 *
 * Capture rules:
 * - native: the value attached to the call must equal the amount exactly
 * - token: no value may be attached; the holder's balance is measured
 *   before and after the pull, and a short delta fails the capture
 *   (fee-on-transfer and short-transfer tokens)
 */

import type { AccountId, Amount, CurrencyRef, Money } from "@accrual/types";
import { assertAmount, toMoney } from "./money-math.js";
import type { AssetBook, Rollback, TransferOutcome } from "./types.js";
import { InsufficientFundsError } from "./types.js";

export class Currency {
  readonly ref: CurrencyRef;
  private readonly book: AssetBook;
  private readonly holder: AccountId;

  constructor(ref: CurrencyRef, book: AssetBook, holder: AccountId) {
    this.ref = ref;
    this.book = book;
    this.holder = holder;
  }

  get isNative(): boolean {
    return this.ref.kind === "native";
  }

  /** The account that holds captured funds. */
  get account(): AccountId {
    return this.holder;
  }

  /** Current amount held by the ledger. */
  balance(): Amount {
    return this.book.balanceOf(this.holder);
  }

  /**
   * Pull exactly `amount` from `from`. Returns the captured amount.
   */
  capture(from: AccountId, amount: Amount, attachedValue: Amount = 0n): Amount {
    assertAmount(amount);
    assertAmount(attachedValue, "attached value");

    if (this.ref.kind === "native") {
      if (attachedValue !== amount) {
        throw new InsufficientFundsError(
          "INVALID_CAPTURE",
          `Attached value ${attachedValue.toString()} does not match amount ${amount.toString()}`,
        );
      }
      if (amount > 0n && !this.book.transfer(from, this.holder, amount)) {
        throw new InsufficientFundsError(
          "INVALID_CAPTURE",
          `Could not capture ${amount.toString()} from ${from}`,
        );
      }
      return amount;
    }

    if (attachedValue !== 0n) {
      throw new InsufficientFundsError(
        "INVALID_CAPTURE",
        `Native value attached to a ${this.ref.symbol} payment`,
      );
    }
    if (amount === 0n) {
      return 0n;
    }

    const before = this.balance();
    const pulled = this.book.transfer(from, this.holder, amount);
    const delta = this.balance() - before;
    if (!pulled || delta < amount) {
      throw new InsufficientFundsError(
        "INVALID_CAPTURE",
        `Captured ${delta.toString()} of ${amount.toString()} ${this.ref.symbol} from ${from}`,
      );
    }
    return amount;
  }

  /**
   * Push `amount` to `to`. Fails the whole operation if the rails refuse.
   */
  transfer(to: AccountId, amount: Amount): void {
    assertAmount(amount);
    if (amount === 0n) return;

    if (!this.book.transfer(this.holder, to, amount)) {
      throw new InsufficientFundsError(
        "TRANSFER_FAILED",
        `Transfer of ${amount.toString()} ${this.ref.symbol} to ${to} failed`,
      );
    }
  }

  /**
   * Push `amount` to `to`, reporting failure instead of throwing.
   * A throwing recipient callback counts as a failed transfer and its
   * balance movement is undone.
   */
  tryTransfer(to: AccountId, amount: Amount): TransferOutcome {
    assertAmount(amount);
    if (amount === 0n) return { ok: true };

    const rollback = this.book.checkpoint();
    try {
      return this.book.transfer(this.holder, to, amount)
        ? { ok: true }
        : { ok: false, reason: "transfer rejected" };
    } catch (err) {
      rollback();
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  }

  format(amount: Amount): Money {
    return toMoney(amount, this.ref.symbol, this.ref.decimals);
  }

  checkpoint(): Rollback {
    return this.book.checkpoint();
  }
}
