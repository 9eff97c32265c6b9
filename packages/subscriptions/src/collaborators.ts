/**
 * @accrual/subscriptions — In-process collaborators.
 *
 * Default implementations of the authorization, identity and clock
 * interfaces. Hosts with their own identity or role layers pass those in
 * instead.
 */

import type { Rollback } from "@accrual/ledger";
import type { AccountId, Timestamp } from "@accrual/types";
import type { Authorizer, Clock, IdentityRegistry, Role } from "./types.js";

// =============================================================================
// Roles
// =============================================================================

/**
 * Role table with a single owner who holds every role.
 */
export class RoleTable implements Authorizer {
  private readonly roles = new Map<AccountId, Set<Role>>();

  constructor(public readonly owner: AccountId) {}

  grantRole(account: AccountId, role: Role): void {
    const roles = this.roles.get(account) ?? new Set<Role>();
    roles.add(role);
    this.roles.set(account, roles);
  }

  revokeRole(account: AccountId, role: Role): void {
    this.roles.get(account)?.delete(role);
  }

  isAuthorized(caller: AccountId, role: Role): boolean {
    return caller === this.owner || (this.roles.get(caller)?.has(role) ?? false);
  }
}

// =============================================================================
// Identity
// =============================================================================

/**
 * Hands out token ids 1, 2, 3, ...
 */
export class SequentialIdentityRegistry implements IdentityRegistry {
  private next = 1;

  mint(_account: AccountId): number {
    const tokenId = this.next;
    this.next += 1;
    return tokenId;
  }

  /** Next id that `mint` will hand out. */
  peek(): number {
    return this.next;
  }

  checkpoint(): Rollback {
    const next = this.next;
    return () => {
      this.next = next;
    };
  }
}

// =============================================================================
// Clocks
// =============================================================================

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: Timestamp) {}

  now(): Timestamp {
    return this.current;
  }

  set(timestamp: Timestamp): void {
    this.current = timestamp;
  }

  advance(seconds: number): Timestamp {
    this.current += seconds;
    return this.current;
  }
}
