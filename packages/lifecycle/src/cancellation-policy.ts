/**
 * When an open deposit record may be cancelled.
 *
 * | state                  | cancellable                               |
 * |------------------------|-------------------------------------------|
 * | requested / assigned   | immediately                               |
 * | confirmed              | once the cooldown has elapsed since confirm |
 * | finalized / cancelled  | never                                     |
 *
 * Vault deposit requests stuck in processing use the same cooldown,
 * counted from assignment.
 */

import { DEFAULT_CANCEL_COOLDOWN_SECONDS } from "@stakegate/types";
import type { DepositState } from "@stakegate/types";
import { CooldownActive, StateViolation } from "./errors.js";

export type CancellationDecision =
  | { readonly allowed: true; readonly reason: "open" | "cooldown_elapsed" }
  | { readonly allowed: false; readonly reason: "cooldown"; readonly availableAt: string }
  | { readonly allowed: false; readonly reason: "terminal" | "not_found" };

export interface CancellableRecord {
  readonly state: DepositState;
  readonly confirmedAt?: string | undefined;
}

export interface CancellationPolicyOptions {
  readonly cooldownSeconds?: number;
}

export class CancellationPolicy {
  readonly cooldownSeconds: number;

  constructor(options?: CancellationPolicyOptions) {
    const cooldown = options?.cooldownSeconds ?? DEFAULT_CANCEL_COOLDOWN_SECONDS;
    if (!Number.isInteger(cooldown) || cooldown < 0) {
      throw new RangeError(`cooldownSeconds must be a non-negative integer, got ${String(cooldown)}`);
    }
    this.cooldownSeconds = cooldown;
  }

  evaluate(record: CancellableRecord | undefined, now: Date): CancellationDecision {
    if (record === undefined || record.state === "none") {
      return { allowed: false, reason: "not_found" };
    }

    switch (record.state) {
      case "requested":
      case "assigned":
        return { allowed: true, reason: "open" };
      case "confirmed":
        return this.evaluateSince(record.confirmedAt, now);
      case "finalized":
      case "cancelled":
        return { allowed: false, reason: "terminal" };
    }
  }

  /**
   * @throws StateViolation when the record can never be cancelled
   * @throws CooldownActive when it can be cancelled later
   */
  assertCancellable(record: CancellableRecord | undefined, now: Date): void {
    const decision = this.evaluate(record, now);
    if (decision.allowed) return;

    if (decision.reason === "cooldown") {
      throw new CooldownActive(decision.availableAt);
    }
    throw new StateViolation(
      ["requested", "assigned", "confirmed"],
      record?.state ?? "none",
      `Cannot cancel a deposit in state "${record?.state ?? "none"}"`,
    );
  }

  /**
   * Decision for a cooldown that started at `startedAt`.
   */
  evaluateSince(startedAt: string | undefined, now: Date): CancellationDecision {
    const availableAt = this.availableAt(startedAt);
    return now.getTime() >= availableAt.getTime()
      ? { allowed: true, reason: "cooldown_elapsed" }
      : { allowed: false, reason: "cooldown", availableAt: availableAt.toISOString() };
  }

  /**
   * @throws CooldownActive until the cooldown started at `startedAt` has elapsed
   */
  assertCooldownElapsed(startedAt: string | undefined, now: Date): void {
    const decision = this.evaluateSince(startedAt, now);
    if (!decision.allowed && decision.reason === "cooldown") {
      throw new CooldownActive(decision.availableAt);
    }
  }

  private availableAt(startedAt: string | undefined): Date {
    const start = startedAt !== undefined ? Date.parse(startedAt) : NaN;
    if (Number.isNaN(start)) {
      throw new StateViolation(
        ["confirmed", "processing"],
        "none",
        "Cooldown has no valid start time",
      );
    }
    return new Date(start + this.cooldownSeconds * 1000);
  }
}
