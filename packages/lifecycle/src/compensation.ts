/**
 * Write-then-call transitions with compensation.
 *
 * A transition registers an undo step for each local write. If a later
 * step throws (a port call, an invariant check), the undo steps run in
 * reverse order and the original error propagates. Port calls go through
 * `callPort`, which turns a `false` result or a rejection into
 * ExternalCallFailure.
 */

import { ExternalCallFailure } from "./errors.js";
import type { ExternalTarget } from "./errors.js";

export interface CompensationEvent {
  readonly transition: string;
  readonly ref: string;
  readonly error: unknown;
  /** Labels of the undo steps that ran, in execution order */
  readonly undone: readonly string[];
}

export type CompensationListener = (event: CompensationEvent) => void;

export class Compensations {
  private readonly _steps: Array<{ readonly label: string; readonly undo: () => void }> = [];

  add(label: string, undo: () => void): void {
    this._steps.push({ label, undo });
  }

  /**
   * Run every undo step, newest first.
   *
   * @returns labels of the steps that ran
   * @throws AggregateError when an undo step itself fails
   */
  rollback(cause: unknown): readonly string[] {
    const undone: string[] = [];
    const failures: unknown[] = [];
    for (const step of [...this._steps].reverse()) {
      try {
        step.undo();
        undone.push(step.label);
      } catch (err) {
        failures.push(err);
      }
    }
    this._steps.length = 0;
    if (failures.length > 0) {
      throw new AggregateError([cause, ...failures], "Compensation failed; state may be inconsistent");
    }
    return undone;
  }
}

/**
 * Run `body`; on failure, compensate and rethrow.
 */
export async function runTransition<T>(
  transition: string,
  ref: string,
  body: (c: Compensations) => Promise<T>,
  onCompensate?: CompensationListener,
): Promise<T> {
  const compensations = new Compensations();
  try {
    return await body(compensations);
  } catch (err) {
    const undone = compensations.rollback(err);
    if (undone.length > 0) {
      onCompensate?.({ transition, ref, error: err, undone });
    }
    throw err;
  }
}

/** Synchronous variant for transitions without port calls. */
export function runLocalTransition<T>(
  transition: string,
  ref: string,
  body: (c: Compensations) => T,
  onCompensate?: CompensationListener,
): T {
  const compensations = new Compensations();
  try {
    return body(compensations);
  } catch (err) {
    const undone = compensations.rollback(err);
    if (undone.length > 0) {
      onCompensate?.({ transition, ref, error: err, undone });
    }
    throw err;
  }
}

/**
 * Await a port call and treat `false` like a rejection.
 *
 * @throws ExternalCallFailure
 */
export async function callPort(
  target: ExternalTarget,
  description: string,
  call: () => Promise<boolean>,
): Promise<void> {
  let ok: boolean;
  try {
    ok = await call();
  } catch (err) {
    throw new ExternalCallFailure(
      target,
      `${description} failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  if (!ok) {
    throw new ExternalCallFailure(target, `${description} reported failure`);
  }
}
