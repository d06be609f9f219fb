/**
 * Validators created by finalized deposits and processed vault deposits.
 *
 * status: active → exiting → exited (exiting may be skipped)
 */

import type { Hex, ValidatorSource, ValidatorStatus } from "@stakegate/types";
import { NotFoundError, StateViolation, ValidationError } from "./errors.js";

export interface Validator {
  readonly id: number;
  readonly pubkey: Hex;
  readonly withdrawalCredentials: Hex;
  readonly source: ValidatorSource;
  /** Deposit record id or vault request id that funded the validator */
  readonly sourceId: number;
  readonly status: ValidatorStatus;
  readonly exitEpoch?: number;
  readonly createdAt: string;
  readonly exitedAt?: string;
}

export interface ValidatorRegistration {
  readonly pubkey: Hex;
  readonly withdrawalCredentials: Hex;
  readonly source: ValidatorSource;
  readonly sourceId: number;
}

export class ValidatorSet {
  private readonly _validators = new Map<number, Validator>();
  private readonly _byPubkey = new Map<Hex, number>();
  private _nextId = 1;

  /**
   * @throws ValidationError when the pubkey is already registered
   */
  register(registration: ValidatorRegistration, now: Date): Validator {
    const existing = this._byPubkey.get(registration.pubkey);
    if (existing !== undefined) {
      throw new ValidationError(
        "VALIDATION_FAILED",
        `Pubkey ${registration.pubkey} is already registered as validator ${String(existing)}`,
        "pubkey",
      );
    }

    const validator: Validator = {
      id: this._nextId++,
      ...registration,
      status: "active",
      createdAt: now.toISOString(),
    };
    this._validators.set(validator.id, validator);
    this._byPubkey.set(validator.pubkey, validator.id);
    return validator;
  }

  /** Compensation for `register`. The id stays consumed. */
  remove(id: number): void {
    const validator = this._validators.get(id);
    if (validator !== undefined) {
      this._validators.delete(id);
      this._byPubkey.delete(validator.pubkey);
    }
  }

  get(id: number): Validator {
    const validator = this._validators.get(id);
    if (validator === undefined) {
      throw new NotFoundError("VALIDATOR_NOT_FOUND", `Validator ${String(id)} does not exist`);
    }
    return validator;
  }

  find(id: number): Validator | undefined {
    return this._validators.get(id);
  }

  hasPubkey(pubkey: Hex): boolean {
    return this._byPubkey.has(pubkey);
  }

  markExiting(id: number): Validator {
    const validator = this.get(id);
    if (validator.status !== "active") {
      throw new StateViolation(["active"], validator.status);
    }
    return this._put({ ...validator, status: "exiting" });
  }

  markExited(id: number, exitEpoch: number, now: Date): Validator {
    const validator = this.get(id);
    if (validator.status === "exited") {
      throw new StateViolation(["active", "exiting"], validator.status);
    }
    return this._put({
      ...validator,
      status: "exited",
      exitEpoch,
      exitedAt: now.toISOString(),
    });
  }

  /** Put back a previous version of a validator (compensation). */
  restore(validator: Validator): void {
    this._put(validator);
  }

  list(status?: ValidatorStatus): readonly Validator[] {
    const all = [...this._validators.values()];
    return status === undefined ? all : all.filter((v) => v.status === status);
  }

  private _put(validator: Validator): Validator {
    this._validators.set(validator.id, validator);
    return validator;
  }
}
