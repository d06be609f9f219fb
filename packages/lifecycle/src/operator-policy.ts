/**
 * Operator allow-list.
 *
 * Operators (keepers) advance assign / finalize and the vault's keeper
 * steps. The set is owned by one address and changes only through
 * `setOperator` called by that owner.
 */

import { normalizeAddress } from "@stakegate/types";
import type { Address } from "@stakegate/types";
import { AuthorizationError } from "./errors.js";
import { requireAddress } from "./inputs.js";

export class OperatorPolicy {
  private readonly _owner: Address;
  private readonly _operators = new Set<Address>();

  constructor(owner: string, initialOperators: readonly string[] = []) {
    this._owner = requireAddress(owner, "owner");
    for (const operator of initialOperators) {
      this._operators.add(requireAddress(operator, "operator"));
    }
  }

  get owner(): Address {
    return this._owner;
  }

  isOwner(caller: string): boolean {
    return normalizeAddress(caller) === this._owner;
  }

  isOperator(address: string): boolean {
    const normalized = normalizeAddress(address);
    return normalized !== undefined && this._operators.has(normalized);
  }

  /**
   * @throws AuthorizationError when `caller` is not an operator
   */
  assertOperator(caller: string, action: string): void {
    if (!this.isOperator(caller)) {
      throw new AuthorizationError(caller, `${caller} is not an operator and cannot ${action}`);
    }
  }

  /**
   * Enable or disable an operator.
   *
   * @returns true when the set changed
   * @throws AuthorizationError when `caller` is not the owner
   */
  setOperator(caller: string, operator: string, enabled: boolean): boolean {
    if (!this.isOwner(caller)) {
      throw new AuthorizationError(caller, `Only the owner can update operators, not ${caller}`);
    }
    const address = requireAddress(operator, "operator");
    if (enabled === this._operators.has(address)) {
      return false;
    }
    if (enabled) {
      this._operators.add(address);
    } else {
      this._operators.delete(address);
    }
    return true;
  }

  listOperators(): readonly Address[] {
    return [...this._operators].sort();
  }
}
