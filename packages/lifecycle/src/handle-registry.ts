/**
 * Handle registry: who may confirm, cancel and redeem a deposit record.
 *
 * A plain id → owner table. A transfer passes through the injected hook
 * and is also refused while the handle is locked by an open redeem
 * request.
 */

import type { Address } from "@stakegate/types";
import { AuthorizationError, HandleError } from "./errors.js";
import { requireAddress } from "./inputs.js";

export interface Handle {
  readonly id: number;
  readonly owner: Address;
  readonly locked: boolean;
}

/** Returns true when the record behind `id` may change hands. */
export type TransferHook = (id: number) => boolean;

export class HandleRegistry {
  private readonly _handles = new Map<number, Handle>();
  private readonly _canTransfer: TransferHook;

  constructor(canTransfer: TransferHook = () => true) {
    this._canTransfer = canTransfer;
  }

  issue(id: number, owner: string): Handle {
    if (this._handles.has(id)) {
      throw new HandleError("HANDLE_NOT_TRANSFERABLE", `Handle ${String(id)} already exists`);
    }
    const handle: Handle = { id, owner: requireAddress(owner, "owner"), locked: false };
    this._handles.set(id, handle);
    return handle;
  }

  has(id: number): boolean {
    return this._handles.has(id);
  }

  get(id: number): Handle {
    const handle = this._handles.get(id);
    if (handle === undefined) {
      throw new HandleError("HANDLE_NOT_FOUND", `Handle ${String(id)} does not exist`);
    }
    return handle;
  }

  ownerOf(id: number): Address {
    return this.get(id).owner;
  }

  isOwner(id: number, caller: string): boolean {
    const handle = this._handles.get(id);
    return handle !== undefined && handle.owner === caller.toLowerCase();
  }

  /**
   * @throws AuthorizationError when `caller` does not own the handle
   * @throws HandleError HANDLE_NOT_TRANSFERABLE when locked or refused by the hook
   */
  transfer(caller: string, id: number, to: string): Handle {
    const handle = this.get(id);
    if (!this.isOwner(id, caller)) {
      throw new AuthorizationError(caller, `${caller} does not own handle ${String(id)}`);
    }
    const recipient = requireAddress(to, "to");
    if (handle.locked) {
      throw new HandleError(
        "HANDLE_NOT_TRANSFERABLE",
        `Handle ${String(id)} is locked by an open redeem request`,
      );
    }
    if (!this._canTransfer(id)) {
      throw new HandleError(
        "HANDLE_NOT_TRANSFERABLE",
        `Handle ${String(id)} cannot be transferred while its record is open`,
      );
    }

    const updated: Handle = { ...handle, owner: recipient };
    this._handles.set(id, updated);
    return updated;
  }

  burn(id: number): Handle {
    const handle = this.get(id);
    this._handles.delete(id);
    return handle;
  }

  /** Put back a handle removed by `burn`. */
  restore(handle: Handle): void {
    this._handles.set(handle.id, handle);
  }

  lock(id: number): void {
    this._setLocked(id, true);
  }

  unlock(id: number): void {
    this._setLocked(id, false);
  }

  handlesOf(owner: string): readonly Handle[] {
    const normalized = owner.toLowerCase();
    return [...this._handles.values()].filter((h) => h.owner === normalized);
  }

  all(): readonly Handle[] {
    return [...this._handles.values()];
  }

  private _setLocked(id: number, locked: boolean): void {
    const handle = this.get(id);
    this._handles.set(id, { ...handle, locked });
  }
}
