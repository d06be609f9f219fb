/**
 * Property tests: custody conservation and share accounting under
 * arbitrary operation sequences across the registry and both vault
 * directions, including failing ports.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { computeDepositDataRoot } from "@stakegate/credentials";
import { STAKE_UNIT_GWEI } from "@stakegate/types";
import { LifecycleError } from "../src/errors.js";
import type { DepositRecord, ExitRequest } from "../src/types.js";
import { createHarness, DEPOSITOR, OPERATOR, STAKE, VAULT } from "./fixtures.js";
import type { Harness } from "./fixtures.js";

type PickKind =
  | "assign"
  | "confirm"
  | "finalize"
  | "cancel"
  | "vaultAssign"
  | "vaultProcess"
  | "vaultClaim"
  | "vaultCancel"
  | "redeem"
  | "acknowledge"
  | "processRedeem"
  | "claimRedeem"
  | "cancelRedeem";

type Op =
  | { readonly kind: "create"; readonly toVault: boolean }
  | { readonly kind: PickKind; readonly pick: number }
  | { readonly kind: "vaultRequest" }
  | { readonly kind: "failSink" | "failTransfer" }
  | { readonly kind: "advance"; readonly seconds: number };

const pickKinds: readonly PickKind[] = [
  "assign",
  "confirm",
  "finalize",
  "cancel",
  "vaultAssign",
  "vaultProcess",
  "vaultClaim",
  "vaultCancel",
  "redeem",
  "acknowledge",
  "processRedeem",
  "claimRedeem",
  "cancelRedeem",
];

const opArb: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("create" as const), toVault: fc.boolean() }),
  fc.record({ kind: fc.constantFrom(...pickKinds), pick: fc.nat(20) }),
  fc.constant({ kind: "vaultRequest" } as const),
  fc.constantFrom({ kind: "failSink" } as const, { kind: "failTransfer" } as const),
  fc.record({ kind: fc.constant("advance" as const), seconds: fc.integer({ min: 1, max: 400_000 }) }),
);

// vault requests draw key material from a separate range
const VAULT_KEY_OFFSET = 1000;

function pubkeyFor(id: number): string {
  return "0x" + id.toString(16).padStart(96, "0");
}

function signatureFor(id: number): string {
  return "0x" + id.toString(16).padStart(192, "0");
}

function rootFor(withdrawalCredentials: string, keyId: number): string {
  return computeDepositDataRoot({
    pubkey: pubkeyFor(keyId),
    withdrawalCredentials,
    signature: signatureFor(keyId),
    amountGwei: STAKE_UNIT_GWEI,
  });
}

function pick<T>(items: readonly T[], n: number): T | undefined {
  return items.length === 0 ? undefined : items[n % items.length];
}

async function applyPick(h: Harness, kind: PickKind, n: number): Promise<void> {
  switch (kind) {
    case "assign":
    case "confirm":
    case "finalize":
    case "cancel": {
      const record = pick(h.registry.listRecords(), n);
      if (record === undefined) return;
      await applyRegistry(h, kind, record);
      return;
    }
    case "vaultAssign":
    case "vaultProcess":
    case "vaultClaim":
    case "vaultCancel": {
      const request = pick(h.vault.listRequests({ kind: "deposit" }), n);
      if (request === undefined) return;
      await applyVaultDeposit(h, kind, request);
      return;
    }
    case "redeem": {
      const validator = pick(h.validators.list(), n);
      if (validator === undefined) return;
      h.vault.requestRedeem(DEPOSITOR, { validatorId: validator.id });
      return;
    }
    default: {
      const request = pick(h.vault.listRequests({ kind: "redeem" }), n);
      if (request === undefined) return;
      if (kind === "acknowledge") {
        h.vault.acknowledgeRedeem(OPERATOR, request.id);
      } else if (kind === "processRedeem") {
        h.vault.processRedeem(OPERATOR, request.id, 10);
        // the exited stake is swept back into custody
        h.transfer.credit(request.amount);
      } else if (kind === "claimRedeem") {
        await h.vault.claimRedeem(DEPOSITOR, request.id);
      } else {
        h.vault.cancelRedeem(DEPOSITOR, request.id);
      }
    }
  }
}

async function applyRegistry(
  h: Harness,
  kind: "assign" | "confirm" | "finalize" | "cancel",
  record: DepositRecord,
): Promise<void> {
  if (kind === "assign") {
    h.registry.assign(OPERATOR, record.id, {
      pubkey: pubkeyFor(record.id),
      signature: signatureFor(record.id),
    });
  } else if (kind === "confirm") {
    h.registry.confirm(DEPOSITOR, record.id, rootFor(record.withdrawalCredentials, record.id));
  } else if (kind === "finalize") {
    await h.registry.finalize(OPERATOR, record.id);
  } else {
    await h.registry.cancel(DEPOSITOR, record.id);
  }
}

async function applyVaultDeposit(
  h: Harness,
  kind: "vaultAssign" | "vaultProcess" | "vaultClaim" | "vaultCancel",
  request: ExitRequest,
): Promise<void> {
  const keyId = VAULT_KEY_OFFSET + request.id;
  if (kind === "vaultAssign") {
    h.vault.assignDeposit(OPERATOR, request.id, {
      pubkey: pubkeyFor(keyId),
      signature: signatureFor(keyId),
    });
  } else if (kind === "vaultProcess") {
    await h.vault.processValidatorDeposit(OPERATOR, request.id, {
      depositDataRoot: rootFor(h.vault.withdrawalCredentials, keyId),
    });
  } else if (kind === "vaultClaim") {
    h.vault.claimDeposit(DEPOSITOR, request.id);
  } else {
    await h.vault.cancelDeposit(DEPOSITOR, request.id);
  }
}

async function apply(h: Harness, op: Op): Promise<void> {
  switch (op.kind) {
    case "create":
      h.transfer.credit(STAKE);
      h.registry.create(DEPOSITOR, {
        amount: STAKE,
        ...(op.toVault ? { withdrawalAddress: VAULT } : {}),
      });
      return;
    case "vaultRequest":
      h.transfer.credit(STAKE);
      h.vault.requestDeposit(DEPOSITOR, { amount: STAKE });
      return;
    case "failSink":
      h.sink.failNext();
      return;
    case "failTransfer":
      h.transfer.failNext();
      return;
    case "advance":
      h.clock.advance(op.seconds);
      return;
    default:
      await applyPick(h, op.kind, op.pick);
  }
}

async function run(h: Harness, op: Op): Promise<void> {
  try {
    await apply(h, op);
  } catch (err) {
    if (!(err instanceof LifecycleError)) throw err;
  }
}

function count<T>(items: readonly T[], predicate: (item: T) => boolean): bigint {
  return BigInt(items.filter(predicate).length);
}

function isOpen(request: ExitRequest): boolean {
  return request.state === "pending" || request.state === "processing" || request.state === "claimable";
}

function sourceOf(h: Harness, request: ExitRequest): "registry" | "vault" | undefined {
  return request.validatorId === undefined ? undefined : h.validators.get(request.validatorId).source;
}

describe("lifecycle properties", () => {
  it("custody stays conserved and reconciled after every operation", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(opArb, { maxLength: 60 }), async (ops) => {
        const h = createHarness();

        for (const op of ops) {
          await run(h, op);

          h.custody.assertConserved();
          const { matched } = h.custody.reconcile(await h.transfer.balance());
          expect(matched).toBe(true);

          const records = h.registry.listRecords();
          const deposits = h.vault.listRequests({ kind: "deposit" });
          const redeems = h.vault.listRequests({ kind: "redeem" });
          const balances = h.custody.balances();

          const open =
            count(records, (r) => r.state !== "finalized") +
            count(deposits, (r) => r.state === "pending" || r.state === "processing");
          expect(balances.pending).toBe(open * STAKE);
          expect(balances.committed).toBe(
            count(h.validators.list(), (v) => v.status !== "exited") * STAKE,
          );
          expect(balances.exited).toBe(count(redeems, (r) => r.state === "claimable") * STAKE);
        }
      }),
      { numRuns: 80 },
    );
  });

  it("locks exactly the shares and handles of open redeem requests", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(opArb, { maxLength: 60 }), async (ops) => {
        const h = createHarness(0);

        for (const op of ops) {
          await run(h, op);

          const deposits = h.vault.listRequests({ kind: "deposit" });
          const redeems = h.vault.listRequests({ kind: "redeem" });
          const shares = h.vault.sharesOf(DEPOSITOR);
          const locked = h.vault.lockedShares(DEPOSITOR);

          expect(locked).toBeLessThanOrEqual(shares);
          expect(locked).toBe(
            count(redeems, (r) => isOpen(r) && sourceOf(h, r) === "vault") * STAKE,
          );
          expect(shares).toBe(
            (count(deposits, (r) => r.state === "claimed") -
              count(redeems, (r) => r.state === "claimed" && sourceOf(h, r) === "vault")) *
              STAKE,
          );
          expect(h.vault.totalShares()).toBe(shares);

          for (const handle of h.registry.handles.all()) {
            const redeemed = redeems.some(
              (r) =>
                isOpen(r) &&
                r.validatorId !== undefined &&
                h.validators.get(r.validatorId).source === "registry" &&
                h.validators.get(r.validatorId).sourceId === handle.id,
            );
            expect(handle.locked).toBe(redeemed);
          }
        }
      }),
      { numRuns: 80 },
    );
  });

  it("never stores a record outside the declared states", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(opArb, { maxLength: 30 }), async (ops) => {
        const h = createHarness(0);
        for (const op of ops) {
          await run(h, op);
        }
        for (const record of h.registry.listRecords()) {
          expect(["requested", "assigned", "confirmed", "finalized"]).toContain(record.state);
          if (record.state !== "requested") expect(record.pubkey).toBe(pubkeyFor(record.id));
          if (record.state === "confirmed" || record.state === "finalized") {
            expect(record.committedRoot).toBe(rootFor(record.withdrawalCredentials, record.id));
          }
        }
        for (const request of h.vault.listRequests({ kind: "deposit" })) {
          if (request.state === "pending") continue;
          if (request.state === "cancelled" && request.pubkey === undefined) continue;
          expect(request.pubkey).toBe(pubkeyFor(VAULT_KEY_OFFSET + request.id));
          expect(request.assignedAt).toBeDefined();
        }
      }),
      { numRuns: 60 },
    );
  });
});
