/**
 * StakeService wiring: custody crediting, operator journaling and the
 * transition log.
 */

import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import { StakeService } from "../src/services/stake-service.js";
import {
  DEPOSITOR,
  ManualClock,
  OPERATOR,
  OTHER,
  OWNER,
  PUBKEY_A,
  ROOT_A,
  SIGNATURE_A,
  STAKE,
  VAULT,
} from "./setup.js";

interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

let lines: LogLine[];
let service: StakeService;

function parseLine(line: string): LogLine {
  const parsed: unknown = JSON.parse(line);
  if (typeof parsed !== "object" || parsed === null || !("level" in parsed) || !("msg" in parsed)) {
    throw new Error(`Unexpected log line: ${line}`);
  }
  const { level, msg } = parsed;
  if (typeof level !== "number" || typeof msg !== "string") {
    throw new Error(`Unexpected log line: ${line}`);
  }
  return { ...parsed, level, msg };
}

function confirmed(): number {
  const { id } = service.createDeposit(DEPOSITOR, { amount: BigInt(STAKE) });
  service.assignDeposit(OPERATOR, id, { pubkey: PUBKEY_A, signature: SIGNATURE_A });
  service.confirmDeposit(DEPOSITOR, id, ROOT_A);
  return id;
}

beforeEach(() => {
  lines = [];
  const logger = pino({ level: "info" }, { write: (line: string) => void lines.push(parseLine(line)) });
  service = new StakeService({
    ownerAddress: OWNER,
    operators: [OPERATOR],
    vaultAddress: VAULT,
    clock: new ManualClock().read,
    logger,
  });
});

describe("StakeService", () => {
  it("logs each journaled transition", () => {
    service.createDeposit(DEPOSITOR, { amount: BigInt(STAKE) });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "Transition applied",
      ref: "deposit-1",
      id: 1,
      actor: DEPOSITOR,
      event: "deposit.created",
    });
  });

  it("credits paid requests so custody reconciles", async () => {
    service.createDeposit(DEPOSITOR, { amount: BigInt(STAKE) });

    const report = await service.custodyReport();
    expect(report.held).toBe(BigInt(STAKE));
    expect(report.conserved).toBe(true);
    expect(report.reconciliation.matched).toBe(true);
  });

  it("compensates a failed finalize and logs a warning", async () => {
    const id = confirmed();
    service.sink.failNext("false");

    await expect(service.finalizeDeposit(OPERATOR, id)).rejects.toThrow(
      "Deposit contract call for deposit-1 reported failure",
    );

    expect(service.getDeposit(id).state).toBe("confirmed");
    expect(() => service.getValidator(1)).toThrow();
    expect((await service.custodyReport()).reconciliation.matched).toBe(true);

    const warning = lines.find((line) => line.msg === "Transition compensated");
    expect(warning).toMatchObject({
      level: 40,
      transition: "finalize",
      ref: "deposit-1",
      undone: ["custody", "state", "validator"],
      err: "Deposit contract call for deposit-1 reported failure",
    });
  });

  it("journals operator changes only when the set changes", () => {
    expect(service.setOperator(OWNER, OTHER, true)).toBe(true);
    expect(service.setOperator(OWNER, OTHER, true)).toBe(false);

    const events = service.readStreamEvents("operators");
    expect(events).toHaveLength(1);
    expect(events[0]?.event.payload).toEqual({ operator: OTHER, enabled: true });
    expect(service.listOperators().operators).toContain(OTHER);
  });

  it("rejects operator changes from anyone but the owner", () => {
    expect(() => service.setOperator(OPERATOR, OTHER, true)).toThrow(
      `Only the owner can update operators, not ${OPERATOR}`,
    );
    expect(service.readStreamEvents("operators")).toEqual([]);
  });

  it("is ready until stopped", () => {
    expect(service.isReady()).toBe(true);
    service.stop();
    expect(service.isReady()).toBe(false);
  });
});
