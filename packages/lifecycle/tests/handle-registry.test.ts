import { describe, it, expect } from "vitest";
import { HandleRegistry } from "../src/handle-registry.js";
import { AuthorizationError, HandleError } from "../src/errors.js";

const ALICE = "0x" + "a1".repeat(20);
const BOB = "0x" + "b2".repeat(20);

describe("HandleRegistry", () => {
  it("issues a handle to a normalized owner", () => {
    const handles = new HandleRegistry();
    expect(handles.issue(1, "0x" + "A1".repeat(20))).toEqual({ id: 1, owner: ALICE, locked: false });
    expect(handles.isOwner(1, ALICE)).toBe(true);
    expect(handles.handlesOf(ALICE).map((h) => h.id)).toEqual([1]);
  });

  it("refuses to issue the same id twice", () => {
    const handles = new HandleRegistry();
    handles.issue(1, ALICE);
    expect(() => handles.issue(1, BOB)).toThrow("Handle 1 already exists");
  });

  it("consults the transfer hook", () => {
    const handles = new HandleRegistry((id) => id !== 2);
    handles.issue(1, ALICE);
    handles.issue(2, ALICE);

    expect(handles.transfer(ALICE, 1, BOB).owner).toBe(BOB);
    expect(() => handles.transfer(ALICE, 2, BOB)).toThrow(HandleError);
    expect(handles.ownerOf(2)).toBe(ALICE);
  });

  it("checks ownership before transferability", () => {
    const handles = new HandleRegistry(() => false);
    handles.issue(1, ALICE);
    expect(() => handles.transfer(BOB, 1, BOB)).toThrow(AuthorizationError);
  });

  it("refuses to move a locked handle until unlocked", () => {
    const handles = new HandleRegistry();
    handles.issue(1, ALICE);
    handles.lock(1);

    expect(() => handles.transfer(ALICE, 1, BOB)).toThrow("Handle 1 is locked by an open redeem request");
    handles.unlock(1);
    expect(handles.transfer(ALICE, 1, BOB).owner).toBe(BOB);
  });

  it("burns and restores", () => {
    const handles = new HandleRegistry();
    handles.issue(1, ALICE);
    const burned = handles.burn(1);

    expect(handles.has(1)).toBe(false);
    expect(() => handles.get(1)).toThrow("Handle 1 does not exist");
    handles.restore(burned);
    expect(handles.ownerOf(1)).toBe(ALICE);
  });
});
