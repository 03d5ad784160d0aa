// test/model/validity.spec.ts
// Tests for validity predicates: most specific wins, enforced at construction

import { describe, it, expect, beforeEach } from "vitest";
import {
  SlotTypes,
  ValidityError,
  checkValidity,
  construct,
  countEvents,
  defineClass,
  findValidity,
  getAttribute,
  getRecentEvents,
  getRegistryStats,
  resetRegistryStore,
  setAttribute,
  setValidity,
  slotNumeric,
  validObject,
} from "../../src/core/model";
import { testRegistry, type CapturedLine } from "../helpers/model";

describe("Validity", () => {
  let reg: string;
  let lines: CapturedLine[];

  beforeEach(() => {
    resetRegistryStore();
    ({ id: reg, lines } = testRegistry({ log: { level: "info" } }));

    defineClass(reg, "Range", { lo: SlotTypes.numeric, hi: SlotTypes.numeric }, {
      validity: r => slotNumeric(r, "lo") <= slotNumeric(r, "hi") || "lo must not exceed hi",
    });
    defineClass(reg, "Percent", { unit: SlotTypes.text }, {
      parent: "Range",
      validity: r => slotNumeric(r, "hi") <= 100 || "hi must be at most 100",
    });
    defineClass(reg, "Window", { label: SlotTypes.text }, { parent: "Range" });
  });

  // ─────────────────────────────────────────────────────────────────
  // findValidity
  // ─────────────────────────────────────────────────────────────────

  describe("findValidity", () => {
    it("returns the nearest predicate in the chain", () => {
      expect(findValidity(reg, "Range")?.definedBy).toBe("Range");
      expect(findValidity(reg, "Percent")?.definedBy).toBe("Percent");
      expect(findValidity(reg, "Window")?.definedBy).toBe("Range");
    });

    it("returns undefined when no class in the chain has one", () => {
      defineClass(reg, "Free", { x: SlotTypes.numeric });
      expect(findValidity(reg, "Free")).toBeUndefined();
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Enforcement at construction
  // ─────────────────────────────────────────────────────────────────

  describe("construct", () => {
    it("accepts a valid instance", () => {
      const r = construct(reg, "Range", { lo: 1, hi: 2 });
      expect(checkValidity(r)).toEqual({ valid: true });
    });

    it("throws ValidityError with the predicate's reason", () => {
      try {
        construct(reg, "Range", { lo: 5, hi: 2 });
        expect.unreachable("invalid range should throw");
      } catch (e) {
        expect(e).toBeInstanceOf(ValidityError);
        if (e instanceof ValidityError) {
          expect(e.message).toBe("Validity: invalid 'Range' object: lo must not exceed hi");
          expect(e.reason).toBe("lo must not exceed hi");
          expect(e.checkedBy).toBe("Range");
        }
      }
      expect(getRegistryStats(reg)?.constructed).toBe(0);
      expect(getRegistryStats(reg)?.validityFailures).toBe(1);
    });

    it("records and logs the failure", () => {
      expect(() => construct(reg, "Range", { lo: 5, hi: 2 })).toThrow(ValidityError);
      expect(countEvents(reg, "validity-failure")).toBe(1);
      expect(getRecentEvents(reg, 1)[0]).toMatchObject({
        tag: "validity-failure",
        className: "Range",
        checkedBy: "Range",
        reason: "lo must not exceed hi",
      });
      expect(lines).toContainEqual({
        level: "info",
        message: "invalid Range object: lo must not exceed hi",
        data: { checkedBy: "Range" },
      });
    });

    it("uses only the most specific predicate", () => {
      // lo > hi passes, because Percent's predicate replaces Range's
      const p = construct(reg, "Percent", { lo: 50, hi: 10, unit: "%" });
      expect(getAttribute(p, "lo")).toBe(50);
      expect(() => construct(reg, "Percent", { lo: 0, hi: 200, unit: "%" })).toThrow(
        "Validity: invalid 'Percent' object: hi must be at most 100"
      );
    });

    it("inherits the predicate when the subclass has none", () => {
      expect(() => construct(reg, "Window", { lo: 5, hi: 2, label: "w" })).toThrow(
        "Validity: invalid 'Window' object: lo must not exceed hi"
      );
    });

    it("substitutes a default reason for an empty one", () => {
      setValidity(reg, "Range", () => "");
      expect(() => construct(reg, "Range", { lo: 1, hi: 2 })).toThrow(
        "Validity: invalid 'Range' object: validity check failed"
      );
    });

    it("lets predicate exceptions propagate", () => {
      setValidity(reg, "Range", () => {
        throw new RangeError("predicate exploded");
      });
      expect(() => construct(reg, "Range", { lo: 1, hi: 2 })).toThrow(RangeError);
    });

    it("runs after type checks", () => {
      let calls = 0;
      setValidity(reg, "Range", () => {
        calls++;
        return true;
      });
      expect(() => construct(reg, "Range", { lo: "1", hi: 2 })).toThrow("TypeMismatch");
      expect(calls).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Updates and explicit re-checks
  // ─────────────────────────────────────────────────────────────────

  describe("validObject", () => {
    it("lets setAttribute produce an invalid instance", () => {
      const r = construct(reg, "Range", { lo: 1, hi: 2 });
      const broken = setAttribute(r, "lo", 10);
      expect(checkValidity(broken)).toEqual({ valid: false, reason: "lo must not exceed hi", checkedBy: "Range" });
    });

    it("throws for an invalid instance and returns a valid one", () => {
      const r = construct(reg, "Range", { lo: 1, hi: 2 });
      expect(validObject(r)).toBe(r);
      expect(() => validObject(setAttribute(r, "lo", 10))).toThrow(ValidityError);
    });

    it("sees a predicate set after construction", () => {
      const r = construct(reg, "Range", { lo: 1, hi: 2 });
      setValidity(reg, "Range", x => slotNumeric(x, "hi") > 5 || "hi too small");
      expect(() => validObject(r)).toThrow("Validity: invalid 'Range' object: hi too small");
    });
  });
});
