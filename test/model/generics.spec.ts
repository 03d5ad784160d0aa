// test/model/generics.spec.ts
// Tests for generic definition, shadowing and method registration

import { describe, it, expect, beforeEach } from "vitest";
import {
  GenericConflictError,
  ShadowedBuiltinWarning,
  SignatureMismatchError,
  SlotTypes,
  UnknownClassError,
  UnknownGenericError,
  countEvents,
  defineClass,
  defineGeneric,
  defineMethod,
  dispatch,
  existsMethod,
  getGeneric,
  getWarnings,
  isGeneric,
  listGenerics,
  listMethods,
  parseShape,
  removeMethod,
  resetRegistryStore,
} from "../../src/core/model";
import { testRegistry, type CapturedLine } from "../helpers/model";

describe("Generics", () => {
  let reg: string;
  let lines: CapturedLine[];

  beforeEach(() => {
    resetRegistryStore();
    ({ id: reg, lines } = testRegistry());
    defineClass(reg, "Shape", {});
  });

  // ─────────────────────────────────────────────────────────────────
  // Formal shapes
  // ─────────────────────────────────────────────────────────────────

  describe("parseShape", () => {
    it("splits off the variadic marker", () => {
      expect(parseShape("g", ["x", "y"])).toEqual({ params: ["x", "y"], variadic: false });
      expect(parseShape("g", ["x", "..."])).toEqual({ params: ["x"], variadic: true });
    });

    it("rejects malformed parameter lists", () => {
      expect(() => parseShape("g", [])).toThrow(SignatureMismatchError);
      expect(() => parseShape("g", ["..."])).toThrow("SignatureMismatch: generic 'g': the receiver cannot be '...'");
      expect(() => parseShape("g", ["x", "...", "y"])).toThrow("'...' may only come last");
      expect(() => parseShape("g", ["x", "x"])).toThrow("parameter 'x' is declared twice");
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // defineGeneric
  // ─────────────────────────────────────────────────────────────────

  describe("defineGeneric", () => {
    it("creates a new generic with user origin", () => {
      const result = defineGeneric(reg, "area", ["shape"], { description: "Area of a shape" });
      expect(result.tag).toBe("created");
      expect(getGeneric(reg, "area")).toMatchObject({
        name: "area",
        shape: { params: ["shape"], variadic: false },
        origin: "user",
        description: "Area of a shape",
      });
      expect(isGeneric(reg, "area")).toBe(true);
      expect(listGenerics(reg)).toEqual(["show", "length", "sequence", "area"]);
    });

    it("keeps methods when redefined with the same shape", () => {
      defineGeneric(reg, "area", ["shape"]);
      defineMethod(reg, "area", "Shape", () => 1);
      const again = defineGeneric(reg, "area", ["shape"]);
      expect(again.tag).toBe("unchanged");
      expect(existsMethod(reg, "area", "Shape")).toBe(true);
    });

    it("keeps a built-in whose shape matches", () => {
      const result = defineGeneric(reg, "length", ["x"]);
      expect(result.tag).toBe("unchanged");
      expect(result.generic.origin).toBe("builtin");
      expect(dispatch(reg, "length", "abc")).toBe(3);
    });

    it("replaces a same-origin generic with a new shape and drops its methods", () => {
      defineGeneric(reg, "area", ["shape"]);
      defineMethod(reg, "area", "Shape", () => 1);
      const result = defineGeneric(reg, "area", ["shape", "units"]);
      expect(result).toMatchObject({ tag: "replaced", droppedMethods: 1 });
      expect(listMethods(reg, "area")).toEqual([]);
      expect(getWarnings(reg)).toEqual([]);
    });

    it("shadows a built-in of another shape with a warning", () => {
      const result = defineGeneric(reg, "sequence", ["object"]);
      expect(result.tag).toBe("shadowed");
      if (result.tag !== "shadowed") return;

      expect(result.droppedMethods).toBe(2);
      expect(result.warning).toBeInstanceOf(ShadowedBuiltinWarning);
      expect(result.warning.message).toBe(
        "ShadowedBuiltin: 'sequence' from 'user' replaces 'sequence(nvec, ...)' from 'builtin'"
      );
      expect(getWarnings(reg)).toEqual([result.warning]);
      expect(lines).toContainEqual({
        level: "warn",
        message: result.warning.message,
        data: { generic: "sequence", origin: "user" },
      });
      expect(getGeneric(reg, "sequence")?.origin).toBe("user");
      expect(listMethods(reg, "sequence")).toEqual([]);
    });

    it("refuses to shadow under the error policy", () => {
      const strict = testRegistry({ dispatch: { shadowPolicy: "error" } }).id;
      try {
        defineGeneric(strict, "sequence", ["object"], { origin: "seqtools" });
        expect.unreachable("shadowing should throw");
      } catch (e) {
        expect(e).toBeInstanceOf(GenericConflictError);
        if (e instanceof GenericConflictError) {
          expect(e.existingParams).toEqual(["nvec", "..."]);
          expect(e.requestedParams).toEqual(["object"]);
          expect(e.existingOrigin).toBe("builtin");
          expect(e.requestedOrigin).toBe("seqtools");
        }
      }
      expect(getGeneric(strict, "sequence")?.origin).toBe("builtin");
      expect(listMethods(strict, "sequence")).toHaveLength(2);
    });

    it("records every definition in the ledger", () => {
      const before = countEvents(reg, "define-generic");
      defineGeneric(reg, "area", ["shape"]);
      defineGeneric(reg, "area", ["shape"]);
      expect(countEvents(reg, "define-generic")).toBe(before + 2);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // defineMethod
  // ─────────────────────────────────────────────────────────────────

  describe("defineMethod", () => {
    beforeEach(() => {
      defineGeneric(reg, "scale", ["shape", "factor"]);
    });

    it("registers for defined classes, basic classes and ANY", () => {
      defineMethod(reg, "scale", "Shape", () => "shape");
      defineMethod(reg, "scale", "numeric", (x, f) => Number(x) * Number(f));
      defineMethod(reg, "scale", "ANY", () => "any");
      expect(listMethods(reg, "scale").map(m => m.className)).toEqual(["Shape", "numeric", "ANY"]);
    });

    it("replaces the method for the same pair", () => {
      defineMethod(reg, "scale", "Shape", () => "first");
      defineMethod(reg, "scale", "Shape", () => "second");
      expect(listMethods(reg, "scale")).toHaveLength(1);
      expect(listMethods(reg, "scale")[0].impl(null)).toBe("second");
    });

    it("requires the generic and the class to exist", () => {
      expect(() => defineMethod(reg, "rotate", "Shape", () => 0)).toThrow(UnknownGenericError);
      expect(() => defineMethod(reg, "scale", "Blob", () => 0)).toThrow(UnknownClassError);
    });

    it("refuses implementations with more parameters than the generic", () => {
      expect(() => defineMethod(reg, "scale", "Shape", (_s, _f, _extra) => 0)).toThrow(
        "SignatureMismatch: generic 'scale': method for 'Shape' declares 3 parameters, the generic has 2"
      );
    });

    it("allows any parameter count for variadic generics", () => {
      defineGeneric(reg, "combine", ["x", "..."]);
      expect(() => defineMethod(reg, "combine", "Shape", (_a, _b, _c) => 0)).not.toThrow();
    });

    it("skips the parameter check when checkArity is off", () => {
      const loose = testRegistry({ dispatch: { checkArity: false } }).id;
      defineClass(loose, "Shape", {});
      defineGeneric(loose, "scale", ["shape"]);
      expect(() => defineMethod(loose, "scale", "Shape", (_s, _f) => 0)).not.toThrow();
    });

    it("removes methods", () => {
      defineMethod(reg, "scale", "Shape", () => 0);
      expect(removeMethod(reg, "scale", "Shape")).toBe(true);
      expect(removeMethod(reg, "scale", "Shape")).toBe(false);
      expect(existsMethod(reg, "scale", "Shape")).toBe(false);
    });

    it("lists methods of unknown generics as an error", () => {
      expect(() => listMethods(reg, "rotate")).toThrow("UnknownGeneric: generic 'rotate' is not defined");
    });
  });

  it("existsMethod ignores inherited methods", () => {
    defineClass(reg, "Square", { side: SlotTypes.numeric }, { parent: "Shape" });
    defineGeneric(reg, "kind", ["shape"]);
    defineMethod(reg, "kind", "Shape", () => "shape");
    expect(existsMethod(reg, "kind", "Square")).toBe(false);
  });
});
