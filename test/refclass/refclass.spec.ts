// test/refclass/refclass.spec.ts
// Tests for reference classes: shared mutation, methods, callSuper and copy

import { describe, it, expect, beforeEach } from "vitest";
import {
  ClassKindError,
  NoApplicableMethodError,
  SlotTypes,
  TypeMismatchError,
  construct,
  defineClass,
  defineGeneric,
  defineMethod,
  dispatch,
  getAttribute,
  resetRegistryStore,
} from "../../src/core/model";
import { type RefClassGenerator, RefObject, defineRefClass, getRefClass, isRefObject } from "../../src/core/refclass";
import { testRegistry } from "../helpers/model";

describe("Reference classes", () => {
  let reg: string;
  let Account: RefClassGenerator;

  beforeEach(() => {
    resetRegistryStore();
    reg = testRegistry().id;
    Account = defineRefClass(reg, "Account", {
      fields: { owner: SlotTypes.text, balance: SlotTypes.numeric },
      methods: {
        deposit: (self, amount) => self.set("balance", Number(self.get("balance")) + Number(amount)),
        describe: self => `account of ${String(self.get("owner"))}`,
      },
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Fields
  // ─────────────────────────────────────────────────────────────────

  describe("fields", () => {
    it("start empty and take initial values", () => {
      const blank = Account.new();
      expect(blank.get("owner")).toBe("");
      expect(blank.get("balance")).toBe(0);

      const a = Account.new({ owner: "Ada", balance: 10 });
      expect(a.fieldNames()).toEqual(["owner", "balance"]);
      expect(a.get("balance")).toBe(10);
      expect(isRefObject(a)).toBe(true);
    });

    it("are shared by every holder", () => {
      const a = Account.new({ owner: "Ada", balance: 10 });
      const alias = a;
      alias.set("balance", 99);
      expect(a.get("balance")).toBe(99);
    });

    it("are type-checked", () => {
      const a = Account.new();
      expect(() => a.set("balance", "lots")).toThrow(
        "TypeMismatch: slot 'balance' of class 'Account' expects numeric, got text"
      );
      expect(() => a.set("iban", "x")).toThrow(TypeMismatchError);
      expect(() => a.get("iban")).toThrow("TypeMismatch: class 'Account' has no slot 'iban'");
      expect(() => Account.new({ balance: true })).toThrow(TypeMismatchError);
    });

    it("are described by the generator", () => {
      expect(Account.fields()).toEqual({ owner: "text", balance: "numeric" });
      expect(Account.methods()).toEqual(["deposit", "describe"]);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Methods
  // ─────────────────────────────────────────────────────────────────

  describe("methods", () => {
    it("mutate the object in place", () => {
      const a = Account.new({ owner: "Ada", balance: 10 });
      const returned = a.call("deposit", 5);
      expect(returned).toBe(a);
      expect(a.get("balance")).toBe(15);
    });

    it("throw for unknown methods", () => {
      const a = Account.new();
      expect(() => a.call("withdraw", 1)).toThrow(
        "NoApplicableMethod: no method of 'withdraw' for class 'Account' (searched Account)"
      );
    });

    it("are inherited and overridable", () => {
      const Savings = defineRefClass(reg, "Savings", {
        contains: "Account",
        fields: { rate: SlotTypes.numeric },
        methods: {
          describe: self => `savings < ${String(self.callSuper())}`,
        },
      });
      const s = Savings.new({ owner: "Ada", balance: 100, rate: 0.5 });
      expect(s.fieldNames()).toEqual(["owner", "balance", "rate"]);
      expect(s.call("describe")).toBe("savings < account of Ada");
      s.call("deposit", 1);
      expect(s.get("balance")).toBe(101);
      expect(Savings.methods()).toEqual(["describe", "deposit"]);
      expect(s.isA("Account")).toBe(true);
      expect(Account.new().isA("Savings")).toBe(false);
    });

    it("callSuper in initialize falls back to assigning fields", () => {
      const Named = defineRefClass(reg, "Named", {
        fields: { name: SlotTypes.text, size: SlotTypes.numeric },
        methods: {
          initialize: (self, init) => {
            self.callSuper(init);
            if (self.get("name") === "") self.set("name", "anonymous");
            return self;
          },
        },
      });
      expect(Named.new({ size: 3 }).get("name")).toBe("anonymous");
      expect(Named.new({ name: "Ada" }).get("name")).toBe("Ada");
    });

    it("callSuper outside a method throws", () => {
      expect(() => Account.new().callSuper()).toThrow(NoApplicableMethodError);
    });

    it("callSuper without a parent method throws", () => {
      defineRefClass(reg, "Frozen", {
        fields: {},
        methods: { describe: self => self.callSuper() },
      });
      expect(() => getRefClass(reg, "Frozen").new().call("describe")).toThrow(NoApplicableMethodError);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Copy
  // ─────────────────────────────────────────────────────────────────

  describe("copy", () => {
    it("gives an independent object", () => {
      const a = Account.new({ owner: "Ada", balance: 10 });
      const b = a.copy();
      b.set("balance", 0);
      expect(a.get("balance")).toBe(10);
      expect(b.get("owner")).toBe("Ada");
      expect(isRefObject(b)).toBe(true);
    });

    it("copies nested objects once", () => {
      const Pair = defineRefClass(reg, "Pair", {
        fields: { left: SlotTypes.classRef("Account"), right: SlotTypes.classRef("Account") },
      });
      const shared = Account.new({ owner: "Ada", balance: 1 });
      const pair = Pair.new({ left: shared, right: shared });

      const copied = pair.copy();
      const left = copied.get("left");
      expect(left).toBe(copied.get("right"));
      expect(left).not.toBe(shared);
      if (left instanceof RefObject) {
        left.set("balance", 50);
      }
      expect(shared.get("balance")).toBe(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Interplay with formal classes and generics
  // ─────────────────────────────────────────────────────────────────

  describe("with formal classes", () => {
    it("are shared from inside an instance slot", () => {
      defineClass(reg, "Customer", { account: SlotTypes.classRef("Account") });
      const account = Account.new({ owner: "Ada", balance: 10 });
      const customer = construct(reg, "Customer", { account });
      account.call("deposit", 5);
      const held = getAttribute(customer, "account");
      expect(held).toBe(account);
      expect(account.get("balance")).toBe(15);
    });

    it("take part in generic dispatch", () => {
      defineRefClass(reg, "Savings", { contains: "Account", fields: { rate: SlotTypes.numeric } });
      defineGeneric(reg, "owner", ["account"]);
      defineMethod(reg, "owner", "Account", a => (a instanceof RefObject ? a.get("owner") : null));
      const s = getRefClass(reg, "Savings").new({ owner: "Ada" });
      expect(dispatch(reg, "owner", s)).toBe("Ada");
    });

    it("cannot extend or be extended by formal classes", () => {
      defineClass(reg, "Person", { name: SlotTypes.text });
      expect(() => defineRefClass(reg, "Club", { contains: "Person", fields: {} })).toThrow(ClassKindError);
      expect(() => getRefClass(reg, "Person")).toThrow("ClassKind: class 'Person' is a formal class; use construct");
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // show
  // ─────────────────────────────────────────────────────────────────

  describe("show", () => {
    it("lists fields by default", () => {
      const a = Account.new({ owner: "Ada", balance: 10 });
      expect(a.show()).toBe('Reference class object of class "Account"\nField "owner": "Ada"\nField "balance": 10');
    });

    it("uses a show method when the class has one", () => {
      const Tag = defineRefClass(reg, "Tag", {
        fields: { text: SlotTypes.text },
        methods: { show: self => `#${String(self.get("text"))}` },
      });
      expect(Tag.new({ text: "x" }).show()).toBe("#x");
    });
  });
});
