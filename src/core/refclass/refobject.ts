// src/core/refclass/refobject.ts
// Reference objects: mutable field cells shared by every holder

import { brandRefObject, isRefObject } from "../model/brands";
import { formatValue } from "../model/builtins";
import { chainOf, collectSlots, extendsClass, requireClass } from "../model/classes";
import { NoApplicableMethodError, TypeMismatchError } from "../model/errors";
import { requireRegistry } from "../model/registry";
import { classOf, conformsTo, describeSlotType, emptyValue, isSlotArray } from "../model/slotTypes";
import type { ClassName, RefMethod, RegistryState, SlotType, SlotValue } from "../model/types";

type Frame = {
  method: string;
  definedBy: ClassName;
};

export { isRefObject } from "../model/brands";

type FoundMethod = {
  impl: RefMethod;
  definedBy: ClassName;
};

export function isFieldRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !isRefObject(value);
}

function findRefMethod(registry: RegistryState, method: string, chain: ClassName[]): FoundMethod | undefined {
  for (const name of chain) {
    const def = requireClass(registry, name);
    if (def.kind !== "reference") continue;
    const impl = def.methods.get(method);
    if (impl) return { impl, definedBy: name };
  }
  return undefined;
}

/**
 * RefObject: an object of a reference class. Unlike an Instance it is
 * mutable, and every variable holding it observes every change. Use
 * `copy()` for an independent object.
 */
export class RefObject {
  readonly tag = "RefObject";
  private readonly cells = new Map<string, SlotValue>();
  private readonly frames: Frame[] = [];

  /** Use RefClassGenerator.new; objects built directly are not recognised as slot values. */
  constructor(
    public readonly registryId: string,
    public readonly className: ClassName
  ) {
    for (const field of collectSlots(this.registry(), className)) {
      this.cells.set(field.name, emptyValue(field.type));
    }
  }

  private registry(): RegistryState {
    return requireRegistry(this.registryId);
  }

  private fieldType(field: string): SlotType {
    const found = collectSlots(this.registry(), this.className).find(s => s.name === field);
    if (!found) {
      throw new TypeMismatchError(this.className, field, "unknown-slot");
    }
    return found.type;
  }

  // ───────────────────────────────────────────────────────────────
  // Fields
  // ───────────────────────────────────────────────────────────────

  get(field: string): SlotValue {
    const value = this.cells.get(field);
    if (value === undefined) {
      throw new TypeMismatchError(this.className, field, "unknown-slot");
    }
    return value;
  }

  set(field: string, value: unknown): this {
    const type = this.fieldType(field);
    if (!conformsTo(this.registry(), type, value)) {
      throw new TypeMismatchError(this.className, field, "type", describeSlotType(type), classOf(value));
    }
    this.cells.set(field, isSlotArray(value) ? [...value] : value);
    return this;
  }

  initFields(values: Readonly<Record<string, unknown>>): this {
    for (const [field, value] of Object.entries(values)) {
      this.set(field, value);
    }
    return this;
  }

  fieldNames(): string[] {
    return Array.from(this.cells.keys());
  }

  // ───────────────────────────────────────────────────────────────
  // Methods
  // ───────────────────────────────────────────────────────────────

  hasMethod(method: string): boolean {
    return findRefMethod(this.registry(), method, chainOf(this.registry(), this.className)) !== undefined;
  }

  /** Methods visible on this object, nearest definition first */
  methodNames(): string[] {
    const registry = this.registry();
    const names = new Set<string>();
    for (const name of chainOf(registry, this.className)) {
      const def = requireClass(registry, name);
      if (def.kind === "reference") {
        for (const method of def.methods.keys()) names.add(method);
      }
    }
    return Array.from(names);
  }

  call(method: string, ...args: unknown[]): unknown {
    const chain = chainOf(this.registry(), this.className);
    const found = findRefMethod(this.registry(), method, chain);
    if (!found) {
      throw new NoApplicableMethodError(method, this.className, chain);
    }
    return this.invoke(method, found, args);
  }

  /**
   * Run the parent class's version of the method currently executing on
   * this object. An `initialize` without a parent version falls back to
   * `initFields`.
   */
  callSuper(...args: unknown[]): unknown {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new NoApplicableMethodError("callSuper", this.className, []);
    }

    const above = chainOf(this.registry(), frame.definedBy).slice(1);
    const found = findRefMethod(this.registry(), frame.method, above);
    if (found) {
      return this.invoke(frame.method, found, args);
    }
    if (frame.method === "initialize") {
      const init = args[0];
      return this.initFields(isFieldRecord(init) ? init : {});
    }
    throw new NoApplicableMethodError(frame.method, frame.definedBy, above);
  }

  private invoke(method: string, found: FoundMethod, args: unknown[]): unknown {
    this.frames.push({ method, definedBy: found.definedBy });
    try {
      return found.impl(this, ...args);
    } finally {
      this.frames.pop();
    }
  }

  // ───────────────────────────────────────────────────────────────
  // Identity
  // ───────────────────────────────────────────────────────────────

  isA(className: ClassName): boolean {
    return extendsClass(this.registry(), this.className, className);
  }

  /**
   * Deep copy: nested reference objects are copied too, and objects
   * reachable twice are copied once.
   */
  copy(): RefObject {
    return this.copyWith(new Map());
  }

  private copyWith(seen: Map<RefObject, RefObject>): RefObject {
    const existing = seen.get(this);
    if (existing) return existing;

    const clone = brandRefObject(new RefObject(this.registryId, this.className));
    seen.set(this, clone);

    const copyValue = (value: SlotValue): SlotValue => {
      if (isRefObject(value)) return value.copyWith(seen);
      if (isSlotArray(value)) return value.map(copyValue);
      return value;
    };

    for (const [field, value] of this.cells) {
      clone.cells.set(field, copyValue(value));
    }
    return clone;
  }

  show(): string {
    if (this.hasMethod("show")) {
      return String(this.call("show"));
    }
    const lines = [`Reference class object of class "${this.className}"`];
    for (const [field, value] of this.cells) {
      lines.push(`Field "${field}": ${formatValue(value)}`);
    }
    return lines.join("\n");
  }
}
