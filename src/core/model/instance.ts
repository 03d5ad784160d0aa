// src/core/model/instance.ts
// Instance model: validated construction, slot access and typed readers

import { brandInstance, isInstance } from "./brands";
import { effectiveSchemaOf, extendsClass, requireClass } from "./classes";
import { ClassKindError, TypeMismatchError } from "./errors";
import { logModelEvent, requireRegistry } from "./registry";
import {
  classOf,
  conformsTo,
  copySlotValue,
  describeSlotType,
  isSlotArray,
} from "./slotTypes";
import { type ClassName, type Instance, type SlotValue, ANY_CLASS } from "./types";
import { enforceValidity } from "./validity";

export { isInstance } from "./brands";

function hasKey(values: Readonly<Record<string, unknown>>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(values, key);
}

function freezeInstance(registryId: string, className: ClassName, slots: Map<string, SlotValue>): Instance {
  const instance: Instance = { tag: "Instance", registryId, className, slots };
  return brandInstance(Object.freeze(instance));
}

// ─────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────

/**
 * Build an instance of a formal class. Either every slot is present and
 * type-correct and the validity predicate passes, or this throws and no
 * instance escapes.
 */
export function construct(
  registryId: string,
  className: ClassName,
  values: Readonly<Record<string, unknown>>
): Instance {
  const registry = requireRegistry(registryId);
  const def = requireClass(registry, className);

  if (def.kind !== "formal") {
    throw new ClassKindError(className, "is a reference class; create it through its generator");
  }
  if (def.virtual) {
    throw new ClassKindError(className, "is virtual and cannot be constructed");
  }

  const schema = effectiveSchemaOf(registry, className);

  for (const key of Object.keys(values)) {
    if (!schema.has(key)) {
      throw new TypeMismatchError(className, key, "unknown-slot");
    }
  }

  const slots = new Map<string, SlotValue>();
  for (const [slot, type] of schema) {
    if (!hasKey(values, slot)) {
      throw new TypeMismatchError(className, slot, "missing");
    }
    const value = values[slot];
    if (!conformsTo(registry, type, value)) {
      throw new TypeMismatchError(className, slot, "type", describeSlotType(type), classOf(value));
    }
    slots.set(slot, copySlotValue(value));
  }

  const instance = freezeInstance(registryId, className, slots);
  enforceValidity(registry, instance);

  registry.stats.constructed++;
  logModelEvent(registry, { tag: "construct", className, timestamp: Date.now() });
  return instance;
}

// ─────────────────────────────────────────────────────────────────
// Low-level Slot Access
// ─────────────────────────────────────────────────────────────────

export function getAttribute(instance: Instance, name: string): SlotValue {
  const value = instance.slots.get(name);
  if (value === undefined) {
    throw new TypeMismatchError(instance.className, name, "unknown-slot");
  }
  return value;
}

/**
 * Copy-on-write slot update. The value is type-checked; the validity
 * predicate is not run (see validObject).
 */
export function setAttribute(instance: Instance, name: string, value: unknown): Instance {
  const registry = requireRegistry(instance.registryId);
  const schema = effectiveSchemaOf(registry, instance.className);
  const type = schema.get(name);
  if (!type) {
    throw new TypeMismatchError(instance.className, name, "unknown-slot");
  }
  if (!conformsTo(registry, type, value)) {
    throw new TypeMismatchError(instance.className, name, "type", describeSlotType(type), classOf(value));
  }

  const slots = new Map(instance.slots);
  slots.set(name, copySlotValue(value));
  return freezeInstance(instance.registryId, instance.className, slots);
}

export function instanceToRecord(instance: Instance): Record<string, SlotValue> {
  return Object.fromEntries(instance.slots);
}

/**
 * `value` belongs to `className` or one of its subclasses.
 */
export function is(registryId: string, value: unknown, className: ClassName): boolean {
  const registry = requireRegistry(registryId);
  const own = classOf(value);
  if (own === className) return true;
  if (isInstance(value) && value.registryId !== registryId) return false;
  if (!registry.classes.has(own)) return className === ANY_CLASS;
  return extendsClass(registry, own, className);
}

// ─────────────────────────────────────────────────────────────────
// Readers for Method Bodies
// ─────────────────────────────────────────────────────────────────

export function asInstance(value: unknown, className?: ClassName): Instance {
  if (!isInstance(value)) {
    throw new TypeMismatchError(className ?? ANY_CLASS, "object", "type", className ?? "instance", classOf(value));
  }
  if (className !== undefined && !is(value.registryId, value, className)) {
    throw new TypeMismatchError(className, "object", "type", className, value.className);
  }
  return value;
}

export function slotValue(obj: unknown, name: string): SlotValue {
  return getAttribute(asInstance(obj), name);
}

export function slotText(obj: unknown, name: string): string {
  const instance = asInstance(obj);
  const value = getAttribute(instance, name);
  if (typeof value !== "string") {
    throw new TypeMismatchError(instance.className, name, "type", "text", classOf(value));
  }
  return value;
}

export function slotNumeric(obj: unknown, name: string): number {
  const instance = asInstance(obj);
  const value = getAttribute(instance, name);
  if (typeof value !== "number") {
    throw new TypeMismatchError(instance.className, name, "type", "numeric", classOf(value));
  }
  return value;
}

export function slotLogical(obj: unknown, name: string): boolean {
  const instance = asInstance(obj);
  const value = getAttribute(instance, name);
  if (typeof value !== "boolean") {
    throw new TypeMismatchError(instance.className, name, "type", "logical", classOf(value));
  }
  return value;
}

export function slotTextSeq(obj: unknown, name: string): string[] {
  const instance = asInstance(obj);
  const value = getAttribute(instance, name);
  const texts: string[] = [];
  if (isSlotArray(value)) {
    for (const item of value) {
      if (typeof item !== "string") break;
      texts.push(item);
    }
    if (texts.length === value.length) return texts;
  }
  throw new TypeMismatchError(instance.className, name, "type", "sequence<text>", classOf(value));
}
