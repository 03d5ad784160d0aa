// src/core/model/slotTypes.ts
// Slot type constructors, conformance checks and value classification

import { isInstance, isRefObject } from "./brands";
import { extendsClass } from "./classes";
import {
  type ClassName,
  type RegistryState,
  type SlotType,
  type SlotValue,
  ANY_CLASS,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────

export const SlotTypes: {
  readonly text: SlotType;
  readonly numeric: SlotType;
  readonly logical: SlotType;
  readonly any: SlotType;
  seqOf(item: SlotType): SlotType;
  classRef(className: ClassName): SlotType;
} = {
  text: { tag: "Text" },
  numeric: { tag: "Numeric" },
  logical: { tag: "Logical" },
  any: { tag: "Any" },
  seqOf: item => ({ tag: "SeqOf", item }),
  classRef: className => ({ tag: "ClassRef", className }),
};

export function describeSlotType(type: SlotType): string {
  switch (type.tag) {
    case "Text": return "text";
    case "Numeric": return "numeric";
    case "Logical": return "logical";
    case "Any": return "any";
    case "SeqOf": return `sequence<${describeSlotType(type.item)}>`;
    case "ClassRef": return type.className;
  }
}

// ─────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────

/**
 * Runtime class of any value: its defined class for instances and
 * reference objects, a basic class for plain values, ANY otherwise.
 */
export function classOf(value: unknown): ClassName {
  if (isInstance(value) || isRefObject(value)) return value.className;
  if (typeof value === "string") return "text";
  if (typeof value === "number") return "numeric";
  if (typeof value === "boolean") return "logical";
  if (Array.isArray(value)) return "list";
  if (value === null || value === undefined) return "null";
  if (typeof value === "function") return "function";
  return ANY_CLASS;
}

export function isSlotValue(value: unknown): value is SlotValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      if (Array.isArray(value)) return value.every(isSlotValue);
      return isInstance(value) || isRefObject(value);
    default:
      return false;
  }
}

export function isSlotArray(value: SlotValue): value is readonly SlotValue[] {
  return Array.isArray(value);
}

/**
 * Check a value against a declared type. Class references are resolved
 * against the registry at call time.
 */
export function conformsTo(registry: RegistryState, type: SlotType, value: unknown): value is SlotValue {
  switch (type.tag) {
    case "Text":
      return typeof value === "string";
    case "Numeric":
      return typeof value === "number";
    case "Logical":
      return typeof value === "boolean";
    case "Any":
      return isSlotValue(value);
    case "SeqOf":
      return Array.isArray(value) && value.every(item => conformsTo(registry, type.item, item));
    case "ClassRef":
      if (!isInstance(value) && !isRefObject(value)) return false;
      if (value.registryId !== registry.id) return false;
      return registry.classes.has(value.className) && extendsClass(registry, value.className, type.className);
  }
}

// ─────────────────────────────────────────────────────────────────
// Copying and Defaults
// ─────────────────────────────────────────────────────────────────

/**
 * Frozen copy of the array structure, so instance slots never alias the
 * caller's arrays. Instances are immutable and reference objects are
 * shared, so both are kept as-is.
 */
export function copySlotValue(value: SlotValue): SlotValue {
  if (isSlotArray(value)) {
    return Object.freeze(value.map(copySlotValue));
  }
  return value;
}

/**
 * Initial value of a reference class field before initialisation.
 */
export function emptyValue(type: SlotType): SlotValue {
  switch (type.tag) {
    case "Text": return "";
    case "Numeric": return 0;
    case "Logical": return false;
    case "SeqOf": return [];
    case "Any":
    case "ClassRef":
      return null;
  }
}
