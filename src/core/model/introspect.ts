// src/core/model/introspect.ts
// Registry queries: class and generic descriptions

import { chainOf, collectSlots, requireClass } from "./classes";
import { formatShape, requireGeneric } from "./generics";
import { requireRegistry } from "./registry";
import { describeSlotType } from "./slotTypes";
import type { ClassKind, ClassName } from "./types";
import { findValidityIn } from "./validity";

export type ClassDescription = {
  name: ClassName;
  kind: ClassKind;
  description?: string;
  parent?: ClassName;
  /** Parent first, root last */
  ancestors: ClassName[];
  /** Direct subclasses */
  subclasses: ClassName[];
  slots: Array<{ name: string; type: string; definedBy: ClassName }>;
  /** Class whose validity predicate applies */
  validity?: ClassName;
  virtual: boolean;
  /** Generics with a method registered for exactly this class */
  methods: string[];
  refMethods: string[];
};

export type GenericDescription = {
  name: string;
  params: string[];
  variadic: boolean;
  origin: string;
  description?: string;
  methods: ClassName[];
};

export function describeClass(registryId: string, name: ClassName): ClassDescription {
  const registry = requireRegistry(registryId);
  const def = requireClass(registry, name);

  const subclasses: ClassName[] = [];
  for (const other of registry.classes.values()) {
    if (other.parent === name) subclasses.push(other.name);
  }

  const methods: string[] = [];
  for (const [generic, byClass] of registry.methods) {
    if (byClass.has(name)) methods.push(generic);
  }

  return {
    name,
    kind: def.kind,
    description: def.description,
    parent: def.parent,
    ancestors: chainOf(registry, name).slice(1),
    subclasses,
    slots: collectSlots(registry, name).map(s => ({ name: s.name, type: describeSlotType(s.type), definedBy: s.definedBy })),
    validity: def.kind === "formal" ? findValidityIn(registry, name)?.definedBy : undefined,
    virtual: def.kind === "formal" && def.virtual,
    methods,
    refMethods: def.kind === "reference" ? Array.from(def.methods.keys()) : [],
  };
}

export function describeGeneric(registryId: string, name: string): GenericDescription {
  const registry = requireRegistry(registryId);
  const def = requireGeneric(registry, name);
  return {
    name,
    params: formatShape(def.shape),
    variadic: def.shape.variadic,
    origin: def.origin,
    description: def.description,
    methods: Array.from(registry.methods.get(name)?.keys() ?? []),
  };
}

/**
 * Text rendering of describeClass.
 */
export function showClass(registryId: string, name: ClassName): string {
  const d = describeClass(registryId, name);
  const lines = [`Class "${d.name}" [${d.kind}${d.virtual ? ", virtual" : ""}]`];

  if (d.slots.length > 0) {
    lines.push("Slots:");
    for (const s of d.slots) {
      lines.push(`  ${s.name}: ${s.type}${s.definedBy === d.name ? "" : `  (from ${s.definedBy})`}`);
    }
  }
  if (d.ancestors.length > 0) {
    lines.push(`Extends: ${d.ancestors.map(a => `"${a}"`).join(", ")}`);
  }
  if (d.subclasses.length > 0) {
    lines.push(`Known subclasses: ${d.subclasses.map(s => `"${s}"`).join(", ")}`);
  }
  if (d.validity !== undefined) {
    lines.push(`Validity: ${d.validity}`);
  }
  if (d.refMethods.length > 0) {
    lines.push(`Methods: ${d.refMethods.join(", ")}`);
  }
  return lines.join("\n");
}
