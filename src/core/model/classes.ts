// src/core/model/classes.ts
// Class registry: definition, inheritance chain and effective schema

import {
  ClassKindError,
  InheritanceCycleError,
  SchemaConflictError,
  UnknownClassError,
} from "./errors";
import { logModelEvent, requireRegistry } from "./registry";
import {
  type ClassDefinition,
  type ClassName,
  type FormalClassDefinition,
  type RegistryState,
  type SlotSchema,
  type SlotType,
  type ValidityPredicate,
  ANY_CLASS,
  isBasicClass,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Lookup
// ─────────────────────────────────────────────────────────────────

export function getClass(registryId: string, name: ClassName): ClassDefinition | undefined {
  return requireRegistry(registryId).classes.get(name);
}

export function isClass(registryId: string, name: ClassName): boolean {
  return requireRegistry(registryId).classes.has(name);
}

export function listClasses(registryId: string): ClassName[] {
  return Array.from(requireRegistry(registryId).classes.keys());
}

export function requireClass(registry: RegistryState, name: ClassName): ClassDefinition {
  const def = registry.classes.get(name);
  if (!def) {
    throw new UnknownClassError(name);
  }
  return def;
}

/**
 * Classes a method may be registered for: defined classes, basic classes and ANY.
 */
export function isDispatchableClass(registry: RegistryState, name: ClassName): boolean {
  return name === ANY_CLASS || isBasicClass(name) || registry.classes.has(name);
}

// ─────────────────────────────────────────────────────────────────
// Inheritance Chain
// ─────────────────────────────────────────────────────────────────

/**
 * [name, parent, grandparent, ..., root]. Basic classes are their own chain.
 */
export function chainOf(registry: RegistryState, name: ClassName): ClassName[] {
  if (isBasicClass(name)) return [name];

  const chain: ClassName[] = [];
  let current: ClassName | undefined = name;
  while (current !== undefined) {
    if (chain.includes(current)) {
      throw new InheritanceCycleError(name, [...chain, current]);
    }
    const def = requireClass(registry, current);
    chain.push(current);
    current = def.parent;
  }
  return chain;
}

export function classChain(registryId: string, name: ClassName): ClassName[] {
  return chainOf(requireRegistry(registryId), name);
}

/**
 * Reflexive reachability along the parent chain. Everything extends ANY.
 */
export function isSubclassOf(registryId: string, candidate: ClassName, ancestor: ClassName): boolean {
  return extendsClass(requireRegistry(registryId), candidate, ancestor);
}

export function extendsClass(registry: RegistryState, candidate: ClassName, ancestor: ClassName): boolean {
  if (ancestor === ANY_CLASS || candidate === ancestor) return true;
  if (candidate === ANY_CLASS) return false;
  return chainOf(registry, candidate).includes(ancestor);
}

// ─────────────────────────────────────────────────────────────────
// Effective Schema
// ─────────────────────────────────────────────────────────────────

export type SlotOrigin = {
  name: string;
  type: SlotType;
  definedBy: ClassName;
};

/**
 * Slots of the whole chain, root ancestor first.
 */
export function collectSlots(registry: RegistryState, name: ClassName): SlotOrigin[] {
  const chain = chainOf(registry, name).reverse();
  const seen = new Map<string, ClassName>();
  const slots: SlotOrigin[] = [];

  for (const className of chain) {
    const def = requireClass(registry, className);
    for (const [slot, type] of def.slots) {
      const owner = seen.get(slot);
      if (owner !== undefined) {
        throw new SchemaConflictError(className, `slot '${slot}' is already defined by '${owner}'`, slot, owner);
      }
      seen.set(slot, className);
      slots.push({ name: slot, type, definedBy: className });
    }
  }
  return slots;
}

export function effectiveSchemaOf(registry: RegistryState, name: ClassName): Map<string, SlotType> {
  return new Map(collectSlots(registry, name).map(s => [s.name, s.type]));
}

export function resolveEffectiveSchema(registryId: string, name: ClassName): Map<string, SlotType> {
  return effectiveSchemaOf(requireRegistry(registryId), name);
}

// ─────────────────────────────────────────────────────────────────
// Definition
// ─────────────────────────────────────────────────────────────────

/**
 * Common checks for formal and reference classes: reserved names, parent
 * kind, cycles and inherited slot collisions.
 */
export function checkClassDefinition(
  registry: RegistryState,
  name: ClassName,
  slots: SlotSchema,
  kind: ClassDefinition["kind"],
  parent?: ClassName
): Map<string, SlotType> {
  if (name === ANY_CLASS || isBasicClass(name)) {
    throw new SchemaConflictError(name, "the name is reserved");
  }
  if (name.length === 0) {
    throw new SchemaConflictError(name, "class names must not be empty");
  }

  const own = new Map<string, SlotType>(Object.entries(slots));

  if (parent === undefined) return own;

  const parentDef = requireClass(registry, parent);
  if (parentDef.kind !== kind) {
    throw new ClassKindError(parent, `is a ${parentDef.kind} class and cannot be extended by ${kind} class '${name}'`);
  }

  const parentChain = chainOf(registry, parent);
  if (parentChain.includes(name)) {
    throw new InheritanceCycleError(name, [name, ...parentChain.slice(0, parentChain.indexOf(name) + 1)]);
  }

  for (const inherited of collectSlots(registry, parent)) {
    if (own.has(inherited.name)) {
      throw new SchemaConflictError(
        name,
        `slot '${inherited.name}' collides with the one inherited from '${inherited.definedBy}'`,
        inherited.name,
        inherited.definedBy
      );
    }
  }

  return own;
}

/**
 * Existing subclasses of a redefined class must still resolve: same kind
 * as their parent and no slot collisions along the new chain.
 */
function checkSubclasses(registry: RegistryState, def: ClassDefinition): void {
  const trial: RegistryState = { ...registry, classes: new Map(registry.classes).set(def.name, def) };

  for (const other of trial.classes.values()) {
    if (other.name === def.name || !chainOf(trial, other.name).includes(def.name)) continue;

    if (other.parent === def.name && other.kind !== def.kind) {
      throw new ClassKindError(def.name, `is a ${def.kind} class and cannot be extended by ${other.kind} class '${other.name}'`);
    }
    collectSlots(trial, other.name);
  }
}

export function storeClass(registry: RegistryState, def: ClassDefinition): void {
  const replaced = registry.classes.has(def.name);
  if (replaced) {
    checkSubclasses(registry, def);
  }
  registry.classes.set(def.name, def);
  logModelEvent(registry, {
    tag: "define-class",
    className: def.name,
    kind: def.kind,
    replaced,
    timestamp: def.createdAt,
  });
  registry.logger.debug(`${replaced ? "redefined" : "defined"} ${def.kind} class ${def.name}`, {
    parent: def.parent,
    slots: Array.from(def.slots.keys()),
  });
}

/**
 * Register a formal class, replacing any previous definition wholesale.
 */
export function defineClass(
  registryId: string,
  name: ClassName,
  slots: SlotSchema,
  options: {
    parent?: ClassName;
    validity?: ValidityPredicate;
    virtual?: boolean;
    description?: string;
  } = {}
): FormalClassDefinition {
  const registry = requireRegistry(registryId);
  const own = checkClassDefinition(registry, name, slots, "formal", options.parent);

  const def: FormalClassDefinition = {
    kind: "formal",
    name,
    slots: own,
    parent: options.parent,
    validity: options.validity,
    virtual: options.virtual ?? false,
    description: options.description,
    createdAt: Date.now(),
  };
  storeClass(registry, def);
  return def;
}

/**
 * Replace the validity predicate of a formal class.
 */
export function setValidity(
  registryId: string,
  className: ClassName,
  predicate: ValidityPredicate
): FormalClassDefinition {
  const registry = requireRegistry(registryId);
  const def = requireClass(registry, className);
  if (def.kind !== "formal") {
    throw new ClassKindError(className, "is a reference class and cannot carry a validity predicate");
  }
  const updated: FormalClassDefinition = { ...def, validity: predicate };
  registry.classes.set(className, updated);
  return updated;
}
