// src/core/model/generics.ts
// Generic/method table: generic definitions, shadowing rules and method registration

import { isDispatchableClass } from "./classes";
import {
  GenericConflictError,
  ShadowedBuiltinWarning,
  SignatureMismatchError,
  UnknownClassError,
  UnknownGenericError,
} from "./errors";
import { logModelEvent, recordWarning, requireRegistry } from "./registry";
import {
  type ClassName,
  type FormalShape,
  type GenericDef,
  type GenericDefineResult,
  type MethodEntry,
  type MethodImpl,
  type RegistryState,
  VARIADIC_MARKER,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Formal Shapes
// ─────────────────────────────────────────────────────────────────

/**
 * Parse a parameter list. The first name is the receiver; a trailing
 * "..." makes the generic variadic.
 */
export function parseShape(generic: string, params: readonly string[]): FormalShape {
  if (params.length === 0) {
    throw new SignatureMismatchError(generic, "a generic needs at least a receiver parameter");
  }

  const variadic = params[params.length - 1] === VARIADIC_MARKER;
  const named = variadic ? params.slice(0, -1) : [...params];

  if (named.length === 0) {
    throw new SignatureMismatchError(generic, `the receiver cannot be '${VARIADIC_MARKER}'`);
  }
  if (named.includes(VARIADIC_MARKER)) {
    throw new SignatureMismatchError(generic, `'${VARIADIC_MARKER}' may only come last`);
  }
  const dup = named.find((p, i) => named.indexOf(p) !== i);
  if (dup !== undefined) {
    throw new SignatureMismatchError(generic, `parameter '${dup}' is declared twice`);
  }

  return { params: named, variadic };
}

export function shapesCompatible(a: FormalShape, b: FormalShape): boolean {
  return a.variadic === b.variadic
    && a.params.length === b.params.length
    && a.params.every((p, i) => p === b.params[i]);
}

export function formatShape(shape: FormalShape): string[] {
  return shape.variadic ? [...shape.params, VARIADIC_MARKER] : [...shape.params];
}

// ─────────────────────────────────────────────────────────────────
// Generic Definition
// ─────────────────────────────────────────────────────────────────

export function requireGeneric(registry: RegistryState, name: string): GenericDef {
  const def = registry.generics.get(name);
  if (!def) {
    throw new UnknownGenericError(name);
  }
  return def;
}

/**
 * Define a generic operation.
 *
 * Redefinition keeps the existing generic and its methods when the shapes
 * agree. An incompatible shape from the same origin replaces it. One from a
 * different origin is refused under shadowPolicy "error", and otherwise
 * replaces it with a recorded ShadowedBuiltinWarning.
 */
export function defineGeneric(
  registryId: string,
  name: string,
  params: readonly string[],
  options: { origin?: string; description?: string } = {}
): GenericDefineResult {
  const registry = requireRegistry(registryId);
  const shape = parseShape(name, params);
  const origin = options.origin ?? "user";
  const existing = registry.generics.get(name);

  const def: GenericDef = {
    name,
    shape,
    origin,
    description: options.description,
    createdAt: Date.now(),
  };

  let result: GenericDefineResult;

  if (!existing) {
    registry.generics.set(name, def);
    result = { tag: "created", generic: def };
  } else if (shapesCompatible(existing.shape, shape)) {
    result = { tag: "unchanged", generic: existing };
  } else if (existing.origin === origin) {
    const droppedMethods = dropMethods(registry, name);
    registry.generics.set(name, def);
    result = { tag: "replaced", generic: def, droppedMethods };
  } else {
    if (registry.config.dispatch.shadowPolicy === "error") {
      throw new GenericConflictError(name, formatShape(existing.shape), formatShape(shape), existing.origin, origin);
    }
    const warning = new ShadowedBuiltinWarning(name, formatShape(existing.shape), existing.origin, origin);
    const droppedMethods = dropMethods(registry, name);
    registry.generics.set(name, def);
    recordWarning(registry, warning);
    result = { tag: "shadowed", generic: def, droppedMethods, warning };
  }

  logModelEvent(registry, { tag: "define-generic", generic: name, outcome: result.tag, timestamp: Date.now() });
  registry.logger.debug(`generic ${name}(${formatShape(result.generic.shape).join(", ")}): ${result.tag}`);
  return result;
}

function dropMethods(registry: RegistryState, generic: string): number {
  const byClass = registry.methods.get(generic);
  registry.methods.delete(generic);
  return byClass?.size ?? 0;
}

export function getGeneric(registryId: string, name: string): GenericDef | undefined {
  return requireRegistry(registryId).generics.get(name);
}

export function isGeneric(registryId: string, name: string): boolean {
  return requireRegistry(registryId).generics.has(name);
}

export function listGenerics(registryId: string): string[] {
  return Array.from(requireRegistry(registryId).generics.keys());
}

// ─────────────────────────────────────────────────────────────────
// Method Table Operations
// ─────────────────────────────────────────────────────────────────

/**
 * Register the implementation of `generic` for `className` (a defined
 * class, a basic class or ANY). Replaces any previous one for the pair.
 */
export function defineMethod(
  registryId: string,
  generic: string,
  className: ClassName,
  impl: MethodImpl
): MethodEntry {
  const registry = requireRegistry(registryId);
  const def = requireGeneric(registry, generic);

  if (!isDispatchableClass(registry, className)) {
    throw new UnknownClassError(className);
  }

  if (registry.config.dispatch.checkArity && !def.shape.variadic && impl.length > def.shape.params.length) {
    throw new SignatureMismatchError(
      generic,
      `method for '${className}' declares ${impl.length} parameters, the generic has ${def.shape.params.length}`
    );
  }

  let byClass = registry.methods.get(generic);
  if (!byClass) {
    byClass = new Map();
    registry.methods.set(generic, byClass);
  }

  const replaced = byClass.has(className);
  const entry: MethodEntry = { generic, className, impl, createdAt: Date.now() };
  byClass.set(className, entry);

  logModelEvent(registry, { tag: "define-method", generic, className, replaced, timestamp: entry.createdAt });
  registry.logger.debug(`method ${generic} for ${className}${replaced ? " (replaced)" : ""}`);
  return entry;
}

export function lookupMethodIn(registry: RegistryState, generic: string, className: ClassName): MethodEntry | undefined {
  return registry.methods.get(generic)?.get(className);
}

export function removeMethod(registryId: string, generic: string, className: ClassName): boolean {
  const registry = requireRegistry(registryId);
  return registry.methods.get(generic)?.delete(className) ?? false;
}

/**
 * Exact registration only; inherited methods do not count.
 */
export function existsMethod(registryId: string, generic: string, className: ClassName): boolean {
  return lookupMethodIn(requireRegistry(registryId), generic, className) !== undefined;
}

/**
 * Methods of a generic, in registration order.
 */
export function listMethods(registryId: string, generic: string): MethodEntry[] {
  const registry = requireRegistry(registryId);
  requireGeneric(registry, generic);
  return Array.from(registry.methods.get(generic)?.values() ?? []);
}
