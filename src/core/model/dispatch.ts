// src/core/model/dispatch.ts
// Dispatch engine: most-specific-wins walk up the class chain, then ANY

import { chainOf } from "./classes";
import { NoApplicableMethodError, SignatureMismatchError } from "./errors";
import { lookupMethodIn, requireGeneric } from "./generics";
import { logModelEvent, requireRegistry } from "./registry";
import { classOf } from "./slotTypes";
import {
  type ClassName,
  type MethodEntry,
  type RegistryState,
  type Resolution,
  ANY_CLASS,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────

function receiverChain(registry: RegistryState, className: ClassName): ClassName[] {
  return className === ANY_CLASS ? [] : chainOf(registry, className);
}

/**
 * Resolve over an explicit chain. The first class with a method wins;
 * ANY is consulted only after the whole chain misses.
 */
function resolveOver(
  registry: RegistryState,
  generic: string,
  receiverClass: ClassName,
  chain: ClassName[]
): Resolution {
  for (let i = 0; i < chain.length; i++) {
    const method = lookupMethodIn(registry, generic, chain[i]);
    if (method) {
      return { tag: "found", method, via: i === 0 ? "exact" : "inherited", chain };
    }
  }

  const fallback = lookupMethodIn(registry, generic, ANY_CLASS);
  if (fallback) {
    return { tag: "found", method: fallback, via: "fallback", chain };
  }

  return { tag: "miss", generic, receiverClass, chain };
}

export function resolveIn(registry: RegistryState, generic: string, className: ClassName): Resolution {
  requireGeneric(registry, generic);
  return resolveOver(registry, generic, className, receiverChain(registry, className));
}

/**
 * Resolve a generic for a class without invoking anything.
 */
export function resolveMethod(registryId: string, generic: string, className: ClassName): Resolution {
  return resolveIn(requireRegistry(registryId), generic, className);
}

/**
 * Inherited or fallback methods count.
 */
export function hasMethod(registryId: string, generic: string, className: ClassName): boolean {
  return resolveMethod(registryId, generic, className).tag === "found";
}

/**
 * Every applicable method, most specific first, ANY last.
 */
export function listApplicableMethods(registryId: string, generic: string, className: ClassName): MethodEntry[] {
  const registry = requireRegistry(registryId);
  requireGeneric(registry, generic);

  const results: MethodEntry[] = [];
  for (const name of [...receiverChain(registry, className), ANY_CLASS]) {
    const method = lookupMethodIn(registry, generic, name);
    if (method) results.push(method);
  }
  return results;
}

// ─────────────────────────────────────────────────────────────────
// Invocation
// ─────────────────────────────────────────────────────────────────

function checkArgs(registry: RegistryState, generic: string, extraArgs: unknown[]): void {
  const shape = requireGeneric(registry, generic).shape;
  const accepted = shape.params.length - 1;
  if (registry.config.dispatch.checkArity && !shape.variadic && extraArgs.length > accepted) {
    throw new SignatureMismatchError(generic, `expected at most ${accepted} extra arguments, got ${extraArgs.length}`);
  }
}

function record(registry: RegistryState, generic: string, receiverClass: ClassName, resolution: Resolution): MethodEntry {
  registry.stats.dispatches++;

  if (resolution.tag === "miss") {
    registry.stats.misses++;
    logModelEvent(registry, { tag: "miss", generic, receiverClass, timestamp: Date.now() });
    throw new NoApplicableMethodError(generic, receiverClass, [...resolution.chain, ANY_CLASS]);
  }

  switch (resolution.via) {
    case "exact": registry.stats.exactHits++; break;
    case "inherited": registry.stats.inheritedHits++; break;
    case "fallback": registry.stats.fallbackHits++; break;
  }
  logModelEvent(registry, {
    tag: "dispatch",
    generic,
    receiverClass,
    selected: resolution.method.className,
    via: resolution.via,
    timestamp: Date.now(),
  });
  return resolution.method;
}

/**
 * Call a generic on a receiver. The selected method's result is returned
 * unchanged; validity is the method's own business.
 */
export function dispatch(registryId: string, generic: string, receiver: unknown, ...extraArgs: unknown[]): unknown {
  const registry = requireRegistry(registryId);
  requireGeneric(registry, generic);
  checkArgs(registry, generic, extraArgs);

  const receiverClass = classOf(receiver);
  const method = record(registry, generic, receiverClass, resolveIn(registry, generic, receiverClass));
  return method.impl(receiver, ...extraArgs);
}

/**
 * From inside the method registered for `fromClass`, call the next
 * applicable one: the nearest ancestor's, then ANY's.
 */
export function callNextMethod(
  registryId: string,
  generic: string,
  fromClass: ClassName,
  receiver: unknown,
  ...extraArgs: unknown[]
): unknown {
  const registry = requireRegistry(registryId);
  requireGeneric(registry, generic);
  checkArgs(registry, generic, extraArgs);

  if (fromClass === ANY_CLASS) {
    throw new NoApplicableMethodError(generic, fromClass, [ANY_CLASS]);
  }

  const above = chainOf(registry, fromClass).slice(1);
  const method = record(registry, generic, fromClass, resolveOver(registry, generic, fromClass, above));
  return method.impl(receiver, ...extraArgs);
}
