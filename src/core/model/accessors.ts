// src/core/model/accessors.ts
// Accessor and mutator generics for a single slot

import { effectiveSchemaOf, requireClass } from "./classes";
import { ClassKindError, TypeMismatchError } from "./errors";
import { defineGeneric, defineMethod } from "./generics";
import { asInstance, getAttribute, setAttribute } from "./instance";
import { requireRegistry } from "./registry";
import type { ClassName } from "./types";
import { validObject } from "./validity";

export type AccessorSpec = {
  className: ClassName;
  slot: string;
  /** Getter generic name; defaults to the slot name */
  getter?: string;
  /** Setter generic name; no setter when omitted */
  setter?: string;
  /** Run validObject on the updated instance before returning it */
  validate?: boolean;
  origin?: string;
};

/**
 * Define `getter(object)` and, optionally, `setter(object, value)` for one
 * slot of a formal class. The setter returns the updated instance.
 */
export function defineAccessor(registryId: string, spec: AccessorSpec): { getter: string; setter?: string } {
  const registry = requireRegistry(registryId);
  const def = requireClass(registry, spec.className);
  if (def.kind !== "formal") {
    throw new ClassKindError(spec.className, "is a reference class; use get/set on its objects");
  }
  if (!effectiveSchemaOf(registry, spec.className).has(spec.slot)) {
    throw new TypeMismatchError(spec.className, spec.slot, "unknown-slot");
  }

  const { className, slot } = spec;
  const getter = spec.getter ?? slot;
  const validate = spec.validate ?? true;

  defineGeneric(registryId, getter, ["object"], { origin: spec.origin });
  defineMethod(registryId, getter, className, object => getAttribute(asInstance(object, className), slot));

  if (spec.setter === undefined) {
    return { getter };
  }

  defineGeneric(registryId, spec.setter, ["object", "value"], { origin: spec.origin });
  defineMethod(registryId, spec.setter, className, (object, value) => {
    const next = setAttribute(asInstance(object, className), slot, value);
    return validate ? validObject(next) : next;
  });

  return { getter, setter: spec.setter };
}
