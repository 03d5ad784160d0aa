// src/core/model/validity.ts
// Validity engine: most specific predicate in the chain, no chaining to ancestors

import { chainOf, effectiveSchemaOf, requireClass } from "./classes";
import { TypeMismatchError, ValidityError } from "./errors";
import { logModelEvent, requireRegistry } from "./registry";
import { conformsTo, classOf, describeSlotType } from "./slotTypes";
import type {
  ClassName,
  Instance,
  RegistryState,
  ValidityPredicate,
} from "./types";

export type ValidityCheck =
  | { valid: true }
  | { valid: false; reason: string; checkedBy: ClassName };

const DEFAULT_REASON = "validity check failed";

export function findValidityIn(
  registry: RegistryState,
  className: ClassName
): { predicate: ValidityPredicate; definedBy: ClassName } | undefined {
  for (const name of chainOf(registry, className)) {
    const def = requireClass(registry, name);
    if (def.kind === "formal" && def.validity) {
      return { predicate: def.validity, definedBy: name };
    }
  }
  return undefined;
}

/**
 * The predicate that applies to `className`, and the class that declared it.
 */
export function findValidity(
  registryId: string,
  className: ClassName
): { predicate: ValidityPredicate; definedBy: ClassName } | undefined {
  return findValidityIn(requireRegistry(registryId), className);
}

/**
 * Run the applicable predicate. Exceptions thrown by the predicate propagate.
 */
export function checkValidity(instance: Instance): ValidityCheck {
  const registry = requireRegistry(instance.registryId);
  const found = findValidityIn(registry, instance.className);
  if (!found) return { valid: true };

  const outcome = found.predicate(instance);
  if (outcome === true) return { valid: true };
  return { valid: false, reason: outcome.length > 0 ? outcome : DEFAULT_REASON, checkedBy: found.definedBy };
}

/**
 * Convert a failed check into a ValidityError, recording it first.
 */
export function enforceValidity(registry: RegistryState, instance: Instance): void {
  const check = checkValidity(instance);
  if (check.valid) return;

  registry.stats.validityFailures++;
  logModelEvent(registry, {
    tag: "validity-failure",
    className: instance.className,
    checkedBy: check.checkedBy,
    reason: check.reason,
    timestamp: Date.now(),
  });
  registry.logger.info(`invalid ${instance.className} object: ${check.reason}`, { checkedBy: check.checkedBy });
  throw new ValidityError(instance.className, check.reason, check.checkedBy);
}

/**
 * Full re-check of an instance: every slot against its declared type,
 * then the validity predicate. Returns the instance unchanged.
 */
export function validObject(instance: Instance): Instance {
  const registry = requireRegistry(instance.registryId);
  const schema = effectiveSchemaOf(registry, instance.className);

  for (const [slot, type] of schema) {
    if (!instance.slots.has(slot)) {
      throw new TypeMismatchError(instance.className, slot, "missing");
    }
    const value = instance.slots.get(slot);
    if (!conformsTo(registry, type, value)) {
      throw new TypeMismatchError(instance.className, slot, "type", describeSlotType(type), classOf(value));
    }
  }

  enforceValidity(registry, instance);
  return instance;
}
