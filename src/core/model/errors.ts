// src/core/model/errors.ts
// Error taxonomy for the object model

import type { ClassName } from "./types";

export type ObjectModelErrorCode =
  | "UNKNOWN_REGISTRY"
  | "UNKNOWN_CLASS"
  | "UNKNOWN_GENERIC"
  | "SCHEMA_CONFLICT"
  | "INHERITANCE_CYCLE"
  | "CLASS_KIND"
  | "GENERIC_CONFLICT"
  | "SHADOWED_BUILTIN"
  | "SIGNATURE_MISMATCH"
  | "TYPE_MISMATCH"
  | "VALIDITY"
  | "NO_APPLICABLE_METHOD";

export class ObjectModelError extends Error {
  constructor(message: string, public readonly code: ObjectModelErrorCode) {
    super(message);
    this.name = "ObjectModelError";
  }
}

export class UnknownRegistryError extends ObjectModelError {
  constructor(public readonly registryId: string) {
    super(`UnknownRegistry: no registry with id '${registryId}'`, "UNKNOWN_REGISTRY");
    this.name = "UnknownRegistryError";
  }
}

export class UnknownClassError extends ObjectModelError {
  constructor(public readonly className: ClassName) {
    super(`UnknownClass: class '${className}' is not defined`, "UNKNOWN_CLASS");
    this.name = "UnknownClassError";
  }
}

export class UnknownGenericError extends ObjectModelError {
  constructor(public readonly generic: string) {
    super(`UnknownGeneric: generic '${generic}' is not defined`, "UNKNOWN_GENERIC");
    this.name = "UnknownGenericError";
  }
}

export class SchemaConflictError extends ObjectModelError {
  constructor(
    public readonly className: ClassName,
    public readonly detail: string,
    public readonly slot?: string,
    public readonly inheritedFrom?: ClassName
  ) {
    super(`SchemaConflict: class '${className}': ${detail}`, "SCHEMA_CONFLICT");
    this.name = "SchemaConflictError";
  }
}

export class InheritanceCycleError extends ObjectModelError {
  constructor(
    public readonly className: ClassName,
    public readonly chain: ClassName[]
  ) {
    super(`InheritanceCycle: '${className}' would inherit from itself via ${chain.join(" -> ")}`, "INHERITANCE_CYCLE");
    this.name = "InheritanceCycleError";
  }
}

export class ClassKindError extends ObjectModelError {
  constructor(
    public readonly className: ClassName,
    public readonly reason: string
  ) {
    super(`ClassKind: class '${className}' ${reason}`, "CLASS_KIND");
    this.name = "ClassKindError";
  }
}

export class GenericConflictError extends ObjectModelError {
  constructor(
    public readonly generic: string,
    public readonly existingParams: string[],
    public readonly requestedParams: string[],
    public readonly existingOrigin: string,
    public readonly requestedOrigin: string
  ) {
    super(
      `GenericConflict: '${generic}(${existingParams.join(", ")})' from '${existingOrigin}' ` +
        `cannot be redefined as '${generic}(${requestedParams.join(", ")})' from '${requestedOrigin}'`,
      "GENERIC_CONFLICT"
    );
    this.name = "GenericConflictError";
  }
}

/**
 * Recorded (never thrown) when a generic of another origin is replaced by
 * one with an incompatible shape. Its methods are gone afterwards.
 */
export class ShadowedBuiltinWarning extends ObjectModelError {
  constructor(
    public readonly generic: string,
    public readonly shadowedParams: string[],
    public readonly shadowedOrigin: string,
    public readonly origin: string
  ) {
    super(
      `ShadowedBuiltin: '${generic}' from '${origin}' replaces '${generic}(${shadowedParams.join(", ")})' from '${shadowedOrigin}'`,
      "SHADOWED_BUILTIN"
    );
    this.name = "ShadowedBuiltinWarning";
  }
}

export class SignatureMismatchError extends ObjectModelError {
  constructor(
    public readonly generic: string,
    detail: string
  ) {
    super(`SignatureMismatch: generic '${generic}': ${detail}`, "SIGNATURE_MISMATCH");
    this.name = "SignatureMismatchError";
  }
}

export type TypeMismatchKind = "missing" | "type" | "unknown-slot";

export class TypeMismatchError extends ObjectModelError {
  constructor(
    public readonly className: ClassName,
    public readonly slot: string,
    public readonly kind: TypeMismatchKind,
    public readonly expected?: string,
    public readonly actual?: string
  ) {
    super(`TypeMismatch: ${describeMismatch(className, slot, kind, expected, actual)}`, "TYPE_MISMATCH");
    this.name = "TypeMismatchError";
  }
}

function describeMismatch(
  className: ClassName,
  slot: string,
  kind: TypeMismatchKind,
  expected?: string,
  actual?: string
): string {
  switch (kind) {
    case "missing":
      return `slot '${slot}' of class '${className}' was not supplied`;
    case "unknown-slot":
      return `class '${className}' has no slot '${slot}'`;
    case "type":
      return `slot '${slot}' of class '${className}' expects ${expected ?? "?"}, got ${actual ?? "?"}`;
  }
}

export class ValidityError extends ObjectModelError {
  constructor(
    public readonly className: ClassName,
    public readonly reason: string,
    public readonly checkedBy: ClassName
  ) {
    super(`Validity: invalid '${className}' object: ${reason}`, "VALIDITY");
    this.name = "ValidityError";
  }
}

export class NoApplicableMethodError extends ObjectModelError {
  constructor(
    public readonly generic: string,
    public readonly receiverClass: ClassName,
    public readonly chain: ClassName[]
  ) {
    super(
      `NoApplicableMethod: no method of '${generic}' for class '${receiverClass}' (searched ${chain.join(", ")})`,
      "NO_APPLICABLE_METHOD"
    );
    this.name = "NoApplicableMethodError";
  }
}
