// src/core/model/types.ts
// Object model types: classes, slots, instances, generics and the registry state

import type { ModelConfig } from "../config/config";
import type { Logger } from "../log/logger";
import type { RefObject } from "../refclass/refobject";
import type { ShadowedBuiltinWarning } from "./errors";

// ─────────────────────────────────────────────────────────────────
// Class Names
// ─────────────────────────────────────────────────────────────────

export type ClassName = string;

/** Wildcard class: a method registered here applies to every receiver. */
export const ANY_CLASS: ClassName = "ANY";

/**
 * Classes of plain values. They take part in dispatch but cannot be
 * defined, extended or constructed.
 */
export const BASIC_CLASSES = ["text", "numeric", "logical", "list", "null", "function"] as const;

export type BasicClassName = (typeof BASIC_CLASSES)[number];

export function isBasicClass(name: string): name is BasicClassName {
  return BASIC_CLASSES.some(b => b === name);
}

// ─────────────────────────────────────────────────────────────────
// Slot Types
// ─────────────────────────────────────────────────────────────────

export type TextType = { tag: "Text" };
export type NumericType = { tag: "Numeric" };
export type LogicalType = { tag: "Logical" };
export type AnyType = { tag: "Any" };
export type SeqOfType = { tag: "SeqOf"; item: SlotType };
export type ClassRefType = { tag: "ClassRef"; className: ClassName };

/**
 * SlotType: the declared semantic type of a slot or field.
 */
export type SlotType =
  | TextType | NumericType | LogicalType | AnyType
  | SeqOfType
  | ClassRefType;

/** Ordered slot declarations, as supplied by the caller. */
export type SlotSchema = Readonly<Record<string, SlotType>>;

export type SlotValue =
  | string
  | number
  | boolean
  | null
  | Instance
  | RefObject
  | readonly SlotValue[];

// ─────────────────────────────────────────────────────────────────
// Class Definitions
// ─────────────────────────────────────────────────────────────────

/**
 * Returns `true` when the instance is valid, or a reason when it is not.
 */
export type ValidityPredicate = (instance: Instance) => true | string;

export type RefMethod = (self: RefObject, ...args: unknown[]) => unknown;

type ClassDefinitionBase = {
  name: ClassName;
  /** Own slots, in declaration order */
  slots: ReadonlyMap<string, SlotType>;
  parent?: ClassName;
  description?: string;
  createdAt: number;
};

export type FormalClassDefinition = ClassDefinitionBase & {
  kind: "formal";
  validity?: ValidityPredicate;
  /** Virtual classes can be extended and dispatched on but not constructed */
  virtual: boolean;
};

export type RefClassDefinition = ClassDefinitionBase & {
  kind: "reference";
  methods: ReadonlyMap<string, RefMethod>;
};

export type ClassDefinition = FormalClassDefinition | RefClassDefinition;

export type ClassKind = ClassDefinition["kind"];

// ─────────────────────────────────────────────────────────────────
// Instances
// ─────────────────────────────────────────────────────────────────

/**
 * Instance: an immutable slot mapping tagged with its class.
 * Only `construct` produces one; updates return a new instance.
 */
export type Instance = {
  readonly tag: "Instance";
  readonly registryId: string;
  readonly className: ClassName;
  readonly slots: ReadonlyMap<string, SlotValue>;
};

// ─────────────────────────────────────────────────────────────────
// Generics and Methods
// ─────────────────────────────────────────────────────────────────

/**
 * The receiver is the first formal parameter; extra arguments follow.
 */
export type MethodImpl = (receiver: unknown, ...args: unknown[]) => unknown;

export type FormalShape = {
  /** Parameter names, receiver first, without the variadic marker */
  params: string[];
  variadic: boolean;
};

export const VARIADIC_MARKER = "...";

export type GenericDef = {
  name: string;
  shape: FormalShape;
  /** Who defined it: "builtin", "user", or a package name */
  origin: string;
  description?: string;
  createdAt: number;
};

export type MethodEntry = {
  generic: string;
  className: ClassName;
  impl: MethodImpl;
  createdAt: number;
};

/**
 * MethodTable: generic name -> class name -> method.
 */
export type MethodTable = Map<string, Map<ClassName, MethodEntry>>;

export type GenericDefineResult =
  | { tag: "created"; generic: GenericDef }
  | { tag: "unchanged"; generic: GenericDef }
  | { tag: "replaced"; generic: GenericDef; droppedMethods: number }
  | { tag: "shadowed"; generic: GenericDef; droppedMethods: number; warning: ShadowedBuiltinWarning };

export type Resolution =
  | { tag: "found"; method: MethodEntry; via: "exact" | "inherited" | "fallback"; chain: ClassName[] }
  | { tag: "miss"; generic: string; receiverClass: ClassName; chain: ClassName[] };

// ─────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────

export type ModelEvent =
  | { tag: "define-class"; className: ClassName; kind: ClassKind; replaced: boolean; timestamp: number }
  | { tag: "define-generic"; generic: string; outcome: GenericDefineResult["tag"]; timestamp: number }
  | { tag: "define-method"; generic: string; className: ClassName; replaced: boolean; timestamp: number }
  | { tag: "dispatch"; generic: string; receiverClass: ClassName; selected: ClassName; via: "exact" | "inherited" | "fallback"; timestamp: number }
  | { tag: "miss"; generic: string; receiverClass: ClassName; timestamp: number }
  | { tag: "construct"; className: ClassName; timestamp: number }
  | { tag: "validity-failure"; className: ClassName; checkedBy: ClassName; reason: string; timestamp: number };

// ─────────────────────────────────────────────────────────────────
// Registry State
// ─────────────────────────────────────────────────────────────────

export type RegistryStats = {
  dispatches: number;
  exactHits: number;
  inheritedHits: number;
  fallbackHits: number;
  misses: number;
  constructed: number;
  validityFailures: number;
};

export type RegistryState = {
  id: string;
  name?: string;
  config: ModelConfig;
  logger: Logger;
  classes: Map<ClassName, ClassDefinition>;
  generics: Map<string, GenericDef>;
  methods: MethodTable;
  events: ModelEvent[];
  warnings: ShadowedBuiltinWarning[];
  stats: RegistryStats;
  createdAt: number;
};

/**
 * RegistryHandle: what callers hold on to.
 */
export type RegistryHandle = {
  tag: "Registry";
  id: string;
  name?: string;
};
