// src/core/model/builtins.ts
// Built-in generics installed into new registries, and their original behaviour

import { isInstance, isRefObject } from "./brands";
import { NoApplicableMethodError } from "./errors";
import { defineGeneric, defineMethod } from "./generics";
import { classOf } from "./slotTypes";
import { type ClassName, type MethodImpl, ANY_CLASS } from "./types";

export const BUILTIN_ORIGIN = "builtin";

// ─────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────

export function formatValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value === null || value === undefined) return "null";
  if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
  if (isInstance(value)) return `<${value.className}>`;
  if (isRefObject(value)) return `<ref ${value.className}>`;
  return `<${classOf(value)}>`;
}

export function showObject(value: unknown): string {
  if (!isInstance(value)) return formatValue(value);
  const lines = [`An object of class "${value.className}"`];
  for (const [slot, v] of value.slots) {
    lines.push(`Slot "${slot}": ${formatValue(v)}`);
  }
  return lines.join("\n");
}

// ─────────────────────────────────────────────────────────────────
// Default Implementations
// ─────────────────────────────────────────────────────────────────

function countTo(n: unknown): number[] {
  if (typeof n !== "number" || !Number.isInteger(n) || n < 0) {
    throw new RangeError(`sequence: counts must be non-negative integers, got ${formatValue(n)}`);
  }
  return Array.from({ length: n }, (_, i) => i + 1);
}

type BuiltinGeneric = {
  params: string[];
  description: string;
  methods: Partial<Record<ClassName, MethodImpl>>;
};

const BUILTINS: Record<string, BuiltinGeneric> = {
  show: {
    params: ["object"],
    description: "Render a value as text",
    methods: {
      [ANY_CLASS]: object => showObject(object),
    },
  },
  length: {
    params: ["x"],
    description: "Number of elements",
    methods: {
      list: x => (Array.isArray(x) ? x.length : 0),
      text: x => (typeof x === "string" ? x.length : 0),
    },
  },
  sequence: {
    params: ["nvec", "..."],
    description: "Concatenated 1..n runs for each count",
    methods: {
      numeric: nvec => countTo(nvec),
      list: nvec => (Array.isArray(nvec) ? nvec.flatMap(countTo) : []),
    },
  },
};

export function builtinNames(): string[] {
  return Object.keys(BUILTINS);
}

/**
 * The original behaviour of a built-in generic, independent of any
 * registry. Use it to restore a shadowed built-in as an ANY method.
 */
export function getBuiltin(name: string): MethodImpl {
  const builtin = BUILTINS[name];
  if (!builtin) {
    throw new NoApplicableMethodError(name, ANY_CLASS, []);
  }
  return (receiver, ...args) => {
    const receiverClass = classOf(receiver);
    const impl = builtin.methods[receiverClass] ?? builtin.methods[ANY_CLASS];
    if (!impl) {
      throw new NoApplicableMethodError(name, receiverClass, [receiverClass, ANY_CLASS]);
    }
    return impl(receiver, ...args);
  };
}

export function installBuiltins(registryId: string): void {
  for (const [name, builtin] of Object.entries(BUILTINS)) {
    defineGeneric(registryId, name, builtin.params, { origin: BUILTIN_ORIGIN, description: builtin.description });
    for (const [className, impl] of Object.entries(builtin.methods)) {
      if (impl) defineMethod(registryId, name, className, impl);
    }
  }
}
