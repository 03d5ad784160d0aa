// src/core/model/registry.ts
// Registry store, statistics and event ledger

import { type ConfigOverrides, loadConfig } from "../config/config";
import { type LogSink, createLogger } from "../log/logger";
import { UnknownRegistryError } from "./errors";
import type {
  ModelEvent,
  RegistryHandle,
  RegistryState,
  RegistryStats,
} from "./types";
import type { ShadowedBuiltinWarning } from "./errors";

// ─────────────────────────────────────────────────────────────────
// Registry Store
// ─────────────────────────────────────────────────────────────────

const registryStore = new Map<string, RegistryState>();
let nextRegistryId = 0;

function genRegistryId(): string {
  return `registry-${nextRegistryId++}`;
}

/**
 * Reset the registry store (for testing).
 */
export function resetRegistryStore(): void {
  registryStore.clear();
  nextRegistryId = 0;
}

export type RegistryOptions = {
  name?: string;
  config?: ConfigOverrides;
  sink?: LogSink;
};

/**
 * Allocate an empty registry. `createRegistry` also installs the built-ins.
 * `config` overrides the environment and `dispatchkit.config.json`.
 */
export function allocateRegistry(options: RegistryOptions = {}): RegistryHandle {
  const id = genRegistryId();
  const config = loadConfig({ overrides: options.config });
  const state: RegistryState = {
    id,
    name: options.name,
    config,
    logger: createLogger(config.log.level, options.sink),
    classes: new Map(),
    generics: new Map(),
    methods: new Map(),
    events: [],
    warnings: [],
    stats: {
      dispatches: 0,
      exactHits: 0,
      inheritedHits: 0,
      fallbackHits: 0,
      misses: 0,
      constructed: 0,
      validityFailures: 0,
    },
    createdAt: Date.now(),
  };
  registryStore.set(id, state);
  return { tag: "Registry", id, name: options.name };
}

export function getRegistry(id: string): RegistryState | undefined {
  return registryStore.get(id);
}

export function requireRegistry(id: string): RegistryState {
  const registry = registryStore.get(id);
  if (!registry) {
    throw new UnknownRegistryError(id);
  }
  return registry;
}

// ─────────────────────────────────────────────────────────────────
// Registry Statistics
// ─────────────────────────────────────────────────────────────────

export function getRegistryStats(registryId: string): RegistryStats | undefined {
  const registry = registryStore.get(registryId);
  if (!registry) return undefined;
  return { ...registry.stats };
}

/**
 * Get a summary of the registry.
 */
export function getRegistrySummary(registryId: string): {
  id: string;
  name?: string;
  classCount: number;
  genericCount: number;
  methodCount: number;
  stats: RegistryStats;
} | undefined {
  const registry = registryStore.get(registryId);
  if (!registry) return undefined;

  let methodCount = 0;
  for (const byClass of registry.methods.values()) {
    methodCount += byClass.size;
  }

  return {
    id: registry.id,
    name: registry.name,
    classCount: registry.classes.size,
    genericCount: registry.generics.size,
    methodCount,
    stats: { ...registry.stats },
  };
}

// ─────────────────────────────────────────────────────────────────
// Event Ledger
// ─────────────────────────────────────────────────────────────────

export function logModelEvent(registry: RegistryState, event: ModelEvent): void {
  registry.events.push(event);
  const overflow = registry.events.length - registry.config.log.eventLogLimit;
  if (overflow > 0) {
    registry.events.splice(0, overflow);
  }
}

export function getRecentEvents(registryId: string, limit: number = 100): ModelEvent[] {
  return requireRegistry(registryId).events.slice(-limit);
}

export function countEvents(registryId: string, tag: ModelEvent["tag"]): number {
  return requireRegistry(registryId).events.filter(e => e.tag === tag).length;
}

export function clearEventLog(registryId: string): void {
  requireRegistry(registryId).events.length = 0;
}

// ─────────────────────────────────────────────────────────────────
// Warnings
// ─────────────────────────────────────────────────────────────────

export function recordWarning(registry: RegistryState, warning: ShadowedBuiltinWarning): void {
  registry.warnings.push(warning);
  registry.logger.warn(warning.message, { generic: warning.generic, origin: warning.origin });
}

export function getWarnings(registryId: string): ShadowedBuiltinWarning[] {
  return [...requireRegistry(registryId).warnings];
}
