// src/core/model/setup.ts
// Registry creation with built-ins

import { installBuiltins } from "./builtins";
import { type RegistryOptions, allocateRegistry, requireRegistry } from "./registry";
import type { RegistryHandle } from "./types";

/**
 * Create a new object model registry. Built-in generics are installed
 * unless `config.dispatch.installBuiltins` is false.
 */
export function createRegistry(options: RegistryOptions = {}): RegistryHandle {
  const handle = allocateRegistry(options);
  const registry = requireRegistry(handle.id);
  if (registry.config.dispatch.installBuiltins) {
    installBuiltins(handle.id);
  }
  registry.logger.debug(`registry ${handle.id} ready`, { name: handle.name, builtins: registry.config.dispatch.installBuiltins });
  return handle;
}
