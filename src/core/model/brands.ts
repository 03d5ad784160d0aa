// src/core/model/brands.ts
// Private brands: only objects made by construct / RefClassGenerator.new pass these guards

import type { Instance } from "./types";
import type { RefObject } from "../refclass/refobject";

const instances = new WeakSet<object>();
const refObjects = new WeakSet<object>();

export function brandInstance(instance: Instance): Instance {
  instances.add(instance);
  return instance;
}

export function brandRefObject(obj: RefObject): RefObject {
  refObjects.add(obj);
  return obj;
}

export function isInstance(value: unknown): value is Instance {
  return typeof value === "object" && value !== null && instances.has(value);
}

export function isRefObject(value: unknown): value is RefObject {
  return typeof value === "object" && value !== null && refObjects.has(value);
}
