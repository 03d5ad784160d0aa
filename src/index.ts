// src/index.ts
// Public API for dispatchkit

export * from "./core/model";
export * from "./core/refclass";
export * from "./core/config";
export * from "./core/log/logger";
