// src/core/model/index.ts
// Formal classes, generics and dispatch

export * from "./types";
export * from "./errors";
export * from "./registry";
export * from "./setup";
export * from "./classes";
export * from "./slotTypes";
export * from "./instance";
export * from "./validity";
export * from "./generics";
export * from "./dispatch";
export * from "./builtins";
export * from "./accessors";
export * from "./introspect";
