// src/core/refclass/index.ts
// Reference classes (mutable, shared objects)

export * from "./refobject";
export * from "./refclass";
