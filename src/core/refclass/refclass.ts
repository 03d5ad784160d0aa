// src/core/refclass/refclass.ts
// Reference class definitions and their generators

import { brandRefObject } from "../model/brands";
import { checkClassDefinition, collectSlots, requireClass, storeClass } from "../model/classes";
import { ClassKindError } from "../model/errors";
import { showClass } from "../model/introspect";
import { requireRegistry } from "../model/registry";
import { describeSlotType } from "../model/slotTypes";
import type { ClassName, RefClassDefinition, RefMethod, SlotSchema } from "../model/types";
import { RefObject } from "./refobject";

export type RefClassSpec = {
  fields: SlotSchema;
  methods?: Readonly<Record<string, RefMethod>>;
  /** Parent reference class */
  contains?: ClassName;
  description?: string;
};

/**
 * Creates objects of one reference class.
 */
export class RefClassGenerator {
  constructor(
    public readonly registryId: string,
    public readonly className: ClassName
  ) {}

  /**
   * Fields start empty; then `initialize` runs if the class chain has one,
   * otherwise the supplied values are assigned with initFields.
   */
  new(init: Readonly<Record<string, unknown>> = {}): RefObject {
    const obj = brandRefObject(new RefObject(this.registryId, this.className));
    if (obj.hasMethod("initialize")) {
      obj.call("initialize", init);
    } else {
      obj.initFields(init);
    }
    return obj;
  }

  /** Field name -> declared type, inherited fields first */
  fields(): Record<string, string> {
    const registry = requireRegistry(this.registryId);
    return Object.fromEntries(
      collectSlots(registry, this.className).map(s => [s.name, describeSlotType(s.type)])
    );
  }

  methods(): string[] {
    return new RefObject(this.registryId, this.className).methodNames();
  }

  show(): string {
    return showClass(this.registryId, this.className);
  }
}

/**
 * Register a reference class, replacing any previous definition wholesale.
 */
export function defineRefClass(registryId: string, name: ClassName, spec: RefClassSpec): RefClassGenerator {
  const registry = requireRegistry(registryId);
  const own = checkClassDefinition(registry, name, spec.fields, "reference", spec.contains);

  const def: RefClassDefinition = {
    kind: "reference",
    name,
    slots: own,
    parent: spec.contains,
    methods: new Map(Object.entries(spec.methods ?? {})),
    description: spec.description,
    createdAt: Date.now(),
  };
  storeClass(registry, def);
  return new RefClassGenerator(registryId, name);
}

/**
 * Generator for an already defined reference class.
 */
export function getRefClass(registryId: string, name: ClassName): RefClassGenerator {
  const def = requireClass(requireRegistry(registryId), name);
  if (def.kind !== "reference") {
    throw new ClassKindError(name, "is a formal class; use construct");
  }
  return new RefClassGenerator(registryId, name);
}
