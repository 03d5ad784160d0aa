// src/demo/sequences.ts
// Biological sequences: a formal class pair with accessors, a validity rule,
// a shadowed built-in and a reference-class collection

import {
  type Instance,
  type ShadowedBuiltinWarning,
  ANY_CLASS,
  SlotTypes,
  asInstance,
  callNextMethod,
  construct,
  defineAccessor,
  defineClass,
  defineGeneric,
  defineMethod,
  getBuiltin,
  getWarnings,
  isSlotArray,
  setAttribute,
  slotText,
  slotTextSeq,
  validObject,
} from "../core/model";
import { type RefClassGenerator, defineRefClass } from "../core/refclass";

/**
 * Characters of `sequence` missing from `alphabet`, in order of first use.
 */
export function foreignSymbols(alphabet: readonly string[], sequence: string): string[] {
  const allowed = new Set(alphabet);
  const foreign: string[] = [];
  for (const ch of sequence) {
    if (!allowed.has(ch) && !foreign.includes(ch)) foreign.push(ch);
  }
  return foreign;
}

export function gcFraction(sequence: string): number {
  if (sequence.length === 0) return 0;
  let gc = 0;
  for (const ch of sequence) {
    if (ch === "G" || ch === "C") gc++;
  }
  return gc / sequence.length;
}

export type SequenceModel = {
  /** Raised when the `sequence` accessor replaced the built-in of the same name */
  warnings: ShadowedBuiltinWarning[];
  library: RefClassGenerator;
};

export function installSequenceModel(registryId: string): SequenceModel {
  defineClass(
    registryId,
    "Seq",
    { alphabet: SlotTypes.seqOf(SlotTypes.text), sequence: SlotTypes.text },
    {
      description: "A sequence over a fixed alphabet",
      validity: seq => {
        const foreign = foreignSymbols(slotTextSeq(seq, "alphabet"), slotText(seq, "sequence"));
        return foreign.length === 0 || `sequence contains symbols outside the alphabet: ${foreign.join(", ")}`;
      },
    }
  );

  defineClass(
    registryId,
    "DNASeq",
    { adapter: SlotTypes.text, organism: SlotTypes.text },
    { parent: "Seq", description: "A DNA read with its adapter" }
  );

  // length(x) already exists as a built-in with the same shape
  defineGeneric(registryId, "length", ["x"]);
  defineMethod(registryId, "length", "Seq", x => slotText(x, "sequence").length);

  defineGeneric(registryId, "show", ["object"]);
  defineMethod(registryId, "show", "Seq", object => {
    const seq = asInstance(object, "Seq");
    return `${seq.className} of length ${slotText(seq, "sequence").length}\n${slotText(seq, "sequence")}`;
  });
  defineMethod(registryId, "show", "DNASeq", object => {
    const inherited = callNextMethod(registryId, "show", "DNASeq", object);
    return `${String(inherited)}\nadapter: ${slotText(object, "adapter")}`;
  });

  defineGeneric(registryId, "rev", ["object"]);
  defineMethod(registryId, "rev", "Seq", object => {
    const seq = asInstance(object, "Seq");
    const reversed = Array.from(slotText(seq, "sequence")).reverse().join("");
    return validObject(setAttribute(seq, "sequence", reversed));
  });

  defineGeneric(registryId, "gcContent", ["object"]);
  defineMethod(registryId, "gcContent", "DNASeq", object => gcFraction(slotText(object, "sequence")));

  // The accessor replaces the built-in sequence(nvec, ...); route every
  // other receiver back to the built-in.
  const before = getWarnings(registryId).length;
  defineAccessor(registryId, { className: "Seq", slot: "sequence", setter: "setSequence" });
  const shadowed = getWarnings(registryId).slice(before);
  defineMethod(registryId, "sequence", ANY_CLASS, (x, ...rest) => getBuiltin("sequence")(x, ...rest));

  defineAccessor(registryId, { className: "Seq", slot: "alphabet" });

  const library = defineRefClass(registryId, "SeqLibrary", {
    fields: { name: SlotTypes.text, items: SlotTypes.seqOf(SlotTypes.classRef("Seq")) },
    description: "A named, shared collection of sequences",
    methods: {
      add: (self, seq) => {
        const items = self.get("items");
        return self.set("items", [...(isSlotArray(items) ? items : []), asInstance(seq, "Seq")]);
      },
      size: self => {
        const items = self.get("items");
        return isSlotArray(items) ? items.length : 0;
      },
    },
  });

  return {
    warnings: shadowed,
    library,
  };
}

export function makeSeq(registryId: string, alphabet: string[], sequence: string): Instance {
  return construct(registryId, "Seq", { alphabet, sequence });
}

export function makeDNASeq(
  registryId: string,
  values: { sequence: string; adapter: string; organism: string; alphabet?: string[] }
): Instance {
  return construct(registryId, "DNASeq", {
    alphabet: values.alphabet ?? ["A", "C", "G", "T"],
    sequence: values.sequence,
    adapter: values.adapter,
    organism: values.organism,
  });
}
