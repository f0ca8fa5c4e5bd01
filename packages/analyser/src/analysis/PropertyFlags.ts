/**
 * Decision table for the required / readOnly / default / computed flags of
 * a property. Every combination maps to either the computed outcome or the
 * rule it breaks.
 */

export type PropertyFlagInput = {
  required: boolean;
  readOnly: boolean;
  hasDefault: boolean;
  /** `x-terraform-computed`: value unknown until apply */
  computedExtension: boolean;
};

export type PropertyConflict =
  | "requiredReadOnly"
  | "computedReadOnly"
  | "computedWithDefault";

export type PropertyFlagOutcome =
  | { type: "ok"; computed: boolean; keepDefault: boolean }
  | { type: "conflict"; conflict: PropertyConflict };

export function decidePropertyFlags(
  input: PropertyFlagInput
): PropertyFlagOutcome {
  const { required, readOnly, hasDefault, computedExtension } = input;

  if (required && readOnly) {
    return { type: "conflict", conflict: "requiredReadOnly" };
  }
  if (computedExtension && readOnly) {
    return { type: "conflict", conflict: "computedReadOnly" };
  }
  if (computedExtension && hasDefault) {
    return { type: "conflict", conflict: "computedWithDefault" };
  }
  // required properties are never optional-computed
  if (required) {
    return { type: "ok", computed: false, keepDefault: true };
  }
  if (computedExtension) {
    return { type: "ok", computed: true, keepDefault: false };
  }
  if (hasDefault) {
    return { type: "ok", computed: true, keepDefault: true };
  }
  return { type: "ok", computed: readOnly, keepDefault: true };
}

export function formatPropertyConflict(
  conflict: PropertyConflict,
  property: string
): string {
  switch (conflict) {
    case "requiredReadOnly":
      return `failed to process property '${property}': a required property cannot be readOnly too`;
    case "computedReadOnly":
      return `optional computed property validation failed for property '${property}': optional computed properties marked with 'x-terraform-computed' can not be readOnly`;
    case "computedWithDefault":
      return `optional computed property validation failed for property '${property}': optional computed properties with default attributes should not have 'x-terraform-computed' extension too`;
  }
}
