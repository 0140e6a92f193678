import type { FieldsOfScienceSource } from "../types/vo.js";
import type { FieldsOfScienceOut } from "../types/tree.js";
import { readField } from "./NullPredicate.js";

/**
 * { PrimaryFields: ["P1"], SecondaryFields: ["S1"] }
 *   -> { PrimaryFields: { Field: ["P1"] }, SecondaryFields: { Field: ["S1"] } }
 *
 * No primary fields means no block at all (null). Missing secondary fields
 * drop the key instead of nulling it: the schema has SecondaryFields as an
 * optional element.
 */
export function expandFieldsOfScience(
  fos: FieldsOfScienceSource,
): FieldsOfScienceOut | null {
  const primary = readField(fos, "PrimaryFields");
  if (primary.kind !== "present") return null;

  const out: FieldsOfScienceOut = { PrimaryFields: { Field: [...primary.value] } };
  const secondary = readField(fos, "SecondaryFields");
  if (secondary.kind === "present") {
    out.SecondaryFields = { Field: [...secondary.value] };
  }
  return out;
}
