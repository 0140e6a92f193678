import type { AttrRecord } from "../types/tree.js";
import type { Mapping } from "../types/vo.js";
import { entriesOf } from "../utils/mapping.js";
import { fail } from "./Errors.js";

/**
 * Turn a name-keyed mapping into a list of records, each carrying its own
 * name under `nameField`:
 *
 *   { a: { x: 1 }, b: { x: 2 } }  ->  [{ Name: "a", x: 1 }, { Name: "b", x: 2 }]
 *
 * Each record is laid out in exactly the field order of `ordering` (the
 * slot named `nameField` takes the name; if `ordering` does not name it, the
 * name goes first). A field of `ordering` missing from a record throws
 * CATALOG_ENTRY_INCOMPLETE unless `ignoreMissing` is set, in which case the
 * field is left out.
 *
 * List order is the mapping's iteration order; nothing is sorted.
 */
export function expandAttrList(
  records: Mapping<Readonly<AttrRecord>>,
  nameField: string,
  ordering: ReadonlyArray<string>,
  ignoreMissing = false,
): AttrRecord[] {
  return entriesOf(records).map(([name, record]) =>
    layOut(name, record, nameField, ordering, ignoreMissing),
  );
}

function layOut(
  name: string,
  record: Readonly<AttrRecord>,
  nameField: string,
  ordering: ReadonlyArray<string>,
  ignoreMissing: boolean,
): AttrRecord {
  const entry: AttrRecord = {};
  if (!ordering.includes(nameField)) entry[nameField] = name;

  for (const field of ordering) {
    if (field === nameField) {
      entry[field] = name;
    } else if (Object.hasOwn(record, field)) {
      entry[field] = record[field];
    } else if (!ignoreMissing) {
      fail(
        "CATALOG_ENTRY_INCOMPLETE",
        `Entry "${name}" is missing required field "${field}"`,
        { name, record },
        field,
      );
    }
  }
  return entry;
}
