import type { Mapping, OASISManagerSource } from "../types/vo.js";
import type { ManagersOut } from "../types/tree.js";
import { expandAttrList } from "./AttrListExpander.js";
import { readField } from "./NullPredicate.js";
import { entriesOf } from "../utils/mapping.js";

/**
 * { "Jane Doe": { ContactID: "c1", DNs: ["/DC=org/CN=Jane"] } }
 *   -> { Manager: [{ ContactID: "c1", Name: "Jane Doe", DNs: { DN: [...] } }] }
 *
 * ContactID is optional per manager.
 */
export function expandOasisManagers(
  managers: Mapping<OASISManagerSource>,
): ManagersOut {
  const reshaped = new Map<string, Record<string, unknown>>();
  for (const [name, data] of entriesOf(managers)) {
    const dns = readField(data, "DNs");
    reshaped.set(name, {
      ...data,
      DNs: dns.kind === "present" ? { DN: [...dns.value] } : null,
    });
  }

  return {
    Manager: expandAttrList(reshaped, "Name", ["ContactID", "Name", "DNs"], true),
  };
}
