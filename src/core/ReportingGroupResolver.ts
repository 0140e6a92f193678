import type { ReportingGroupsCatalog } from "../types/vo.js";
import type { ReportingGroupsOut } from "../types/tree.js";
import { expandAttrList } from "./AttrListExpander.js";
import { readField } from "./NullPredicate.js";
import { entriesOf } from "../utils/mapping.js";

const REPORTING_GROUP_ORDER = ["Name", "FQANs", "Contacts"] as const;

/**
 * Expand a VO's reporting-group names against the global catalog:
 *
 *   ["GroupA"]  ->  { ReportingGroup: [{ Name: "GroupA",
 *                                        FQANs: { FQAN: [{ GroupName, Role }] },
 *                                        Contacts: { Contact: [{ Name }] } }] }
 *
 * Resolution walks the catalog, so output follows catalog order and a name
 * with no catalog entry is dropped without error.
 */
export function expandReportingGroups(
  names: ReadonlyArray<string>,
  catalog: ReportingGroupsCatalog,
): ReportingGroupsOut {
  const wanted = new Set(names);
  const groups = new Map<string, Record<string, unknown>>();

  for (const [name, group] of entriesOf(catalog)) {
    if (!wanted.has(name)) continue;

    const fqans = readField(group, "FQANs");
    const contacts = readField(group, "Contacts");
    groups.set(name, {
      FQANs:
        fqans.kind === "present"
          ? {
              FQAN: fqans.value.map((f) => ({
                GroupName: f.GroupName,
                Role: f.Role,
              })),
            }
          : null,
      Contacts:
        contacts.kind === "present"
          ? { Contact: contacts.value.map((n) => ({ Name: n })) }
          : null,
    });
  }

  return {
    ReportingGroup: expandAttrList(groups, "Name", REPORTING_GROUP_ORDER),
  };
}
