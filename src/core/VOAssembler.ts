import type {
  ContactsTable,
  OASISBlock,
  ParentVOSource,
  ReportingGroupsCatalog,
  VORecord,
} from "../types/vo.js";
import { VO_FIELD_ORDER, type ExpandedVO, type OASISOut, type ParentVOOut } from "../types/tree.js";
import { expandContactTypes } from "./ContactTypeExpander.js";
import { expandFieldsOfScience } from "./FieldsOfScienceExpander.js";
import { expandOasisManagers } from "./OasisManagerExpander.js";
import { expandReportingGroups } from "./ReportingGroupResolver.js";
import { readField } from "./NullPredicate.js";

/** Always carried by an assembled VO, as null when the source lacks them. */
const URL_FIELDS = [
  "MembershipServicesURL",
  "PrimaryURL",
  "PurposeURL",
  "SupportURL",
] as const;

export interface VOAssemblerOptions {
  contactsTable?: ContactsTable | null;
  reportingGroups: ReportingGroupsCatalog;
}

export class VOAssembler {
  private readonly contactsTable: ContactsTable;
  private readonly reportingGroups: ReportingGroupsCatalog;

  constructor(opts: VOAssemblerOptions) {
    this.contactsTable = opts.contactsTable ?? {};
    this.reportingGroups = opts.reportingGroups;
  }

  /** Build the schema-ordered record for one VO. `vo` itself is left untouched. */
  expandVo(authorized: boolean, vo: VORecord): ExpandedVO {
    const working: Record<string, unknown> = { ...vo };

    const contacts = readField(vo, "Contacts");
    working.ContactTypes =
      contacts.kind === "present"
        ? expandContactTypes(contacts.value, authorized, this.contactsTable)
        : null;
    delete working.Contacts;

    const groups = readField(vo, "ReportingGroups");
    working.ReportingGroups =
      groups.kind === "present"
        ? expandReportingGroups(groups.value, this.reportingGroups)
        : null;

    const oasis = readField(vo, "OASIS");
    working.OASIS = oasis.kind === "present" ? expandOasis(oasis.value) : null;

    const fos = readField(vo, "FieldsOfScience");
    working.FieldsOfScience =
      fos.kind === "present" ? expandFieldsOfScience(fos.value) : null;

    const parent = readField(vo, "ParentVO");
    working.ParentVO = parent.kind === "present" ? expandParentVo(parent.value) : null;

    for (const key of URL_FIELDS) {
      if (!Object.hasOwn(working, key)) working[key] = null;
    }

    const expanded: ExpandedVO = {};
    for (const field of VO_FIELD_ORDER) {
      if (Object.hasOwn(working, field)) expanded[field] = working[field];
    }
    return expanded;
  }
}

function expandOasis(block: OASISBlock): OASISOut {
  const managers = readField(block, "Managers");
  const urls = readField(block, "OASISRepoURLs");
  return {
    UseOASIS: block.UseOASIS ?? false,
    Managers: managers.kind === "present" ? expandOasisManagers(managers.value) : null,
    OASISRepoURLs: urls.kind === "present" ? { URL: [...urls.value] } : null,
  };
}

function expandParentVo(parent: ParentVOSource): ParentVOOut {
  const out: ParentVOOut = {};
  if (Object.hasOwn(parent, "ID")) out.ID = parent.ID;
  if (Object.hasOwn(parent, "Name")) out.Name = parent.Name;
  return out;
}
