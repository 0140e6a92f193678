export type {
  VORecord,
  ContactRef,
  ContactEntry,
  ContactsTable,
  FieldsOfScienceSource,
  FQANSource,
  OASISBlock,
  OASISManagerSource,
  ParentVOSource,
  ReportingGroupSource,
  ReportingGroupsCatalog,
  Mapping,
} from "./types/vo.js";
export type {
  AttrRecord,
  ContactOut,
  ContactTypesOut,
  ExpandedVO,
  FieldsOfScienceOut,
  ManagersOut,
  OASISOut,
  ParentVOOut,
  ReportingGroupsOut,
  VOField,
  VOSummaryTree,
} from "./types/tree.js";
export type { SummaryResult, SummaryMeta, SummaryError } from "./types/result.js";
export { VO_FIELD_ORDER } from "./types/tree.js";
export { isNull, readField, type FieldState } from "./core/NullPredicate.js";
export { expandAttrList } from "./core/AttrListExpander.js";
export { expandReportingGroups } from "./core/ReportingGroupResolver.js";
export { expandOasisManagers } from "./core/OasisManagerExpander.js";
export { expandFieldsOfScience } from "./core/FieldsOfScienceExpander.js";
export { expandContactTypes } from "./core/ContactTypeExpander.js";
export { VOAssembler } from "./core/VOAssembler.js";
export { VOData } from "./core/TreeBuilder.js";
export { SummaryFailure } from "./core/Errors.js";
export { loadVoDirectory } from "./core/SourceLoader.js";
export { SummaryBuilder } from "./core/SummaryBuilder.js";
export {
  REPORTING_GROUPS_FILE,
  VOSUMMARY_SCHEMA_URL,
  XSI_NAMESPACE,
} from "./core/schema.js";
export { toXml } from "./parsing/xml.js";

import type { VOSummaryTree } from "./types/tree.js";
import type { SummaryBuilderOptions } from "./core/SummaryBuilder.js";
import { SummaryBuilder as SummaryBuilderClass } from "./core/SummaryBuilder.js";
import { loadVoDirectory } from "./core/SourceLoader.js";
import { toXml } from "./parsing/xml.js";

export function createSummaryBuilder(opts: SummaryBuilderOptions) {
  return new SummaryBuilderClass(opts);
}

/** Load `indir` and build the tree. Throws SummaryFailure on any malformed input. */
export function getVos(
  indir = "virtual-organizations",
  contactsFile?: string,
  authorized = false,
): VOSummaryTree {
  return loadVoDirectory(indir, { contactsFile }).data.getTree(authorized);
}

export function getVosXml(
  indir = "virtual-organizations",
  contactsFile?: string,
  authorized = false,
): string {
  return toXml(getVos(indir, contactsFile, authorized));
}
