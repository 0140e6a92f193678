/**
 * Output shapes. Key order in these objects is XML element order, so every
 * producer builds them in the order declared here.
 */

export interface ContactOut {
  Name: string;
  Email?: string;
  Phone?: string;
  SMSAddress?: string;
}

export interface ContactTypeOut {
  Type: string;
  Contacts: { Contact: ContactOut[] };
}

export interface ContactTypesOut {
  ContactType: ContactTypeOut[];
}

/** A record laid out by expandAttrList. */
export type AttrRecord = Record<string, unknown>;

/** Entries are laid out as Name, FQANs, Contacts. */
export interface ReportingGroupsOut {
  ReportingGroup: AttrRecord[];
}

/** Entries are laid out as ContactID, Name, DNs. */
export interface ManagersOut {
  Manager: AttrRecord[];
}

export interface OASISOut {
  UseOASIS: boolean;
  Managers: ManagersOut | null;
  OASISRepoURLs: { URL: string[] } | null;
}

export interface FieldsOfScienceOut {
  PrimaryFields: { Field: string[] };
  SecondaryFields?: { Field: string[] };
}

export interface ParentVOOut {
  ID?: string | number | null;
  Name?: string | null;
}

export const VO_FIELD_ORDER = [
  "ID",
  "Name",
  "LongName",
  "CertificateOnly",
  "PrimaryURL",
  "MembershipServicesURL",
  "PurposeURL",
  "SupportURL",
  "AppDescription",
  "Community",
  "FieldsOfScience",
  "ParentVO",
  "ReportingGroups",
  "Active",
  "Disable",
  "ContactTypes",
  "OASIS",
] as const;

export type VOField = (typeof VO_FIELD_ORDER)[number];

/** An assembled VO. Which keys exist depends on the source; their order never does. */
export type ExpandedVO = Partial<Record<VOField, unknown>>;

export interface VOSummaryTree {
  VOSummary: {
    "@xmlns:xsi": string;
    "@xsi:schemaLocation": string;
    VO: ExpandedVO[];
  };
}
