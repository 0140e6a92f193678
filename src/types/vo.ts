/**
 * A name-keyed mapping whose key order is the output order. The loader
 * always builds Maps; plain objects are accepted for records built in code.
 */
export type Mapping<T> = ReadonlyMap<string, T> | Readonly<Record<string, T>>;

/**
 * A VO source record as parsed from its YAML file.
 *
 * Only the fields the engine reshapes are typed. Scalars such as LongName,
 * CertificateOnly, the URL fields, AppDescription, Community, Active and
 * Disable pass through untouched; unrecognized keys are dropped at assembly.
 */
export interface VORecord {
  ID?: string | number;
  Name?: string;
  FieldsOfScience?: FieldsOfScienceSource | null;
  ParentVO?: ParentVOSource | null;
  ReportingGroups?: ReadonlyArray<string> | null;
  /** Contact type (e.g. "Administrative Contact") -> contacts of that type */
  Contacts?: Mapping<ReadonlyArray<ContactRef>> | null;
  OASIS?: OASISBlock | null;
  [key: string]: unknown;
}

export interface ContactRef {
  Name: string;
  ID?: string;
}

export interface ParentVOSource {
  ID?: string | number | null;
  Name?: string | null;
  [key: string]: unknown;
}

export interface FieldsOfScienceSource {
  PrimaryFields?: ReadonlyArray<string> | null;
  SecondaryFields?: ReadonlyArray<string> | null;
}

export interface OASISBlock {
  UseOASIS?: boolean;
  Managers?: Mapping<OASISManagerSource> | null;
  OASISRepoURLs?: ReadonlyArray<string> | null;
}

export interface OASISManagerSource {
  ContactID?: string;
  DNs?: ReadonlyArray<string> | null;
  [key: string]: unknown;
}

export interface FQANSource {
  GroupName: string;
  Role: string;
}

export interface ReportingGroupSource {
  Contacts?: ReadonlyArray<string> | null;
  FQANs?: ReadonlyArray<FQANSource> | null;
}

/** Group name -> group definition. Shared by every VO, never mutated. */
export type ReportingGroupsCatalog = Mapping<ReportingGroupSource>;

export interface ContactEntry {
  Email: string;
  Phone?: string;
  SMS?: string;
}

/** Contact ID -> private contact details. */
export type ContactsTable = Readonly<Record<string, ContactEntry>>;
