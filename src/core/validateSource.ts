import type {
  ContactRef,
  ContactsTable,
  ContactEntry,
  FieldsOfScienceSource,
  FQANSource,
  OASISBlock,
  OASISManagerSource,
  ParentVOSource,
  ReportingGroupSource,
  VORecord,
} from "../types/vo.js";
import { fail } from "./Errors.js";
import { readField } from "./NullPredicate.js";
import { mappingEntries, mappingRecord } from "../utils/mapping.js";

/**
 * Narrow a parsed VO file into a VORecord. Only the fields the engine
 * reshapes are checked; an empty value (null, "", [], ...) is kept as null so
 * the assembler still sees the key.
 */
export function asVORecord(input: unknown, source: string): VORecord {
  const raw = mappingRecord(input);
  if (!raw) invalid(source, "", "a VO file must hold a mapping");

  const vo: VORecord = {};
  for (const [key, value] of Object.entries(raw)) vo[key] = value;

  const id = readField(raw, "ID");
  if (id.kind === "present") vo.ID = asScalarId(id.value, source, "ID");
  const name = readField(raw, "Name");
  if (name.kind === "present") vo.Name = asString(name.value, source, "Name");

  const contacts = readField(raw, "Contacts");
  if (contacts.kind !== "absent") {
    vo.Contacts = contacts.kind === "present" ? asContacts(contacts.value, source) : null;
  }
  const groups = readField(raw, "ReportingGroups");
  if (groups.kind !== "absent") {
    vo.ReportingGroups =
      groups.kind === "present" ? asStringList(groups.value, source, "ReportingGroups") : null;
  }
  const oasis = readField(raw, "OASIS");
  if (oasis.kind !== "absent") {
    vo.OASIS = oasis.kind === "present" ? asOasis(oasis.value, source) : null;
  }
  const parent = readField(raw, "ParentVO");
  if (parent.kind !== "absent") {
    vo.ParentVO = parent.kind === "present" ? asParentVo(parent.value, source) : null;
  }
  const fos = readField(raw, "FieldsOfScience");
  if (fos.kind !== "absent") {
    vo.FieldsOfScience =
      fos.kind === "present" ? asFieldsOfScience(fos.value, source) : null;
  }
  return vo;
}

/**
 * An empty catalog file is an empty catalog; an empty entry is a group with
 * no contacts or FQANs. Groups keep the file's order, integer-like names
 * included.
 */
export function asReportingGroupsCatalog(
  raw: unknown,
  source: string,
): ReadonlyMap<string, ReportingGroupSource> {
  if (raw === null || raw === undefined) return new Map();
  const groups = mappingEntries(raw);
  if (!groups) invalid(source, "", "the reporting groups file must hold a mapping");

  const catalog = new Map<string, ReportingGroupSource>();
  for (const [name, value] of groups) {
    const where = name;
    if (value === null || value === undefined) {
      catalog.set(name, {});
      continue;
    }
    const entry = mappingRecord(value);
    if (!entry) invalid(source, where, "must be a mapping");

    const group: ReportingGroupSource = {};
    const contacts = readField(entry, "Contacts");
    if (contacts.kind !== "absent") {
      group.Contacts =
        contacts.kind === "present"
          ? asStringList(contacts.value, source, `${where}.Contacts`)
          : null;
    }
    const fqans = readField(entry, "FQANs");
    if (fqans.kind !== "absent") {
      group.FQANs =
        fqans.kind === "present" ? asFqans(fqans.value, source, `${where}.FQANs`) : null;
    }
    catalog.set(name, group);
  }
  return catalog;
}

export function asContactsTable(raw: unknown, source: string): ContactsTable {
  if (raw === null || raw === undefined) return {};
  const entries = mappingEntries(raw);
  if (!entries) invalid(source, "", "the contacts file must hold a mapping");

  const table: Record<string, ContactEntry> = {};
  for (const [id, value] of entries) {
    const entry = mappingRecord(value);
    if (!entry) invalid(source, id, "must be a mapping");
    const contact: ContactEntry = {
      Email: asString(entry.Email, source, `${id}.Email`),
    };
    if (entry.Phone !== undefined && entry.Phone !== null) {
      contact.Phone = asText(entry.Phone, source, `${id}.Phone`);
    }
    if (entry.SMS !== undefined && entry.SMS !== null) {
      contact.SMS = asText(entry.SMS, source, `${id}.SMS`);
    }
    table[id] = contact;
  }
  return table;
}

function asContacts(
  value: unknown,
  source: string,
): Map<string, ContactRef[]> {
  const types = mappingEntries(value);
  if (!types) invalid(source, "Contacts", "must map contact types to lists");

  const byType = new Map<string, ContactRef[]>();
  for (const [type, list] of types) {
    const where = `Contacts.${type}`;
    if (!Array.isArray(list)) invalid(source, where, "must be a list of contacts");

    const contacts = list.map((entry: unknown, i) => {
      const item = mappingRecord(entry);
      if (!item) invalid(source, `${where}[${i}]`, "must be a mapping");
      const contact: ContactRef = {
        Name: asString(item.Name, source, `${where}[${i}].Name`),
      };
      if (item.ID !== undefined && item.ID !== null) {
        contact.ID = asText(item.ID, source, `${where}[${i}].ID`);
      }
      return contact;
    });
    byType.set(type, contacts);
  }
  return byType;
}

function asOasis(input: unknown, source: string): OASISBlock {
  const value = mappingRecord(input);
  if (!value) invalid(source, "OASIS", "must be a mapping");

  const block: OASISBlock = {};
  if (value.UseOASIS !== undefined && value.UseOASIS !== null) {
    if (typeof value.UseOASIS !== "boolean") {
      invalid(source, "OASIS.UseOASIS", "must be a boolean");
    }
    block.UseOASIS = value.UseOASIS;
  }

  const managers = readField(value, "Managers");
  if (managers.kind !== "absent") {
    block.Managers =
      managers.kind === "present" ? asManagers(managers.value, source) : null;
  }
  const urls = readField(value, "OASISRepoURLs");
  if (urls.kind !== "absent") {
    block.OASISRepoURLs =
      urls.kind === "present"
        ? asStringList(urls.value, source, "OASIS.OASISRepoURLs")
        : null;
  }
  return block;
}

function asManagers(
  value: unknown,
  source: string,
): Map<string, OASISManagerSource> {
  const entries = mappingEntries(value);
  if (!entries) invalid(source, "OASIS.Managers", "must be a mapping");

  const managers = new Map<string, OASISManagerSource>();
  for (const [name, item] of entries) {
    const where = `OASIS.Managers.${name}`;
    if (item === null || item === undefined) {
      managers.set(name, {});
      continue;
    }
    const entry = mappingRecord(item);
    if (!entry) invalid(source, where, "must be a mapping");

    const manager: OASISManagerSource = {};
    for (const [key, field] of Object.entries(entry)) manager[key] = field;
    if (entry.ContactID !== undefined && entry.ContactID !== null) {
      manager.ContactID = asText(entry.ContactID, source, `${where}.ContactID`);
    }
    const dns = readField(entry, "DNs");
    if (dns.kind !== "absent") {
      manager.DNs = dns.kind === "present" ? asStringList(dns.value, source, `${where}.DNs`) : null;
    }
    managers.set(name, manager);
  }
  return managers;
}

function asParentVo(input: unknown, source: string): ParentVOSource {
  const value = mappingRecord(input);
  if (!value) invalid(source, "ParentVO", "must be a mapping");

  const parent: ParentVOSource = {};
  for (const [key, field] of Object.entries(value)) parent[key] = field;
  if (value.ID !== undefined && value.ID !== null) {
    parent.ID = asScalarId(value.ID, source, "ParentVO.ID");
  }
  if (value.Name !== undefined && value.Name !== null) {
    parent.Name = asString(value.Name, source, "ParentVO.Name");
  }
  return parent;
}

function asFieldsOfScience(input: unknown, source: string): FieldsOfScienceSource {
  const value = mappingRecord(input);
  if (!value) invalid(source, "FieldsOfScience", "must be a mapping");

  const fos: FieldsOfScienceSource = {};
  for (const key of ["PrimaryFields", "SecondaryFields"] as const) {
    const state = readField(value, key);
    if (state.kind === "absent") continue;
    fos[key] =
      state.kind === "present"
        ? asStringList(state.value, source, `FieldsOfScience.${key}`)
        : null;
  }
  return fos;
}

function asFqans(value: unknown, source: string, where: string): FQANSource[] {
  if (!Array.isArray(value)) invalid(source, where, "must be a list");
  return value.map((entry: unknown, i) => {
    const item = mappingRecord(entry);
    if (!item) invalid(source, `${where}[${i}]`, "must be a mapping");
    return {
      GroupName: asText(item.GroupName, source, `${where}[${i}].GroupName`),
      Role: asText(item.Role, source, `${where}[${i}].Role`),
    };
  });
}

function asStringList(value: unknown, source: string, where: string): string[] {
  if (!Array.isArray(value)) invalid(source, where, "must be a list");
  return value.map((item: unknown, i) => asText(item, source, `${where}[${i}]`));
}

function asString(value: unknown, source: string, where: string): string {
  if (typeof value !== "string") invalid(source, where, "must be a string");
  return value;
}

/** Strings, or numbers the YAML reader took for numbers (IDs, phone numbers). */
function asText(value: unknown, source: string, where: string): string {
  if (typeof value === "number") return String(value);
  return asString(value, source, where);
}

function asScalarId(value: unknown, source: string, where: string): string | number {
  if (typeof value === "number") return value;
  return asString(value, source, where);
}

function invalid(source: string, where: string, problem: string): never {
  const location = where ? `${source}: ${where}` : source;
  fail("INVALID_SOURCE", `Invalid ${location}: ${problem}`, { source }, where || undefined);
}
