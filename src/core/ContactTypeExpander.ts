import type { ContactRef, ContactsTable, Mapping } from "../types/vo.js";
import type { ContactOut, ContactTypesOut } from "../types/tree.js";
import { entriesOf } from "../utils/mapping.js";

export function expandContactTypes(
  contactsByType: Mapping<ReadonlyArray<ContactRef>>,
  authorized: boolean,
  contactsTable: ContactsTable,
): ContactTypesOut {
  return {
    ContactType: entriesOf(contactsByType).map(([type, contacts]) => ({
      Type: type,
      Contacts: {
        Contact: contacts.map((c) => expandContact(c, authorized, contactsTable)),
      },
    })),
  };
}

/** Email, Phone and SMSAddress only appear in the authorized view, and only for contacts the table knows. */
function expandContact(
  contact: ContactRef,
  authorized: boolean,
  contactsTable: ContactsTable,
): ContactOut {
  const out: ContactOut = { Name: contact.Name };
  const id = contact.ID;
  if (!authorized || id === undefined || !Object.hasOwn(contactsTable, id)) {
    return out;
  }

  const details = contactsTable[id];
  if (!details) return out;
  out.Email = details.Email;
  out.Phone = details.Phone ?? "";
  out.SMSAddress = details.SMS ?? "";
  return out;
}
