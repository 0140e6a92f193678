import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { loadVoDirectory } from "../src/core/SourceLoader.js";
import { SummaryFailure } from "../src/core/Errors.js";
import { getVos } from "../src/index.js";

const VO_DIR = fileURLToPath(new URL("./fixtures/virtual-organizations", import.meta.url));
const CONTACTS = fileURLToPath(new URL("./fixtures/contacts.yaml", import.meta.url));
const MALFORMED_DIR = fileURLToPath(new URL("./fixtures/malformed", import.meta.url));
const NO_CATALOG_DIR = fileURLToPath(new URL("./fixtures/no-catalog", import.meta.url));
const INTEGER_NAMES_DIR = fileURLToPath(new URL("./fixtures/integer-names", import.meta.url));

const alphaAuthorized = {
  ID: 101,
  Name: "AlphaVO",
  LongName: "Alpha Virtual Organization",
  CertificateOnly: false,
  PrimaryURL: "https://alpha.example.org",
  MembershipServicesURL: null,
  PurposeURL: null,
  SupportURL: null,
  AppDescription: "Simulation workloads",
  Community: "Physicists",
  FieldsOfScience: {
    PrimaryFields: { Field: ["Physics"] },
    SecondaryFields: { Field: ["Computer Science"] },
  },
  ParentVO: { ID: 5, Name: "ParentVO" },
  ReportingGroups: {
    ReportingGroup: [
      {
        Name: "GroupA",
        FQANs: { FQAN: [{ GroupName: "/groupa", Role: "Admin" }] },
        Contacts: { Contact: [{ Name: "Alice Admin" }, { Name: "Bob Ops" }] },
      },
      {
        Name: "GroupB",
        FQANs: { FQAN: [{ GroupName: "/groupb", Role: "Production" }] },
        Contacts: null,
      },
    ],
  },
  Active: true,
  Disable: false,
  ContactTypes: {
    ContactType: [
      {
        Type: "Administrative Contact",
        Contacts: {
          Contact: [
            { Name: "Alice Admin", Email: "alice@example.org", Phone: "555-0100", SMSAddress: "" },
          ],
        },
      },
      {
        Type: "Security Contact",
        Contacts: { Contact: [{ Name: "Sam Secure" }] },
      },
    ],
  },
  OASIS: {
    UseOASIS: true,
    Managers: {
      Manager: [
        {
          ContactID: "c-oscar",
          Name: "Oscar Manager",
          DNs: { DN: ["/DC=org/DC=example/CN=Oscar Manager"] },
        },
      ],
    },
    OASISRepoURLs: { URL: ["http://alpha.example.org/cvmfs"] },
  },
};

const beta = {
  ID: 102,
  Name: "BetaVO",
  PrimaryURL: null,
  MembershipServicesURL: null,
  PurposeURL: null,
  SupportURL: null,
  FieldsOfScience: null,
  ParentVO: null,
  ReportingGroups: null,
  ContactTypes: null,
  OASIS: null,
};

describe("loadVoDirectory", () => {
  it("registers YAML files in name order, skipping the catalog and other files", () => {
    const { data, sources } = loadVoDirectory(VO_DIR);
    expect(sources).toEqual(["AlphaVO.yaml", "BetaVO.yml"]);
    expect(data.size).toBe(2);
  });

  it("builds the authorized tree with contacts", () => {
    const { data } = loadVoDirectory(VO_DIR, { contactsFile: CONTACTS });
    const [alpha, second] = data.getTree(true).VOSummary.VO;
    expect(alpha).toEqual(alphaAuthorized);
    expect(Object.keys(alpha ?? {})).toEqual(Object.keys(alphaAuthorized));
    expect(second).toEqual(beta);
    expect(Object.keys(second ?? {})).toEqual(Object.keys(beta));
  });

  it("never enriches contacts without a contacts file", () => {
    const { data } = loadVoDirectory(VO_DIR);
    const alpha = data.getTree(true).VOSummary.VO[0];
    expect(alpha?.ContactTypes).toEqual({
      ContactType: [
        { Type: "Administrative Contact", Contacts: { Contact: [{ Name: "Alice Admin" }] } },
        { Type: "Security Contact", Contacts: { Contact: [{ Name: "Sam Secure" }] } },
      ],
    });
  });

  it("surfaces the malformed VO file", () => {
    expect(() => loadVoDirectory(MALFORMED_DIR)).toThrow(SummaryFailure);
    expect(() => loadVoDirectory(MALFORMED_DIR)).toThrow(
      /BrokenVO\.yaml: Contacts: must map contact types to lists$/,
    );
  });

  it("keeps integer-like group, contact type and manager names in file order", () => {
    const { data } = loadVoDirectory(INTEGER_NAMES_DIR);
    const cohort = data.getTree().VOSummary.VO[0];
    expect(cohort?.ReportingGroups).toEqual({
      ReportingGroup: [
        {
          Name: "Zeta",
          FQANs: { FQAN: [{ GroupName: "/zeta", Role: "Production" }] },
          Contacts: null,
        },
        { Name: "2024", FQANs: null, Contacts: { Contact: [{ Name: "Yuri Year" }] } },
      ],
    });
    expect(cohort?.ContactTypes).toEqual({
      ContactType: [
        { Type: "Security Contact", Contacts: { Contact: [{ Name: "Sam Secure" }] } },
        { Type: "1", Contacts: { Contact: [{ Name: "First Responder" }] } },
      ],
    });
    expect(cohort?.OASIS).toEqual({
      UseOASIS: true,
      Managers: {
        Manager: [
          { Name: "Zed Manager", DNs: { DN: ["/DC=org/CN=Zed"] } },
          { ContactID: "c-42", Name: "42", DNs: null },
        ],
      },
      OASISRepoURLs: null,
    });
  });

  it("requires the reporting groups catalog", () => {
    expect(() => loadVoDirectory(NO_CATALOG_DIR)).toThrow(/REPORTING_GROUPS\.yaml/);
  });
});

describe("getVos", () => {
  it("renders the unauthorized view by default", () => {
    const tree = getVos(VO_DIR, CONTACTS);
    const alpha = tree.VOSummary.VO[0];
    expect(alpha?.ContactTypes).toEqual({
      ContactType: [
        { Type: "Administrative Contact", Contacts: { Contact: [{ Name: "Alice Admin" }] } },
        { Type: "Security Contact", Contacts: { Contact: [{ Name: "Sam Secure" }] } },
      ],
    });
  });
});
