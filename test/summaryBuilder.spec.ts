import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { createSummaryBuilder, getVosXml } from "../src/index.js";

const VO_DIR = fileURLToPath(new URL("./fixtures/virtual-organizations", import.meta.url));
const CONTACTS = fileURLToPath(new URL("./fixtures/contacts.yaml", import.meta.url));
const MALFORMED_DIR = fileURLToPath(new URL("./fixtures/malformed", import.meta.url));

describe("SummaryBuilder", () => {
  it("returns the tree without meta by default", () => {
    const res = createSummaryBuilder({ indir: VO_DIR }).build();
    expect(res.ok).toBe(true);
    expect(res.meta).toBeUndefined();
    if (res.ok) {
      expect(res.value.VOSummary.VO.map((vo) => vo.Name)).toEqual(["AlphaVO", "BetaVO"]);
    }
  });

  it("keeps meta in debug mode", () => {
    const res = createSummaryBuilder({ indir: VO_DIR, debug: true }).build();
    expect(res.meta).toEqual({ voCount: 2, sources: ["AlphaVO.yaml", "BetaVO.yml"] });
  });

  it("reports a malformed source as an error result", () => {
    const res = createSummaryBuilder({ indir: MALFORMED_DIR }).build();
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.code).toBe("INVALID_SOURCE");
      expect(res.error.field).toBe("Contacts");
    }
  });

  it("renders XML for the authorized view", () => {
    const res = createSummaryBuilder({
      indir: VO_DIR,
      contactsFile: CONTACTS,
      authorized: true,
    }).buildXml();
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.value).toContain("<Email>alice@example.org</Email>");
      expect(res.value).toContain("<Phone>555-0100</Phone>");
    }
  });

  it("leaves contact details out of the default XML", () => {
    const xml = getVosXml(VO_DIR, CONTACTS);
    expect(xml).not.toContain("<Email>");
    expect(xml).toContain("<Name>Alice Admin</Name>");
  });

  it("fails buildXml with the same error as build", () => {
    const res = createSummaryBuilder({ indir: MALFORMED_DIR }).buildXml();
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("INVALID_SOURCE");
  });
});
