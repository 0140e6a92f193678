import { describe, it, expect } from "vitest";
import { parseYaml, parseYamlFile } from "../src/parsing/yaml.js";
import { SummaryFailure } from "../src/core/Errors.js";

describe("parseYaml", () => {
  it("keeps mapping key order, integer-like keys included", () => {
    const doc = parseYaml("Zeta: 1\n'2024': 2\nMid: 3\n7: 4\n", "order.yaml");
    expect(doc instanceof Map ? [...doc.keys()] : []).toEqual(["Zeta", "2024", "Mid", 7]);
  });

  it("reads yes/no as booleans", () => {
    expect(parseYaml("Active: yes\nDisable: no\n", "v.yaml")).toEqual(
      new Map<string, unknown>([
        ["Active", true],
        ["Disable", false],
      ]),
    );
  });

  it("reads an empty document as an empty mapping", () => {
    expect(parseYaml("", "empty.yaml")).toEqual(new Map());
  });

  it("reports syntax errors with the source name", () => {
    let caught: unknown;
    try {
      parseYaml("Name: [unclosed\n", "broken.yaml");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(SummaryFailure);
    if (caught instanceof SummaryFailure) {
      expect(caught.error.code).toBe("SOURCE_PARSE_ERROR");
      expect(caught.message.startsWith("Cannot parse broken.yaml: ")).toBe(true);
    }
  });

  it("reports unreadable files", () => {
    expect(() => parseYamlFile("/nonexistent/vosummary/file.yaml")).toThrow(
      /^Cannot read \/nonexistent\/vosummary\/file\.yaml: /,
    );
  });
});
