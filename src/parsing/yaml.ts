import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { fail } from "../core/Errors.js";

/**
 * YAML 1.1 rules, so `yes`/`no`/`on`/`off` read as booleans the way the
 * records have always been written. Mappings come back as Maps so keys such
 * as `2024` stay where the file put them. An empty document reads as an
 * empty Map.
 */
export function parseYaml(text: string, source: string): unknown {
  let doc: unknown;
  try {
    doc = parse(text, { version: "1.1", mapAsMap: true });
  } catch (e) {
    fail(
      "SOURCE_PARSE_ERROR",
      `Cannot parse ${source}: ${e instanceof Error ? e.message : String(e)}`,
      { source, cause: e },
    );
  }
  return doc ?? new Map();
}

export function parseYamlFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (e) {
    fail(
      "SOURCE_READ_ERROR",
      `Cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`,
      { source: path, cause: e },
    );
  }
  return parseYaml(text, path);
}
