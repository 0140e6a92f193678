import { readdirSync, type Dirent } from "node:fs";
import { extname, join } from "node:path";
import { parseYamlFile } from "../parsing/yaml.js";
import { getLog } from "../utils/logger.js";
import { sizeOf } from "../utils/mapping.js";
import { fail } from "./Errors.js";
import { REPORTING_GROUPS_FILE } from "./schema.js";
import { VOData } from "./TreeBuilder.js";
import {
  asContactsTable,
  asReportingGroupsCatalog,
  asVORecord,
} from "./validateSource.js";

const log = getLog(import.meta);

const VO_EXTENSIONS = new Set([".yaml", ".yml"]);

export interface LoadOptions {
  /** Without it no contact is ever enriched with private details. */
  contactsFile?: string;
}

export interface LoadedSources {
  data: VOData;
  /** VO file names in registration order */
  sources: string[];
}

/**
 * Read REPORTING_GROUPS.yaml, the optional contacts file and every other
 * YAML file in `indir` (one VO per file). Files are registered in sorted
 * name order so output does not depend on directory listing order.
 */
export function loadVoDirectory(indir: string, opts: LoadOptions = {}): LoadedSources {
  const catalogPath = join(indir, REPORTING_GROUPS_FILE);
  const reportingGroups = asReportingGroupsCatalog(parseYamlFile(catalogPath), catalogPath);
  const contactsTable = opts.contactsFile
    ? asContactsTable(parseYamlFile(opts.contactsFile), opts.contactsFile)
    : null;

  const data = new VOData({ contactsTable, reportingGroups });
  const sources = listVoFiles(indir);
  for (const file of sources) {
    const path = join(indir, file);
    data.addVo(asVORecord(parseYamlFile(path), path), file);
  }

  log.debug(
    `Loaded ${sources.length} VOs, ${sizeOf(reportingGroups)} reporting groups, ` +
      `${contactsTable ? Object.keys(contactsTable).length : 0} contacts from ${indir}`,
  );
  return { data, sources };
}

function listVoFiles(indir: string): string[] {
  let entries: Dirent[];
  try {
    entries = readdirSync(indir, { withFileTypes: true });
  } catch (e) {
    fail(
      "SOURCE_READ_ERROR",
      `Cannot list ${indir}: ${e instanceof Error ? e.message : String(e)}`,
      { source: indir, cause: e },
    );
  }
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => name !== REPORTING_GROUPS_FILE && VO_EXTENSIONS.has(extname(name)))
    .sort();
}
