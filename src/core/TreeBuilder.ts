import type { ContactsTable, ReportingGroupsCatalog, VORecord } from "../types/vo.js";
import type { ExpandedVO, VOSummaryTree } from "../types/tree.js";
import { getLog } from "../utils/logger.js";
import { toPlain } from "../utils/mapping.js";
import { SummaryFailure, err } from "./Errors.js";
import { VOAssembler } from "./VOAssembler.js";
import { VOSUMMARY_SCHEMA_URL, XSI_NAMESPACE } from "./schema.js";

const log = getLog(import.meta);

export interface VODataOptions {
  contactsTable?: ContactsTable | null;
  reportingGroups: ReportingGroupsCatalog;
}

interface RegisteredVO {
  vo: VORecord;
  /** file the record came from, for diagnostics */
  source?: string;
}

/** Registered VOs plus the shared catalogs; renders them as one VOSummary tree. */
export class VOData {
  private readonly assembler: VOAssembler;
  private readonly vos: RegisteredVO[] = [];

  constructor(opts: VODataOptions) {
    this.assembler = new VOAssembler(opts);
  }

  addVo(vo: VORecord, source?: string): void {
    this.vos.push({ vo, source });
  }

  get size(): number {
    return this.vos.length;
  }

  get sources(): string[] {
    return this.vos.flatMap((v) => (v.source === undefined ? [] : [v.source]));
  }

  /** VOs appear in registration order. Any VO that fails to expand aborts the whole tree. */
  getTree(authorized = false): VOSummaryTree {
    const expanded = this.vos.map((entry, index) =>
      this.expandRegistered(authorized, entry, index),
    );
    return {
      VOSummary: {
        "@xmlns:xsi": XSI_NAMESPACE,
        "@xsi:schemaLocation": VOSUMMARY_SCHEMA_URL,
        VO: expanded,
      },
    };
  }

  private expandRegistered(
    authorized: boolean,
    entry: RegisteredVO,
    index: number,
  ): ExpandedVO {
    try {
      return this.assembler.expandVo(authorized, entry.vo);
    } catch (e) {
      const label = describeVo(entry, index);
      log.error({ vo: toPlain(entry.vo), source: entry.source }, `Failed to expand VO ${label}`);

      const inner = e instanceof SummaryFailure ? e.error : undefined;
      const message = inner?.message ?? (e instanceof Error ? e.message : String(e));
      throw new SummaryFailure(
        err(
          inner?.code ?? "VO_EXPANSION_ERROR",
          `VO ${label}: ${message}`,
          { vo: entry.vo, source: entry.source, cause: inner?.details ?? e },
          inner?.field,
        ),
        { cause: e },
      );
    }
  }
}

function describeVo(entry: RegisteredVO, index: number): string {
  if (typeof entry.vo.Name === "string" && entry.vo.Name !== "") {
    return `"${entry.vo.Name}"`;
  }
  return entry.source ?? `#${index}`;
}
