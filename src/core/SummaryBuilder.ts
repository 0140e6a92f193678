import type { SummaryMeta, SummaryResult } from "../types/result.js";
import type { VOSummaryTree } from "../types/tree.js";
import { toXml } from "../parsing/xml.js";
import { err, toSummaryError } from "./Errors.js";
import { loadVoDirectory, type LoadedSources } from "./SourceLoader.js";

export interface SummaryBuilderOptions {
  indir: string;
  contactsFile?: string;
  /** default: false (no Email/Phone/SMSAddress in the output) */
  authorized?: boolean;
  /** keep `meta` on the result */
  debug?: boolean;
}

export class SummaryBuilder {
  private indir: string;
  private contactsFile: string | undefined;
  private authorized: boolean;
  private debug: boolean;

  constructor(opts: SummaryBuilderOptions) {
    this.indir = opts.indir;
    this.contactsFile = opts.contactsFile;
    this.authorized = opts.authorized ?? false;
    this.debug = opts.debug ?? false;
  }

  build(): SummaryResult<VOSummaryTree> {
    const loaded = runLoader(this.indir, this.contactsFile);
    if (!loaded.ok) return finalizeResult(loaded.result, this.debug);

    const meta: SummaryMeta = {
      voCount: loaded.sources.data.size,
      sources: loaded.sources.sources,
    };
    try {
      const tree = loaded.sources.data.getTree(this.authorized);
      return finalizeResult({ ok: true, value: tree, meta }, this.debug);
    } catch (e) {
      return finalizeResult(
        { ok: false, error: toSummaryError(e, "VO_EXPANSION_ERROR"), meta },
        this.debug,
      );
    }
  }

  buildXml(): SummaryResult<string> {
    const tree = this.build();
    if (!tree.ok) return tree;

    try {
      return { ...tree, value: toXml(tree.value) };
    } catch (e) {
      return {
        ok: false,
        error: err("SERIALIZE_ERROR", e instanceof Error ? e.message : String(e), {
          cause: e,
        }),
        meta: tree.meta,
      };
    }
  }
}

function runLoader(
  indir: string,
  contactsFile: string | undefined,
):
  | { ok: true; sources: LoadedSources }
  | { ok: false; result: SummaryResult<never> } {
  try {
    return { ok: true, sources: loadVoDirectory(indir, { contactsFile }) };
  } catch (e) {
    return {
      ok: false,
      result: { ok: false, error: toSummaryError(e, "SOURCE_READ_ERROR") },
    };
  }
}

function finalizeResult<T>(result: SummaryResult<T>, debug: boolean): SummaryResult<T> {
  if (debug) return result;

  if (result.ok) {
    return { ok: true, value: result.value };
  }

  return { ok: false, error: result.error };
}
