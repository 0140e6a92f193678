export type SummaryResult<T> =
  | { ok: true; value: T; meta?: SummaryMeta }
  | { ok: false; error: SummaryError; meta?: SummaryMeta };

export interface SummaryMeta {
  voCount: number;
  /** VO source files in registration order */
  sources: string[];
}

export interface SummaryError {
  code:
    | "SOURCE_READ_ERROR"
    | "SOURCE_PARSE_ERROR"
    | "INVALID_SOURCE"
    | "CATALOG_ENTRY_INCOMPLETE"
    | "VO_EXPANSION_ERROR"
    | "SERIALIZE_ERROR";
  message: string;
  field?: string;
  details?: unknown;
}
