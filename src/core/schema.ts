/** Root attributes of the VO summary document. Consumers validate against these verbatim. */
export const XSI_NAMESPACE = "http://www.w3.org/2001/XMLSchema-instance";
export const VOSUMMARY_SCHEMA_URL =
  "https://my.opensciencegrid.org/schema/vosummary.xsd";

/** The catalog file living next to the VO files; it is never read as a VO. */
export const REPORTING_GROUPS_FILE = "REPORTING_GROUPS.yaml";
