import { XMLBuilder } from "fast-xml-parser";
import type { VOSummaryTree } from "../types/tree.js";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * Tree -> XML text:
 * - keys starting with @ are attributes
 * - arrays become repeated sibling elements
 * - null becomes an empty element (<LongName/>), undefined is skipped
 * - key order is element order
 */
export function toXml(tree: VOSummaryTree): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@",
    format: true,
    indentBy: "  ",
    suppressEmptyNode: false,
  });

  return `${XML_DECLARATION}\n${builder.build(tree)}`;
}
