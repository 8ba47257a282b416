import { CheerioAPI } from "cheerio";
import { AnyNode, Element, cloneNode, isTag, isText } from "domhandler";
import { WHITESPACE_PRESERVING_TAGS } from "../constants/chunkerConfig";

// Indentation between tags collapses to a single line break
function compactLayoutWhitespace(element: Element): void {
  if (WHITESPACE_PRESERVING_TAGS.has(element.name)) {
    return;
  }

  for (const child of element.children) {
    if (isText(child)) {
      if (child.data.includes("\n") && child.data.trim() === "") {
        child.data = "\n";
      }
    } else if (isTag(child)) {
      compactLayoutWhitespace(child);
    }
  }
}

/**
 * Serializes one node for a section's text. Elements keep their markup and
 * are serialized from a copy, so the source tree is left untouched.
 */
export function serializeNode($: CheerioAPI, node: AnyNode): string {
  if (isText(node)) {
    return node.data.trim();
  }

  if (!isTag(node)) {
    return "";
  }

  const copy = cloneNode(node, true);
  compactLayoutWhitespace(copy);
  return $.html(copy);
}

export function serializeNodes($: CheerioAPI, nodes: AnyNode[]): string {
  return nodes
    .map((node) => serializeNode($, node))
    .filter((markup) => markup.length > 0)
    .join("\n")
    .trim();
}
