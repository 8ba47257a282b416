import { AnyNode, Element, isTag } from "domhandler";
import {
  HEADING_ROLE,
  HEADING_TAG_LEVELS,
  RANK_OVERRIDE_ATTRIBUTE,
} from "../constants/chunkerConfig";

/**
 * Parses an `aria-level` style override. Only whole integers count, with an
 * optional sign and surrounding whitespace; anything else yields null.
 */
export function parseRankOverride(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }

  return parseInt(trimmed, 10);
}

/**
 * Resolves the heading rank of a node, or null when it is not a heading.
 *
 * `h1`..`h6` imply their rank unless a valid override is present. Any other
 * element needs `role="heading"` and a valid override to be a heading at all.
 */
export function getHeadingLevel(node: AnyNode): number | null {
  if (!isTag(node)) {
    return null;
  }

  const override = parseRankOverride(node.attribs[RANK_OVERRIDE_ATTRIBUTE]);
  const impliedLevel = HEADING_TAG_LEVELS.get(node.name);

  if (impliedLevel !== undefined) {
    return override ?? impliedLevel;
  }

  const role = (node.attribs.role ?? "").trim().toLowerCase();
  return role === HEADING_ROLE ? override : null;
}

export function isHeading(node: AnyNode): node is Element {
  return getHeadingLevel(node) !== null;
}

export function headingRank(heading: Element): number {
  return getHeadingLevel(heading) ?? Number.POSITIVE_INFINITY;
}

// Lowest rank wins; on a tie the earliest heading is kept
export function findHighestHeading(headings: Element[]): Element | null {
  let highest: Element | null = null;

  for (const heading of headings) {
    if (highest === null || headingRank(heading) < headingRank(highest)) {
      highest = heading;
    }
  }

  return highest;
}
