export const HEADING_TAG_LEVELS: ReadonlyMap<string, number> = new Map([
  ["h1", 1],
  ["h2", 2],
  ["h3", 3],
  ["h4", 4],
  ["h5", 5],
  ["h6", 6],
]);

export const HEADING_ROLE = "heading";
export const RANK_OVERRIDE_ATTRIBUTE = "aria-level";

// Never part of a node's text, whatever they contain
export const EXCLUDED_TAGS: ReadonlySet<string> = new Set([
  "script",
  "style",
  "noscript",
  "meta",
  "link",
  "title",
  "base",
  "head",
  "html",
]);

export const WHITESPACE_PRESERVING_TAGS: ReadonlySet<string> = new Set(["pre", "textarea"]);

// Checked in this order, each only if it has text; the threshold fallback comes last
export const ROOT_SELECTORS = ["main", "[role='main']", "article", "body", "section"] as const;

// The document head never serves as a root, whatever its text length
export const FALLBACK_SKIPPED_SELECTOR = "html, head, head *";

export const DEFAULT_MIN_ROOT_TEXT_LENGTH = 100;
