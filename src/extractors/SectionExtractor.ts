import { CheerioAPI, load } from "cheerio";
import { AnyNode, Document, Element, cloneNode, hasChildren, isTag, isText } from "domhandler";
import { DEFAULT_MIN_ROOT_TEXT_LENGTH, EXCLUDED_TAGS } from "../constants/chunkerConfig";
import { ContentNode, SectionContainer } from "../types/contentTypes";
import {
  claimSubtree,
  collectHeadings,
  containsHeading,
  followingSiblings,
  headingsWithin,
  isAncestorOf,
} from "../utils/domTraversal";
import { findRootElement } from "../utils/findRootElement";
import { findHighestHeading, headingRank, isHeading } from "../utils/headingLevel";
import { serializeNodes } from "../utils/serializeMarkup";
import { BaseExtractor } from ".";

export interface SectionExtractorOptions {
  minRootTextLength?: number;
}

/**
 * Copies a heading and the nodes it governs into a fresh fragment document.
 * The copies share nothing with the source tree.
 */
export function isolateSection(heading: Element, content: AnyNode[]): Document {
  const $fragment = load("", null, false);
  const $root = $fragment.root();
  $root.append([heading, ...content].map((node) => cloneNode(node, true)));
  return $root[0];
}

export class SectionExtractor extends BaseExtractor<ContentNode> {
  private readonly minRootTextLength: number;

  constructor(cheerioInstance: CheerioAPI, options: SectionExtractorOptions = {}) {
    super(cheerioInstance);
    this.minRootTextLength = options.minRootTextLength ?? DEFAULT_MIN_ROOT_TEXT_LENGTH;
  }

  extract(): ContentNode {
    return this.chunk(this.findRoot());
  }

  findRoot(): SectionContainer {
    return findRootElement(this.$, this.minRootTextLength);
  }

  chunk(root: SectionContainer): ContentNode {
    if (isHeading(root)) {
      return this.chunkHeading(root);
    }

    const headings = collectHeadings(root);
    const anchor = findHighestHeading(headings);

    if (!anchor) {
      return {
        title: "",
        text: this.ownText(root, null),
        level: null,
        subsections: [],
      };
    }

    if (this.isBaseCase(root)) {
      return this.leaf(anchor, this.ownText(root, anchor));
    }

    return this.decompose(root, anchor, headings);
  }

  /**
   * A heading is a base case when nothing after it, up to the heading that
   * closes its section, is or holds a deeper heading. Any other subtree is a
   * base case when it holds exactly one heading.
   */
  isBaseCase(node: SectionContainer): boolean {
    if (!isHeading(node)) {
      return collectHeadings(node).length === 1;
    }

    const rank = headingRank(node);
    for (const sibling of followingSiblings(node)) {
      const nested = headingsWithin(sibling);
      if (nested.some((heading) => headingRank(heading) <= rank)) {
        break;
      }
      if (nested.length > 0) {
        return false;
      }
    }

    return true;
  }

  /**
   * Siblings governed by a heading: everything after it up to the first
   * sibling that is, or contains, a heading of the same or higher rank.
   */
  sectionContent(heading: Element): AnyNode[] {
    const rank = headingRank(heading);
    const content: AnyNode[] = [];

    for (const sibling of followingSiblings(heading)) {
      if (headingsWithin(sibling).some((nested) => headingRank(nested) <= rank)) {
        break;
      }
      content.push(sibling);
    }

    return content;
  }

  shouldIncludeNode(node: AnyNode): boolean {
    if (isText(node)) {
      return node.data.trim().length > 0;
    }

    if (!isTag(node)) {
      return false;
    }

    if (EXCLUDED_TAGS.has(node.name) || isHeading(node)) {
      return false;
    }

    if (!this.$(node).text().trim()) {
      return false;
    }

    // Anything holding a heading is routed to a subsection instead
    return !containsHeading(node);
  }

  private chunkHeading(heading: Element): ContentNode {
    const content = this.sectionContent(heading);

    if (this.isBaseCase(heading)) {
      return this.leaf(heading, this.serialize(content));
    }

    return this.chunk(isolateSection(heading, content));
  }

  private decompose(root: SectionContainer, anchor: Element, headings: Element[]): ContentNode {
    const anchorRank = headingRank(anchor);
    const anchorIndex = headings.indexOf(anchor);
    const claimed = new Set<AnyNode>([anchor]);
    const subsections: ContentNode[] = [];

    headings.forEach((candidate, index) => {
      if (claimed.has(candidate)) {
        return;
      }

      if (
        index > anchorIndex &&
        this.isClaimedByIntermediate(
          headings.slice(anchorIndex + 1, index),
          claimed,
          anchorRank,
          headingRank(candidate)
        )
      ) {
        return;
      }

      const content = this.sectionContent(candidate);
      claimed.add(candidate);
      content.forEach((node) => claimSubtree(node, claimed));

      subsections.push(this.chunk(isolateSection(candidate, content)));
    });

    return {
      title: this.headingTitle(anchor),
      text: this.ownText(root, anchor),
      level: anchorRank,
      subsections,
    };
  }

  // An unclaimed heading ranked strictly between the anchor and the candidate owns the candidate
  private isClaimedByIntermediate(
    between: Element[],
    claimed: Set<AnyNode>,
    anchorRank: number,
    candidateRank: number
  ): boolean {
    return between.some((heading) => {
      if (claimed.has(heading)) {
        return false;
      }
      const rank = headingRank(heading);
      return rank > anchorRank && rank < candidateRank;
    });
  }

  /**
   * Nodes that make up the anchor's own text: what comes before the first
   * heading, then what follows the anchor up to the next heading. A wrapper
   * holding the anchor is walked with the same rule; a wrapper holding other
   * headings gives up the content before its first heading.
   */
  private leadContent(container: AnyNode, anchor: Element | null): AnyNode[] {
    const lead: AnyNode[] = [];
    if (!hasChildren(container)) {
      return lead;
    }

    let seenHeading = false;
    let pastAnchor = false;

    for (const child of container.children) {
      if (child === anchor) {
        pastAnchor = true;
        continue;
      }

      if (anchor && isAncestorOf(child, anchor)) {
        lead.push(...this.leadContent(child, anchor));
        pastAnchor = true;
        continue;
      }

      if (isHeading(child)) {
        if (pastAnchor) {
          break;
        }
        seenHeading = true;
        continue;
      }

      // Only what precedes a wrapper's first heading is left outside that heading's section
      if (containsHeading(child)) {
        if (pastAnchor || !seenHeading) {
          lead.push(...this.leadContent(child, null));
        }
        continue;
      }

      if (pastAnchor || !seenHeading) {
        lead.push(child);
      }
    }

    return lead;
  }

  private ownText(root: SectionContainer, anchor: Element | null): string {
    return this.serialize(this.leadContent(root, anchor));
  }

  private serialize(nodes: AnyNode[]): string {
    return serializeNodes(
      this.$,
      nodes.filter((node) => this.shouldIncludeNode(node))
    );
  }

  private leaf(heading: Element, text: string): ContentNode {
    return {
      title: this.headingTitle(heading),
      text,
      level: headingRank(heading),
      subsections: [],
    };
  }

  private headingTitle(heading: Element): string {
    return this.sanitizeText(this.$(heading).text());
  }
}
