import { AnyNode, ChildNode, Element, hasChildren } from "domhandler";
import { isHeading } from "./headingLevel";

/**
 * Headings below `root` in document order. The root itself is not
 * considered, and nothing nested inside a heading counts as a heading.
 */
export function collectHeadings(root: AnyNode): Element[] {
  const headings: Element[] = [];

  if (!hasChildren(root)) {
    return headings;
  }

  for (const child of root.children) {
    if (isHeading(child)) {
      headings.push(child);
    } else {
      headings.push(...collectHeadings(child));
    }
  }

  return headings;
}

// The node itself when it is a heading, otherwise the headings it contains
export function headingsWithin(node: AnyNode): Element[] {
  return isHeading(node) ? [node] : collectHeadings(node);
}

export function containsHeading(node: AnyNode): boolean {
  return collectHeadings(node).length > 0;
}

export function* followingSiblings(node: AnyNode): Generator<ChildNode> {
  let sibling = node.nextSibling;
  while (sibling) {
    yield sibling;
    sibling = sibling.nextSibling;
  }
}

export function isAncestorOf(ancestor: AnyNode, node: AnyNode): boolean {
  let current = node.parent;
  while (current) {
    if (current === ancestor) {
      return true;
    }
    current = current.parent;
  }
  return false;
}

export function claimSubtree(node: AnyNode, claimed: Set<AnyNode>): void {
  claimed.add(node);

  if (hasChildren(node)) {
    for (const child of node.children) {
      claimSubtree(child, claimed);
    }
  }
}
