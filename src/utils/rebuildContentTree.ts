import { InvalidDigestStreamError } from "../errors/chunker/ChunkerErrorTypes";
import { ContentNode, DigestNode } from "../types/contentTypes";

interface OpenSection {
  digestHash: string;
  node: ContentNode;
}

/**
 * Reassembles a pre-order digest stream into the section tree it came from.
 *
 * Parents are looked up among the currently open ancestors only, so
 * identical sibling subtrees sharing a hash still land in the right place.
 */
export function rebuildContentTree(nodes: Iterable<DigestNode>): ContentNode {
  const open: OpenSection[] = [];
  let root: ContentNode | null = null;
  let position = 0;

  for (const digestNode of nodes) {
    position++;
    const node: ContentNode = {
      title: digestNode.title,
      text: digestNode.text,
      level: digestNode.level,
      subsections: [],
    };

    if (digestNode.parent_digest_hash === null) {
      if (root) {
        throw new InvalidDigestStreamError(`second root at line ${position}`);
      }
      root = node;
    } else {
      while (open.length > 0 && open[open.length - 1].digestHash !== digestNode.parent_digest_hash) {
        open.pop();
      }

      const parent = open[open.length - 1];
      if (!parent) {
        throw new InvalidDigestStreamError(
          `parent ${digestNode.parent_digest_hash} of line ${position} is not an open ancestor`
        );
      }
      parent.node.subsections.push(node);
    }

    open.push({ digestHash: digestNode.digest_hash, node });
  }

  if (!root) {
    throw new InvalidDigestStreamError("stream holds no nodes");
  }

  return root;
}
