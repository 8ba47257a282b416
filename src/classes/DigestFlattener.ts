import { ContentNode, DigestNode } from "../types/contentTypes";
import { computeDigestHash } from "../utils/computeDigestHash";
import { generateSectionDigest } from "../utils/generateSectionDigest";

/**
 * Walks a section tree pre-order and yields one digest node per section,
 * each as soon as it is computed.
 */
export class DigestFlattener {
  *flatten(node: ContentNode, parentDigestHash: string | null = null): Generator<DigestNode> {
    const sectionDigest = generateSectionDigest(node);
    const digestHash = computeDigestHash(sectionDigest);

    yield {
      digest_hash: digestHash,
      parent_digest_hash: parentDigestHash,
      title: node.title,
      text: node.text,
      level: node.level,
      section_digest: sectionDigest,
    };

    for (const child of node.subsections) {
      yield* this.flatten(child, digestHash);
    }
  }

  *toJsonLines(nodes: Iterable<DigestNode>): Generator<string> {
    for (const node of nodes) {
      yield `${JSON.stringify(node)}\n`;
    }
  }
}
