// tests/unit/rebuildContentTree.test.ts
import { DigestFlattener } from "../../src/classes/DigestFlattener";
import { InvalidDigestStreamError } from "../../src/errors/chunker/ChunkerErrorTypes";
import { ContentNode } from "../../src/types/contentTypes";
import { rebuildContentTree } from "../../src/utils/rebuildContentTree";

const flattener = new DigestFlattener();

const branch = (title: string, level: number, subsections: ContentNode[] = []): ContentNode => ({
  title,
  text: `<p>${title} text</p>`,
  level,
  subsections,
});

describe("rebuildContentTree", () => {
  it("should restore the tree a digest stream came from", () => {
    const tree = branch("Root", 1, [branch("A", 2, [branch("A1", 3)]), branch("B", 2)]);

    expect(rebuildContentTree(flattener.flatten(tree))).toEqual(tree);
  });

  it("should reproduce the same hashes when flattened again", () => {
    const tree = branch("Root", 1, [branch("A", 2), branch("B", 2, [branch("B1", 4)])]);
    const hashes = Array.from(flattener.flatten(tree), (node) => node.digest_hash);
    const rebuilt = rebuildContentTree(flattener.flatten(tree));

    expect(Array.from(flattener.flatten(rebuilt), (node) => node.digest_hash)).toEqual(hashes);
  });

  it("should place identical sibling subtrees under the right parents", () => {
    const tree: ContentNode = {
      title: "R",
      text: "",
      level: null,
      subsections: [branch("Twin", 2, [branch("Leaf", 3)]), branch("Twin", 2, [branch("Leaf", 3)])],
    };

    expect(rebuildContentTree(flattener.flatten(tree))).toEqual(tree);
  });

  it("should reject an empty stream", () => {
    expect(() => rebuildContentTree([])).toThrow("INVALID_DIGEST_STREAM: stream holds no nodes");
  });

  it("should reject a second root", () => {
    const [root] = Array.from(flattener.flatten(branch("Root", 1)));

    expect(() => rebuildContentTree([root, root])).toThrow(
      "INVALID_DIGEST_STREAM: second root at line 2"
    );
  });

  it("should reject a node whose parent is not an open ancestor", () => {
    const nodes = Array.from(flattener.flatten(branch("Root", 1, [branch("A", 2)])));

    expect(() => rebuildContentTree(nodes.slice(1))).toThrow(InvalidDigestStreamError);
    expect(() => rebuildContentTree(nodes.slice(1))).toThrow(
      `parent ${nodes[0].digest_hash} of line 1 is not an open ancestor`
    );
  });
});
