// tests/unit/digestFlattener.test.ts
import { DigestFlattener } from "../../src/classes/DigestFlattener";
import { ContentNode } from "../../src/types/contentTypes";
import { canonicalizeSectionDigest, computeDigestHash } from "../../src/utils/computeDigestHash";
import { generateSectionDigest } from "../../src/utils/generateSectionDigest";

const leaf = (title: string, text: string, level: number | null = 2): ContentNode => ({
  title,
  text,
  level,
  subsections: [],
});

const sampleTree: ContentNode = {
  title: "T",
  text: "<p>A</p>",
  level: 1,
  subsections: [leaf("S1", "<p>B</p>"), leaf("S2", "<p>C</p>")],
};

describe("generateSectionDigest", () => {
  const children = [
    leaf("S1", "<p>B</p>\n<p>B2</p>"),
    { ...leaf("S2", ""), subsections: [leaf("Deep", "<p>d</p>", 3)] },
  ];

  it("should shorten children to one line when the parent has text", () => {
    const digest = generateSectionDigest({ title: "T", text: "<p>A</p>", level: 1, subsections: children });

    expect(digest).toEqual({
      title: "T",
      text: "<p>A</p>",
      subsections: [
        { title: "S1", text: "<p>B</p>\n..." },
        { title: "S2", text: "<p>Covered topics in this subsection:</p><ul><li>Deep</li></ul>" },
      ],
    });
  });

  it("should keep children whole when the parent has no text", () => {
    const digest = generateSectionDigest({ title: "T", text: "", level: 1, subsections: children });

    expect(digest.subsections).toEqual([
      { title: "S1", text: "<p>B</p>\n<p>B2</p>" },
      { title: "S2", text: "" },
    ]);
  });
});

describe("computeDigestHash", () => {
  const digest = generateSectionDigest(sampleTree);

  it("should serialize digests with a fixed key order", () => {
    expect(
      canonicalizeSectionDigest({ subsections: [{ text: "y", title: "S" }], text: "x", title: "T" })
    ).toBe('{"title":"T","text":"x","subsections":[{"title":"S","text":"y"}]}');
  });

  it("should hash the canonical form with 128-bit BLAKE2b", () => {
    expect(
      computeDigestHash({ title: "T", text: "x", subsections: [{ title: "S", text: "y" }] })
    ).toBe("0c40655cf077dbf3e8e36bc853a615f8");
  });

  it("should produce a stable 128-bit hex hash", () => {
    const hash = computeDigestHash(digest);

    expect(hash).toMatch(/^[0-9a-f]{32}$/);
    expect(computeDigestHash(generateSectionDigest(sampleTree))).toBe(hash);
  });

  it("should ignore properties outside the digest", () => {
    const withExtra = { ...digest, extra: "ignored" };

    expect(computeDigestHash(withExtra)).toBe(computeDigestHash(digest));
  });

  it("should change when the digest content changes", () => {
    expect(computeDigestHash({ ...digest, text: "<p>Changed</p>" })).not.toBe(computeDigestHash(digest));
  });
});

describe("DigestFlattener", () => {
  const flattener = new DigestFlattener();

  it("should yield nodes in pre-order with parent links", () => {
    const nodes = Array.from(flattener.flatten(sampleTree));

    expect(nodes.map((node) => node.title)).toEqual(["T", "S1", "S2"]);
    expect(nodes[0].parent_digest_hash).toBeNull();
    expect(nodes[1].parent_digest_hash).toBe(nodes[0].digest_hash);
    expect(nodes[2].parent_digest_hash).toBe(nodes[0].digest_hash);
    expect(nodes[0]).toMatchObject({ text: "<p>A</p>", level: 1 });
    expect(nodes[0].section_digest).toEqual({
      title: "T",
      text: "<p>A</p>",
      subsections: [
        { title: "S1", text: "<p>B</p>" },
        { title: "S2", text: "<p>C</p>" },
      ],
    });
    expect(nodes[1].digest_hash).toBe(computeDigestHash({ title: "S1", text: "<p>B</p>", subsections: [] }));
  });

  it("should yield the root before touching the children", () => {
    const first = flattener.flatten(sampleTree).next();

    expect(first.done).toBe(false);
    expect(first.value).toMatchObject({ title: "T", parent_digest_hash: null });
  });

  it("should give identical subtrees the same hash", () => {
    const tree: ContentNode = {
      title: "R",
      text: "",
      level: null,
      subsections: [leaf("Same", "<p>s</p>"), leaf("Same", "<p>s</p>")],
    };
    const [root, first, second] = Array.from(flattener.flatten(tree));

    expect(first.digest_hash).toBe(second.digest_hash);
    expect(second.parent_digest_hash).toBe(root.digest_hash);
  });

  it("should keep the parent hash when only a truncated line of a child changes", () => {
    const [original, originalChild] = Array.from(
      flattener.flatten({ ...sampleTree, subsections: [leaf("S1", "<p>B</p>\n<p>B2</p>")] })
    );
    const [edited, editedChild] = Array.from(
      flattener.flatten({ ...sampleTree, subsections: [leaf("S1", "<p>B</p>\n<p>other</p>")] })
    );

    expect(edited.digest_hash).toBe(original.digest_hash);
    expect(editedChild.digest_hash).not.toBe(originalChild.digest_hash);
  });

  it("should write one JSON document per line", () => {
    const nodes = Array.from(flattener.flatten(sampleTree));
    const lines = Array.from(flattener.toJsonLines(nodes));

    expect(lines).toHaveLength(3);
    lines.forEach((line, index) => {
      expect(line.endsWith("\n")).toBe(true);
      expect(line.indexOf("\n")).toBe(line.length - 1);
      expect(JSON.parse(line)).toEqual(nodes[index]);
    });
  });
});
