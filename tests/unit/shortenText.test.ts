// tests/unit/shortenText.test.ts
import { NO_LIMIT } from "../../src/constants/digestConfig";
import { shortenText } from "../../src/utils/shortenText";

describe("shortenText", () => {
  it("should return the text unchanged without a limit", () => {
    expect(shortenText("a\nb\nc", NO_LIMIT)).toBe("a\nb\nc");
    expect(shortenText("", NO_LIMIT, [{ title: "X" }])).toBe("");
  });

  it("should list subsection titles when the text is empty", () => {
    expect(shortenText("", 1, [{ title: "X" }])).toBe(
      "<p>Covered topics in this subsection:</p><ul><li>X</li></ul>"
    );
  });

  it("should escape subsection titles in the topic list", () => {
    expect(shortenText("", 1, [{ title: "A & B" }, { title: "<C>" }])).toBe(
      "<p>Covered topics in this subsection:</p><ul><li>A &amp; B</li><li>&lt;C&gt;</li></ul>"
    );
  });

  it("should cut text past the limit and mark it", () => {
    expect(shortenText("<p>a</p>\n<p>b</p>", 1)).toBe("<p>a</p>\n...");
  });

  it("should mark short text that has subsections below it", () => {
    expect(shortenText("<p>a</p>", 1, [{ title: "x" }])).toBe("<p>a</p>\n...");
  });

  it("should keep short text without subsections as is", () => {
    expect(shortenText("<p>a</p>", 1)).toBe("<p>a</p>");
    expect(shortenText("", 1, [])).toBe("");
  });

  it("should split on any line ending and ignore a final newline", () => {
    expect(shortenText("a\r\nb\rc\n", 2)).toBe("a\nb\n...");
    expect(shortenText("a\nb\n", 2)).toBe("a\nb");
  });
});
