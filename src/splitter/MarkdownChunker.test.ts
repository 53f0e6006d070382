import { describe, expect, it } from "vitest";
import { chunkText, MarkdownChunker } from "./MarkdownChunker";

const countFences = (text: string) => text.split("```").length - 1;

describe("MarkdownChunker", () => {
  it("should handle empty markdown", () => {
    expect(chunkText("", 1500)).toEqual([]);
  });

  it("should return a small document as a single chunk", () => {
    expect(chunkText("# Title\nShort body.", 1500)).toEqual(["# Title\nShort body."]);
  });

  it("should default to a chunk size of 1500", () => {
    const markdown = `# Big\n${"a ".repeat(700).trim()}`;
    expect(markdown.length).toBeLessThanOrEqual(1500);

    expect(new MarkdownChunker().splitText(markdown)).toEqual([markdown]);
    expect(chunkText(`${markdown} ${"b ".repeat(100).trim()}`).length).toBeGreaterThan(1);
  });

  it("should emit one chunk per small section in document order", () => {
    expect(chunkText("# A\nalpha\n## B\nbeta", 1500)).toEqual(["# A\nalpha", "## B\nbeta"]);
  });

  it("should keep fenced hash lines inside their section", () => {
    const markdown = "# Install\nRun this:\n```bash\n# comment\nnpm ci\n```\n## Next\nMore.";

    expect(chunkText(markdown, 1500)).toEqual([
      "# Install\nRun this:\n```bash\n# comment\nnpm ci\n```",
      "## Next\nMore.",
    ]);
  });

  it("should split oversized sections at paragraphs and repeat the header", () => {
    const paragraph = Array(20).fill("word").join(" ");
    const markdown = `# Guide\n${Array(5).fill(paragraph).join("\n\n")}`;

    const chunks = chunkText(markdown, 150);

    expect(chunks).toEqual(Array(5).fill(`# Guide\n${paragraph}`));
  });

  it("should not inject anything into headerless continuation chunks", () => {
    const markdown = "word ".repeat(50).trim();

    const chunks = chunkText(markdown, 100);

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.startsWith("word")).toBe(true);
      expect(chunk.length).toBeLessThanOrEqual(100);
    }
    expect(chunks.join(" ")).toBe(markdown);
  });

  it("should only split the sections that exceed the chunk size", () => {
    const long = `## Long\n${"x".repeat(150)}`;
    const markdown = `# Short\ntext\n${long}\n# Tail\nend`;

    const chunks = chunkText(markdown, 100);

    expect(chunks).toEqual([
      "# Short\ntext",
      `## Long\n${"x".repeat(84)}`,
      `## Long\n${"x".repeat(66)}`,
      "# Tail\nend",
    ]);
  });

  it("should split a header and an unbroken body into five chunks", () => {
    const chunks = chunkText(`# Title\n${"a".repeat(2000)}`, 500);

    expect(chunks.map((chunk) => chunk.length)).toEqual([492, 500, 500, 500, 48]);
    expect(chunks[0]).toBe(`# Title\n${"a".repeat(484)}`);
    expect(chunks.slice(1)).toEqual([
      `# Title\n${"a".repeat(492)}`,
      `# Title\n${"a".repeat(492)}`,
      `# Title\n${"a".repeat(492)}`,
      `# Title\n${"a".repeat(40)}`,
    ]);
  });

  it("should keep every fenced block whole across a multi-block document", () => {
    const prose = "Some prose here.";
    const block = `\`\`\`js\n${"const a = 1;\n".repeat(5)}\`\`\``;
    const markdown = [prose, block, prose, block, prose, block, prose].join("\n\n");
    expect(markdown).toHaveLength(298);

    const chunks = chunkText(markdown, 120);

    expect(chunks).toEqual([
      `${prose}\n\n${block}\n\n${prose}`,
      `${block}\n\n${prose}`,
      `${block}\n\n${prose}`,
    ]);
    for (const chunk of chunks) {
      expect(countFences(chunk)).toBe(2);
    }
  });

  it("should count astral characters once when checking the chunk size", () => {
    const markdown = "😀".repeat(1000);

    expect(chunkText(markdown, 1500)).toEqual([markdown]);
  });
});
