import { beforeEach, describe, expect, it, vi } from "vitest";
import type { CodeBlock } from "../splitter";
import { logger } from "../utils/logger";
import {
  buildCodeTitlePrompt,
  type CodeTitleGenerator,
  formatCodePayload,
  resolveCodeTitle,
} from "./codeTitle";

const block: CodeBlock = {
  code: "npm install",
  language: "sh",
  contextBefore: "Install the package.",
  contextAfter: "Then import it.",
};

describe("buildCodeTitlePrompt", () => {
  it("should wrap the code and its context in tags", () => {
    const lines = buildCodeTitlePrompt(block).split("\n");

    expect(lines.slice(0, 12)).toEqual([
      "<context_before>",
      "Install the package.",
      "</context_before>",
      "",
      "<code_example>",
      "npm install",
      "</code_example>",
      "",
      "<context_after>",
      "Then import it.",
      "</context_after>",
      "",
    ]);
    expect(lines[12]).toMatch(/^Based on the code example and its surrounding context/);
  });

  it("should keep the end of the preceding prose and the start of the rest", () => {
    const lines = buildCodeTitlePrompt({
      code: `${"c".repeat(1500)}${"d".repeat(100)}`,
      language: "",
      contextBefore: `${"a".repeat(100)}${"b".repeat(500)}`,
      contextAfter: `${"e".repeat(500)}${"f".repeat(100)}`,
    }).split("\n");

    expect(lines[1]).toBe("b".repeat(500));
    expect(lines[5]).toBe("c".repeat(1500));
    expect(lines[9]).toBe("e".repeat(500));
  });

  it("should truncate astral context without splitting characters", () => {
    const lines = buildCodeTitlePrompt({
      code: "run()",
      language: "",
      contextBefore: "😀".repeat(600),
      contextAfter: "🎉".repeat(600),
    }).split("\n");

    expect(lines[1]).toBe("😀".repeat(500));
    expect(lines[9]).toBe("🎉".repeat(500));
  });
});

describe("resolveCodeTitle", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should return the trimmed generated title", async () => {
    const generator: CodeTitleGenerator = {
      generateTitle: vi.fn().mockResolvedValue("  Installing the package with npm \n"),
    };

    await expect(resolveCodeTitle(generator, block)).resolves.toBe(
      "Installing the package with npm",
    );
    expect(generator.generateTitle).toHaveBeenCalledWith(buildCodeTitlePrompt(block));
  });

  it("should fall back when the generator fails", async () => {
    const generator: CodeTitleGenerator = {
      generateTitle: vi.fn().mockRejectedValue(new Error("quota exceeded")),
    };

    await expect(resolveCodeTitle(generator, block)).resolves.toBe("Code Snippet");
    expect(logger.warn).toHaveBeenCalledWith(
      "⚠️ Failed to generate code title: quota exceeded",
    );
  });

  it("should fall back when the generator returns a blank title", async () => {
    const generator: CodeTitleGenerator = {
      generateTitle: vi.fn().mockResolvedValue("   "),
    };

    await expect(resolveCodeTitle(generator, block)).resolves.toBe("Code Snippet");
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe("formatCodePayload", () => {
  it("should label plain code", () => {
    expect(formatCodePayload("ls")).toBe("Code Snippet:\nls");
  });

  it("should put the title first when there is one", () => {
    expect(formatCodePayload("ls", "Listing files")).toBe(
      "Title: Listing files\n\nCode Snippet:\nls",
    );
  });
});
