import { describe, expect, it } from "vitest";
import { codePointLength, firstCodePoints, lastCodePoints } from "./text";

describe("codePointLength", () => {
  it("should count an astral character once", () => {
    expect(codePointLength("a😀b")).toBe(3);
    expect(codePointLength("")).toBe(0);
  });
});

describe("firstCodePoints", () => {
  it("should keep whole surrogate pairs", () => {
    expect(firstCodePoints("😀😀😀", 2)).toBe("😀😀");
    expect(firstCodePoints(`a${"😀".repeat(5)}`, 3)).toBe("a😀😀");
  });

  it("should return the whole text when it is shorter", () => {
    expect(firstCodePoints("ab", 5)).toBe("ab");
  });

  it("should return nothing for a zero count", () => {
    expect(firstCodePoints("abc", 0)).toBe("");
  });
});

describe("lastCodePoints", () => {
  it("should not start with a lone low surrogate", () => {
    expect(lastCodePoints(`${"😀".repeat(5)}a`, 3)).toBe("😀😀a");
    expect(lastCodePoints("😀".repeat(4), 3)).toBe("😀😀😀");
  });

  it("should return nothing for a zero count", () => {
    expect(lastCodePoints("abc", 0)).toBe("");
  });
});
