/**
 * Content sanitization and truncation tests
 */
import { describe, expect, it } from "vitest";
import { sanitizeContent, truncateContent } from "../../src/sanitize.js";

const TRUNCATE = { maxChars: 1000, headRatio: 0.3, tailRatio: 0.3 };

// =============================================================================
// sanitizeContent
// =============================================================================

describe("sanitizeContent", () => {
  it("returns empty string for null and undefined", () => {
    expect(sanitizeContent(null)).toBe("");
    expect(sanitizeContent(undefined)).toBe("");
  });

  it("unwraps chat reply wrappers", () => {
    expect(sanitizeContent('<chat id="1">Hello there</chat>')).toBe("Hello there");
  });

  it("joins multiple wrappers and drops text outside them", () => {
    expect(sanitizeContent("<chat>one</chat> junk <chat>two</chat>")).toBe("one two");
  });

  it("removes processing placeholders", () => {
    expect(sanitizeContent("[Voice: Processing...]")).toBe("");
    expect(sanitizeContent("[Image: processing…] caption")).toBe("caption");
  });

  it("rewrites image summaries", () => {
    expect(sanitizeContent("Look [Image Summary: a red bicycle] nice")).toBe("Look Image content: a red bicycle nice");
  });

  it("strips other markup and collapses whitespace", () => {
    expect(sanitizeContent("<b>bold</b>   text\n\nmore")).toBe("bold text more");
  });
});

// =============================================================================
// truncateContent
// =============================================================================

describe("truncateContent", () => {
  it("leaves short content alone", () => {
    expect(truncateContent("short text", TRUNCATE)).toBe("short text");
  });

  it("keeps head and tail around an elision marker", () => {
    const text = "h".repeat(300) + "m".repeat(2400) + "t".repeat(300);
    const result = truncateContent(text, TRUNCATE);
    expect(result).toBe(`${"h".repeat(300)}\n\n[... 2400 chars omitted ...]\n\n${"t".repeat(300)}`);
    expect(result.length).toBe(632);
  });

  it("is idempotent", () => {
    const once = truncateContent("x".repeat(5000), TRUNCATE);
    expect(truncateContent(once, TRUNCATE)).toBe(once);
  });
});
