/**
 * Unit tests for MarkdownV2 escaping and captions.
 */
import { describe, test, expect } from "vitest";
import { CAPTION_LIMIT, codeBlock, escapeMarkdownV2, formatCaption } from "../src/transport/markdown.js";

/** Visible length once the MarkdownV2 escapes are parsed away. */
function visibleLength(escaped: string): number {
  return escaped.replace(/\\(.)/g, "$1").length;
}

describe("escapeMarkdownV2", () => {
  test("escapes every reserved character", () => {
    expect(escapeMarkdownV2("a_b*c[d]e(f)g~h`i>j#k+l-m=n|o{p}q.r!s\\t")).toBe(
      "a\\_b\\*c\\[d\\]e\\(f\\)g\\~h\\`i\\>j\\#k\\+l\\-m\\=n\\|o\\{p\\}q\\.r\\!s\\\\t",
    );
  });

  test("leaves plain text alone", () => {
    expect(escapeMarkdownV2("hello world")).toBe("hello world");
  });
});

describe("codeBlock", () => {
  test("wraps and escapes only backtick and backslash", () => {
    expect(codeBlock("cat a.* > b\\c`")).toBe("```\ncat a.* > b\\\\c\\`\n```");
  });
});

describe("formatCaption", () => {
  test("single unit", () => {
    expect(formatCaption({ filename: "report_v1.pdf", encrypted: false })).toBe(
      "File: report\\_v1\\.pdf\n🔓 Not encrypted",
    );
  });

  test("part marker", () => {
    expect(formatCaption({ filename: "a.zip", encrypted: true, part: { index: 2, total: 5 } })).toBe(
      "File: a\\.zip\n🔒 Encrypted\n\\(Part 2/5\\)",
    );
  });

  test("long names are shortened to fit the limit", () => {
    const caption = formatCaption({
      filename: `${"x.".repeat(800)}bin`,
      encrypted: false,
      part: { index: 1, total: 2 },
    });
    expect(visibleLength(caption)).toBe(CAPTION_LIMIT);
    expect(caption.endsWith("…\n🔓 Not encrypted\n\\(Part 1/2\\)")).toBe(true);
  });

  test("astral names are budgeted in UTF-16 units without splitting pairs", () => {
    const caption = formatCaption({ filename: "😀".repeat(600), encrypted: false });
    expect(caption).toBe(`File: ${"😀".repeat(500)}…\n🔓 Not encrypted`);
    expect(caption.length).toBe(CAPTION_LIMIT);
  });
});
