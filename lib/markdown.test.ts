import { describe, it, expect } from "vitest";
import { escapeTableCell, parseMarkdown, tableRow } from "./markdown";

describe("parseMarkdown", () => {
  it("reads headings, lists and paragraphs", () => {
    const blocks = parseMarkdown("# Guide\n\n## Inputs\n- one\n- two\n\nPlain text.\n### Notes");

    expect(blocks).toEqual([
      { kind: "heading", level: 1, text: "Guide" },
      { kind: "heading", level: 2, text: "Inputs" },
      { kind: "list", items: ["one", "two"] },
      { kind: "paragraph", text: "Plain text." },
      { kind: "heading", level: 3, text: "Notes" },
    ]);
  });

  it("reads pipe tables and drops the separator row", () => {
    const blocks = parseMarkdown("| A | B |\n| --- | --- |\n| 1 | 2 |\n| 3 | 4 |\nafter");

    expect(blocks).toEqual([
      { kind: "table", headers: ["A", "B"], rows: [["1", "2"], ["3", "4"]] },
      { kind: "paragraph", text: "after" },
    ]);
  });

  it("keeps escaped pipes inside a cell", () => {
    const blocks = parseMarkdown("| Unit | Value |\n| --- | --- |\n| mg\\|L | 5 |");
    expect(blocks).toEqual([{ kind: "table", headers: ["Unit", "Value"], rows: [["mg|L", "5"]] }]);
  });

  it("ends a list at a blank line", () => {
    expect(parseMarkdown("- a\n\n- b")).toEqual([
      { kind: "list", items: ["a"] },
      { kind: "list", items: ["b"] },
    ]);
  });
});

describe("tableRow", () => {
  it("escapes pipes and backslashes in cells", () => {
    expect(escapeTableCell("a|b\\c")).toBe("a\\|b\\\\c");
    expect(tableRow(["Panel|A", "1.0"])).toBe("| Panel\\|A | 1.0 |");
  });

  it("reads back to the same cells", () => {
    const cells = ["Panel|A", "C:\\data", "plain"];
    expect(parseMarkdown(tableRow(cells))).toEqual([{ kind: "table", headers: cells, rows: [] }]);
  });
});
