/**
 * The small Markdown subset used by the in-app documentation and the
 * preparation report: headings, bullet lists, paragraphs and pipe tables.
 */
export type MarkdownBlock =
  | { kind: "heading"; level: 1 | 2 | 3; text: string }
  | { kind: "list"; items: string[] }
  | { kind: "paragraph"; text: string }
  | { kind: "table"; headers: string[]; rows: string[][] };

/** Escape a value for use inside a pipe-table cell. */
export function escapeTableCell(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\|/g, "\\|");
}

export function tableRow(cells: string[]): string {
  return `| ${cells.map(escapeTableCell).join(" | ")} |`;
}

function splitTableRow(line: string): string[] {
  const cells: string[] = [];
  let current = "";
  const body = line.trim().replace(/^\|/, "");

  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === "\\" && i + 1 < body.length) {
      current += body[i + 1];
      i++;
    } else if (ch === "|") {
      cells.push(current.trim());
      current = "";
    } else {
      current += ch;
    }
  }
  // Text after the closing pipe is not a cell.
  if (current.trim() !== "") cells.push(current.trim());
  return cells;
}

function isSeparatorRow(cells: string[]): boolean {
  return cells.length > 0 && cells.every((cell) => /^:?-{3,}:?$/.test(cell));
}

const HEADING = /^(#{1,3}) (.*)$/;

export function parseMarkdown(markdown: string): MarkdownBlock[] {
  const blocks: MarkdownBlock[] = [];
  let listItems: string[] = [];
  let tableLines: string[] = [];

  const flushList = () => {
    if (listItems.length === 0) return;
    blocks.push({ kind: "list", items: listItems });
    listItems = [];
  };

  const flushTable = () => {
    if (tableLines.length === 0) return;
    const [headerLine = "", ...rest] = tableLines;
    const rows = rest.map(splitTableRow);
    if (rows.length > 0 && isSeparatorRow(rows[0])) rows.shift();
    blocks.push({ kind: "table", headers: splitTableRow(headerLine), rows });
    tableLines = [];
  };

  for (const rawLine of markdown.split(/\r?\n/)) {
    const line = rawLine.trimEnd();

    if (line.trimStart().startsWith("|")) {
      flushList();
      tableLines.push(line);
      continue;
    }
    flushTable();

    if (!line.trim()) {
      flushList();
      continue;
    }

    const heading = HEADING.exec(line);
    if (heading) {
      flushList();
      const level = heading[1].length;
      blocks.push({ kind: "heading", level: level === 1 ? 1 : level === 2 ? 2 : 3, text: heading[2] });
      continue;
    }

    if (line.startsWith("- ")) {
      listItems.push(line.slice(2));
      continue;
    }

    flushList();
    blocks.push({ kind: "paragraph", text: line });
  }

  flushList();
  flushTable();
  return blocks;
}
