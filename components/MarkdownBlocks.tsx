"use client";

import React from "react";
import type { MarkdownBlock } from "@/lib/markdown";

function renderBlock(block: MarkdownBlock, key: string): React.ReactElement {
  switch (block.kind) {
    case "heading":
      if (block.level === 1) {
        return (
          <h1 className="my-4 text-center text-2xl font-semibold" key={key}>
            {block.text}
          </h1>
        );
      }
      if (block.level === 2) {
        return (
          <h2 className="mb-2 mt-6 text-lg font-semibold" key={key}>
            {block.text}
          </h2>
        );
      }
      return (
        <h3 className="mb-2 mt-4 font-medium" key={key}>
          {block.text}
        </h3>
      );
    case "list":
      return (
        <ul className="list-disc space-y-1 pl-6 text-sm" key={key}>
          {block.items.map((item, i) => (
            <li key={`${key}-${i}`}>{item}</li>
          ))}
        </ul>
      );
    case "paragraph":
      return (
        <p className="mb-3 leading-relaxed" key={key}>
          {block.text}
        </p>
      );
    case "table":
      return (
        <table className="w-full border-collapse text-sm" key={key}>
          <thead>
            <tr className="bg-neutral-100">
              {block.headers.map((header, i) => (
                <th className="border px-2 py-1 text-center font-medium" key={`${key}-h${i}`}>
                  {header}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {block.rows.map((row, r) => (
              <tr key={`${key}-${r}`}>
                {row.map((cell, c) => (
                  <td className="border px-2 py-1 text-center" key={`${key}-${r}-${c}`}>
                    {cell}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      );
  }
}

export function MarkdownBlocks({ blocks }: { blocks: MarkdownBlock[] }) {
  return <>{blocks.map((block, i) => renderBlock(block, `block-${i}`))}</>;
}
