"use client"

import { useEffect, useState } from "react"
import { MarkdownBlocks } from "@/components/MarkdownBlocks"
import { parseMarkdown, type MarkdownBlock } from "@/lib/markdown"

const GUIDE_URL = "/documentation.md"

export function MarkdownDocument() {
  const [blocks, setBlocks] = useState<MarkdownBlock[] | null>(null)
  const [error, setError] = useState<string | null>(null)

  useEffect(() => {
    let cancelled = false

    const load = async () => {
      const res = await fetch(GUIDE_URL)
      if (!res.ok) throw new Error(`Failed to load the user guide: ${res.status}`)
      const parsed = parseMarkdown(await res.text())
      if (!cancelled) setBlocks(parsed)
    }

    load().catch((err: unknown) => {
      console.error("Error loading user guide", err)
      if (!cancelled) setError(err instanceof Error ? err.message : "Failed to load the user guide.")
    })

    return () => {
      cancelled = true
    }
  }, [])

  if (error) return <div className="text-red-500">{error}</div>
  if (blocks === null) return <div className="text-sm text-neutral-500">Loading user guide…</div>

  return (
    <article className="max-w-none">
      <MarkdownBlocks blocks={blocks} />
    </article>
  )
}
