import Link from "next/link";
import { MarkdownDocument } from "./MarkdownDocument";

export default function Documentation() {
  return (
    <main className="mx-auto max-w-3xl p-6">
      <Link className="text-sm text-neutral-500" href="/">
        ← Back to planner
      </Link>
      <MarkdownDocument />
    </main>
  );
}
