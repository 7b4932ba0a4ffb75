import Link from "next/link";
import DilutionPlanner from "@/components/DilutionPlanner";
import { appConfig } from "@/lib/config";

export default function Home() {
  return (
    <main>
      <header className="flex items-baseline justify-between border-b px-6 py-4 print:hidden">
        <h1 className="text-2xl font-semibold">
          Linearity sample preparation{" "}
          <span className="text-base font-normal text-neutral-500">gravimetric dilution</span>
        </h1>
        <div className="flex items-center gap-4 text-sm text-neutral-500">
          <Link href="/documentation">Documentation</Link>
          <span>Version: {appConfig.version}</span>
        </div>
      </header>
      <DilutionPlanner />
    </main>
  );
}
