import Table from "cli-table3";

import type { SubtreeSettings } from "../types";

const MISSING = "-";

export function formatSubtreeTable(entries: SubtreeSettings[]): string {
  const table = new Table({
    head: ["Prefix", "Subtree", "Dir", "Repo", "Branch"],
    style: { head: [], border: [] },
  });

  for (const entry of entries) {
    table.push([
      entry.prefix,
      entry.subtree ?? MISSING,
      entry.dir ?? MISSING,
      entry.repo ?? MISSING,
      entry.branch ?? MISSING,
    ]);
  }

  return table.toString();
}
