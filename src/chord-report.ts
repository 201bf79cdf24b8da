import { CHORD_SLOTS } from "./chord-classifier.js";
import type { ChordCatalog } from "./types.js";

/**
 * Markdown table of a chord catalog: one row per chord, sorted by name,
 * one column per chord tone
 */
export function formatChordTable(catalog: ChordCatalog): string {
  const columns = Array.from({ length: CHORD_SLOTS }, (_, i) => String(i + 1));
  const lines = [
    `| Chord | ${columns.join(" | ")} |`,
    `| --- | ${columns.map(() => "---").join(" | ")} |`,
  ];

  for (const name of Object.keys(catalog).sort()) {
    const cells = catalog[name].slice(0, CHORD_SLOTS);
    while (cells.length < CHORD_SLOTS) cells.push("");
    lines.push(`| ${name} | ${cells.join(" | ")} |`);
  }

  return lines.join("\n");
}
