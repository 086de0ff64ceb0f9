import type { GmpParseResult, GmpRecord, GmpSections, RowWarning, TableRow } from "./types";

// Name/window, price, GMP, GMP %, subject to
export const MIN_DATA_CELLS = 5;

// ─── Cell helpers ─────────────────────────────────────────────────────────────

function fragments(cell: string | undefined): string[] {
  if (!cell) return [];
  return cell
    .split("\n")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** "₹100\n" → "₹100"; fragments are concatenated without a separator */
function cellText(cell: string | undefined): string {
  return fragments(cell).join("");
}

/** "Acme Corp\n(1 - 5 Jan)" → { name: "Acme Corp", window: "(1 - 5 Jan)" } */
function splitNameAndWindow(cell: string): { name: string; window: string } {
  const [name = "", window = ""] = fragments(cell);
  return { name, window };
}

function toRecord(cells: string[]): GmpRecord {
  const { name, window } = splitNameAndWindow(cells[0]);
  return {
    name,
    window,
    price: cellText(cells[1]),
    gmp: cellText(cells[2]),
    gmpPercent: cellText(cells[3]),
    subjectTo: cellText(cells[4]),
  };
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Rebuilds the section → records structure from a flat list of table rows.
 *
 * A header row opens (or re-opens) a section; every following data row is
 * appended to it. Data rows seen before the first header are dropped, and data
 * rows with fewer than five cells are skipped and reported in `warnings`.
 */
export function parseGmpRows(rows: Iterable<TableRow>): GmpParseResult {
  const sections: GmpSections = new Map();
  const warnings: RowWarning[] = [];
  let current: string | null = null;
  let rowIndex = -1;

  for (const row of rows) {
    rowIndex++;

    if (row.headerCells.length > 0) {
      const header = cellText(row.headerCells[0]);
      if (header) {
        current = header;
        if (!sections.has(header)) sections.set(header, []);
      }
      continue;
    }

    if (row.dataCells.length === 0 || current === null) continue;

    if (row.dataCells.length < MIN_DATA_CELLS) {
      warnings.push({
        rowIndex,
        section: current,
        cellCount: row.dataCells.length,
      });
      continue;
    }

    sections.get(current)?.push(toRecord(row.dataCells));
  }

  return { sections, warnings };
}

export function countRecords(sections: GmpSections): number {
  let total = 0;
  for (const records of sections.values()) total += records.length;
  return total;
}
