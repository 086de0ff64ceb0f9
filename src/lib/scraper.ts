import * as cheerio from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";
import { FetchFailedError } from "./errors";
import { countRecords, MIN_DATA_CELLS, parseGmpRows } from "./parser";
import type { GmpPageResult, GmpSummary, TableRow } from "./types";

// ─── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_SOURCE_URL = "https://ipocentral.in/ipo-discussion/";

const FETCH_TIMEOUT_MS = 20000;

const FETCH_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0 Safari/537.36",
  Accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  Connection: "keep-alive",
};

export const BLOCKED_MESSAGE =
  "Scraping blocked by the website (HTTP 403 Forbidden). They may be blocking bots / scripts.";

export const EMPTY_MESSAGE = "No GMP table data could be parsed from the page.";

export interface ScrapeOptions {
  url: string;
  referer?: string;
  timeoutMs?: number;
}

// ─── Fetch ────────────────────────────────────────────────────────────────────

function refererFor(url: string): string {
  return `${new URL(url).origin}/`;
}

/**
 * Single GET of the GMP page. A 403 comes back as the "blocked" sentinel;
 * every other failure throws FetchFailedError.
 */
export async function fetchGmpPage(options: ScrapeOptions): Promise<GmpPageResult> {
  const { url, timeoutMs = FETCH_TIMEOUT_MS } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { ...FETCH_HEADERS, Referer: options.referer ?? refererFor(url) },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new FetchFailedError(`fetchGmpPage: request to ${url} failed`, url, undefined, {
      cause: err,
    });
  }

  if (response.status === 403) {
    console.warn(`fetchGmpPage: HTTP 403 Forbidden for ${url}`);
    return { status: "blocked", httpStatus: 403 };
  }

  if (!response.ok) {
    throw new FetchFailedError(
      `fetchGmpPage: HTTP ${response.status} for ${url}`,
      url,
      response.status
    );
  }

  return { status: "ok", html: await response.text() };
}

// ─── Row extraction ───────────────────────────────────────────────────────────

// Whitespace inside a text node collapses to one space, so "\n" in cell text
// only ever separates text nodes.
function textFragments(node: AnyNode): string[] {
  if (isText(node)) {
    const text = node.data.replace(/\s+/g, " ").trim();
    return text ? [text] : [];
  }
  if (hasChildren(node)) return node.children.flatMap(textFragments);
  return [];
}

/** `<td>Acme Corp<br><span>(1 - 5 Jan)</span></td>` → "Acme Corp\n(1 - 5 Jan)" */
function cellText(cell: AnyNode): string {
  return textFragments(cell).join("\n");
}

/** Every `<tr>` on the page, in document order. */
export function extractTableRows(html: string): TableRow[] {
  const $ = cheerio.load(html);
  const rows: TableRow[] = [];

  $("tr").each((_, row) => {
    const $row = $(row);
    rows.push({
      headerCells: $row.find("th").toArray().map(cellText),
      dataCells: $row.find("td").toArray().map(cellText),
    });
  });

  return rows;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Fetches the GMP page and turns it into a summary. Blocked and empty pages
 * come back as placeholder summaries; fetch failures propagate.
 */
export async function scrapeGmpSummary(options: ScrapeOptions): Promise<GmpSummary> {
  const page = await fetchGmpPage(options);

  if (page.status === "blocked") {
    return { status: "blocked", sourceUrl: options.url, message: BLOCKED_MESSAGE };
  }

  const rows = extractTableRows(page.html);
  const { sections, warnings } = parseGmpRows(rows);

  for (const warning of warnings) {
    console.warn(
      `scrapeGmpSummary: skipped row ${warning.rowIndex} in "${warning.section}": ` +
        `expected at least ${MIN_DATA_CELLS} data cells, found ${warning.cellCount}`
    );
  }

  if (sections.size === 0) {
    console.log(`scrapeGmpSummary: no GMP sections found in ${rows.length} rows`);
    return { status: "empty", sourceUrl: options.url, message: EMPTY_MESSAGE };
  }

  console.log(
    `scrapeGmpSummary: parsed ${countRecords(sections)} IPOs across ${sections.size} sections`
  );

  return {
    status: "ok",
    report: {
      sourceUrl: options.url,
      sections,
      warnings,
    },
  };
}
