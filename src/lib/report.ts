import type {
  GmpRecord,
  GmpReport,
  GmpSummary,
  RenderedReport,
  ReportFormat,
} from "./types";

export const REPORT_TITLE = "IPO GMP Summary from IPO Central";

export interface ReportRenderer {
  readonly format: ReportFormat;
  render(summary: GmpSummary): RenderedReport;
}

// ─── Plain text ───────────────────────────────────────────────────────────────

/** "20" → "20%", "20%" → "20%" */
function withPercent(value: string): string {
  return value.endsWith("%") ? value : `${value}%`;
}

function recordLine(ipo: GmpRecord): string {
  const label = ipo.window ? `${ipo.name} ${ipo.window}` : ipo.name;
  return (
    `- ${label}: Price ${ipo.price}, GMP ${ipo.gmp} ` +
    `(${withPercent(ipo.gmpPercent)}), Subject to ${ipo.subjectTo}`
  );
}

function reportText(report: GmpReport): string {
  const lines: string[] = [REPORT_TITLE, report.sourceUrl, ""];

  for (const [section, ipos] of report.sections) {
    lines.push(`${section}:`);
    if (ipos.length === 0) lines.push("  (no rows)");
    for (const ipo of ipos) lines.push(recordLine(ipo));
    lines.push("");
  }

  return lines.join("\n");
}

export function renderText(summary: GmpSummary): string {
  return summary.status === "ok" ? reportText(summary.report) : summary.message;
}

// ─── HTML ─────────────────────────────────────────────────────────────────────

const STYLES = {
  body: "font-family:Arial,Helvetica,sans-serif;color:#1f2937;background:#ffffff;margin:0;padding:16px",
  title: "font-size:20px;margin:0 0 4px",
  source: "font-size:12px;color:#6b7280;margin:0 0 16px",
  link: "color:#2563eb",
  section: "font-size:16px;margin:24px 0 8px",
  table: "border-collapse:collapse;width:100%;font-size:14px",
  th: "background:#f3f4f6;border:1px solid #d1d5db;padding:6px 10px;text-align:left",
  td: "border:1px solid #d1d5db;padding:6px 10px",
  empty: "border:1px solid #d1d5db;padding:6px 10px;color:#6b7280;font-style:italic",
  message: "font-size:14px",
} as const;

const COLUMNS = ["IPO", "Bidding window", "Price", "GMP", "GMP %", "Subject to"];

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function td(value: string): string {
  return `<td style="${STYLES.td}">${escapeHtml(value)}</td>`;
}

function recordRow(ipo: GmpRecord): string {
  const cells = [ipo.name, ipo.window, ipo.price, ipo.gmp, ipo.gmpPercent, ipo.subjectTo];
  return `<tr>${cells.map(td).join("")}</tr>`;
}

function sectionTable(section: string, ipos: GmpRecord[]): string {
  const head = COLUMNS.map((col) => `<th style="${STYLES.th}">${col}</th>`).join("");
  const body =
    ipos.length > 0
      ? ipos.map(recordRow)
      : [`<tr><td colspan="${COLUMNS.length}" style="${STYLES.empty}">No rows</td></tr>`];

  return [
    `<h2 style="${STYLES.section}">${escapeHtml(section)}</h2>`,
    `<table style="${STYLES.table}">`,
    `<thead><tr>${head}</tr></thead>`,
    "<tbody>",
    ...body,
    "</tbody>",
    "</table>",
  ].join("\n");
}

function htmlDocument(content: string[]): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${REPORT_TITLE}</title>`,
    "</head>",
    `<body style="${STYLES.body}">`,
    ...content,
    "</body>",
    "</html>",
  ].join("\n");
}

export function renderHtml(summary: GmpSummary): string {
  if (summary.status !== "ok") {
    return htmlDocument([`<p style="${STYLES.message}">${escapeHtml(summary.message)}</p>`]);
  }

  const { report } = summary;
  const url = escapeHtml(report.sourceUrl);
  const content = [
    `<h1 style="${STYLES.title}">${REPORT_TITLE}</h1>`,
    `<p style="${STYLES.source}"><a href="${url}" style="${STYLES.link}">${url}</a></p>`,
  ];
  for (const [section, ipos] of report.sections) {
    content.push(sectionTable(section, ipos));
  }

  return htmlDocument(content);
}

// ─── Strategies ───────────────────────────────────────────────────────────────

export const textRenderer: ReportRenderer = {
  format: "text",
  render: (summary) => ({ text: renderText(summary) }),
};

// The plain-text part travels alongside the HTML as multipart/alternative.
export const htmlRenderer: ReportRenderer = {
  format: "html",
  render: (summary) => ({ text: renderText(summary), html: renderHtml(summary) }),
};

export function createRenderer(format: ReportFormat): ReportRenderer {
  return format === "html" ? htmlRenderer : textRenderer;
}
