/**
 * One `<tr>` as the parser sees it. Cell text keeps each trimmed text
 * fragment of the cell on its own line, e.g. "Acme Corp\n(1 - 5 Jan)".
 */
export interface TableRow {
  headerCells: string[];
  dataCells: string[];
}

export interface GmpRecord {
  name: string;
  window: string;
  price: string;
  gmp: string;
  gmpPercent: string;
  subjectTo: string;
}

/** Section header text → records, in the order headers first appear. */
export type GmpSections = Map<string, GmpRecord[]>;

export interface RowWarning {
  rowIndex: number;
  section: string;
  cellCount: number;
}

export interface GmpParseResult {
  sections: GmpSections;
  warnings: RowWarning[];
}

export interface GmpReport {
  sourceUrl: string;
  sections: GmpSections;
  warnings: RowWarning[];
}

export type GmpSummary =
  | { status: "ok"; report: GmpReport }
  | { status: "blocked"; sourceUrl: string; message: string }
  | { status: "empty"; sourceUrl: string; message: string };

export type GmpPageResult =
  | { status: "ok"; html: string }
  | { status: "blocked"; httpStatus: 403 };

export type ReportFormat = "text" | "html";

export type DeliveryMode = "email" | "console";

export interface RenderedReport {
  text: string;
  html?: string;
}

export interface ReportMessage extends RenderedReport {
  subject: string;
}
