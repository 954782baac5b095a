import * as fs from "fs";
import * as path from "path";
import type { AvailableDomains, CrawlSummary, LinkRecord } from "./types";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

/** Domain statuses listed by default: the ones that mean "available" */
export const AVAILABLE_STATUSES = [
  "Potentially available",
  "Expired",
  "No DNS record found",
] as const;

/** Generate a filename with a timestamp suffix to avoid overwriting old runs. */
function timestampedPath(outputDir: string, base: string, ext: string): string {
  const ts = new Date()
    .toISOString()
    .replace(/[-:]/g, "")
    .replace("T", "_")
    .slice(0, 15); // "20260224_143022"
  return path.join(outputDir, `${base}_${ts}${ext}`);
}

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 * @param value - The raw cell value
 */
export function escapeCsv(value: string | number | null): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** A CSV column: header label and how to read the cell from a row */
interface Column<T> {
  header: string;
  value: (row: T) => string | number | null;
}

/**
 * Convert rows to a CSV string with a header row.
 * @param rows - Data rows
 * @param columns - Ordered column definitions
 */
export function toCsv<T>(rows: T[], columns: Column<T>[]): string {
  const header = columns.map((c) => escapeCsv(c.header)).join(",");
  const lines = rows.map((row) =>
    columns.map((col) => escapeCsv(col.value(row))).join(",")
  );
  return BOM + [header, ...lines].join("\n") + "\n";
}

const DEAD_LINK_COLUMNS: Column<LinkRecord>[] = [
  { header: "Article", value: (r) => r.article_title },
  { header: "Link Text", value: (r) => r.text },
  { header: "URL", value: (r) => r.url },
  { header: "Status", value: (r) => r.status_code },
  { header: "Domain", value: (r) => r.domain ?? "Unknown" },
  { header: "Available", value: (r) => (r.domain_available ? "yes" : "no") },
  { header: "Domain Status", value: (r) => r.domain_status ?? "Unknown" },
];

export interface DomainRow {
  domain: string;
  status: string;
  found_on: string;
  sources: number;
}

const DOMAIN_COLUMNS: Column<DomainRow>[] = [
  { header: "Domain", value: (r) => r.domain },
  { header: "Status", value: (r) => r.status },
  { header: "Found On", value: (r) => r.found_on },
  { header: "Sources Count", value: (r) => r.sources },
];

/**
 * Dead links, optionally narrowed to those whose domain looked available.
 */
export function filterDeadLinks(records: LinkRecord[], availableOnly = false): LinkRecord[] {
  return availableOnly ? records.filter((r) => r.domain_available === true) : records;
}

/**
 * Available-domain rows whose status is one of `statuses`, in file order.
 */
export function domainRows(
  domains: AvailableDomains,
  statuses: readonly string[] = AVAILABLE_STATUSES
): DomainRow[] {
  return Object.entries(domains)
    .filter(([, info]) => statuses.includes(info.status))
    .map(([domain, info]) => ({
      domain,
      status: info.status,
      found_on: info.found_on,
      sources: info.sources.length,
    }));
}

/**
 * Export dead links to dead_links_<timestamp>.csv.
 * @param records - Dead link records
 * @param outputDir - Target directory (created if needed)
 * @returns Path to the written file
 */
export function exportDeadLinks(
  records: LinkRecord[],
  outputDir: string,
  availableOnly = false
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "dead_links", ".csv");
  fs.writeFileSync(
    filePath,
    toCsv(filterDeadLinks(records, availableOnly), DEAD_LINK_COLUMNS),
    "utf-8"
  );
  return filePath;
}

/**
 * Export available domains to available_domains_<timestamp>.csv.
 * @returns Path to the written file
 */
export function exportAvailableDomains(
  domains: AvailableDomains,
  outputDir: string,
  statuses: readonly string[] = AVAILABLE_STATUSES
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "available_domains", ".csv");
  fs.writeFileSync(filePath, toCsv(domainRows(domains, statuses), DOMAIN_COLUMNS), "utf-8");
  return filePath;
}

/**
 * Write crawl summary statistics to summary_<timestamp>.json.
 * @returns Path to the written file
 */
export function exportSummary(
  summary: CrawlSummary,
  outputDir: string
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "summary", ".json");
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  return filePath;
}
