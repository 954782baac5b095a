import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import type { PageRef } from "../types";

const URL_COLUMN_NAMES = ["url", "link", "href", "address", "uri"];
const TITLE_COLUMN_NAMES = ["title", "article", "name"];

/**
 * Read the articles to crawl from a CSV or XLSX file.
 * Rows need a URL column; a title column is optional.
 * @param filePath  Absolute or relative path to the file.
 * @param columnName  Optional header name of the URL column.
 */
export function readPagesFromFile(filePath: string, columnName?: string): PageRef[] {
  const ext = path.extname(filePath).toLowerCase();
  let rows: string[][];
  if (ext === ".csv") {
    rows = readCsvRows(filePath);
  } else if (ext === ".xlsx" || ext === ".xls") {
    rows = readXlsxRows(filePath);
  } else {
    throw new Error(
      `Unsupported file type "${ext}". Only .csv and .xlsx/.xls are supported.`
    );
  }

  if (rows.length === 0) {
    throw new Error(`File "${filePath}" is empty.`);
  }

  const headers = rows[0];
  const urlIdx = findUrlColumn(headers, columnName);
  const titleIdx = findColumn(headers, TITLE_COLUMN_NAMES);

  const pages: PageRef[] = [];
  for (const row of rows.slice(1)) {
    const url = (row[urlIdx] ?? "").trim();
    if (!isValidUrl(url)) continue;
    const title = titleIdx === -1 ? "" : (row[titleIdx] ?? "").trim();
    pages.push({ title: title || titleFromUrl(url), url });
  }
  return pages;
}

/**
 * Article title from a /wiki/ URL: last path segment, decoded, "_" as spaces.
 */
export function titleFromUrl(url: string): string {
  const segment = new URL(url).pathname.split("/").filter(Boolean).at(-1) ?? "";
  let decoded = segment;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // keep the raw segment when it is not valid percent-encoding
  }
  return decoded.replace(/_/g, " ");
}

// ── Internals ────────────────────────────────────────────────────────────────

function findColumn(headers: string[], names: string[]): number {
  for (const name of names) {
    const idx = headers.findIndex((h) => h.trim().toLowerCase() === name);
    if (idx !== -1) return idx;
  }
  return -1;
}

function findUrlColumn(headers: string[], preferred?: string): number {
  if (preferred) {
    const idx = findColumn(headers, [preferred.trim().toLowerCase()]);
    if (idx === -1) {
      throw new Error(
        `Column "${preferred}" not found.\n` +
          `   Available headers: ${headers.map((h) => `"${h}"`).join(", ")}`
      );
    }
    return idx;
  }

  const idx = findColumn(headers, URL_COLUMN_NAMES);
  if (idx !== -1) return idx;

  throw new Error(
    `No URL column found automatically.\n` +
      `   Headers present: ${headers.map((h) => `"${h}"`).join(", ")}\n` +
      `   Re-run with --column=<name> to specify the correct column.`
  );
}

function isValidUrl(str: string): boolean {
  try {
    const u = new URL(str);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

/** Minimal CSV row parser: handles quoted fields and "" escaped quotes. */
function parseCsvRow(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

function readCsvRows(filePath: string): string[][] {
  const raw = fs.readFileSync(filePath, "utf-8");
  // Strip BOM if present
  const content = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;

  return content
    .split(/\r?\n/)
    .filter((l) => l.trim() !== "")
    .map(parseCsvRow);
}

function readXlsxRows(filePath: string): string[][] {
  // Read through fs: the ESM build of xlsx has no file access of its own.
  const wb = XLSX.read(fs.readFileSync(filePath), { type: "buffer" });
  const ws = wb.Sheets[wb.SheetNames[0]];
  if (!ws) return [];

  // header:1 → array of arrays; first row is headers
  const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1 });
  return rows.map((row) => row.map((cell) => String(cell ?? "")));
}
