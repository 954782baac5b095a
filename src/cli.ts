import type { ConfigOverrides } from "./core/config";
import type { DomainRow } from "./exporter";
import type { AvailableDomains, DomainDetails, LinkRecord, PageRef } from "./types";

export const COMMANDS = ["search", "categories", "category", "article", "file", "domains", "excluded"] as const;
export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command | null;
  opts: Record<string, string>;
  availableOnly: boolean;
}

/**
 * Parse CLI arguments: a command followed by --key=value flags.
 * The first known command wins; other bare words are ignored.
 */
export function parseArgs(argv: string[]): CliArgs {
  const opts: Record<string, string> = {};
  let command: Command | null = null;
  let availableOnly = false;

  for (const arg of argv) {
    if (arg === "--available-only") { availableOnly = true; continue; }
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      continue;
    }
    const match = COMMANDS.find((c) => c === arg);
    if (match && command === null) command = match;
  }

  return { command, opts, availableOnly };
}

export function configOverrides(opts: Record<string, string>): ConfigOverrides {
  return {
    maxWorkers: opts.workers,
    maxPages: opts["max-pages"],
    requestTimeout: opts.timeout,
    articleDelayMs: opts.delay,
    outputDir: opts.output,
    logFile: opts["log-file"],
    availableDomainsFile: opts["domains-file"],
  };
}

/**
 * Zero-based index of a 1-based --pick value, or null when it is missing
 * or outside 1..count.
 */
export function pickIndex(value: string | undefined, count: number): number | null {
  const pick = Number(value);
  if (value === undefined || !Number.isInteger(pick) || pick < 1 || pick > count) return null;
  return pick - 1;
}

export function detailLines(details: DomainDetails, indent: string): string[] {
  return Object.entries(details).map(([key, value]) => `${indent}${key}: ${value}`);
}

export function pageLines(pages: PageRef[]): string[] {
  return pages.map((page, i) => {
    const snippet = page.snippet ? `  ${page.snippet.slice(0, 80)}` : "";
    return `   ${i + 1}. ${page.title}${snippet}`;
  });
}

/** One line per dead link, followed by the details of its domain verdict. */
export function deadLinkLines(deadLinks: LinkRecord[], availableOnly: boolean): string[] {
  const lines: string[] = [];
  for (const link of deadLinks) {
    if (availableOnly && !link.domain_available) continue;
    const icon = link.domain_available ? "+" : "x";
    lines.push(
      `   ${icon} [${link.status_code}] ${link.url}  (${link.domain ?? "no domain"}: ${link.domain_status ?? "unchecked"})`
    );
    if (link.domain_details) lines.push(...detailLines(link.domain_details, "        "));
  }
  return lines;
}

/** Each listed domain with its verdict details and every source link. */
export function domainLines(domains: AvailableDomains, rows: DomainRow[]): string[] {
  const lines: string[] = [];
  for (const row of rows) {
    lines.push(`   ${row.domain}  ${row.status}  found ${row.found_on}  (${row.sources} sources)`);
    const record = domains[row.domain];
    if (!record) continue;
    lines.push(...detailLines(record.details, "      "));
    for (const source of record.sources) {
      lines.push(`      - ${source.url}  "${source.text}"`);
      lines.push(`        on ${source.article_title} (${source.article_url})`);
    }
  }
  return lines;
}
