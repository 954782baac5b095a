#!/usr/bin/env node
import * as readline from "readline";
import * as path from "path";
import {
  configOverrides,
  deadLinkLines,
  domainLines,
  pageLines,
  parseArgs,
  pickIndex,
  type CliArgs,
} from "./cli";
import { ConfigError, loadConfig, type AppConfig } from "./core/config";
import { readPagesFromFile } from "./core/file-reader";
import { logger } from "./core/logger";
import { formatDuration } from "./core/utils";
import { CrawlSession } from "./crawl-session";
import { batchProcessArticles, crawlCategory, processArticle, type BatchResult } from "./crawler";
import { EXCLUDED_DOMAIN_ENDINGS } from "./domain-classifier";
import {
  AVAILABLE_STATUSES,
  domainRows,
  exportAvailableDomains,
  exportDeadLinks,
  exportSummary,
} from "./exporter";
import type { CrawlSummary, LinkRecord, PageRef } from "./types";
import { searchCategories, searchWikipediaText } from "./wikipedia-client";

const USAGE = `Usage: wiki-dead-links <command> [--key=value ...]

Commands:
  search --query=<text> [--limit=10]      Search articles and check their links
  categories --query=<text> [--pick=N]    Search categories; crawl the N-th match
  category --url=<category page>          Crawl the articles of a category
  article --url=<article> [--title=]      Check a single article
  file --input=<csv|xlsx> [--column=]     Check the articles listed in a file
  domains [--status=a,b]                  List and export available domains
  excluded                                Print the excluded domain endings

Options:
  --workers=N  --max-pages=N  --timeout=MS  --delay=MS  --output=DIR
  --log-file=PATH  --domains-file=PATH  --available-only`;

/**
 * Prompt the user interactively for a value via stdin.
 */
function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function required(opts: Record<string, string>, key: string, question: string): Promise<string> {
  const value = opts[key]?.trim() || (await prompt(question));
  if (!value) throw new Error(`No ${key} provided.`);
  return value;
}

function print(lines: string[]): void {
  for (const line of lines) console.log(line);
}

/**
 * Run a batch with per-article progress lines, then export and summarise.
 */
async function runBatch(
  session: CrawlSession,
  config: AppConfig,
  args: CliArgs,
  source: string,
  run: (onProgress: (fraction: number, page: PageRef, found: LinkRecord[]) => void) => Promise<BatchResult>
): Promise<void> {
  const domainsBefore = Object.keys(session.availableDomains).length;
  const startTime = Date.now();

  const { deadLinks, processedCount } = await run((fraction, page, found) => {
    const pct = Math.round(fraction * 100).toString().padStart(3);
    console.log(`   [${pct}%]  ${found.length > 0 ? "x" : "+"} ${page.title} (${found.length} dead)`);
  });
  await session.flush();

  const elapsed = Date.now() - startTime;
  const domainsAfter = Object.keys(session.availableDomains).length;

  console.log(`\nProcessed ${processedCount} pages and found ${deadLinks.length} dead links`);
  print(deadLinkLines(deadLinks, args.availableOnly));
  if (domainsAfter > 0) {
    console.log(`\nFound ${domainsAfter} potentially available domains (${domainsAfter - domainsBefore} new)`);
    console.log(`   Run "wiki-dead-links domains" to list them`);
  }

  const outputFiles: string[] = [];
  if (deadLinks.length > 0) {
    const csvPath = exportDeadLinks(deadLinks, config.outputDir, args.availableOnly);
    outputFiles.push(csvPath);
    console.log(`\n   ${csvPath}`);
  }

  const summary: CrawlSummary = {
    command: args.command ?? "",
    source,
    total_processed: processedCount,
    total_dead_links: deadLinks.length,
    total_available_domains: domainsAfter,
    new_available_domains: domainsAfter - domainsBefore,
    elapsed_time: formatDuration(elapsed),
    output_files: [...outputFiles, config.logFile, config.availableDomainsFile],
    crawled_at: new Date().toISOString(),
  };
  const summaryPath = exportSummary(summary, config.outputDir);
  console.log(`   ${summaryPath}`);
  console.log(`\nDone in ${formatDuration(elapsed)}`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.command) {
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }

  let config: AppConfig;
  try {
    config = loadConfig(process.env, configOverrides(args.opts));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
  config.outputDir = path.resolve(config.outputDir);

  if (args.command === "excluded") {
    console.log("Domain endings never reported as available:");
    for (const ending of EXCLUDED_DOMAIN_ENDINGS) console.log(`   ${ending}`);
    return;
  }

  const session = CrawlSession.open(config);
  const base = config.wikipediaBaseUrl;

  switch (args.command) {
    case "search": {
      const query = await required(args.opts, "query", "Enter search terms: ");
      const limit = Number(args.opts.limit ?? "10") || 10;
      console.log(`Step 1: Searching Wikipedia for "${query}"...`);
      const pages = await searchWikipediaText(session.http, base, query, limit);
      if (pages.length === 0) {
        console.log("   No pages found matching your search");
        return;
      }
      console.log(`   Found ${pages.length} pages`);
      print(pageLines(pages));

      console.log(`\nStep 2: Checking up to ${config.maxPages} pages (workers: ${config.maxWorkers})...`);
      await runBatch(session, config, args, query, (onProgress) =>
        batchProcessArticles(session, pages, { maxPages: config.maxPages, onProgress })
      );
      return;
    }

    case "categories": {
      const query = await required(args.opts, "query", "Enter a category name: ");
      console.log(`Step 1: Searching categories for "${query}"...`);
      const categories = await searchCategories(session.http, base, query);
      if (categories.length === 0) {
        console.log("   No categories found");
        return;
      }
      console.log(`   Found ${categories.length} categories`);
      print(pageLines(categories));

      const index = pickIndex(args.opts.pick, categories.length);
      if (index === null) {
        console.log(`\nRe-run with --pick=<1-${categories.length}> to crawl a category.`);
        return;
      }
      const selected = categories[index];
      console.log(`\nStep 2: Crawling category ${selected.title} (${selected.url})...`);
      await runBatch(session, config, args, selected.url, (onProgress) =>
        crawlCategory(session, selected.url, { maxPages: config.maxPages, onProgress })
      );
      return;
    }

    case "category": {
      const url = await required(args.opts, "url", "Enter category URL: ");
      console.log(`Crawling category ${url} (max pages: ${config.maxPages})...`);
      await runBatch(session, config, args, url, (onProgress) =>
        crawlCategory(session, url, { maxPages: config.maxPages, onProgress })
      );
      return;
    }

    case "article": {
      const url = await required(args.opts, "url", "Enter article URL: ");
      console.log(`Checking ${url}...`);
      await runBatch(session, config, args, url, async (onProgress) => {
        const found = await processArticle(session, url, args.opts.title);
        onProgress(1, { title: args.opts.title ?? url, url }, found);
        return { deadLinks: found, processedCount: 1 };
      });
      return;
    }

    case "file": {
      const input = await required(args.opts, "input", "Enter path to a CSV/XLSX file: ");
      console.log(`Step 1: Reading articles from ${input}...`);
      const pages = readPagesFromFile(input, args.opts.column);
      console.log(`   Found ${pages.length} articles`);
      if (pages.length === 0) return;

      console.log(`\nStep 2: Checking up to ${config.maxPages} pages (workers: ${config.maxWorkers})...`);
      await runBatch(session, config, args, input, (onProgress) =>
        batchProcessArticles(session, pages, { maxPages: config.maxPages, onProgress })
      );
      return;
    }

    case "domains": {
      const statuses = args.opts.status
        ? args.opts.status.split(",").map((s) => s.trim()).filter(Boolean)
        : [...AVAILABLE_STATUSES];
      const rows = domainRows(session.availableDomains, statuses);
      console.log(`Found ${Object.keys(session.availableDomains).length} potentially available domains`);
      if (rows.length === 0) {
        console.log("   No domains matching the selected filters");
        return;
      }
      print(domainLines(session.availableDomains, rows));
      const csvPath = exportAvailableDomains(session.availableDomains, config.outputDir, statuses);
      console.log(`\n   ${csvPath}`);
      return;
    }
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Unhandled error in main process");
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
