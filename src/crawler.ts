import * as cheerio from "cheerio";
import type { CrawlSession } from "./crawl-session";
import { extractArticleTitle, extractExternalLinks } from "./link-extractor";
import { checkLinkStatus, isDeadStatus } from "./liveness-checker";
import { getPagesInCategory } from "./wikipedia-client";
import { getErrorMessage, runPool, sleep } from "./core/utils";
import { createLogger, logError } from "./core/logger";
import type { ArticleLink, LinkRecord, PageRef } from "./types";

export interface BatchOptions {
  /** Only the first `maxPages` pages are processed */
  maxPages?: number;
  /** Called after each article with the fraction of the batch done */
  onProgress?: (fraction: number, page: PageRef, deadLinks: LinkRecord[]) => void;
}

export interface BatchResult {
  deadLinks: LinkRecord[];
  processedCount: number;
}

/**
 * Fetch an article, check every external link on it and return the dead ones.
 * Each dead link is persisted as soon as its check completes. A failed or
 * non-200 article fetch is logged and yields no links.
 * @param session - Crawl session holding the HTTP client and result files
 * @param articleUrl - Article page URL
 * @param articleTitle - Title to record; read from the page heading when omitted
 */
export async function processArticle(
  session: CrawlSession,
  articleUrl: string,
  articleTitle?: string
): Promise<LinkRecord[]> {
  const log = createLogger({ article: articleUrl });

  try {
    const response = await session.http.get<string>(articleUrl, {
      responseType: "text",
      timeout: session.options.requestTimeout,
      validateStatus: () => true,
    });
    if (response.status !== 200) {
      log.error({ status: response.status }, `Failed to retrieve article: ${articleUrl}`);
      return [];
    }

    const $ = cheerio.load(response.data);
    const title = articleTitle || extractArticleTitle($);
    const links: ArticleLink[] = extractExternalLinks($).map((link) => ({
      ...link,
      article_title: title,
      article_url: articleUrl,
    }));
    log.debug(`Checking ${links.length} external links on "${title}"`);

    const deadLinks: LinkRecord[] = [];
    await runPool(
      links,
      session.options.maxWorkers,
      (link) => checkLinkStatus(session, link),
      async (_completed, _total, _link, result) => {
        if (!isDeadStatus(result.status_code)) return;
        deadLinks.push(result);
        await session.recordDeadLink(result);
      }
    );

    log.info(`"${title}": ${deadLinks.length} dead of ${links.length} links`);
    return deadLinks;
  } catch (err) {
    logError(`Error processing article: ${getErrorMessage(err)}`, err, { article: articleUrl });
    return [];
  }
}

/**
 * Process pages one at a time, pausing between articles to limit the
 * request rate against Wikipedia. Link checks within an article run on the
 * session's worker pool.
 */
export async function batchProcessArticles(
  session: CrawlSession,
  pages: PageRef[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const batch = options.maxPages ? pages.slice(0, options.maxPages) : pages;
  const deadLinks: LinkRecord[] = [];
  let processedCount = 0;

  for (let i = 0; i < batch.length; i++) {
    const page = batch[i];
    if (i > 0) await sleep(session.options.articleDelayMs);

    const found = await processArticle(session, page.url, page.title);
    deadLinks.push(...found);
    processedCount++;

    options.onProgress?.((i + 1) / batch.length, page, found);
  }

  return { deadLinks, processedCount };
}

/**
 * Crawl the articles listed on a category page.
 */
export async function crawlCategory(
  session: CrawlSession,
  categoryUrl: string,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const pages = await getPagesInCategory(session.http, session.options.wikipediaBaseUrl, categoryUrl);
  return batchProcessArticles(session, pages, { ...options, maxPages: options.maxPages ?? 10 });
}
