import type { AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { z } from "zod";
import { getErrorMessage } from "./core/utils";
import { logError, logInfo, logWarn } from "./core/logger";
import type { PageRef } from "./types";

/** Namespace ids of the search API */
const ARTICLE_NAMESPACE = 0;
const CATEGORY_NAMESPACE = 14;

const SearchResponseSchema = z.object({
  query: z
    .object({
      search: z
        .array(
          z.object({
            title: z.string().default(""),
            pageid: z.number().default(0),
            snippet: z.string().default(""),
          })
        )
        .default([]),
    })
    .default({}),
});

function pageUrl(baseUrl: string, title: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/wiki/${title.replace(/ /g, "_")}`;
}

function stripTags(html: string): string {
  return html.replace(/<[^>]+>/g, "");
}

async function search(
  http: AxiosInstance,
  baseUrl: string,
  srsearch: string,
  namespace: number,
  limit: number
) {
  const response = await http.get<unknown>(`${baseUrl.replace(/\/+$/, "")}/w/api.php`, {
    params: {
      action: "query",
      format: "json",
      list: "search",
      srsearch,
      srnamespace: String(namespace),
      srlimit: String(limit),
    },
    responseType: "json",
  });
  return SearchResponseSchema.parse(response.data).query.search;
}

/**
 * Full-text search over article titles and bodies.
 */
export async function searchWikipediaText(
  http: AxiosInstance,
  baseUrl: string,
  query: string,
  limit = 50
): Promise<PageRef[]> {
  try {
    const hits = await search(http, baseUrl, query, ARTICLE_NAMESPACE, limit);
    logInfo(`Search "${query}" returned ${hits.length} pages`);
    return hits.map((hit) => ({
      title: hit.title,
      url: pageUrl(baseUrl, hit.title),
      snippet: stripTags(hit.snippet),
      page_id: hit.pageid,
    }));
  } catch (err) {
    logError(`Error searching Wikipedia: ${getErrorMessage(err)}`, err, { query });
    return [];
  }
}

/**
 * Search the Category: namespace.
 */
export async function searchCategories(
  http: AxiosInstance,
  baseUrl: string,
  query: string
): Promise<PageRef[]> {
  try {
    const hits = await search(http, baseUrl, `Category:${query}`, CATEGORY_NAMESPACE, 20);
    return hits.map((hit) => ({ title: hit.title, url: pageUrl(baseUrl, hit.title) }));
  } catch (err) {
    logError(`Error searching categories: ${getErrorMessage(err)}`, err, { query });
    return [];
  }
}

/**
 * List the articles of a category page. Subcategories and files are skipped.
 */
export async function getPagesInCategory(
  http: AxiosInstance,
  baseUrl: string,
  categoryUrl: string
): Promise<PageRef[]> {
  try {
    const response = await http.get<string>(categoryUrl, { responseType: "text" });
    const $ = cheerio.load(response.data);

    const $content = $("#mw-content-text").first();
    if (!$content.length) {
      logWarn(`No content area on category page ${categoryUrl}`);
      return [];
    }

    const pages: PageRef[] = [];
    $content.find("li").each((_, item) => {
      const $link = $(item).find("a").first();
      const href = $link.attr("href");
      const title = $link.attr("title");
      if (!href || title === undefined) return;
      if (href.includes("Category:") || href.includes("File:")) return;
      if (!href.startsWith("/wiki/")) return;
      pages.push({ title, url: new URL(href, baseUrl).toString() });
    });

    logInfo(`Category ${categoryUrl} lists ${pages.length} pages`);
    return pages;
  } catch (err) {
    logError(`Error getting pages in category: ${getErrorMessage(err)}`, err, { categoryUrl });
    return [];
  }
}
