import * as cheerio from "cheerio";
import type { ExtractedLink } from "./types";

type CheerioEl = ReturnType<cheerio.CheerioAPI>;

const ARCHIVE_URL_RE = /^https?:\/\/web\.archive\.org/i;

/**
 * First <ul> following `$start` in document order: later siblings and their
 * descendants, then the same for each ancestor.
 */
function findNextList($: cheerio.CheerioAPI, $start: CheerioEl): CheerioEl | null {
  let $node = $start;
  while ($node.length) {
    for (const el of $node.nextAll().toArray()) {
      const $el = $(el);
      if ($el.is("ul")) return $el;
      const $nested = $el.find("ul").first();
      if ($nested.length) return $nested;
    }
    $node = $node.parent();
  }
  return null;
}

function collectExternal($: cheerio.CheerioAPI, $scope: CheerioEl, into: ExtractedLink[]): void {
  $scope.find("a.external[href]").each((_, el) => {
    const $el = $(el);
    const url = $el.attr("href") ?? "";
    if (!url || ARCHIVE_URL_RE.test(url)) return;
    into.push({ url, text: $el.text().trim() });
  });
}

/**
 * Extract external links from a Wikipedia article.
 *
 * Links in the list under the "External links" heading are collected first,
 * then every external-marked anchor in the page, citations included. Links
 * of the "External links" list therefore appear twice; callers get them in
 * document order, without deduplication. Web archive snapshots are skipped.
 */
export function extractExternalLinks($: cheerio.CheerioAPI): ExtractedLink[] {
  const links: ExtractedLink[] = [];

  // Legacy skins put the id on a <span> inside the heading, current ones on
  // the <h2> inside div.mw-heading; either way the list follows the parent.
  const $anchor = $("#External_links").first();
  if ($anchor.length) {
    const $heading = $anchor.parent().length ? $anchor.parent() : $anchor;
    const $list = findNextList($, $heading);
    if ($list) {
      $list.find("li").each((_, li) => collectExternal($, $(li), links));
    }
  }

  collectExternal($, $.root(), links);
  return links;
}

/**
 * Article title from the page heading.
 */
export function extractArticleTitle($: cheerio.CheerioAPI): string {
  return $("h1#firstHeading").first().text().trim() || "Unknown Title";
}
