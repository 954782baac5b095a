import { describe, expect, it } from "vitest";
import { getPagesInCategory, searchCategories, searchWikipediaText } from "../src/wikipedia-client";
import { createFakeHttp, html } from "./helpers/fake-http";

const BASE = "https://en.wikipedia.test";
const API = `${BASE}/w/api.php`;

describe("searchWikipediaText", () => {
  it("maps search hits to pages", async () => {
    const { http, requests } = createFakeHttp({
      [`GET ${API}`]: {
        status: 200,
        data: {
          query: {
            search: [
              { title: "Link rot", pageid: 42, snippet: 'Broken <span class="searchmatch">links</span>' },
              { title: "Dead end", pageid: 7 },
            ],
          },
        },
      },
    });

    const pages = await searchWikipediaText(http, BASE, "links", 5);

    expect(pages).toEqual([
      { title: "Link rot", url: `${BASE}/wiki/Link_rot`, snippet: "Broken links", page_id: 42 },
      { title: "Dead end", url: `${BASE}/wiki/Dead_end`, snippet: "", page_id: 7 },
    ]);
    expect(requests[0].params).toEqual({
      action: "query",
      format: "json",
      list: "search",
      srsearch: "links",
      srnamespace: "0",
      srlimit: "5",
    });
  });

  it("returns nothing when the response has no results", async () => {
    const { http } = createFakeHttp({ [API]: { status: 200, data: { batchcomplete: "" } } });
    expect(await searchWikipediaText(http, BASE, "nothing")).toEqual([]);
  });

  it("returns nothing when the API fails", async () => {
    const { http } = createFakeHttp({ [API]: { status: 500 } });
    expect(await searchWikipediaText(http, BASE, "links")).toEqual([]);
  });
});

describe("searchCategories", () => {
  it("searches the category namespace", async () => {
    const { http, requests } = createFakeHttp({
      [API]: { status: 200, data: { query: { search: [{ title: "Category:Defunct websites", pageid: 1 }] } } },
    });

    const categories = await searchCategories(http, BASE, "Defunct websites");

    expect(categories).toEqual([
      { title: "Category:Defunct websites", url: `${BASE}/wiki/Category:Defunct_websites` },
    ]);
    expect(requests[0].params).toMatchObject({
      srsearch: "Category:Defunct websites",
      srnamespace: "14",
      srlimit: "20",
    });
  });
});

describe("getPagesInCategory", () => {
  const CATEGORY = `${BASE}/wiki/Category:Samples`;

  it("lists article links and skips subcategories and files", async () => {
    const { http } = createFakeHttp({
      [CATEGORY]: html(
        `<div id="mw-content-text"><ul>` +
          `<li><a href="/wiki/Alpha" title="Alpha">Alpha</a></li>` +
          `<li><a href="/wiki/Category:Sub" title="Category:Sub">Sub</a></li>` +
          `<li><a href="/wiki/File:Pic.png" title="File:Pic.png">Pic</a></li>` +
          `<li><a href="https://elsewhere.example/" title="Elsewhere">Elsewhere</a></li>` +
          `<li><a href="/wiki/No_title">No title</a></li>` +
          `<li>plain item</li>` +
          `<li><a href="/wiki/Beta_(band)" title="Beta (band)">Beta</a></li>` +
          `</ul></div>`
      ),
    });

    expect(await getPagesInCategory(http, BASE, CATEGORY)).toEqual([
      { title: "Alpha", url: `${BASE}/wiki/Alpha` },
      { title: "Beta (band)", url: `${BASE}/wiki/Beta_(band)` },
    ]);
  });

  it("returns nothing without a content area", async () => {
    const { http } = createFakeHttp({ [CATEGORY]: html("<p>empty</p>") });
    expect(await getPagesInCategory(http, BASE, CATEGORY)).toEqual([]);
  });

  it("returns nothing when the page fails to load", async () => {
    const { http } = createFakeHttp({});
    expect(await getPagesInCategory(http, BASE, CATEGORY)).toEqual([]);
  });
});
