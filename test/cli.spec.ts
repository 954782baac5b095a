import { describe, expect, it } from "vitest";
import {
  configOverrides,
  deadLinkLines,
  domainLines,
  pageLines,
  parseArgs,
  pickIndex,
} from "../src/cli";
import { loadConfig } from "../src/core/config";
import { domainRows } from "../src/exporter";
import type { AvailableDomains, LinkRecord } from "../src/types";

const ARTICLE_URL = "https://en.wikipedia.test/wiki/Sample";

describe("parseArgs", () => {
  it("reads the command, flags and --available-only", () => {
    expect(
      parseArgs(["search", "--query=link rot", "--workers=4", "--available-only", "extra"])
    ).toEqual({
      command: "search",
      opts: { query: "link rot", workers: "4" },
      availableOnly: true,
    });
  });

  it("splits a flag on its first equals sign", () => {
    expect(parseArgs(["article", "--url=https://en.wikipedia.test/w/index.php?title=A"]).opts).toEqual({
      url: "https://en.wikipedia.test/w/index.php?title=A",
    });
  });

  it("keeps the first command and ignores unknown words", () => {
    expect(parseArgs(["crawl", "domains", "search"]).command).toBe("domains");
    expect(parseArgs(["--query=x"]).command).toBeNull();
  });
});

describe("configOverrides", () => {
  it("maps flags onto config keys that win over the environment", () => {
    const overrides = configOverrides({ workers: "4", "max-pages": "2", "log-file": "links.json" });
    const config = loadConfig({ MAX_WORKERS: "8", MAX_PAGES: "9" }, overrides);

    expect(config.maxWorkers).toBe(4);
    expect(config.maxPages).toBe(2);
    expect(config.logFile).toBe("links.json");
    expect(config.requestTimeout).toBe(10_000);
  });
});

describe("pickIndex", () => {
  it("accepts 1..count", () => {
    expect(pickIndex("1", 3)).toBe(0);
    expect(pickIndex("3", 3)).toBe(2);
  });

  it("rejects missing, out of range and non-integer picks", () => {
    expect(pickIndex(undefined, 3)).toBeNull();
    expect(pickIndex("0", 3)).toBeNull();
    expect(pickIndex("4", 3)).toBeNull();
    expect(pickIndex("1.5", 3)).toBeNull();
    expect(pickIndex("two", 3)).toBeNull();
  });
});

describe("output lines", () => {
  const expired: LinkRecord = {
    url: "http://old.example/x",
    text: "Old site",
    article_title: "Sample",
    article_url: ARTICLE_URL,
    status_code: 404,
    timestamp: "2024-01-01T00:00:00.000Z",
    domain: "old.example",
    domain_available: true,
    domain_status: "Expired",
    domain_details: { expiration_date: "2019-01-01T00:00:00.000Z", registrar: "Example Registrar" },
  };
  const registered: LinkRecord = {
    ...expired,
    url: "http://taken.example/",
    domain: "taken.example",
    domain_available: false,
    domain_status: "Registered",
    domain_details: {},
  };

  it("lists search hits with their snippets", () => {
    expect(pageLines([{ title: "Link rot", url: "u", snippet: "Broken links" }, { title: "B", url: "v" }])).toEqual([
      "   1. Link rot  Broken links",
      "   2. B",
    ]);
  });

  it("prints each dead link with its domain details", () => {
    expect(deadLinkLines([expired, registered], false)).toEqual([
      "   + [404] http://old.example/x  (old.example: Expired)",
      "        expiration_date: 2019-01-01T00:00:00.000Z",
      "        registrar: Example Registrar",
      "   x [404] http://taken.example/  (taken.example: Registered)",
    ]);
    expect(deadLinkLines([expired, registered], true)).toHaveLength(3);
  });

  it("prints domain details and every source", () => {
    const domains: AvailableDomains = {
      "old.example": {
        domain: "old.example",
        status: "Expired",
        details: { registrar: "Example Registrar" },
        found_on: "2024-01-01T00:00:00.000Z",
        sources: [
          { url: "http://old.example/x", text: "Old site", article_title: "Sample", article_url: ARTICLE_URL },
        ],
      },
    };

    expect(domainLines(domains, domainRows(domains))).toEqual([
      "   old.example  Expired  found 2024-01-01T00:00:00.000Z  (1 sources)",
      "      registrar: Example Registrar",
      '      - http://old.example/x  "Old site"',
      `        on Sample (${ARTICLE_URL})`,
    ]);
  });
});
