import type { AxiosInstance } from "axios";
import type { AppConfig } from "./core/config";
import { createHttpClient } from "./core/utils";
import { logDebug, logInfo, logSuccess } from "./core/logger";
import { resolveHost, type ProbeDependencies } from "./availability-prober";
import { JsonMapStore } from "./result-store";
import {
  type ArticleLink,
  type AvailableDomains,
  type DomainRecord,
  DomainRecordSchema,
  type DomainVerdict,
  type LinkRecord,
  LinkRecordSchema,
  type LinkResults,
} from "./types";
import { RdapWhoisClient } from "./whois-client";

/** Settings a session needs from the application config */
export type SessionOptions = Pick<
  AppConfig,
  | "logFile"
  | "availableDomainsFile"
  | "maxWorkers"
  | "requestTimeout"
  | "articleDelayMs"
  | "wikipediaBaseUrl"
  | "rdapBaseUrl"
  | "userAgent"
>;

export interface SessionCollaborators {
  http?: AxiosInstance;
  probe?: Partial<ProbeDependencies>;
}

/**
 * State shared by every crawl operation: the HTTP client, the availability
 * probe collaborators and the in-memory mirror of both result files.
 * Opening a session reloads the files; every mutation is written back
 * before the mutating call resolves.
 */
export class CrawlSession {
  readonly results: LinkResults;
  readonly availableDomains: AvailableDomains;

  private constructor(
    readonly options: SessionOptions,
    readonly http: AxiosInstance,
    readonly probe: ProbeDependencies,
    private readonly resultStore: JsonMapStore<LinkRecord>,
    private readonly domainStore: JsonMapStore<DomainRecord>
  ) {
    this.results = resultStore.load();
    this.availableDomains = domainStore.load();
  }

  static open(options: SessionOptions, collaborators: SessionCollaborators = {}): CrawlSession {
    const http =
      collaborators.http ??
      createHttpClient({ timeout: options.requestTimeout, userAgent: options.userAgent });
    const probe: ProbeDependencies = {
      whois: collaborators.probe?.whois ?? new RdapWhoisClient(http, options.rdapBaseUrl),
      resolveHost: collaborators.probe?.resolveHost ?? resolveHost,
    };

    const session = new CrawlSession(
      options,
      http,
      probe,
      new JsonMapStore(options.logFile, LinkRecordSchema),
      new JsonMapStore(options.availableDomainsFile, DomainRecordSchema)
    );
    logInfo("Session opened", {
      results: Object.keys(session.results).length,
      availableDomains: Object.keys(session.availableDomains).length,
    });
    return session;
  }

  /** Store a dead link under `url_articleUrl`, replacing any earlier check. */
  async recordDeadLink(record: LinkRecord): Promise<void> {
    this.results[`${record.url}_${record.article_url}`] = record;
    await this.resultStore.save(this.results);
  }

  /**
   * Register `link` as a source of an available domain, creating the domain
   * record on first sight. A source already listed for the same
   * (url, article_url) pair is not added again.
   * @returns true when a new source was recorded
   */
  async addAvailableDomainSource(
    domain: string,
    verdict: DomainVerdict,
    link: ArticleLink
  ): Promise<boolean> {
    let record = this.availableDomains[domain];
    if (!record) {
      record = {
        domain,
        status: verdict.status,
        details: verdict.details,
        found_on: new Date().toISOString(),
        sources: [],
      };
      this.availableDomains[domain] = record;
      logSuccess(`New available domain: ${domain}`, { status: verdict.status });
    }

    const articleUrl = link.article_url || "Unknown";
    const exists = record.sources.some(
      (source) => source.url === link.url && source.article_url === articleUrl
    );
    if (exists) return false;

    record.sources.push({
      url: link.url,
      text: link.text,
      article_title: link.article_title || "Unknown",
      article_url: articleUrl,
    });
    logDebug(`Recorded source for available domain ${domain}`, { url: link.url });
    await this.domainStore.save(this.availableDomains);
    return true;
  }

  /** Wait for pending file writes. */
  async flush(): Promise<void> {
    await Promise.all([this.resultStore.flush(), this.domainStore.flush()]);
  }
}
