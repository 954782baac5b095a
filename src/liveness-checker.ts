import { Readable } from "stream";
import { checkDomainAvailability } from "./availability-prober";
import type { CrawlSession } from "./crawl-session";
import { extractDomain, isExcludedDomain } from "./domain-classifier";
import { getErrorMessage } from "./core/utils";
import { logDebug, logError } from "./core/logger";
import type { ArticleLink, LinkRecord, StatusCode } from "./types";

/** A status string means the request failed before any response */
export function isDeadStatus(status: StatusCode): boolean {
  return typeof status === "string" || status >= 400;
}

async function requestStatus(
  session: CrawlSession,
  method: "head" | "get",
  url: string
): Promise<StatusCode> {
  try {
    const response = await session.http.request({
      method,
      url,
      timeout: session.options.requestTimeout,
      validateStatus: () => true,
      // Only the status is read; the body is discarded unread.
      responseType: method === "get" ? "stream" : undefined,
    });
    const body: unknown = response.data;
    if (body instanceof Readable) body.destroy();
    return response.status;
  } catch (err) {
    return `Error: ${getErrorMessage(err)}`;
  }
}

/**
 * Check one link: HEAD first, then a single GET when HEAD fails or answers
 * 4xx/5xx. For a dead link the domain is probed and, when it looks
 * available, recorded as an available domain with this link as a source.
 */
export async function checkLinkStatus(session: CrawlSession, link: ArticleLink): Promise<LinkRecord> {
  let status = await requestStatus(session, "head", link.url);
  if (isDeadStatus(status)) {
    status = await requestStatus(session, "get", link.url);
  }

  const record: LinkRecord = {
    url: link.url,
    text: link.text,
    article_title: link.article_title,
    article_url: link.article_url,
    status_code: status,
    timestamp: new Date().toISOString(),
  };

  if (!isDeadStatus(status)) return record;

  const domain = extractDomain(link.url);
  if (!domain) {
    logDebug(`Dead link without a usable domain: ${link.url}`);
    return record;
  }

  const verdict = await checkDomainAvailability(domain, session.probe);
  record.domain = domain;
  record.domain_available = verdict.available;
  record.domain_status = verdict.status;
  record.domain_details = verdict.details;

  if (verdict.available && !isExcludedDomain(domain)) {
    try {
      await session.addAvailableDomainSource(domain, verdict, link);
    } catch (err) {
      logError(`Failed to save available domain ${domain}`, err, { url: link.url });
    }
  }

  return record;
}
