import { z } from "zod";

/** HTTP status code, or "Error: <message>" when the request never produced one */
export type StatusCode = number | string;

/** Free-form details attached to a domain verdict */
export type DomainDetails = Record<string, string>;

/** An external link found on an article page */
export interface ExtractedLink {
  url: string;
  text: string;
}

/** An extracted link plus the article it was found on */
export interface ArticleLink extends ExtractedLink {
  article_title: string;
  article_url: string;
}

/** A Wikipedia page used to seed a crawl: search hit, category member or file row */
export interface PageRef {
  title: string;
  url: string;
  snippet?: string;
  page_id?: number;
}

/** Outcome of the domain availability heuristic */
export interface DomainVerdict {
  available: boolean;
  status: string;
  details: DomainDetails;
}

/** Files written by older tools may hold non-string detail values; those are kept as JSON text. */
export const DomainDetailsSchema = z.record(
  z.preprocess((value) => (typeof value === "string" ? value : JSON.stringify(value)), z.string())
);

/** Result of a liveness check; persisted for dead links keyed by `url_articleUrl` */
export const LinkRecordSchema = z.object({
  url: z.string(),
  text: z.string(),
  article_title: z.string(),
  article_url: z.string(),
  status_code: z.union([z.number().int(), z.string()]),
  timestamp: z.string(),
  domain: z.string().optional(),
  domain_available: z.boolean().optional(),
  domain_status: z.string().optional(),
  domain_details: DomainDetailsSchema.optional(),
});

export type LinkRecord = z.infer<typeof LinkRecordSchema>;

export const DomainSourceSchema = z.object({
  url: z.string(),
  text: z.string(),
  article_title: z.string(),
  article_url: z.string(),
});

export type DomainSource = z.infer<typeof DomainSourceSchema>;

/** A domain that looked registrable, with every link that pointed at it */
export const DomainRecordSchema = z.object({
  domain: z.string(),
  status: z.string(),
  details: DomainDetailsSchema,
  found_on: z.string(),
  sources: z.array(DomainSourceSchema),
});

export type DomainRecord = z.infer<typeof DomainRecordSchema>;

export type LinkResults = Record<string, LinkRecord>;
export type AvailableDomains = Record<string, DomainRecord>;

/** Statistics written to summary.json after a crawl completes */
export interface CrawlSummary {
  command: string;
  source: string;
  total_processed: number;
  total_dead_links: number;
  total_available_domains: number;
  new_available_domains: number;
  elapsed_time: string;
  output_files: string[];
  crawled_at: string;
}
