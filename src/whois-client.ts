import type { AxiosInstance } from "axios";
import { z } from "zod";
import { getErrorMessage } from "./core/utils";

/** Registration data for a domain, reduced to what the availability check reads */
export interface WhoisData {
  domain: string;
  registrar: string | null;
  creation_dates: Date[];
  expiration_dates: Date[];
  statuses: string[];
}

export type WhoisResult =
  | { kind: "found"; data: WhoisData }
  | { kind: "not-found" }
  | { kind: "transport-error"; message: string };

export interface WhoisLookup {
  lookup(domain: string): Promise<WhoisResult>;
}

const RdapEntitySchema = z.object({
  roles: z.array(z.string()).default([]),
  handle: z.string().optional(),
  vcardArray: z.array(z.unknown()).optional(),
});

const RdapEventSchema = z.object({
  eventAction: z.string(),
  eventDate: z.string(),
});

const RdapDomainSchema = z.object({
  ldhName: z.string().optional(),
  status: z.array(z.string()).default([]),
  entities: z.array(RdapEntitySchema).default([]),
  events: z.array(RdapEventSchema).default([]),
});

type RdapEntity = z.infer<typeof RdapEntitySchema>;

/**
 * Read the formatted name ("fn") out of a jCard:
 * ["vcard", [["version", {}, "text", "4.0"], ["fn", {}, "text", "Example Registrar"]]]
 */
function vcardName(entity: RdapEntity): string | null {
  const properties = entity.vcardArray?.[1];
  if (!Array.isArray(properties)) return null;

  for (const property of properties) {
    if (!Array.isArray(property) || property[0] !== "fn") continue;
    const value: unknown = property[3];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return null;
}

function eventDates(events: z.infer<typeof RdapEventSchema>[], action: string): Date[] {
  return events
    .filter((event) => event.eventAction === action)
    .map((event) => new Date(event.eventDate))
    .filter((date) => !Number.isNaN(date.getTime()));
}

/**
 * Map an RDAP domain object onto WhoisData.
 */
export function parseRdapDomain(domain: string, body: unknown): WhoisData | null {
  const parsed = RdapDomainSchema.safeParse(body);
  if (!parsed.success) return null;

  const { ldhName, status, entities, events } = parsed.data;
  const registrarEntity = entities.find((entity) => entity.roles.includes("registrar"));
  const registrar = registrarEntity
    ? vcardName(registrarEntity) ?? registrarEntity.handle ?? null
    : null;

  return {
    domain: ldhName?.toLowerCase() ?? domain,
    registrar,
    creation_dates: eventDates(events, "registration"),
    expiration_dates: eventDates(events, "expiration"),
    statuses: status,
  };
}

/**
 * Registration lookups over RDAP, the JSON successor of port-43 WHOIS.
 * The bootstrap service at rdap.org redirects to the registry that holds
 * the domain and answers 404 when no registry has a record.
 */
export class RdapWhoisClient implements WhoisLookup {
  constructor(
    private readonly http: AxiosInstance,
    private readonly baseUrl: string
  ) {}

  async lookup(domain: string): Promise<WhoisResult> {
    const url = `${this.baseUrl.replace(/\/+$/, "")}/domain/${encodeURIComponent(domain)}`;
    try {
      const response = await this.http.get<unknown>(url, {
        headers: { Accept: "application/rdap+json, application/json" },
        responseType: "json",
        validateStatus: () => true,
      });

      if (response.status === 404) return { kind: "not-found" };
      if (response.status !== 200) {
        return { kind: "transport-error", message: `RDAP lookup failed with HTTP ${response.status}` };
      }

      const data = parseRdapDomain(domain, response.data);
      if (!data) {
        return { kind: "transport-error", message: "RDAP response is not a domain object" };
      }
      return { kind: "found", data };
    } catch (err) {
      return { kind: "transport-error", message: getErrorMessage(err) };
    }
  }
}
