import * as dns from "dns/promises";
import { isExcludedDomain, isRestrictedTld } from "./domain-classifier";
import type { DomainVerdict } from "./types";
import { getErrorMessage } from "./core/utils";
import type { WhoisData, WhoisLookup } from "./whois-client";

/** Resolves to true when the host has an address, false when it has none */
export type HostResolver = (hostname: string) => Promise<boolean>;

export interface ProbeDependencies {
  whois: WhoisLookup;
  resolveHost: HostResolver;
}

/** Resolver failure codes; dns.lookup also marks its errors with syscall "getaddrinfo" */
const NOT_FOUND_CODES = new Set([
  "ENOTFOUND",
  "ENODATA",
  "EAI_NONAME",
  "EAI_NODATA",
  "EAI_AGAIN",
  "EAI_FAIL",
]);

/**
 * True when a lookup error means the host has no usable address. Every
 * getaddrinfo failure counts; other errors are real faults.
 */
export function isUnresolvedHostError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ("syscall" in err && err.syscall === "getaddrinfo") return true;
  return "code" in err && typeof err.code === "string" && NOT_FOUND_CODES.has(err.code);
}

/**
 * Look a host up through the system resolver.
 */
export const resolveHost: HostResolver = async (hostname) => {
  try {
    await dns.lookup(hostname);
    return true;
  } catch (err) {
    if (isUnresolvedHostError(err)) return false;
    throw err;
  }
};

function earliest(dates: Date[]): Date | null {
  if (dates.length === 0) return null;
  return dates.reduce((min, date) => (date.getTime() < min.getTime() ? date : min));
}

function formatDates(dates: Date[]): string {
  if (dates.length === 0) return "Unknown";
  return dates.map((date) => date.toISOString()).join(", ");
}

function summarizeWhois(data: WhoisData): string {
  return JSON.stringify({
    domain: data.domain,
    registrar: data.registrar,
    statuses: data.statuses,
    creation_dates: data.creation_dates.map((date) => date.toISOString()),
    expiration_dates: data.expiration_dates.map((date) => date.toISOString()),
  });
}

function verdictFromWhois(data: WhoisData, now: Date): DomainVerdict {
  if (data.registrar === null) {
    return {
      available: true,
      status: "Potentially available",
      details: { whois: summarizeWhois(data) },
    };
  }

  const expiry = earliest(data.expiration_dates);
  if (expiry && expiry.getTime() < now.getTime()) {
    return {
      available: true,
      status: "Expired",
      details: {
        expiration_date: expiry.toISOString(),
        registrar: data.registrar,
      },
    };
  }

  return {
    available: false,
    status: "Registered",
    details: {
      registrar: data.registrar,
      creation_date: formatDates(data.creation_dates),
      expiration_date: formatDates(data.expiration_dates),
    },
  };
}

/**
 * Decide whether a domain looks registrable.
 *
 * Excluded and restricted domains are rejected before any lookup. A WHOIS
 * record without a registrar, or one whose earliest expiration date has
 * passed, counts as available. With no WHOIS record at all the answer falls
 * back to DNS: a domain that does not resolve is reported as available.
 * Failures become an "Error: ..." status; nothing is thrown.
 */
export async function checkDomainAvailability(
  domain: string | null | undefined,
  deps: ProbeDependencies,
  now: Date = new Date()
): Promise<DomainVerdict> {
  if (!domain) {
    return { available: false, status: "Invalid domain", details: {} };
  }

  if (isExcludedDomain(domain)) {
    return {
      available: false,
      status: "Excluded domain",
      details: { info: "This domain has been excluded from availability checks." },
    };
  }

  if (isRestrictedTld(domain)) {
    return {
      available: false,
      status: "Restricted TLD (not available for general registration)",
      details: {
        info: "This is a restricted domain that requires special eligibility requirements.",
      },
    };
  }

  try {
    const whois = await deps.whois.lookup(domain);

    switch (whois.kind) {
      case "found":
        return verdictFromWhois(whois.data, now);

      case "not-found": {
        if (await deps.resolveHost(domain)) {
          return { available: false, status: "DNS record exists", details: {} };
        }
        if (isRestrictedTld(domain) || isExcludedDomain(domain)) {
          return {
            available: false,
            status: "Restricted TLD or excluded domain",
            details: { info: "This domain is either restricted or has been excluded." },
          };
        }
        return { available: true, status: "No DNS record found", details: {} };
      }

      case "transport-error":
        return { available: false, status: `Error: ${whois.message}`, details: {} };
    }
  } catch (err) {
    return { available: false, status: `Error: ${getErrorMessage(err)}`, details: {} };
  }
}
