import { describe, expect, it } from "vitest";
import {
  checkDomainAvailability,
  isUnresolvedHostError,
  type ProbeDependencies,
} from "../src/availability-prober";
import { EXCLUDED_DOMAIN_ENDINGS } from "../src/domain-classifier";
import type { WhoisData, WhoisLookup, WhoisResult } from "../src/whois-client";

const NOW = new Date("2024-06-01T00:00:00Z");

function whoisReturning(result: WhoisResult | Error): WhoisLookup & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async lookup(domain) {
      calls.push(domain);
      if (result instanceof Error) throw result;
      return result;
    },
  };
}

function found(overrides: Partial<WhoisData> = {}): WhoisResult {
  return {
    kind: "found",
    data: {
      domain: "example.org",
      registrar: "Example Registrar",
      creation_dates: [],
      expiration_dates: [],
      statuses: [],
      ...overrides,
    },
  };
}

function deps(whois: WhoisLookup, resolves: boolean | Error = false): ProbeDependencies {
  return {
    whois,
    resolveHost: async () => {
      if (resolves instanceof Error) throw resolves;
      return resolves;
    },
  };
}

describe("checkDomainAvailability", () => {
  it("rejects a missing domain", async () => {
    const verdict = await checkDomainAvailability(null, deps(whoisReturning({ kind: "not-found" })));
    expect(verdict).toEqual({ available: false, status: "Invalid domain", details: {} });
  });

  it("rejects excluded domains without a lookup", async () => {
    const whois = whoisReturning(found({ registrar: null }));
    const verdict = await checkDomainAvailability("example.de", deps(whois));
    expect(verdict.available).toBe(false);
    expect(verdict.status).toBe("Excluded domain");
    expect(whois.calls).toEqual([]);
  });

  it.each(EXCLUDED_DOMAIN_ENDINGS)("never reports *%s as available", async (ending) => {
    const verdict = await checkDomainAvailability(
      `some-site${ending}`,
      deps(whoisReturning({ kind: "not-found" }), false)
    );
    expect(verdict.available).toBe(false);
  });

  it("rejects restricted TLDs without a lookup", async () => {
    const whois = whoisReturning({ kind: "not-found" });
    const verdict = await checkDomainAvailability("agency.example.gov", deps(whois));
    expect(verdict).toEqual({
      available: false,
      status: "Restricted TLD (not available for general registration)",
      details: {
        info: "This is a restricted domain that requires special eligibility requirements.",
      },
    });
    expect(whois.calls).toEqual([]);
  });

  it("reports a record without registrar as potentially available", async () => {
    const verdict = await checkDomainAvailability(
      "example.org",
      deps(whoisReturning(found({ registrar: null }))),
      NOW
    );
    expect(verdict.available).toBe(true);
    expect(verdict.status).toBe("Potentially available");
    expect(JSON.parse(verdict.details.whois)).toEqual({
      domain: "example.org",
      registrar: null,
      statuses: [],
      creation_dates: [],
      expiration_dates: [],
    });
  });

  it("uses the earliest expiration date", async () => {
    const verdict = await checkDomainAvailability(
      "example.org",
      deps(
        whoisReturning(
          found({
            expiration_dates: [new Date("2030-01-01T00:00:00Z"), new Date("2019-01-01T00:00:00Z")],
          })
        )
      ),
      NOW
    );
    expect(verdict).toEqual({
      available: true,
      status: "Expired",
      details: { expiration_date: "2019-01-01T00:00:00.000Z", registrar: "Example Registrar" },
    });
  });

  it("reports a live registration as registered", async () => {
    const verdict = await checkDomainAvailability(
      "example.org",
      deps(
        whoisReturning(
          found({
            creation_dates: [new Date("2001-02-03T00:00:00Z")],
            expiration_dates: [new Date("2030-01-01T00:00:00Z")],
          })
        )
      ),
      NOW
    );
    expect(verdict).toEqual({
      available: false,
      status: "Registered",
      details: {
        registrar: "Example Registrar",
        creation_date: "2001-02-03T00:00:00.000Z",
        expiration_date: "2030-01-01T00:00:00.000Z",
      },
    });
  });

  it("reports unknown dates of a registered domain", async () => {
    const verdict = await checkDomainAvailability("example.org", deps(whoisReturning(found())), NOW);
    expect(verdict.details).toEqual({
      registrar: "Example Registrar",
      creation_date: "Unknown",
      expiration_date: "Unknown",
    });
  });

  it("falls back to DNS when there is no WHOIS record", async () => {
    const resolving = await checkDomainAvailability(
      "example.org",
      deps(whoisReturning({ kind: "not-found" }), true)
    );
    expect(resolving).toEqual({ available: false, status: "DNS record exists", details: {} });

    const missing = await checkDomainAvailability(
      "example.org",
      deps(whoisReturning({ kind: "not-found" }), false)
    );
    expect(missing).toEqual({ available: true, status: "No DNS record found", details: {} });
  });

  it("turns lookup failures into error statuses", async () => {
    const transport = await checkDomainAvailability(
      "example.org",
      deps(whoisReturning({ kind: "transport-error", message: "RDAP lookup failed with HTTP 503" }))
    );
    expect(transport).toEqual({
      available: false,
      status: "Error: RDAP lookup failed with HTTP 503",
      details: {},
    });

    const thrown = await checkDomainAvailability(
      "example.org",
      deps(whoisReturning(new Error("socket hang up")))
    );
    expect(thrown.status).toBe("Error: socket hang up");

    const dns = await checkDomainAvailability(
      "example.org",
      deps(whoisReturning({ kind: "not-found" }), new Error("resolver unavailable"))
    );
    expect(dns).toEqual({ available: false, status: "Error: resolver unavailable", details: {} });
  });
});

describe("isUnresolvedHostError", () => {
  const lookupError = (code: string, syscall?: string) =>
    Object.assign(new Error(`${syscall ?? "lookup"} ${code} example.org`), { code, syscall });

  it("treats every getaddrinfo failure as no address", () => {
    expect(isUnresolvedHostError(lookupError("EAI_FAIL", "getaddrinfo"))).toBe(true);
    expect(isUnresolvedHostError(lookupError("ESOMETHINGNEW", "getaddrinfo"))).toBe(true);
  });

  it("knows the resolver codes without a syscall", () => {
    expect(isUnresolvedHostError(lookupError("ENOTFOUND"))).toBe(true);
    expect(isUnresolvedHostError(lookupError("EAI_FAIL"))).toBe(true);
  });

  it("leaves other failures as errors", () => {
    expect(isUnresolvedHostError(lookupError("ECONNREFUSED", "connect"))).toBe(false);
    expect(isUnresolvedHostError(new Error("boom"))).toBe(false);
    expect(isUnresolvedHostError("ENOTFOUND")).toBe(false);
  });
});
