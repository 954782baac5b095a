/** Top-level labels that need special eligibility to register */
const RESTRICTED_TOP_LEVEL = new Set(["edu", "gov", "mil", "int", "arpa"]);

/** Second-level suffixes with the same restriction */
const RESTRICTED_SECOND_LEVEL = new Set([
  "us.gov",
  "us.edu",
  "ac.uk",
  "gov.uk",
  "mil.uk",
  "ac.id",
  "nhs.uk",
  "police.uk",
  "mod.uk",
  "parliament.uk",
  "gov.au",
  "edu.au",
]);

/**
 * Domain endings never reported as available. Some carry a port because
 * domains are taken from the URL authority as written.
 */
export const EXCLUDED_DOMAIN_ENDINGS: readonly string[] = [
  ".de",
  ".bg",
  ".br",
  ".com.au",
  ".edu.tw",
  ".dk",
  ".com:80",
  ".co.in",
  ".im",
  ".org:80",
  ".is",
  ".ch",
  ".ac.at",
  ".gov.ua",
  ".edu:8000",
  ".gov.pt",
  ".pk",
  ".hu",
  ".uam.es",
  ".at",
  ".jp",
  ".fi",
];

/** Scheme plus authority as written; WHATWG URL parsing would drop default ports. */
const AUTHORITY_RE = /^[a-z][a-z0-9+.-]*:\/\/([^/?#]*)/i;

/**
 * Extract the authority (host and port as written) of a URL, lowercased and
 * without a leading "www." or any userinfo.
 * @returns The domain, or null for malformed URLs
 */
export function extractDomain(url: string): string | null {
  const trimmed = url.trim();
  // Protocol-relative links ("//host/path") still name a host.
  const absolute = trimmed.startsWith("//") ? `https:${trimmed}` : trimmed;
  try {
    new URL(absolute);
  } catch {
    return null;
  }
  const match = AUTHORITY_RE.exec(absolute);
  if (!match) return null;

  const authority = match[1].slice(match[1].lastIndexOf("@") + 1).toLowerCase();
  if (!authority) return null;
  return authority.startsWith("www.") ? authority.slice(4) : authority;
}

export function isExcludedDomain(domain: string | null | undefined): boolean {
  if (!domain) return true;
  const lower = domain.toLowerCase();
  return EXCLUDED_DOMAIN_ENDINGS.some((ending) => lower.endsWith(ending));
}

export function isRestrictedTld(domain: string | null | undefined): boolean {
  if (!domain) return false;

  const parts = domain.toLowerCase().split(".");
  if (parts.length < 2) return false;

  if (RESTRICTED_TOP_LEVEL.has(parts[parts.length - 1])) return true;

  return parts.length > 2 && RESTRICTED_SECOND_LEVEL.has(parts.slice(-2).join("."));
}
