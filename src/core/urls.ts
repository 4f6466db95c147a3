export const SITE_ORIGIN = "https://www.linkedin.com";
export const FEED_URL = `${SITE_ORIGIN}/feed/`;
export const LOGIN_URL = `${SITE_ORIGIN}/login`;
export const PEOPLE_SEARCH_URL = `${SITE_ORIGIN}/search/results/people/`;
export const CONNECTIONS_URL = `${SITE_ORIGIN}/mynetwork/invite-connect/connections/`;

const PROFILE_MARKER = "/in/";
const MINI_PROFILE_MARKER = "/mini-profile/";

/**
 * Absolute profile URL without query string or fragment, or null when the
 * href does not point at a person profile.
 */
export function normalizeProfileHref(href: string): string | null {
  const value = href.trim();
  if (!value.includes(PROFILE_MARKER) || value.includes(MINI_PROFILE_MARKER)) {
    return null;
  }

  const clean = value.split(/[?#]/)[0] ?? value;
  if (clean.startsWith("http")) {
    return clean;
  }
  return `${SITE_ORIGIN}${clean.startsWith("/") ? "" : "/"}${clean}`;
}

export function assertProfileUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`Invalid URL: ${url}`);
  }

  const host = parsed.hostname;
  if (host !== "linkedin.com" && !host.endsWith(".linkedin.com")) {
    throw new Error(`URL is not a profile URL on ${SITE_ORIGIN}: ${url}`);
  }
  const normalized = normalizeProfileHref(url);
  if (!normalized) {
    throw new Error("Profile URL must include /in/<vanity-name>.");
  }
  return normalized;
}
