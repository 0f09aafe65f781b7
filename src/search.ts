import { NAVER_SITE, type SiteProfile } from "./site";

/**
 * Pulls the numeric resolution token out of a URL or an HTML document.
 * HTML-escaped separators (`&amp;os=`) count as well.
 */
export function extractToken(text: string, param: string = NAVER_SITE.tokenParam): string | null {
  const pattern = new RegExp(`(?:[?&]|&amp;)${param}=(\\d+)`);
  return pattern.exec(text)?.[1] ?? null;
}

/** Decoded value of a query parameter, or null when missing or the URL does not parse. */
export function getQueryParam(url: string, key: string): string | null {
  try {
    return new URL(url).searchParams.get(key);
  } catch {
    return null;
  }
}

function searchUrl(endpoint: string, param: string, query: string): string {
  const url = new URL(endpoint);
  url.searchParams.set(param, query);
  return url.toString();
}

function originalQuery(url: string, site: SiteProfile): string | null {
  const q = getQueryParam(url, site.queryParam)?.trim();
  return q ? q : null;
}

/** Same search endpoint, original term plus each disambiguating suffix. */
export function deriveRequeryUrls(originalUrl: string, site: SiteProfile = NAVER_SITE): string[] {
  const q = originalQuery(originalUrl, site);
  if (!q) return [];
  return site.requerySuffixes.map((suffix) => searchUrl(site.requeryEndpoint, site.queryParam, q + suffix));
}

/** Person-search endpoint: bare term, then term plus an occupation hint. */
export function derivePeopleSearchUrls(originalUrl: string, site: SiteProfile = NAVER_SITE): string[] {
  const q = originalQuery(originalUrl, site);
  if (!q) return [];
  return [q, q + site.occupationHint].map((term) => searchUrl(site.peopleEndpoint, site.queryParam, term));
}
