import { load } from "cheerio";
import pLimit from "p-limit";
import { findPrimaryAnchor, findSecondaryAnchor } from "./anchors";
import { loadConfig, type ResolverConfig } from "./env";
import {
  FetchError,
  NoStrategySucceededError,
  TokenMissingError,
  describeError,
  isAbortError,
} from "./errors";
import { createFetcher } from "./http";
import { createLogger, type Logger } from "./logger";
import { extractProfile } from "./parse";
import type { DuplicatePolicy } from "./profile-map";
import { buildResult, isResultFilled } from "./result";
import { derivePeopleSearchUrls, deriveRequeryUrls, extractToken } from "./search";
import { NAVER_SITE, type SiteProfile } from "./site";
import type { FetchedPage, HtmlFetcher, ResolutionReport, ResolutionRequest, Result, Tier } from "./types";
import { randomBetween, sleep as realSleep, type Sleep } from "./utils";

export type ResolveDeps = {
  fetcher: HtmlFetcher;
  site: SiteProfile;
  logger: Logger;
  duplicatePolicy: DuplicatePolicy;
  signal?: AbortSignal;
};

export type Resolution =
  | { ok: true; result: Result; tier: Tier }
  | { ok: false; error: string };

export type ResolveOptions = {
  config?: ResolverConfig;
  fetcher?: HtmlFetcher;
  site?: SiteProfile;
  logger?: Logger;
  duplicatePolicy?: DuplicatePolicy;
  /** Used for the pause between URLs and, when no fetcher is given, for retry backoff. */
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
};

class Cascade {
  constructor(private readonly deps: ResolveDeps) {}

  async fetch(url: string, referer?: string): Promise<FetchedPage | null> {
    try {
      return await this.deps.fetcher.fetch(url, { referer, signal: this.deps.signal });
    } catch (err) {
      if (err instanceof FetchError) {
        this.deps.logger.warn(err.message);
        return null;
      }
      throw err;
    }
  }

  build(os: string, profileUrl: string, html: string): Result {
    const profile = extractProfile(html, {
      site: this.deps.site,
      duplicatePolicy: this.deps.duplicatePolicy,
      logger: this.deps.logger,
    });
    return buildResult(os, profileUrl, profile, this.deps.site.source);
  }

  async direct(url: string, token: string): Promise<{ page: FetchedPage | null; result: Result | null }> {
    const page = await this.fetch(url);
    if (!page) return { page, result: null };
    return { page, result: this.build(token, url, page.html) };
  }

  /**
   * Fetches the anchor target and builds a result from it.
   * Throws `TokenMissingError` when neither the target nor its page carries a token.
   */
  async followAnchor(origin: FetchedPage, originUrl: string, href: string): Promise<Result | null> {
    let target: string;
    try {
      target = new URL(href, origin.url).toString();
    } catch {
      this.deps.logger.debug(`unusable anchor href "${href}" on ${originUrl}`);
      return null;
    }
    if (!isHttpUrl(target)) {
      this.deps.logger.debug(`skipping non-http anchor "${href}" on ${originUrl}`);
      return null;
    }

    const page = await this.fetch(target, originUrl);
    if (!page) return null;

    const param = this.deps.site.tokenParam;
    const token = extractToken(target, param) ?? extractToken(page.url, param) ?? extractToken(page.html, param);
    if (!token) throw new TokenMissingError(target);
    return this.build(token, target, page.html);
  }

  /** Primary anchor, then secondary anchor, of the page at `originUrl`. */
  async viaAnchors(originUrl: string, fetched?: FetchedPage | null): Promise<Result | null> {
    const origin = fetched ?? (await this.fetch(originUrl));
    if (!origin) return null;

    const $ = load(origin.html);
    const hrefs = [findPrimaryAnchor($, this.deps.site), findSecondaryAnchor($, this.deps.site)];
    const tried = new Set<string>();

    for (const href of hrefs) {
      if (!href || tried.has(href)) continue;
      tried.add(href);
      try {
        const result = await this.followAnchor(origin, originUrl, href);
        if (result && isResultFilled(result)) return result;
      } catch (err) {
        if (!(err instanceof TokenMissingError)) throw err;
        this.deps.logger.debug(err.message);
      }
    }
    return null;
  }

  async viaOrigins(origins: readonly string[]): Promise<Result | null> {
    for (const origin of origins) {
      const result = await this.viaAnchors(origin);
      if (result && isResultFilled(result)) return result;
    }
    return null;
  }
}

function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Runs the fallback tiers for one URL: direct parse, anchor follow,
 * requery, people search, then the unfilled direct result as a last resort.
 */
export async function resolveProfile(request: ResolutionRequest, deps: ResolveDeps): Promise<Resolution> {
  const { url } = request;
  if (!isHttpUrl(url)) return { ok: false, error: `URL: ${url}, Error: invalid URL` };

  const cascade = new Cascade(deps);
  const token = extractToken(url, deps.site.tokenParam);

  let direct: Result | null = null;
  let originPage: FetchedPage | null = null;

  if (token) {
    ({ page: originPage, result: direct } = await cascade.direct(url, token));
    if (direct && isResultFilled(direct)) return { ok: true, result: direct, tier: "direct" };
  }

  // a failed direct fetch already spent the retries on this URL
  const originFailed = token !== null && originPage === null;
  const anchored = originFailed ? null : await cascade.viaAnchors(url, originPage);
  if (anchored && isResultFilled(anchored)) return { ok: true, result: anchored, tier: "anchor" };

  const requeried = await cascade.viaOrigins(deriveRequeryUrls(url, deps.site));
  if (requeried && isResultFilled(requeried)) return { ok: true, result: requeried, tier: "requery" };

  const people = await cascade.viaOrigins(derivePeopleSearchUrls(url, deps.site));
  if (people && isResultFilled(people)) return { ok: true, result: people, tier: "people" };

  if (direct) return { ok: true, result: direct, tier: "degraded" };

  return { ok: false, error: new NoStrategySucceededError(url, token !== null).message };
}

export function toRequests(urls: readonly string[]): ResolutionRequest[] {
  return urls.map((u) => u.trim()).filter(Boolean).map((url) => ({ url }));
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "";
  }
}

const abortedEntry = (url: string): Resolution => ({ ok: false, error: `URL: ${url}, Error: aborted` });

/**
 * Resolves every URL and never rejects. URLs are processed one at a time with
 * a random pause in between; with `concurrency > 1` different hosts run side
 * by side while each host keeps its own sequential, paced lane.
 */
export async function resolveProfiles(urls: readonly string[], options: ResolveOptions = {}): Promise<ResolutionReport> {
  try {
    const config = options.config ?? loadConfig();
    const logger = options.logger ?? createLogger({ debug: config.debug });
    const sleep = options.sleep ?? realSleep;
    const random = options.random ?? Math.random;
    const { signal } = options;

    const deps: ResolveDeps = {
      fetcher: options.fetcher ?? createFetcher(config, logger, sleep),
      site: options.site ?? NAVER_SITE,
      logger,
      duplicatePolicy: options.duplicatePolicy ?? "first-wins",
      signal,
    };

    const requests = toRequests(urls);
    const outcomes: Resolution[] = new Array(requests.length);

    const runOne = async (index: number): Promise<void> => {
      const { url } = requests[index];
      logger.info(`Resolving ${url} ...`);
      try {
        const outcome = await resolveProfile(requests[index], deps);
        if (outcome.ok) logger.info(`[✓] ${url} resolved via ${outcome.tier}`);
        else logger.warn(outcome.error);
        outcomes[index] = outcome;
      } catch (err) {
        outcomes[index] = isAbortError(err) ? abortedEntry(url) : { ok: false, error: `URL: ${url}, Error: ${describeError(err)}` };
      }
    };

    const runLane = async (indexes: number[]): Promise<void> => {
      for (const [position, index] of indexes.entries()) {
        if (signal?.aborted) {
          outcomes[index] = abortedEntry(requests[index].url);
          continue;
        }
        if (position > 0) {
          try {
            await sleep(randomBetween(config.pauseMinMs, config.pauseMaxMs, random), signal);
          } catch (err) {
            if (!isAbortError(err)) throw err;
            outcomes[index] = abortedEntry(requests[index].url);
            continue;
          }
        }
        await runOne(index);
      }
    };

    const indexes = requests.map((_, i) => i);
    if (config.concurrency <= 1) {
      await runLane(indexes);
    } else {
      const lanes = new Map<string, number[]>();
      for (const i of indexes) {
        const host = hostOf(requests[i].url);
        lanes.set(host, [...(lanes.get(host) ?? []), i]);
      }
      const limit = pLimit(config.concurrency);
      await Promise.all([...lanes.values()].map((lane) => limit(() => runLane(lane))));
    }

    const report: ResolutionReport = { results: [], errors: [] };
    for (const outcome of outcomes) {
      if (outcome.ok) report.results.push(outcome.result);
      else report.errors.push(outcome.error);
    }
    return report;
  } catch (err) {
    return { results: [], errors: [`unhandled: ${describeError(err)}`] };
  }
}

