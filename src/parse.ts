import { load, type Cheerio, type CheerioAPI } from "cheerio";
import type { AnyNode, Element } from "domhandler";
import { z } from "zod";
import { ParseError, describeError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { AttributeMap, type DuplicatePolicy } from "./profile-map";
import { NAVER_SITE, type SiteProfile } from "./site";
import type { ExtractedProfile } from "./types";
import { isBlank, norm } from "./utils";

export type ExtractOptions = {
  site?: SiteProfile;
  duplicatePolicy?: DuplicatePolicy;
  logger?: Logger;
};

type ExtractContext = {
  $: CheerioAPI;
  profile: ExtractedProfile;
  site: SiteProfile;
  logger: Logger;
};

/** Each strategy may fill any field; earlier strategies take precedence. */
export type ExtractionStrategy = (ctx: ExtractContext) => void;

/** A pure lookup that yields a field value or nothing. */
export type FieldCandidate = ($: CheerioAPI) => string | undefined;

export function firstValue($: CheerioAPI, candidates: readonly FieldCandidate[]): string | undefined {
  for (const candidate of candidates) {
    const value = candidate($);
    if (value && !isBlank(value)) return norm(value);
  }
  return undefined;
}

const textOf =
  (selector: string): FieldCandidate =>
  ($) =>
    norm($(selector).first().text()) || undefined;

export function imageSrc(img: Cheerio<AnyNode>): string | undefined {
  if (img.length === 0) return undefined;
  for (const attr of ["src", "data-src", "data-lazy-src"]) {
    const v = norm(img.attr(attr));
    if (v) return v;
  }
  const srcset = norm(img.attr("srcset"));
  if (srcset) {
    const first = srcset.split(",")[0]?.trim().split(/\s+/)[0];
    if (first) return first;
  }
  return undefined;
}

const imageOf =
  (selector: string): FieldCandidate =>
  ($) =>
    imageSrc($(selector).first());

const metaImage: FieldCandidate = ($) => norm($('meta[property="og:image"]').attr("content")) || undefined;

// ---------------------------------------------------------------------------
// Structured data (JSON-LD)
// ---------------------------------------------------------------------------

const ImageRef = z.union([z.string(), z.object({ url: z.string() })]);
const Named = z.object({ name: z.string() });

const PersonSchema = z.object({
  "@type": z.union([z.string(), z.array(z.string())]),
  name: z.string().optional().catch(undefined),
  image: z.union([ImageRef, z.array(ImageRef)]).optional().catch(undefined),
  sameAs: z.union([z.string(), z.array(z.string())]).optional().catch(undefined),
  birthDate: z.string().optional().catch(undefined),
  jobTitle: z.string().optional().catch(undefined),
  worksFor: z.unknown().optional(),
});

type JsonLdPerson = z.infer<typeof PersonSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonLdCandidates(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (isRecord(data)) {
    const graph = data["@graph"];
    return Array.isArray(graph) ? graph : [data];
  }
  return [];
}

function isPersonType(type: string | string[]): boolean {
  const types = Array.isArray(type) ? type : [type];
  return types.some((t) => t.toLowerCase() === "person");
}

function firstImage(image: JsonLdPerson["image"]): string {
  const ref = Array.isArray(image) ? image[0] : image;
  if (ref === undefined) return "";
  return norm(typeof ref === "string" ? ref : ref.url);
}

function employerNames(worksFor: unknown): string {
  const items = Array.isArray(worksFor) ? worksFor : [worksFor];
  return items
    .map((item) => Named.safeParse(item))
    .flatMap((parsed) => (parsed.success ? [norm(parsed.data.name)] : []))
    .filter(Boolean)
    .join(", ");
}

function parseJsonLd(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ParseError(`malformed JSON-LD block: ${describeError(err)}`, err);
  }
}

const structuredData: ExtractionStrategy = ({ $, profile, site, logger }) => {
  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text().trim();
    if (!raw) return;

    let data: unknown;
    try {
      data = parseJsonLd(raw);
    } catch (err) {
      logger.debug(describeError(err));
      return;
    }

    for (const candidate of jsonLdCandidates(data)) {
      const parsed = PersonSchema.safeParse(candidate);
      if (!parsed.success || !isPersonType(parsed.data["@type"])) continue;
      const person = parsed.data;

      if (isBlank(profile.name)) profile.name = norm(person.name);
      if (isBlank(profile.image)) profile.image = firstImage(person.image);

      const links = Array.isArray(person.sameAs) ? person.sameAs : person.sameAs ? [person.sameAs] : [];
      for (const link of links) {
        const href = norm(link);
        const lower = href.toLowerCase();
        if (lower.includes("instagram")) profile.info.insertIfAbsentOrBlank(site.labels.instagram, href);
        if (lower.includes("twitter") || lower.includes("x.com")) {
          profile.info.insertIfAbsentOrBlank(site.labels.x, href);
        }
      }

      profile.info.insertIfAbsentOrBlank(site.labels.birthDate, person.birthDate ?? "");
      profile.info.insertIfAbsentOrBlank(site.labels.jobTitle, person.jobTitle ?? "");
      profile.info.insertIfAbsentOrBlank(site.labels.worksFor, employerNames(person.worksFor));
    }
  });
};

// ---------------------------------------------------------------------------
// DOM heuristics
// ---------------------------------------------------------------------------

const heuristicTitle: ExtractionStrategy = ({ $, profile, site }) => {
  if (!isBlank(profile.name)) return;
  profile.name = firstValue($, site.titleSelectors.map(textOf)) ?? "";
};

const attributePairs: ExtractionStrategy = ({ $, profile }) => {
  const readPair = (dt: Element, group: Cheerio<Element>) => {
    const label = norm($(dt).text());
    if (!label) return;
    let dd = $(dt).next();
    if (!dd.is("dd")) dd = group.children("dd").first();
    profile.info.insert(label, norm(dd.text()));
  };

  $("dl").each((_, dl) => {
    const $dl = $(dl);
    $dl.children("dt, div.info_group").each((_, child) => {
      if ($(child).is("dt")) {
        readPair(child, $dl);
        return;
      }
      const $group = $(child);
      $group.children("dt").each((_, dt) => readPair(dt, $group));
    });
  });
};

const profileImage: ExtractionStrategy = ({ $, profile, site }) => {
  if (!isBlank(profile.image)) return;
  profile.image = firstValue($, [...site.imageSelectors.map(imageOf), metaImage]) ?? "";
};

const officialSites: ExtractionStrategy = ({ $, profile, site }) => {
  $("dl dt").each((_, dt) => {
    if (!site.officialSiteLabels.includes(norm($(dt).text()))) return;
    $(dt)
      .next("dd")
      .find("a[href]")
      .each((_, a) => {
        profile.info.insert(norm($(a).text()), norm($(a).attr("href")));
      });
  });
};

const SOCIAL_TEXT = ["인스타그램", "instagram", "트위터", "twitter", "x(트위터)"];

function socialLabel(text: string, href: string, site: SiteProfile): string | undefined {
  const t = text.toLowerCase();
  const h = href.toLowerCase();
  const hostIsX = /^https?:\/\/(www\.)?x\.com(\/|$)/.test(h);
  if (!SOCIAL_TEXT.some((word) => t.includes(word)) && !h.includes("instagram.com") && !h.includes("twitter.com") && !hostIsX) {
    return undefined;
  }
  if (text) return text;
  return h.includes("instagram") ? site.labels.instagram : site.labels.x;
}

const linkHarvest: ExtractionStrategy = ({ $, profile, site }) => {
  $("a[href]").each((_, a) => {
    const href = norm($(a).attr("href"));
    if (!href) return;
    const text = norm($(a).text());
    const label = socialLabel(text, href, site);
    if (label) profile.info.insertIfAbsentOrBlank(label, href);
  });
};

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  structuredData,
  heuristicTitle,
  attributePairs,
  profileImage,
  officialSites,
  linkHarvest,
];

export function extractProfile(
  html: string,
  options: ExtractOptions = {},
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES
): ExtractedProfile {
  const ctx: ExtractContext = {
    $: load(html),
    profile: { name: "", image: "", info: new AttributeMap(options.duplicatePolicy) },
    site: options.site ?? NAVER_SITE,
    logger: options.logger ?? silentLogger,
  };

  for (const strategy of strategies) strategy(ctx);

  ctx.profile.name = norm(ctx.profile.name);
  ctx.profile.image = norm(ctx.profile.image);
  ctx.profile.info.compact();
  return ctx.profile;
}

export function isProfileFilled(profile: ExtractedProfile): boolean {
  return !isBlank(profile.name) || !isBlank(profile.image) || profile.info.size > 0;
}
