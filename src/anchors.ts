import type { CheerioAPI } from "cheerio";
import { isText, type AnyNode, type Element } from "domhandler";
import { NAVER_SITE, type SiteProfile } from "./site";
import { norm } from "./utils";

function ownText($: CheerioAPI, el: Element): string {
  return norm(
    $(el)
      .contents()
      .filter((_, node) => isText(node))
      .text()
  );
}

function hrefOf($: CheerioAPI, el: AnyNode): string | null {
  const href = norm($(el).attr("href"));
  return href || null;
}

const CANDIDATE_TAGS = "a, button, span, div, li";

/**
 * Finds the link to the dedicated profile page: an element inside the result
 * area whose text is exactly one of the profile words, or the nearest link
 * wrapping it.
 */
export function findPrimaryAnchor($: CheerioAPI, site: SiteProfile = NAVER_SITE): string | null {
  const scoped = $(site.anchorRoot).first();
  const candidates = scoped.length > 0 ? scoped.find(CANDIDATE_TAGS) : $(CANDIDATE_TAGS);

  for (const el of candidates.toArray()) {
    const hit = site.primaryAnchorWords.some((word) => ownText($, el) === word || norm($(el).text()) === word);
    if (!hit) continue;

    const link = $(el).closest("a[href]").get(0);
    const href = link ? hrefOf($, link) : null;
    if (href) return href;
  }
  return null;
}

/** Finds the "show more" link of an answer card. */
export function findSecondaryAnchor($: CheerioAPI, site: SiteProfile = NAVER_SITE): string | null {
  const direct = $("div.answer_more > a[href]").get(0);
  const directHref = direct ? hrefOf($, direct) : null;
  if (directHref) return directHref;

  for (const a of $("a[href]").toArray()) {
    if (!ownText($, a).includes(site.moreAnchorWord) && !norm($(a).text()).includes(site.moreAnchorWord)) continue;
    const href = hrefOf($, a);
    if (href) return href;
  }

  const nested = $(".answer_more a[href]").get(0);
  return nested ? hrefOf($, nested) : null;
}
