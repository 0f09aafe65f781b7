/**
 * Everything the resolver knows about one source site: where to search,
 * which words mark a profile link, where names and images usually live.
 */
export type SiteProfile = {
  /** Value of `osSource` on every result. */
  source: string;
  tokenParam: string;
  queryParam: string;

  requeryEndpoint: string;
  requerySuffixes: readonly string[];
  peopleEndpoint: string;
  occupationHint: string;

  anchorRoot: string;
  primaryAnchorWords: readonly string[];
  moreAnchorWord: string;

  titleSelectors: readonly string[];
  imageSelectors: readonly string[];
  officialSiteLabels: readonly string[];

  labels: {
    instagram: string;
    x: string;
    birthDate: string;
    jobTitle: string;
    worksFor: string;
  };
};

export const NAVER_SITE: SiteProfile = {
  source: "NAVER",
  tokenParam: "os",
  queryParam: "query",

  requeryEndpoint: "https://search.naver.com/search.naver?where=nexearch&sm=tab_etc",
  requerySuffixes: [" 프로필", " 인물정보"],
  peopleEndpoint: "https://people.search.naver.com/search.naver",
  occupationHint: " 배우",

  anchorRoot: "#main_pack",
  primaryAnchorWords: ["프로필", "인물정보"],
  moreAnchorWord: "더보기",

  // most site-specific first
  titleSelectors: [
    "span.area_text_title strong._text",
    "div.cm_top_wrap .title",
    "div.cm_top_wrap .cm_title .title",
    "div.cm_top_wrap .title_area .title",
    "h2.title",
    "div.profile_title h2",
    "strong.name",
    ".cm_title span.tit",
  ],
  imageSelectors: [
    "img.profile_img",
    "a.thumb._item img._img",
    "div.img_scroll ul.img_list li._item:first-child img",
    "a.thumb img._img",
    "img._img",
    "img.cm_thumb_img",
  ],
  officialSiteLabels: ["사이트", "공식사이트"],

  labels: {
    instagram: "인스타그램",
    x: "X(트위터)",
    birthDate: "출생",
    jobTitle: "직업",
    worksFor: "소속",
  },
};
