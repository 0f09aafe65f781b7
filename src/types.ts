import type { AttributeMap } from "./profile-map";

export type ResolutionRequest = {
  readonly url: string;
};

export type FetchedPage = {
  html: string;
  url: string; // effective URL after redirects
  status: number;
};

export type FetchOptions = {
  referer?: string;
  signal?: AbortSignal;
};

export interface HtmlFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchedPage>;
}

export type ExtractedProfile = {
  name: string;
  image: string;
  info: AttributeMap;
};

export type Result = Readonly<{
  os: string;
  osSource: string;
  profileUrl: string;
  keyword: string;
  name: string;
  image: string;
  info: Readonly<Record<string, string>>;
}>;

/** Serialized record with the field names downstream consumers already read. */
export type WireResult = {
  os: string;
  osSource: string;
  profileUrl: string;
  keyword: string;
  naverName: string;
  naverImage: string;
  naverInfo: Record<string, string>;
};

export type ResolutionReport = {
  results: Result[];
  errors: string[];
};

export type Tier = "direct" | "anchor" | "requery" | "people" | "degraded";
