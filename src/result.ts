import type { ExtractedProfile, Result, WireResult } from "./types";
import { isBlank } from "./utils";

export function buildResult(os: string, profileUrl: string, profile: ExtractedProfile, source: string): Result {
  return Object.freeze({
    os,
    osSource: source,
    profileUrl,
    // callers search by the resolved name
    keyword: profile.name,
    name: profile.name,
    image: profile.image,
    info: Object.freeze(profile.info.toRecord()),
  });
}

export function isResultFilled(result: Result | null | undefined): boolean {
  if (!result) return false;
  return !isBlank(result.name) || !isBlank(result.image) || Object.keys(result.info).length > 0;
}

export function toWireResult(result: Result): WireResult {
  return {
    os: result.os,
    osSource: result.osSource,
    profileUrl: result.profileUrl,
    keyword: result.keyword,
    naverName: result.name,
    naverImage: result.image,
    naverInfo: { ...result.info },
  };
}
