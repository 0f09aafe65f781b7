import { ResolutionAbortedError } from "./errors";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Collapses whitespace runs and trims. */
export function norm(s: string | null | undefined): string {
  if (!s) return "";
  return s.replace(/\s+/g, " ").trim();
}

export function isBlank(s: string | null | undefined): boolean {
  return norm(s) === "";
}

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ResolutionAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ResolutionAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/** Uniform integer in [min, max); returns min when the range is empty. */
export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  if (max <= min) return min;
  return Math.floor(min + random() * (max - min));
}
