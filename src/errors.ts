export type ResolverErrorKind = "fetch" | "parse" | "token" | "exhausted" | "aborted";

export class ResolverError extends Error {
  readonly kind: ResolverErrorKind;

  constructor(kind: ResolverErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Transport error or non-200 response after every attempt was spent. */
export class FetchError extends ResolverError {
  readonly url: string;
  readonly attempts: number;
  readonly status?: number;

  constructor(url: string, attempts: number, status?: number, cause?: unknown) {
    const reason = status !== undefined ? `HTTP ${status}` : describeError(cause);
    super("fetch", `fetch failed after ${attempts} attempt(s): ${url} (${reason})`, { cause });
    this.url = url;
    this.attempts = attempts;
    this.status = status;
  }
}

/** Malformed structured-data block; the candidate is skipped. */
export class ParseError extends ResolverError {
  constructor(message: string, cause?: unknown) {
    super("parse", message, { cause });
  }
}

export class TokenMissingError extends ResolverError {
  readonly url: string;

  constructor(url: string) {
    super("token", `no resolution token in ${url} or its page`);
    this.url = url;
  }
}

export class NoStrategySucceededError extends ResolverError {
  readonly url: string;
  readonly tokenInInput: boolean;

  constructor(url: string, tokenInInput: boolean) {
    const reason = tokenInInput ? "resolution failed" : "token extraction failed";
    super("exhausted", `URL: ${url}, Error: ${reason}`);
    this.url = url;
    this.tokenInInput = tokenInInput;
  }
}

export class ResolutionAbortedError extends ResolverError {
  constructor(message = "aborted") {
    super("aborted", message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  return String(err ?? "unknown error");
}

export function isAbortError(err: unknown): boolean {
  if (err instanceof ResolutionAbortedError) return true;
  return err instanceof Error && (err.name === "AbortError" || err.name === "CanceledError");
}
