import axios, { type AxiosInstance } from "axios";
import type { ResolverConfig } from "./env";
import { FetchError, ResolutionAbortedError, describeError } from "./errors";
import { calculateBackoff } from "./features/exponential-backoff";
import { silentLogger, type Logger } from "./logger";
import type { FetchedPage, FetchOptions, HtmlFetcher } from "./types";
import { sleep as realSleep, type Sleep } from "./utils";

type HttpConfig = Pick<ResolverConfig, "userAgent" | "acceptLanguage" | "requestTimeoutMs">;

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
  sleep?: Sleep;
};

export function createHttpClient(config: HttpConfig): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": config.userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": config.acceptLanguage,
      "Cache-Control": "no-cache",
      Pragma: "no-cache",
    },
    timeout: config.requestTimeoutMs,
    maxRedirects: 5,
    responseType: "text",
    responseEncoding: "utf8",
    // status handling is ours: anything but 200 is retried
    validateStatus: () => true,
  });
}

function responseUrlOf(request: unknown): string | undefined {
  if (typeof request !== "object" || request === null || !("res" in request)) return undefined;
  const res = request.res;
  if (typeof res !== "object" || res === null || !("responseUrl" in res)) return undefined;
  return typeof res.responseUrl === "string" && res.responseUrl ? res.responseUrl : undefined;
}

export class HttpFetcher implements HtmlFetcher {
  private readonly sleep: Sleep;

  constructor(
    private readonly http: AxiosInstance,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger = silentLogger
  ) {
    this.sleep = policy.sleep ?? realSleep;
  }

  async fetch(url: string, { referer, signal }: FetchOptions = {}): Promise<FetchedPage> {
    const attempts = Math.max(1, this.policy.maxRetries);
    let lastStatus: number | undefined;
    let lastError: unknown;

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (signal?.aborted) throw new ResolutionAbortedError();

      try {
        const res = await this.http.get<string>(url, {
          headers: referer ? { Referer: referer } : undefined,
          signal,
        });
        if (res.status === 200) {
          return {
            html: typeof res.data === "string" ? res.data : "",
            url: responseUrlOf(res.request) ?? url,
            status: res.status,
          };
        }
        lastStatus = res.status;
        lastError = undefined;
        this.logger.debug(`HTTP ${res.status} for ${url} (attempt ${attempt + 1}/${attempts})`);
      } catch (err) {
        if (signal?.aborted || axios.isCancel(err)) throw new ResolutionAbortedError();
        lastStatus = undefined;
        lastError = err;
        this.logger.debug(`request error for ${url} (attempt ${attempt + 1}/${attempts}): ${describeError(err)}`);
      }

      if (attempt < attempts - 1) {
        await this.sleep(calculateBackoff(attempt, this.policy.baseDelayMs), signal);
      }
    }

    throw new FetchError(url, attempts, lastStatus, lastError);
  }
}

export function createFetcher(
  config: HttpConfig & Pick<ResolverConfig, "maxRetries" | "retryBaseDelayMs">,
  logger: Logger = silentLogger,
  sleep?: Sleep
): HttpFetcher {
  return new HttpFetcher(
    createHttpClient(config),
    { maxRetries: config.maxRetries, baseDelayMs: config.retryBaseDelayMs, sleep },
    logger
  );
}
