import { FetchError } from "../errors";
import type { FetchOptions, FetchedPage, HtmlFetcher } from "../types";
import type { Sleep } from "../utils";

/** Serves canned pages by exact URL; anything else fails like an exhausted fetch. */
export class FakeFetcher implements HtmlFetcher {
  readonly calls: Array<{ url: string; referer?: string }> = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
    this.calls.push({ url, referer: options.referer });
    const html = this.pages[url];
    if (html === undefined) throw new FetchError(url, 3, 404);
    return { html, url, status: 200 };
  }

  get urls(): string[] {
    return this.calls.map((c) => c.url);
  }
}

export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

export function personJsonLd(fields: Record<string, unknown>): string {
  return `<script type="application/ld+json">${JSON.stringify({ "@context": "https://schema.org", "@type": "Person", ...fields })}</script>`;
}

export function page(body: string, head = ""): string {
  return `<!doctype html><html><head>${head}</head><body>${body}</body></html>`;
}
