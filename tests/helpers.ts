import { FeedTransport, FetchRequest, TransportResponse } from "../src/core/transport.js";

export interface RssItemFixture {
  title?: string;
  link?: string;
  pubDate?: string;
  description?: string;
}

export function rssFeed(channelTitle: string, items: RssItemFixture[]): string {
  const body = items
    .map((item) => {
      const parts = [
        item.title !== undefined ? `<title>${item.title}</title>` : "",
        item.link !== undefined ? `<link>${item.link}</link>` : "",
        item.pubDate !== undefined ? `<pubDate>${item.pubDate}</pubDate>` : "",
        item.description !== undefined ? `<description>${item.description}</description>` : "",
      ];
      return `<item>${parts.join("")}</item>`;
    })
    .join("\n");
  return (
    `<?xml version="1.0" encoding="UTF-8"?>\n` +
    `<rss version="2.0"><channel><title>${channelTitle}</title><link>https://example.com/</link>` +
    `<description>fixture</description>\n${body}\n</channel></rss>`
  );
}

export function ok(body: string, etag?: string): TransportResponse {
  return { status: "ok", body: Buffer.from(body, "utf-8"), validator: etag ? { etag } : undefined };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type Handler = (url: string, request: FetchRequest) => Promise<TransportResponse>;

export class FakeTransport implements FeedTransport {
  calls: { url: string; request: FetchRequest }[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private handler: Handler) {}

  async fetch(url: string, request: FetchRequest): Promise<TransportResponse> {
    this.calls.push({ url, request });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.handler(url, request);
    } finally {
      this.inFlight--;
    }
  }

  callsFor(url: string): number {
    return this.calls.filter((c) => c.url === url).length;
  }
}

/** Never settles; models a server that accepts the connection and goes quiet. */
export function hang(): Promise<TransportResponse> {
  return new Promise<TransportResponse>(() => undefined);
}
