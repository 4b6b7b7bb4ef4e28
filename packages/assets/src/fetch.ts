import {
  HttpStatusError,
  errorMessage,
  parseRetryAfterHeaderMs,
  silentLogger,
  withExponentialBackoff,
} from "@guidedeck/shared";
import type { Logger } from "@guidedeck/shared";

export type FetchedImage = {
  bytes: Uint8Array;
  contentType: string | null;
};

export interface ImageFetcher {
  fetch(url: string): Promise<FetchedImage>;
}

export type HttpImageFetcherOptions = {
  timeoutMs?: number;
  /** Additional attempts after the first. */
  retries?: number;
  sleep?: (ms: number) => Promise<void>;
  fetchImpl?: typeof fetch;
  logger?: Logger;
};

const DEFAULT_TIMEOUT_MS = 15_000;

export class HttpImageFetcher implements ImageFetcher {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpImageFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retries = options.retries ?? 2;
    this.sleep = options.sleep;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  async fetch(url: string): Promise<FetchedImage> {
    return withExponentialBackoff(
      async () => {
        const res = await this.fetchImpl(url, {
          redirect: "follow",
          headers: { "user-agent": "guidedeck/0.3 (+image-fetch)" },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (!res.ok) {
          throw new HttpStatusError(url, res.status, parseRetryAfterHeaderMs(res.headers.get("retry-after")));
        }
        const ab = await res.arrayBuffer();
        return { bytes: new Uint8Array(ab), contentType: res.headers.get("content-type") };
      },
      {
        retries: this.retries,
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn("Image fetch failed, retrying", {
            url,
            attempt: attempt + 1,
            delayMs,
            error: errorMessage(error),
          });
        },
      },
    );
  }
}
