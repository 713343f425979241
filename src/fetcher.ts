import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { Agent, type Dispatcher, fetch } from 'undici';
import { VOLBY_CONFIG } from './constants';
import { FetchError } from './errors';

export interface PageSource {
  fetchDocument(url: string): Promise<CheerioAPI>;
}

export interface PageFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
  fallbackEncoding?: string;
  // Injected dispatcher is owned by the caller (e.g. a MockAgent in tests)
  dispatcher?: Dispatcher;
}

/**
 * Picks the charset declared in a Content-Type header, if the runtime can decode it.
 */
export function resolveEncoding(contentType: string | null, fallback: string): string {
  const declared = contentType?.match(/charset=["']?([^;"'\s]+)/i)?.[1];
  if (!declared) {
    return fallback;
  }

  try {
    new TextDecoder(declared);
    return declared;
  } catch (_error) {
    console.warn(`Unsupported charset "${declared}", decoding as ${fallback}`);
    return fallback;
  }
}

export class PageFetcher implements PageSource {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fallbackEncoding: string;

  constructor(options: PageFetcherOptions = {}) {
    const {
      timeoutMs = VOLBY_CONFIG.TIMEOUTS.REQUEST,
      userAgent = VOLBY_CONFIG.USER_AGENT,
      fallbackEncoding = VOLBY_CONFIG.FALLBACK_ENCODING,
    } = options;

    this.timeoutMs = timeoutMs;
    this.userAgent = userAgent;
    this.fallbackEncoding = fallbackEncoding;

    // One keep-alive agent for every request of the run
    this.dispatcher = options.dispatcher ?? new Agent({ keepAliveTimeout: 10000 });
    this.ownsDispatcher = !options.dispatcher;
  }

  async fetchDocument(url: string): Promise<CheerioAPI> {
    const response = await fetch(url, {
      dispatcher: this.dispatcher,
      headers: { 'User-Agent': this.userAgent },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchError(url, response.status, response.statusText);
    }

    const body = new Uint8Array(await response.arrayBuffer());
    const encoding = resolveEncoding(response.headers.get('content-type'), this.fallbackEncoding);
    const html = new TextDecoder(encoding).decode(body);

    return cheerio.load(html);
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
