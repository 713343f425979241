import { VOLBY_CONFIG } from './constants';
import { InvalidUrlError } from './errors';
import { PageFetcher, type PageSource } from './fetcher';
import {
  type MunicipalityDetailOptions,
  MunicipalityDetailScraper,
} from './scrapers/municipality-detail';
import { type MunicipalityListOptions, MunicipalityListScraper } from './scrapers/municipality-list';
import type {
  MunicipalityOutcome,
  MunicipalityRef,
  MunicipalitySummary,
  PartyVotes,
  ScrapeResult,
} from './types';
import { DEFAULT_LIST_URL_RULES, isValidListUrl, type ListUrlRules } from './validation';

export interface ElectionResultsScraperOptions {
  // Defaults to a PageFetcher owned (and closed) by the scraper
  source?: PageSource;
  baseUrl?: string;
  delayMs?: number;
  listUrlRules?: ListUrlRules;
  list?: MunicipalityListOptions;
  detail?: MunicipalityDetailOptions;
}

export function zeroSummary(municipality: MunicipalityRef): MunicipalitySummary {
  return {
    code: municipality.code,
    location: municipality.name,
    registered: 0,
    envelopes: 0,
    valid: 0,
  };
}

export function summariesOf(result: ScrapeResult): MunicipalitySummary[] {
  return result.outcomes.map((outcome) => outcome.summary);
}

export function partyVotesOf(result: ScrapeResult): PartyVotes[] {
  return result.outcomes.map((outcome) => outcome.parties);
}

export function failedCount(result: ScrapeResult): number {
  return result.outcomes.filter((outcome) => outcome.status === 'failed').length;
}

export class ElectionResultsScraper {
  private readonly source: PageSource;
  private readonly ownedFetcher: PageFetcher | null;
  private readonly delayMs: number;
  private readonly listUrlRules: ListUrlRules;
  private readonly listScraper: MunicipalityListScraper;
  private readonly detailScraper: MunicipalityDetailScraper;

  constructor(options: ElectionResultsScraperOptions = {}) {
    const {
      baseUrl = VOLBY_CONFIG.URLS.BASE_URL,
      delayMs = VOLBY_CONFIG.REQUEST_DELAY,
      listUrlRules = DEFAULT_LIST_URL_RULES,
    } = options;

    if (options.source) {
      this.source = options.source;
      this.ownedFetcher = null;
    } else {
      const fetcher = new PageFetcher();
      this.source = fetcher;
      this.ownedFetcher = fetcher;
    }

    this.delayMs = Math.max(0, Math.floor(Number(delayMs) || 0));
    this.listUrlRules = listUrlRules;
    this.listScraper = new MunicipalityListScraper(this.source, baseUrl, options.list);
    this.detailScraper = new MunicipalityDetailScraper(this.source, options.detail);
  }

  async close(): Promise<void> {
    if (this.ownedFetcher) {
      await this.ownedFetcher.close();
    }
  }

  /**
   * Validates the list URL and returns the municipalities it links to.
   * Throws InvalidUrlError before any request is made, NoMunicipalitiesError on an empty list.
   */
  async scrapeMunicipalityList(listUrl: string): Promise<MunicipalityRef[]> {
    if (!isValidListUrl(listUrl, this.listUrlRules)) {
      throw new InvalidUrlError(listUrl);
    }

    return this.listScraper.scrape(listUrl);
  }

  /**
   * Scrapes one municipality. Failures become a zero-filled outcome instead of an exception.
   */
  async scrapeMunicipality(municipality: MunicipalityRef): Promise<MunicipalityOutcome> {
    try {
      const detail = await this.detailScraper.scrape(municipality);
      for (const warning of detail.warnings) {
        console.warn(`  -> Warning for ${municipality.name}: ${warning}`);
      }

      return {
        status: 'ok',
        ref: municipality,
        summary: {
          code: municipality.code,
          location: municipality.name,
          registered: detail.registered,
          envelopes: detail.envelopes,
          valid: detail.valid,
        },
        parties: detail.parties,
        warnings: detail.warnings,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`  -> Failed to process ${municipality.name}: ${message}`);

      return {
        status: 'failed',
        ref: municipality,
        summary: zeroSummary(municipality),
        parties: new Map(),
        error: message,
      };
    }
  }

  /**
   * Scrapes the list page and then every municipality on it, one at a time.
   * Yields exactly one outcome per municipality found on the list.
   */
  async run(listUrl: string): Promise<ScrapeResult> {
    console.error('Loading municipality list...');
    const municipalities = await this.scrapeMunicipalityList(listUrl);
    console.error(`Found ${municipalities.length} municipalities`);

    const outcomes: MunicipalityOutcome[] = [];
    for (const [index, municipality] of municipalities.entries()) {
      console.error(
        `[${index + 1}/${municipalities.length}] ${municipality.code} – ${municipality.name}`
      );

      outcomes.push(await this.scrapeMunicipality(municipality));

      // Be gentle with the server between detail pages
      if (index < municipalities.length - 1 && this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
    }

    return {
      outcomes,
      scrapedAt: new Date().toISOString(),
      source: listUrl,
    };
  }
}
