import type { CheerioAPI } from 'cheerio';
import { NoMunicipalitiesError } from '../../errors';
import type { PageSource } from '../../fetcher';
import { cellText, findRows, type Row } from '../../parsing';
import type { MunicipalityRef } from '../../types';
import { MUNICIPALITY_LIST_CONFIG } from './constants';
import type { MunicipalityListOptions, RawMunicipalityRow } from './types';

/**
 * Finds the detail link of a municipality row: a ps311 link anywhere in the row first,
 * then a link in the code cell, then a link in the last cell ("X" column).
 */
function resolveDetailHref(row: Row, detailLinkMarker: string): string | undefined {
  const markedLink = row.element
    .find('a')
    .toArray()
    .map((a) => a.attribs.href ?? '')
    .find((href) => href.includes(detailLinkMarker));
  if (markedLink) {
    return markedLink;
  }

  const firstCellHref = row.cells[0]?.find('a').first().attr('href');
  if (firstCellHref) {
    return firstCellHref;
  }

  const lastCellHref = row.cells[row.cells.length - 1]?.find('a').first().attr('href');
  return lastCellHref || undefined;
}

function toAbsoluteUrl(href: string, baseUrl: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch (_error) {
    console.warn(`Skipping unresolvable detail link: ${href}`);
    return undefined;
  }
}

/**
 * Extracts (code, name, detail URL) for every municipality row of a ps32 list page.
 * Rows whose first cell is a six digit code but which carry no link are skipped.
 */
export function extractMunicipalityLinks(
  $: CheerioAPI,
  baseUrl: string,
  options: MunicipalityListOptions = {}
): MunicipalityRef[] {
  const {
    codePattern = MUNICIPALITY_LIST_CONFIG.CODE_PATTERN,
    detailLinkMarker = MUNICIPALITY_LIST_CONFIG.DETAIL_LINK_MARKER,
  } = options;

  const rows = findRows($, (row) => {
    const [codeCell, nameCell] = row.cells;
    if (!codeCell || !nameCell) return false;
    // A global or sticky pattern keeps lastIndex between rows
    codePattern.lastIndex = 0;
    return codePattern.test(cellText(codeCell));
  });

  const rawRows: RawMunicipalityRow[] = [];
  for (const row of rows) {
    const [codeCell, nameCell] = row.cells;
    const href = resolveDetailHref(row, detailLinkMarker);
    if (!codeCell || !nameCell || !href) {
      continue;
    }

    rawRows.push({ code: cellText(codeCell), name: cellText(nameCell), href });
  }

  const municipalities: MunicipalityRef[] = [];
  for (const raw of rawRows) {
    const detailUrl = toAbsoluteUrl(raw.href, baseUrl);
    if (detailUrl) {
      municipalities.push({ code: raw.code, name: raw.name, detailUrl });
    }
  }

  return municipalities;
}

export class MunicipalityListScraper {
  constructor(
    private readonly source: PageSource,
    private readonly baseUrl: string,
    private readonly options: MunicipalityListOptions = {}
  ) {}

  /**
   * Fetches the list page and returns its municipalities.
   * An empty list means the page is not what we expect, so it is fatal.
   */
  async scrape(listUrl: string): Promise<MunicipalityRef[]> {
    const $ = await this.source.fetchDocument(listUrl);
    const municipalities = extractMunicipalityLinks($, this.baseUrl, this.options);

    if (municipalities.length === 0) {
      throw new NoMunicipalitiesError(listUrl);
    }

    return municipalities;
  }
}
