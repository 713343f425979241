import type { CheerioAPI } from 'cheerio';
import type { PageSource } from '../../fetcher';
import { cellText, containsDigit, findRows, parseNumber, parsePercentage } from '../../parsing';
import type { MunicipalityRef, PartyVotes } from '../../types';
import { MUNICIPALITY_DETAIL_CONFIG } from './constants';
import type {
  DetailClasses,
  MunicipalityDetail,
  MunicipalityDetailOptions,
  PartyRow,
  SummaryLabels,
} from './types';

const DEFAULT_LABELS: SummaryLabels = {
  registered: MUNICIPALITY_DETAIL_CONFIG.LABELS.REGISTERED,
  envelopes: MUNICIPALITY_DETAIL_CONFIG.LABELS.ENVELOPES,
  valid: MUNICIPALITY_DETAIL_CONFIG.LABELS.VALID,
};

const DEFAULT_CLASSES: DetailClasses = {
  numeric: MUNICIPALITY_DETAIL_CONFIG.CLASSES.NUMERIC,
  partyName: MUNICIPALITY_DETAIL_CONFIG.CLASSES.PARTY_NAME,
};

/**
 * Reads the number that belongs to a label such as "Voliči v seznamu".
 * The value is the last numeric cell of the row holding the label; 0 when anything is missing.
 */
export function extractValueByLabel(
  $: CheerioAPI,
  label: string,
  numericClass: string = DEFAULT_CLASSES.numeric
): number {
  const labelCell = $('td')
    .filter((_, td) => $(td).text().trim() === label)
    .first();
  if (labelCell.length === 0) {
    return 0;
  }

  const row = labelCell.closest('tr');
  if (row.length === 0) {
    return 0;
  }

  const cells = row
    .find('td')
    .toArray()
    .map((td) => $(td));
  let candidates = cells.filter((cell) => cell.hasClass(numericClass));
  if (candidates.length === 0) {
    candidates = cells.filter((cell) => containsDigit(cell.text()));
  }

  const last = candidates[candidates.length - 1];
  return last ? parseNumber(last.text()) : 0;
}

/**
 * Reads every party row of the page. Parties are split over several tables, all of them are read.
 * Votes come from the first other cell holding a digit, the percentage from the next one.
 */
export function extractPartyRows(
  $: CheerioAPI,
  partyNameClass: string = DEFAULT_CLASSES.partyName
): PartyRow[] {
  const rows = findRows($, (row) => row.cells.some((cell) => cell.hasClass(partyNameClass)));
  const partyRows: PartyRow[] = [];

  for (const row of rows) {
    const nameCell = row.cells.find((cell) => cell.hasClass(partyNameClass));
    if (!nameCell) continue;

    const name = cellText(nameCell);
    if (!name) continue;

    const numericTexts = row.cells
      .filter((cell) => cell.get(0) !== nameCell.get(0))
      .map(cellText)
      .filter(containsDigit);
    const [votesText, percentageText] = numericTexts;

    const partyRow: PartyRow = { name, votes: parseNumber(votesText) };
    const percentage = parsePercentage(percentageText);
    if (percentage !== undefined) {
      partyRow.percentage = percentage;
    }

    partyRows.push(partyRow);
  }

  return partyRows;
}

/**
 * Party name -> votes for one detail page. A repeated party name keeps the later value.
 */
export function extractPartyVotes(
  $: CheerioAPI,
  partyNameClass: string = DEFAULT_CLASSES.partyName
): PartyVotes {
  return toPartyVotes(extractPartyRows($, partyNameClass));
}

function toPartyVotes(partyRows: PartyRow[]): PartyVotes {
  const votes: PartyVotes = new Map();
  for (const row of partyRows) {
    votes.set(row.name, row.votes);
  }
  return votes;
}

/**
 * Flags values that parse fine but cannot be right, which happens when the page layout shifts.
 */
export function checkPlausibility(partyRows: PartyRow[], valid: number): string[] {
  const warnings: string[] = [];
  const { MIN, MAX } = MUNICIPALITY_DETAIL_CONFIG.PERCENTAGE_RANGE;

  for (const row of partyRows) {
    if (row.percentage !== undefined && (row.percentage < MIN || row.percentage > MAX)) {
      warnings.push(`Percentage ${row.percentage} of "${row.name}" is outside ${MIN}-${MAX}`);
    }
  }

  if (partyRows.length > 0 && valid > 0) {
    const total = partyRows.reduce((sum, row) => sum + row.votes, 0);
    if (total !== valid) {
      warnings.push(`Party votes add up to ${total}, valid votes are ${valid}`);
    }
  }

  return warnings;
}

export class MunicipalityDetailScraper {
  private readonly labels: SummaryLabels;
  private readonly classes: DetailClasses;

  constructor(
    private readonly source: PageSource,
    options: MunicipalityDetailOptions = {}
  ) {
    this.labels = options.labels ?? DEFAULT_LABELS;
    this.classes = options.classes ?? DEFAULT_CLASSES;
  }

  async scrape(municipality: MunicipalityRef): Promise<MunicipalityDetail> {
    const $ = await this.source.fetchDocument(municipality.detailUrl);
    return this.extract($);
  }

  extract($: CheerioAPI): MunicipalityDetail {
    const registered = extractValueByLabel($, this.labels.registered, this.classes.numeric);
    const envelopes = extractValueByLabel($, this.labels.envelopes, this.classes.numeric);
    const valid = extractValueByLabel($, this.labels.valid, this.classes.numeric);

    const partyRows = extractPartyRows($, this.classes.partyName);

    return {
      registered,
      envelopes,
      valid,
      parties: toPartyVotes(partyRows),
      warnings: checkPlausibility(partyRows, valid),
    };
  }
}
