import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

export interface Row {
  element: Cheerio<Element>;
  cells: Cheerio<Element>[];
}

export type RowPredicate = (row: Row) => boolean;

/**
 * Converts locale formatted numbers such as "1 234" or "1\u00a0234" to an integer.
 * Anything that does not leave a plain integer behind yields 0.
 */
export function parseNumber(text: string | null | undefined): number {
  if (!text) {
    return 0;
  }

  const cleaned = text.replace(/\u00a0/g, '').replace(/[^0-9-]/g, '');
  if (!/^-?\d+$/.test(cleaned)) {
    return 0;
  }

  return parseInt(cleaned, 10);
}

/**
 * Reads a percentage cell ("45,2", "45.20 %"). Returns undefined when the text is not a number.
 */
export function parsePercentage(text: string | null | undefined): number | undefined {
  if (!text) {
    return undefined;
  }

  const cleaned = text.replace(/[\s%]/g, '').replace(',', '.');
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) {
    return undefined;
  }

  return Number(cleaned);
}

export function cellText(cell: Cheerio<Element>): string {
  return cell.text().trim();
}

export function containsDigit(text: string): boolean {
  return /\d/.test(text);
}

/**
 * Returns every table row of the document that satisfies the predicate, in document order.
 */
export function findRows($: CheerioAPI, predicate: RowPredicate = () => true): Row[] {
  const rows: Row[] = [];

  $('tr').each((_, tr) => {
    const element = $(tr);
    const cells = element
      .find('td')
      .toArray()
      .map((td) => $(td));
    const row: Row = { element, cells };

    if (predicate(row)) {
      rows.push(row);
    }
  });

  return rows;
}
