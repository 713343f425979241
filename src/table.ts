import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { stringify } from 'csv-stringify';
import type { MunicipalitySummary, PartyVotes, ResultTable } from './types';

export const FIXED_COLUMNS = ['code', 'location', 'registered', 'envelopes', 'valid'] as const;

/**
 * Sorted union of the party names of every municipality.
 */
export function collectPartyNames(parties: PartyVotes[]): string[] {
  const names = new Set<string>();
  for (const votes of parties) {
    for (const name of votes.keys()) {
      names.add(name);
    }
  }
  return [...names].sort();
}

/**
 * Joins each summary with its party votes, projected onto the union of all parties.
 * Parties a municipality did not report are written as 0.
 */
export function buildResultTable(
  summaries: MunicipalitySummary[],
  parties: PartyVotes[]
): ResultTable {
  if (summaries.length !== parties.length) {
    throw new Error(
      `Got ${summaries.length} summaries but ${parties.length} party vote lists; they must match`
    );
  }

  const partyNames = collectPartyNames(parties);
  const rows = summaries.map((summary, index) => {
    const votes = parties[index] ?? new Map<string, number>();
    return [
      summary.code,
      summary.location,
      summary.registered,
      summary.envelopes,
      summary.valid,
      ...partyNames.map((name) => votes.get(name) ?? 0),
    ];
  });

  return { header: [...FIXED_COLUMNS, ...partyNames], rows };
}

/**
 * Serializes the table as CSV with a UTF-8 BOM so spreadsheet apps show Czech names correctly.
 */
export function formatCsv(table: ResultTable): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify(
      [table.header, ...table.rows],
      { bom: true, record_delimiter: 'windows' },
      (error, output) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(output);
      }
    );
  });
}

/**
 * Writes the whole table in one go, once every municipality has been processed.
 */
export async function writeCsv(path: string, table: ResultTable): Promise<void> {
  const csv = await formatCsv(table);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, csv, 'utf-8');
}
