export interface MunicipalityRef {
  code: string;
  name: string;
  detailUrl: string;
}

export interface MunicipalitySummary {
  code: string;
  location: string;
  registered: number;
  envelopes: number;
  valid: number;
}

// Party name -> vote count, one municipality
export type PartyVotes = Map<string, number>;

export type MunicipalityOutcome =
  | {
      status: 'ok';
      ref: MunicipalityRef;
      summary: MunicipalitySummary;
      parties: PartyVotes;
      warnings: string[];
    }
  | {
      status: 'failed';
      ref: MunicipalityRef;
      summary: MunicipalitySummary;
      parties: PartyVotes;
      error: string;
    };

export interface ScrapeResult {
  outcomes: MunicipalityOutcome[];
  scrapedAt: string;
  source: string;
}

export interface ResultTable {
  header: string[];
  rows: Array<Array<string | number>>;
}
