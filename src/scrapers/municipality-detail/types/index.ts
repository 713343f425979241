import type { PartyVotes } from '../../../types';

export interface SummaryLabels {
  registered: string;
  envelopes: string;
  valid: string;
}

export interface DetailClasses {
  numeric: string;
  partyName: string;
}

export interface MunicipalityDetailOptions {
  labels?: SummaryLabels;
  classes?: DetailClasses;
}

// One party row as read from the page
export interface PartyRow {
  name: string;
  votes: number;
  percentage?: number;
}

export interface MunicipalityDetail {
  registered: number;
  envelopes: number;
  valid: number;
  parties: PartyVotes;
  warnings: string[];
}
