export interface MunicipalityListOptions {
  // Matched against the trimmed text of the first cell
  codePattern?: RegExp;
  detailLinkMarker?: string;
}

// Row cells that identify a municipality before its link is resolved
export interface RawMunicipalityRow {
  code: string;
  name: string;
  href: string;
}
