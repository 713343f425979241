// Configuration constants for the ps311 municipality detail page
export const MUNICIPALITY_DETAIL_CONFIG = {
  LABELS: {
    REGISTERED: 'Voliči v seznamu',
    ENVELOPES: 'Vydané obálky',
    VALID: 'Platné hlasy',
  },
  CLASSES: {
    // Numeric columns are tagged <td class="cislo">
    NUMERIC: 'cislo',
    PARTY_NAME: 'overflow_name',
  },
  PERCENTAGE_RANGE: { MIN: 0, MAX: 100 },
} as const;
