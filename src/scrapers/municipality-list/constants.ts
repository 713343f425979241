// Configuration constants for the ps32 municipality list page
export const MUNICIPALITY_LIST_CONFIG = {
  // Municipality codes are six digits (e.g. 589268)
  CODE_PATTERN: /^\d{6}$/,
  // Detail pages of a single municipality
  DETAIL_LINK_MARKER: 'ps311',
} as const;
