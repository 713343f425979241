import { VOLBY_CONFIG } from './constants';

export interface ListUrlRules {
  hosts: readonly string[];
  pathMarker: string;
  queryMarker: string;
}

export const DEFAULT_LIST_URL_RULES: ListUrlRules = {
  hosts: VOLBY_CONFIG.LIST_URL.HOSTS,
  pathMarker: VOLBY_CONFIG.LIST_URL.PATH_MARKER,
  queryMarker: VOLBY_CONFIG.LIST_URL.QUERY_MARKER,
};

/**
 * Checks that the URL points to a municipality list page (ps32, Czech language).
 */
export function isValidListUrl(url: string, rules: ListUrlRules = DEFAULT_LIST_URL_RULES): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (_error) {
    return false;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return false;
  }

  if (!rules.hosts.includes(parsed.hostname)) {
    return false;
  }

  return parsed.pathname.includes(rules.pathMarker) && parsed.search.includes(rules.queryMarker);
}
