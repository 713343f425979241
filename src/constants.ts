// Configuration constants for scraping volby.cz (2017 Chamber of Deputies election)
export const VOLBY_CONFIG = {
  URLS: {
    // Relative detail links on the ps32 list are resolved against this
    BASE_URL: process.env.VOLBY_BASE_URL || 'https://www.volby.cz/pls/ps2017nss/',
    EXAMPLE_LIST:
      'https://www.volby.cz/pls/ps2017nss/ps32?xjazyk=CZ&xkraj=12&xnumnuts=7103',
  },
  // Shape of an accepted ps32 list URL
  LIST_URL: {
    HOSTS: ['www.volby.cz', 'volby.cz'],
    PATH_MARKER: '/pls/ps2017nss/ps32',
    QUERY_MARKER: 'xjazyk=CZ',
  },
  TIMEOUTS: {
    REQUEST: Number(process.env.VOLBY_REQUEST_TIMEOUT) || 30000,
  },
  REQUEST_DELAY: Number(process.env.VOLBY_REQUEST_DELAY) || 200,
  USER_AGENT:
    process.env.VOLBY_USER_AGENT || 'Election Results Scraper (https://www.volby.cz/)',
  // The site serves windows-1250 without always declaring it
  FALLBACK_ENCODING: 'windows-1250',
} as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  INTERRUPTED: 130,
} as const;
