export { MUNICIPALITY_LIST_CONFIG } from './constants';
export { extractMunicipalityLinks, MunicipalityListScraper } from './scraper';
export * from './types';
