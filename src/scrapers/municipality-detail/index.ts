export { MUNICIPALITY_DETAIL_CONFIG } from './constants';
export {
  checkPlausibility,
  extractPartyRows,
  extractPartyVotes,
  extractValueByLabel,
  MunicipalityDetailScraper,
} from './scraper';
export * from './types';
