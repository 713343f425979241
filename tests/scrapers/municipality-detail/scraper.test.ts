import { expect, test } from '@playwright/test';
import * as cheerio from 'cheerio';
import {
  checkPlausibility,
  extractPartyRows,
  extractPartyVotes,
  extractValueByLabel,
  MunicipalityDetailScraper,
} from '../../../src/scrapers/municipality-detail';
import { FakePageSource } from '../../helpers/fake-source';

const SUMMARY_HTML = `
  <table id="ps311_t1">
    <tr><th>Voliči v seznamu</th><th>Vydané obálky</th><th>Platné hlasy</th></tr>
    <tr><td>Voliči v seznamu</td><td class="cislo">1 234</td><td>45,2%</td></tr>
    <tr><td> Vydané obálky </td><td class="cislo">1</td><td class="cislo">1 140</td></tr>
    <tr><td>Platné hlasy</td><td>celkem</td><td>1 138</td></tr>
  </table>
`;

const PARTIES_HTML = `
  <div class="t2_470">
    <table>
      <tr><th>název</th><th>celkem</th><th>v %</th></tr>
      <tr><td class="overflow_name">Občanská demokratická strana</td><td class="cislo">120</td><td class="cislo">10,54</td></tr>
      <tr><td class="overflow_name">Řád národa - Vlastenecká unie</td><td class="cislo">3</td><td class="cislo">0,26</td></tr>
    </table>
  </div>
  <div class="t2_470">
    <table>
      <tr><th>název</th><th>celkem</th><th>v %</th></tr>
      <tr><td class="overflow_name">ANO 2011</td><td class="cislo">1 015</td><td class="cislo">89,19</td></tr>
      <tr><td class="overflow_name">Nová strana</td><td>-</td><td>-</td></tr>
      <tr><td class="overflow_name">  </td><td class="cislo">5</td><td class="cislo">0,44</td></tr>
    </table>
  </div>
`;

test.describe('extractValueByLabel', () => {
  test('should take the last styled numeric cell of the labelled row', () => {
    const $ = cheerio.load(SUMMARY_HTML);

    expect(extractValueByLabel($, 'Voliči v seznamu')).toBe(1234);
    expect(extractValueByLabel($, 'Vydané obálky')).toBe(1140);
  });

  test('should fall back to cells containing digits', () => {
    const $ = cheerio.load(SUMMARY_HTML);

    expect(extractValueByLabel($, 'Platné hlasy')).toBe(1138);
  });

  test('should ignore an unstyled percentage next to a styled value', () => {
    const $ = cheerio.load(`
      <table><tr><td>Registered</td><td class="cislo">1 234</td><td>45,2%</td></tr></table>
    `);

    expect(extractValueByLabel($, 'Registered')).toBe(1234);
  });

  test('should return 0 when the label is missing', () => {
    const $ = cheerio.load(SUMMARY_HTML);

    expect(extractValueByLabel($, 'Odevzdané obálky')).toBe(0);
  });

  test('should match the whole label, not a part of it', () => {
    const $ = cheerio.load(`
      <table><tr><td>Platné hlasy celkem</td><td class="cislo">900</td></tr></table>
    `);

    expect(extractValueByLabel($, 'Platné hlasy')).toBe(0);
  });

  test('should return 0 when the row has no numeric cell', () => {
    const $ = cheerio.load(`
      <table><tr><td>Voliči v seznamu</td><td>-</td></tr></table>
    `);

    expect(extractValueByLabel($, 'Voliči v seznamu')).toBe(0);
  });

  test('should use a custom numeric class', () => {
    const $ = cheerio.load(`
      <table><tr><td>Voters</td><td class="num">1 500</td><td class="pct">77</td></tr></table>
    `);

    expect(extractValueByLabel($, 'Voters', 'num')).toBe(1500);
  });
});

test.describe('extractPartyVotes', () => {
  test('should merge parties from every table on the page', () => {
    const $ = cheerio.load(PARTIES_HTML);
    const votes = extractPartyVotes($);

    expect([...votes.entries()]).toEqual([
      ['Občanská demokratická strana', 120],
      ['Řád národa - Vlastenecká unie', 3],
      ['ANO 2011', 1015],
      ['Nová strana', 0],
    ]);
  });

  test('should take the first other cell holding a digit, wherever it is', () => {
    const $ = cheerio.load(`
      <table>
        <tr><td class="cislo">7</td><td class="overflow_name">P</td><td>-</td></tr>
        <tr><td class="cislo">8</td><td class="overflow_name">Q</td><td class="cislo">250</td><td class="cislo">12,5</td></tr>
      </table>
    `);

    expect([...extractPartyVotes($).entries()]).toEqual([
      ['P', 7],
      ['Q', 8],
    ]);
    expect(extractPartyRows($)).toEqual([
      { name: 'P', votes: 7 },
      { name: 'Q', votes: 8, percentage: 250 },
    ]);
  });

  test('should give 0 votes when no other cell holds a digit', () => {
    const $ = cheerio.load(PARTIES_HTML);

    expect(extractPartyVotes($).get('Nová strana')).toBe(0);
  });

  test('should skip rows with an empty party name', () => {
    const $ = cheerio.load(PARTIES_HTML);

    expect(extractPartyVotes($).has('')).toBe(false);
    expect(extractPartyVotes($).size).toBe(4);
  });

  test('should keep the later value for a repeated party', () => {
    const $ = cheerio.load(`
      <table>
        <tr><td class="overflow_name">Strana X</td><td class="cislo">10</td></tr>
        <tr><td class="overflow_name">Strana X</td><td class="cislo">20</td></tr>
      </table>
    `);

    expect([...extractPartyVotes($).entries()]).toEqual([['Strana X', 20]]);
  });

  test('should return an empty mapping when there are no party rows', () => {
    const $ = cheerio.load(SUMMARY_HTML);

    expect(extractPartyVotes($).size).toBe(0);
  });
});

test.describe('extractPartyRows', () => {
  test('should read the percentage after the vote count', () => {
    const $ = cheerio.load(PARTIES_HTML);

    expect(extractPartyRows($)).toEqual([
      { name: 'Občanská demokratická strana', votes: 120, percentage: 10.54 },
      { name: 'Řád národa - Vlastenecká unie', votes: 3, percentage: 0.26 },
      { name: 'ANO 2011', votes: 1015, percentage: 89.19 },
      { name: 'Nová strana', votes: 0 },
    ]);
  });
});

test.describe('checkPlausibility', () => {
  test('should accept consistent figures', () => {
    const rows = [
      { name: 'A', votes: 60, percentage: 60 },
      { name: 'B', votes: 40, percentage: 40 },
    ];

    expect(checkPlausibility(rows, 100)).toEqual([]);
  });

  test('should flag percentages outside 0-100', () => {
    const rows = [
      { name: 'A', votes: 60, percentage: 60 },
      { name: 'B', votes: 40, percentage: 140 },
    ];

    expect(checkPlausibility(rows, 100)).toEqual(['Percentage 140 of "B" is outside 0-100']);
  });

  test('should flag party votes that do not add up to the valid votes', () => {
    const rows = [
      { name: 'A', votes: 60 },
      { name: 'B', votes: 40 },
    ];

    expect(checkPlausibility(rows, 90)).toEqual(['Party votes add up to 100, valid votes are 90']);
  });

  test('should skip the total check without parties or valid votes', () => {
    expect(checkPlausibility([], 90)).toEqual([]);
    expect(checkPlausibility([{ name: 'A', votes: 5 }], 0)).toEqual([]);
  });
});

test.describe('MunicipalityDetailScraper', () => {
  const detailUrl = 'https://www.volby.cz/pls/ps2017nss/ps311?xobec=589268';

  test('should extract the summary figures and party votes of a page', async () => {
    const source = new FakePageSource({ [detailUrl]: SUMMARY_HTML + PARTIES_HTML });
    const scraper = new MunicipalityDetailScraper(source);

    const detail = await scraper.scrape({ code: '589268', name: 'Bedihošť', detailUrl });

    expect(source.requested).toEqual([detailUrl]);
    expect(detail.registered).toBe(1234);
    expect(detail.envelopes).toBe(1140);
    expect(detail.valid).toBe(1138);
    expect(detail.parties.get('Občanská demokratická strana')).toBe(120);
    expect(detail.parties.size).toBe(4);
    expect(detail.warnings).toEqual([]);
  });

  test('should use custom labels and classes', () => {
    const scraper = new MunicipalityDetailScraper(new FakePageSource({}), {
      labels: { registered: 'Voters', envelopes: 'Envelopes', valid: 'Valid' },
      classes: { numeric: 'num', partyName: 'party' },
    });
    const $ = cheerio.load(`
      <table>
        <tr><td>Voters</td><td class="num">300</td></tr>
        <tr><td>Envelopes</td><td class="num">200</td></tr>
        <tr><td>Valid</td><td class="num">150</td></tr>
        <tr><td class="party">Left</td><td>100</td><td>66,67</td></tr>
        <tr><td class="party">Right</td><td>50</td><td>33,33</td></tr>
      </table>
    `);

    const detail = scraper.extract($);

    expect(detail).toEqual({
      registered: 300,
      envelopes: 200,
      valid: 150,
      parties: new Map([
        ['Left', 100],
        ['Right', 50],
      ]),
      warnings: [],
    });
  });
});
