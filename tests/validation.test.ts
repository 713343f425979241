import { expect, test } from '@playwright/test';
import { isValidListUrl } from '../src/validation';

const VALID_URL = 'https://www.volby.cz/pls/ps2017nss/ps32?xjazyk=CZ&xkraj=12&xnumnuts=7103';

test.describe('isValidListUrl', () => {
  test('should accept a ps32 list URL', () => {
    expect(isValidListUrl(VALID_URL)).toBe(true);
  });

  test('should accept the host without www and plain http', () => {
    expect(isValidListUrl('https://volby.cz/pls/ps2017nss/ps32?xjazyk=CZ&xkraj=2')).toBe(true);
    expect(isValidListUrl('http://www.volby.cz/pls/ps2017nss/ps32?xjazyk=CZ')).toBe(true);
  });

  test('should reject other hosts', () => {
    expect(isValidListUrl('https://www.example.com/pls/ps2017nss/ps32?xjazyk=CZ')).toBe(false);
    expect(isValidListUrl('https://volby.cz.example.com/pls/ps2017nss/ps32?xjazyk=CZ')).toBe(false);
  });

  test('should reject pages other than the municipality list', () => {
    expect(
      isValidListUrl('https://www.volby.cz/pls/ps2017nss/ps311?xjazyk=CZ&xkraj=12&xobec=589268')
    ).toBe(false);
    expect(isValidListUrl('https://www.volby.cz/pls/ps2013/ps32?xjazyk=CZ')).toBe(false);
  });

  test('should require the Czech language parameter', () => {
    expect(isValidListUrl('https://www.volby.cz/pls/ps2017nss/ps32?xjazyk=EN&xkraj=12')).toBe(
      false
    );
    expect(isValidListUrl('https://www.volby.cz/pls/ps2017nss/ps32')).toBe(false);
  });

  test('should reject malformed URLs and other schemes', () => {
    expect(isValidListUrl('not a url')).toBe(false);
    expect(isValidListUrl('')).toBe(false);
    expect(isValidListUrl('ftp://www.volby.cz/pls/ps2017nss/ps32?xjazyk=CZ')).toBe(false);
  });

  test('should apply custom rules', () => {
    const rules = { hosts: ['results.test'], pathMarker: '/list', queryMarker: 'lang=cs' };

    expect(isValidListUrl('https://results.test/list?lang=cs', rules)).toBe(true);
    expect(isValidListUrl(VALID_URL, rules)).toBe(false);
  });
});
