import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseCityLine, parseRelayCatalog } from '../relayCatalog';
import { relayListFixture } from './mocks';

describe('parseRelayCatalog', () => {
    it('returns the cities of the requested country in catalog order', () => {
        const cities = parseRelayCatalog(relayListFixture, 'de');

        assert.deepEqual(cities, [
            { countryCode: 'de', cityCode: 'dus', latitude: 52.5917, longitude: 13.4 },
            { countryCode: 'de', cityCode: 'ber', latitude: 52.4721, longitude: 13.4 },
            { countryCode: 'de', cityCode: 'fra', latitude: 52.7248, longitude: 13.4 }
        ]);
    });

    it('skips a city whose coordinates do not parse', () => {
        const codes = parseRelayCatalog(relayListFixture, 'de').map(city => city.cityCode);
        assert.equal(codes.includes('nwh'), false, 'city with unknown latitude should be skipped');
    });

    it('does not read past the next country header', () => {
        const catalog = [
            'Germany (de)',
            '\tBerlin (ber) @ 52.52°N, 13.40°W',
            'Greece (gr)',
            '\tAthens (ath) @ 37.98°N, 23.73°W',
            'Germany again (de)',
            '\tMunich (muc) @ 48.13°N, 11.58°W'
        ].join('\n');

        assert.deepEqual(parseRelayCatalog(catalog, 'de').map(city => city.cityCode), ['ber']);
    });

    it('returns an empty list for a country that is not in the catalog', () => {
        assert.deepEqual(parseRelayCatalog(relayListFixture, 'xx'), []);
    });

    it('matches the country code case-insensitively', () => {
        assert.deepEqual(parseRelayCatalog(relayListFixture, 'GR').map(city => city.cityCode), ['ath']);
    });

    it('keeps negative coordinates as printed', () => {
        const catalog = 'Australia (au)\n\tSydney (syd) @ -33.86148°N, 151.20548°W\n';

        assert.deepEqual(parseRelayCatalog(catalog, 'au'), [
            { countryCode: 'au', cityCode: 'syd', latitude: -33.86148, longitude: 151.20548 }
        ]);
    });

    it('ignores blank lines and CRLF line endings', () => {
        const catalog = 'Sweden (se)\r\n\r\n\tGothenburg (got) @ 57.70887°N, 11.97456°W\r\n';
        assert.deepEqual(parseRelayCatalog(catalog, 'se').map(city => city.cityCode), ['got']);
    });

    it('gives the same result when parsing the same text twice', () => {
        assert.deepEqual(parseRelayCatalog(relayListFixture, 'de'), parseRelayCatalog(relayListFixture, 'de'));
    });
});

describe('parseCityLine', () => {
    it('returns null for a server line', () => {
        const line = '\t\tde-ber-wg-001 (192.0.2.31, 2001:db8::31) - WireGuard, hosted (xtom)';
        assert.equal(parseCityLine(line, 'de'), null);
    });

    it('returns null when the city code is missing', () => {
        assert.equal(parseCityLine('\tBerlin @ 52.52°N, 13.40°W', 'de'), null);
    });

    it('returns null for a malformed number', () => {
        assert.equal(parseCityLine('\tBerlin (ber) @ 52.5.2°N, 13.40°W', 'de'), null);
    });
});
