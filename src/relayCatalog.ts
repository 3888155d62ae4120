/*
  Parser for the text printed by `mullvad relay list`:

    Germany (de)
    	Berlin (ber) @ 52.52001°N, 13.40495°W
    		de-ber-wg-001 (193.32.248.66, 2a03:1b20:...) - WireGuard, hosted (xtom)
    	Frankfurt (fra) @ 50.11552°N, 8.68417°W
    		...
    Greece (gr)
    	...

  Country headers start at column 0, cities are indented one level and carry the
  coordinates, servers are indented deeper and have no coordinates.
  Only the block of the requested country is read; the scan stops at the next header.
*/
import { RelayCityRecord } from './types';

type ParserState = 'scanningForCountry' | 'inCountryBlock';

const CODE = /\(([a-z]+)\)/;
const COORDINATES = /@ ([0-9.-]+)°N, ([0-9.-]+)°W/;

const isHeader = (line: string): boolean => /^\S/.test(line);

const parseCoordinate = (raw: string | undefined): number | null => {
  if (raw === undefined) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
};

/**
 * Returns the city record of an indented city line, or null when the line
 * has no city code or coordinates (server lines, garbage).
 */
export const parseCityLine = (line: string, countryCode: string): RelayCityRecord | null => {
  const cityMatch = CODE.exec(line);
  const coordinatesMatch = COORDINATES.exec(line);
  if (!cityMatch?.[1] || !coordinatesMatch) {
    return null;
  }

  const latitude = parseCoordinate(coordinatesMatch[1]);
  const longitude = parseCoordinate(coordinatesMatch[2]);
  if (latitude === null || longitude === null) {
    return null;
  }

  return {
    countryCode,
    cityCode: cityMatch[1],
    latitude,
    longitude
  };
};

export const parseRelayCatalog = (catalog: string, countryCode: string): RelayCityRecord[] => {
  const target = countryCode.toLowerCase();
  const records: RelayCityRecord[] = [];
  let state: ParserState = 'scanningForCountry';

  for (const line of catalog.split(/\r?\n/)) {
    if (line.trim() === '') {
      continue;
    }

    if (isHeader(line)) {
      if (state === 'inCountryBlock') {
        break;
      }
      if (CODE.exec(line)?.[1] === target) {
        state = 'inCountryBlock';
      }
      continue;
    }

    if (state === 'inCountryBlock') {
      const record = parseCityLine(line, target);
      if (record) {
        records.push(record);
      }
    }
  }

  return records;
};
