import * as fs from 'fs';
import { HomeReference } from './types';
import { RelayCycleError } from './utils/errorCodes';

/**
 * Parses the single `lat,lon,country` line written by the location setup,
 * e.g. `52.5200,13.4050,de`.
 */
export function parseHomeReference(content: string): HomeReference {
    const [line = ''] = content.trim().split(/\r?\n/);
    const fields = line.split(',').map(field => field.trim());

    if (fields.length !== 3) {
        throw new RelayCycleError('INVALID_HOME_REFERENCE',
            `Home location must be "lat,lon,country", got "${line}"`);
    }

    const [rawLatitude = '', rawLongitude = '', rawCountry = ''] = fields;
    const latitude = rawLatitude === '' ? Number.NaN : Number(rawLatitude);
    const longitude = rawLongitude === '' ? Number.NaN : Number(rawLongitude);
    const countryCode = rawCountry.toLowerCase();

    if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
        throw new RelayCycleError('INVALID_HOME_REFERENCE', `Invalid home latitude "${rawLatitude}"`);
    }
    if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
        throw new RelayCycleError('INVALID_HOME_REFERENCE', `Invalid home longitude "${rawLongitude}"`);
    }
    if (!/^[a-z]+$/.test(countryCode)) {
        throw new RelayCycleError('INVALID_HOME_REFERENCE', `Invalid home country "${rawCountry}"`);
    }

    return Object.freeze({ latitude, longitude, countryCode });
}

export function loadHomeReference(filePath: string): HomeReference {
    if (!fs.existsSync(filePath)) {
        throw new RelayCycleError('MISSING_HOME_REFERENCE',
            `Home location not set up: ${filePath} not found`);
    }

    return parseHomeReference(fs.readFileSync(filePath, 'utf8'));
}
