/**
 * ReferenceData — the static city and country lists offered as choices
 * for Client and Flight fields. Loaded once at start-up; read-only.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ReferenceConfig } from '../config/types.js';
import { readCsvColumn } from './csvCommon.js';
import { ReferenceDataError } from './errors.js';

export const REFERENCE_LISTS = ['countries', 'cities'] as const;

export type ReferenceListName = (typeof REFERENCE_LISTS)[number];

export type ReferenceData = Record<ReferenceListName, string[]>;

const COLUMNS: Record<ReferenceListName, string> = {
  countries: 'country_name',
  cities: 'city_name',
};

/**
 * Read one reference list from a CSV file.
 */
export function loadReferenceList(list: ReferenceListName, filePath: string): string[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ReferenceDataError(`Failed to read ${list} list: ${detail}`, filePath, { cause: err });
  }
  return readCsvColumn(content, COLUMNS[list], filePath);
}

/**
 * Load both lists. Relative paths resolve against `basePath`.
 * @throws ReferenceDataError
 */
export function loadReferenceData(config: ReferenceConfig, basePath = process.cwd()): ReferenceData {
  return {
    countries: loadReferenceList('countries', resolve(basePath, config.countriesPath)),
    cities: loadReferenceList('cities', resolve(basePath, config.citiesPath)),
  };
}

/**
 * Load both lists, substituting an empty list for any that fails.
 */
export function loadReferenceDataOrEmpty(config: ReferenceConfig, basePath = process.cwd()): ReferenceData {
  const paths: ReferenceConfig = {
    countriesPath: resolve(basePath, config.countriesPath),
    citiesPath: resolve(basePath, config.citiesPath),
  };
  const data: ReferenceData = { countries: [], cities: [] };

  for (const list of REFERENCE_LISTS) {
    const filePath = list === 'countries' ? paths.countriesPath : paths.citiesPath;
    try {
      data[list] = loadReferenceList(list, filePath);
    } catch (err) {
      if (!(err instanceof ReferenceDataError)) throw err;
      console.warn(`Reference list unavailable, serving empty ${list}: ${err.message}`);
    }
  }

  return data;
}
