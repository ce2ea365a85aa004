/**
 * dataset.ts — Listings loader / normalizer
 *
 * Reads the listings CSV once at startup and turns it into the immutable
 * WorkingDataset every other service reads from:
 *   - Price "1,250,000" → 1250000
 *   - Latitude/Longitude must be numeric and on the globe
 *   - Beds/Baths must be non-negative integers
 *   - Household_Income synthesized from a seeded PRNG when the column is absent
 *   - Any row missing a required field is dropped (no partial records)
 */
import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import {
  parsePrice, parseCoordinate, parseCount, parseNumber, parseText,
  seededRandom, drawUniform, uniqueSorted,
} from './helpers.ts';
import { DatasetLoadError } from '../shared/errors.ts';
import { childLogger } from '../shared/logger.ts';
import { datasetListings, datasetRejected } from '../shared/metrics.ts';
import { REQUIRED_COLUMNS, INCOME_COLUMN } from '../types.ts';
import type { Listing, RawListingRow, WorkingDataset } from '../types.ts';

const log = childLogger({ module: 'dataset' });

export interface LoadOptions {
  encoding?: 'latin1' | 'utf8';
  incomeSeed?: number;
  incomeMin?: number;
  incomeMax?: number;
}

const DEFAULTS = {
  encoding: 'latin1',
  incomeSeed: 42,
  incomeMin: 40_000,
  incomeMax: 120_000,
} satisfies Required<LoadOptions>;

const CsvTable = z.array(z.array(z.string()));

/** Split CSV text into header + keyed rows. */
function readTable(text: string, source: string): { header: string[]; rows: RawListingRow[] } {
  let parsed: unknown;
  try {
    parsed = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true, relax_quotes: true });
  } catch (err) {
    throw new DatasetLoadError(source, 'DATASET_SCHEMA', `Listings file is not valid CSV: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }

  const table = CsvTable.parse(parsed);
  const [headerRow, ...body] = table;
  if (!headerRow || body.length === 0) {
    throw new DatasetLoadError(source, 'DATASET_EMPTY', 'Listings file has no data rows');
  }

  const header = headerRow.map(h => h.trim());
  const rows = body.map(cells => {
    const row: RawListingRow = {};
    header.forEach((name, i) => { row[name] = cells[i]; });
    return row;
  });
  return { header, rows };
}

/** Clean one raw row; null when any required field is missing or invalid. */
export function normalizeRow(row: RawListingRow, synthesizedIncome: number | null): Listing | null {
  const city = parseText(row.City);
  const province = parseText(row.Province);
  const price = parsePrice(row.Price);
  const beds = parseCount(row.Number_Beds);
  const baths = parseCount(row.Number_Baths);
  const latitude = parseCoordinate(row.Latitude, 90);
  const longitude = parseCoordinate(row.Longitude, 180);
  const income = synthesizedIncome ?? parsePrice(row[INCOME_COLUMN]);

  if (city === null || province === null || price === null || beds === null || baths === null
    || latitude === null || longitude === null || income === null) return null;

  const listing: Listing = { city, province, price, beds, baths, latitude, longitude, income };
  const address = parseText(row.Address);
  const population = parseNumber(row.Population);
  return Object.freeze({
    ...listing,
    ...(address !== null ? { address } : {}),
    ...(population !== null ? { population } : {}),
  });
}

/**
 * Build the working dataset from CSV text.
 * Pure apart from logging: the same text and options always give the same dataset.
 */
export function parseListings(text: string, source: string, options: LoadOptions = {}): WorkingDataset {
  const opts = { ...DEFAULTS, ...options };
  const { header, rows } = readTable(text, source);

  const missing = REQUIRED_COLUMNS.filter(c => !header.includes(c));
  if (missing.length) {
    throw new DatasetLoadError(source, 'DATASET_SCHEMA', `Listings file is missing required column(s): ${missing.join(', ')}`);
  }

  const incomeSynthesized = !header.includes(INCOME_COLUMN);
  const rng = incomeSynthesized ? seededRandom(opts.incomeSeed) : null;

  const listings: Listing[] = [];
  for (const row of rows) {
    // Drawn for every raw row so a row's income depends only on its position in the file
    const synthesized = rng ? drawUniform(rng, opts.incomeMin, opts.incomeMax) : null;
    const listing = normalizeRow(row, synthesized);
    if (listing) listings.push(listing);
  }

  if (listings.length === 0) {
    throw new DatasetLoadError(source, 'DATASET_EMPTY', `None of the ${rows.length} listing rows are usable`);
  }

  const byProvince = new Map<string, Set<string>>();
  let minPrice = Infinity, maxPrice = -Infinity;
  for (const l of listings) {
    let cities = byProvince.get(l.province);
    if (!cities) { cities = new Set(); byProvince.set(l.province, cities); }
    cities.add(l.city);
    if (l.price < minPrice) minPrice = l.price;
    if (l.price > maxPrice) maxPrice = l.price;
  }

  const provinces = uniqueSorted(byProvince.keys());
  const citiesByProvince: Record<string, readonly string[]> = {};
  for (const p of provinces) citiesByProvince[p] = Object.freeze(uniqueSorted(byProvince.get(p) ?? []));

  const rejected = rows.length - listings.length;
  log.info({ source, listings: listings.length, rejected, incomeSynthesized }, 'Listings dataset loaded');

  return Object.freeze({
    listings: Object.freeze(listings),
    provinces: Object.freeze(provinces),
    citiesByProvince: Object.freeze(citiesByProvince),
    cities: Object.freeze(uniqueSorted(listings.map(l => l.city))),
    priceBounds: Object.freeze({ min: minPrice, max: maxPrice }),
    incomeSynthesized,
    rejected,
  });
}

/**
 * Read and clean the listings file. The file is decoded with the configured
 * legacy encoding (latin1 by default) so accented city names come out right.
 */
export async function loadDataset(path: string, options: LoadOptions = {}): Promise<WorkingDataset> {
  const encoding = options.encoding ?? DEFAULTS.encoding;
  let buf: Buffer;
  try {
    buf = await readFile(path);
  } catch (err) {
    throw new DatasetLoadError(path, 'DATASET_UNREADABLE', `Cannot read listings file: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }

  const dataset = parseListings(buf.toString(encoding), path, options);
  datasetListings.set(dataset.listings.length);
  datasetRejected.inc(dataset.rejected);
  return dataset;
}
