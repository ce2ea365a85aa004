import { parseListings } from '../services/dataset.ts';
import type { Listing, WorkingDataset } from '../types.ts';

/** Three listings: two Toronto, one Halifax, with an income column. */
export const SCENARIO_CSV = [
  'City,Province,Price,Number_Beds,Number_Baths,Latitude,Longitude,Household_Income',
  'Toronto,Ontario,500000,3,2,43.65,-79.38,90000',
  'Toronto,Ontario,"1,200,000",4,3,43.70,-79.41,110000',
  'Halifax,Nova Scotia,300000,2,1,44.65,-63.58,70000',
].join('\n');

export function scenarioDataset(): WorkingDataset {
  return parseListings(SCENARIO_CSV, 'scenario.csv');
}

export function makeListing(overrides: Partial<Listing> = {}): Listing {
  return {
    city: 'Toronto',
    province: 'Ontario',
    price: 500000,
    beds: 3,
    baths: 2,
    latitude: 43.65,
    longitude: -79.38,
    income: 90000,
    ...overrides,
  };
}
