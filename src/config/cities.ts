import { City } from '../types/models/weather';

/**
 * Cities the weather ingestion can be pointed at. Bentonville is the default.
 */
export const SUPPORTED_CITIES: readonly City[] = [
  { name: 'Bentonville', latitude: 36.3729, longitude: -94.2088, timezone: 'America/Chicago' },
  { name: 'Fayetteville', latitude: 36.0626, longitude: -94.1574, timezone: 'America/Chicago' },
  { name: 'Chicago', latitude: 41.8781, longitude: -87.6298, timezone: 'America/Chicago' },
  { name: 'New York', latitude: 40.7128, longitude: -74.006, timezone: 'America/New_York' },
];

export const DEFAULT_CITY = 'Bentonville';

export const MAX_CITIES_PER_RUN = 2;

export function findCity(name: string): City | undefined {
  const wanted = name.trim().toLowerCase();
  return SUPPORTED_CITIES.find(city => city.name.toLowerCase() === wanted);
}
