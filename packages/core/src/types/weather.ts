/**
 * Weather observation types
 */

/**
 * Contiguous, non-overlapping local-time windows of a day
 */
export type DayPeriod = 'Morning' | 'Afternoon' | 'Evening' | 'Night';

export const DAY_PERIODS: readonly DayPeriod[] = ['Morning', 'Afternoon', 'Evening', 'Night'];

/**
 * Period a local hour (0-23) falls into.
 * Morning 06-12, Afternoon 12-18, Evening 18-22, Night 22-06.
 */
export function periodForHour(hour: number): DayPeriod {
  if (hour >= 6 && hour < 12) return 'Morning';
  if (hour >= 12 && hour < 18) return 'Afternoon';
  if (hour >= 18 && hour < 22) return 'Evening';
  return 'Night';
}

export function isDayPeriod(value: string): value is DayPeriod {
  return (DAY_PERIODS as readonly string[]).includes(value);
}

/**
 * Whether a value came from the provider or was synthesised locally
 */
export type WeatherSource = 'provider' | 'fallback';

/**
 * Current conditions as returned by a weather provider
 */
export interface WeatherReading {
  temperatureC: number;
  feelsLikeC: number;
  condition: string; // e.g. "Clear", "Clouds", "Rain"
  description: string;
  humidity: number; // percentage
  windSpeedKmh: number;
}

/**
 * Forecast entry from a weather provider
 */
export interface WeatherForecastEntry extends WeatherReading {
  date: string; // YYYY-MM-DD
  period: DayPeriod;
}

/**
 * Forecast as served to consumers
 */
export interface WeatherForecast {
  storeId: string;
  days: number;
  source: WeatherSource;
  entries: WeatherForecastEntry[];
}

/**
 * Weather for one store in one (date, period) bucket
 */
export interface WeatherSnapshot extends WeatherReading {
  storeId: string;
  date: string; // YYYY-MM-DD, store-local
  period: DayPeriod;
  observedAt: string; // ISO timestamp
  source: WeatherSource;
}

/**
 * Per-store cache state: Stale -> Refreshing -> Fresh -> (time passes) -> Stale
 */
export type WeatherCacheState = 'stale' | 'refreshing' | 'fresh';

/**
 * One weather refresh cycle, published as a unit
 */
export interface WeatherGeneration {
  generationId: string;
  computedAt: string;
  snapshots: ReadonlyMap<string, WeatherSnapshot>;
  history: ReadonlyMap<string, readonly WeatherSnapshot[]>;
}

/**
 * Read-side summary for the chat layer
 */
export interface WeatherSummary {
  storeId: string;
  state: WeatherCacheState;
  snapshot: WeatherSnapshot | null;
}
