import {
  DAY_PERIODS,
  DayPeriod,
  EngineConfig,
  Store,
  WeatherCacheState,
  WeatherForecast,
  WeatherForecastEntry,
  WeatherGeneration,
  WeatherReading,
  WeatherSnapshot,
} from '../types';
import { ValidationError, errorMessage } from '../errors';
import { addDays, localDateAndPeriod } from '../utils/dates';
import { WeatherProvider } from './weather-provider';

export type WeatherCacheConfig = Pick<
  EngineConfig,
  'utcOffsetMinutes' | 'weatherFreshTtlMinutes' | 'weatherRetentionDays' | 'weatherRetryBackoffMs'
>;

/**
 * Typical readings per period, used when a store has no observed history
 */
const DEFAULT_PERIOD_TEMPERATURE: Record<DayPeriod, number> = {
  Morning: 22,
  Afternoon: 32,
  Evening: 28,
  Night: 20,
};
const DEFAULT_HUMIDITY = 65;
const DEFAULT_WIND_KMH = 15;
const DEFAULT_CONDITION = 'Clear';

const MAX_FORECAST_DAYS = 15;

interface StoreWeatherEntry {
  latest: WeatherSnapshot | null;
  history: WeatherSnapshot[]; // Oldest first, one per (date, period)
  inFlight: Promise<WeatherSnapshot> | null;
}

const periodIndex = (period: DayPeriod): number => DAY_PERIODS.indexOf(period);

const round1 = (value: number): number => Math.round(value * 10) / 10;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Weather snapshot cache
 *
 * Reads never touch the provider. Refreshes are single-flight per store and
 * never fail: after one retry the cache synthesises a snapshot from the store's
 * history for the same period, flagged `source: 'fallback'`.
 */
export class WeatherSnapshotCache {
  private entries = new Map<string, StoreWeatherEntry>();

  constructor(
    private provider: WeatherProvider,
    private config: WeatherCacheConfig,
    private now: () => Date = () => new Date(),
    private wait: (ms: number) => Promise<void> = sleep
  ) {}

  getLatest(storeId: string): WeatherSnapshot | null {
    return this.entries.get(storeId)?.latest ?? null;
  }

  getHistory(storeId: string): readonly WeatherSnapshot[] {
    return this.entries.get(storeId)?.history ?? [];
  }

  getState(storeId: string): WeatherCacheState {
    const entry = this.entries.get(storeId);
    if (!entry) return 'stale';
    if (entry.inFlight) return 'refreshing';
    if (!entry.latest) return 'stale';
    return this.freshness(entry.latest);
  }

  /**
   * Fresh while the snapshot is younger than the TTL
   */
  freshness(snapshot: WeatherSnapshot): WeatherCacheState {
    const ageMs = this.now().getTime() - new Date(snapshot.observedAt).getTime();
    return ageMs < this.config.weatherFreshTtlMinutes * 60 * 1000 ? 'fresh' : 'stale';
  }

  /**
   * Fetch current weather for a store. Concurrent calls for the same store
   * share a single provider request and receive the same snapshot.
   */
  refresh(store: Store): Promise<WeatherSnapshot> {
    const entry = this.entryFor(store.storeId);
    if (entry.inFlight) {
      return entry.inFlight;
    }

    const flight = this.fetchSnapshot(store).finally(() => {
      entry.inFlight = null;
    });
    entry.inFlight = flight;
    return flight;
  }

  /**
   * Forecast for 1-15 days. The provider serves at most 5; anything it
   * cannot serve is synthesised.
   */
  async getForecast(store: Store, days: number): Promise<WeatherForecast> {
    if (!Number.isInteger(days) || days < 1 || days > MAX_FORECAST_DAYS) {
      throw new ValidationError(`days must be an integer between 1 and ${MAX_FORECAST_DAYS}, got ${days}`);
    }

    try {
      const entries = await this.provider.getForecast(
        store.location.latitude,
        store.location.longitude,
        days
      );
      return { storeId: store.storeId, days, source: 'provider', entries };
    } catch (error) {
      console.log(`[Weather] Forecast unavailable for ${store.storeId}, using synthetic forecast: ${errorMessage(error)}`);
      return {
        storeId: store.storeId,
        days,
        source: 'fallback',
        entries: this.syntheticForecast(days),
      };
    }
  }

  /**
   * Freeze the current state of the given stores into a publishable generation
   */
  toGeneration(storeIds: readonly string[], generationId: string): WeatherGeneration {
    const snapshots = new Map<string, WeatherSnapshot>();
    const history = new Map<string, readonly WeatherSnapshot[]>();

    for (const storeId of storeIds) {
      const entry = this.entries.get(storeId);
      if (!entry?.latest) continue;
      snapshots.set(storeId, entry.latest);
      history.set(storeId, Object.freeze([...entry.history]));
    }

    return Object.freeze({
      generationId,
      computedAt: this.now().toISOString(),
      snapshots,
      history,
    });
  }

  private async fetchSnapshot(store: Store): Promise<WeatherSnapshot> {
    const reading = await this.fetchWithRetry(store);
    const observedAt = this.now();
    const { date, period } = localDateAndPeriod(observedAt, this.config.utcOffsetMinutes);

    if (!reading) {
      const existing = this.findBucket(store.storeId, date, period);
      if (existing && existing.source === 'provider') {
        console.log(`[Weather] Keeping observed ${date} ${period} snapshot for ${store.storeId}`);
        return existing;
      }
    }

    const snapshot: WeatherSnapshot = {
      ...(reading ?? this.seasonalAverage(store.storeId, period)),
      storeId: store.storeId,
      date,
      period,
      observedAt: observedAt.toISOString(),
      source: reading ? 'provider' : 'fallback',
    };

    this.record(Object.freeze(snapshot));
    return snapshot;
  }

  /**
   * One attempt plus a single retry after backoff; null when both fail
   */
  private async fetchWithRetry(store: Store): Promise<WeatherReading | null> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        return await this.provider.getCurrent(store.location.latitude, store.location.longitude);
      } catch (error) {
        console.log(`[Weather] ${store.storeId} attempt ${attempt}/2 failed: ${errorMessage(error)}`);
        if (attempt === 1) {
          await this.wait(this.config.weatherRetryBackoffMs);
        }
      }
    }
    return null;
  }

  /**
   * Deterministic stand-in reading: mean of observed snapshots for the same
   * period, or fixed per-period defaults when there are none.
   */
  private seasonalAverage(storeId: string, period: DayPeriod): WeatherReading {
    const observed = this.getHistory(storeId).filter(
      (s) => s.period === period && s.source === 'provider'
    );

    if (observed.length === 0) {
      const temperatureC = DEFAULT_PERIOD_TEMPERATURE[period];
      return {
        temperatureC,
        feelsLikeC: temperatureC + 2,
        condition: DEFAULT_CONDITION,
        description: 'clear sky',
        humidity: DEFAULT_HUMIDITY,
        windSpeedKmh: DEFAULT_WIND_KMH,
      };
    }

    const mean = (pick: (s: WeatherSnapshot) => number): number =>
      observed.reduce((sum, s) => sum + pick(s), 0) / observed.length;

    // Most frequent condition, ties broken alphabetically
    const conditionCounts = new Map<string, number>();
    for (const s of observed) {
      conditionCounts.set(s.condition, (conditionCounts.get(s.condition) || 0) + 1);
    }
    const [condition] = [...conditionCounts.entries()].sort(
      (a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0)
    )[0];

    return {
      temperatureC: round1(mean((s) => s.temperatureC)),
      feelsLikeC: round1(mean((s) => s.feelsLikeC)),
      condition,
      description: `seasonal average (${observed.length} observations)`,
      humidity: Math.round(mean((s) => s.humidity)),
      windSpeedKmh: round1(mean((s) => s.windSpeedKmh)),
    };
  }

  private syntheticForecast(days: number): WeatherForecastEntry[] {
    const { date: today } = localDateAndPeriod(this.now(), this.config.utcOffsetMinutes);
    const entries: WeatherForecastEntry[] = [];
    const conditions = [
      { condition: 'Clear', description: 'clear sky' },
      { condition: 'Clouds', description: 'few clouds' },
      { condition: 'Rain', description: 'light rain' },
    ];

    for (let day = 0; day < days; day++) {
      const dayVariation = (day % 7) - 3; // -3 to +3
      for (const period of DAY_PERIODS) {
        const temperatureC = DEFAULT_PERIOD_TEMPERATURE[period] + dayVariation;
        entries.push({
          date: addDays(today, day),
          period,
          temperatureC,
          feelsLikeC: temperatureC + 2,
          ...conditions[day % 3],
          humidity: 55 + ((day * 3) % 30),
          windSpeedKmh: 10 + ((day * 1.5) % 15),
        });
      }
    }

    return entries;
  }

  private record(snapshot: WeatherSnapshot): void {
    const entry = this.entryFor(snapshot.storeId);
    const cutoff = addDays(snapshot.date, -(this.config.weatherRetentionDays - 1));

    const history = entry.history.filter(
      (s) => !(s.date === snapshot.date && s.period === snapshot.period) && s.date >= cutoff
    );
    history.push(snapshot);
    history.sort((a, b) =>
      a.date === b.date ? periodIndex(a.period) - periodIndex(b.period) : a.date < b.date ? -1 : 1
    );

    entry.history = history;
    entry.latest = snapshot;
  }

  private findBucket(storeId: string, date: string, period: DayPeriod): WeatherSnapshot | undefined {
    return this.getHistory(storeId).find((s) => s.date === date && s.period === period);
  }

  private entryFor(storeId: string): StoreWeatherEntry {
    let entry = this.entries.get(storeId);
    if (!entry) {
      entry = { latest: null, history: [], inFlight: null };
      this.entries.set(storeId, entry);
    }
    return entry;
  }
}
