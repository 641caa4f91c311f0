import {
  DEFAULT_ENGINE_CONFIG,
  InsightGeneration,
  InsightRecord,
  ProximityGeneration,
  Store,
  StoreInput,
  TransactionPoint,
  WeatherForecastEntry,
  WeatherGeneration,
  WeatherReading,
  WeatherSnapshot,
} from '../types';
import { NotFoundError, ProviderUnavailableError } from '../errors';
import { StoreRepository, TransactionSource, validateStoreInput } from '../services/store-repository';
import { WeatherProvider } from '../services/weather-provider';
import { GenerationStore, PublishedEntry, PublishedProximity } from '../services/generation-store';

// ============================================================================
// Builders
// ============================================================================

export function makeStore(overrides: Partial<Store> = {}): Store {
  return {
    storeId: 'VM-001',
    name: 'V-Mart Connaught Place',
    chain: 'V-Mart',
    location: { latitude: 28.6315, longitude: 77.2167 },
    address: '1 Test Road',
    city: 'Delhi',
    state: 'Delhi',
    postalCode: '110001',
    isActive: true,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/**
 * A point `km` kilometres due north of the base store (1 degree latitude ~ 111.195 km)
 */
export function northOf(base: Store, km: number): Store['location'] {
  return {
    latitude: base.location.latitude + km / 111.195,
    longitude: base.location.longitude,
  };
}

export function makeReading(overrides: Partial<WeatherReading> = {}): WeatherReading {
  return {
    temperatureC: 30,
    feelsLikeC: 33,
    condition: 'Clear',
    description: 'clear sky',
    humidity: 40,
    windSpeedKmh: 12,
    ...overrides,
  };
}

/**
 * Test clock; starts at the given instant and only moves when told to
 */
export function makeClock(iso: string) {
  let current = new Date(iso).getTime();
  return {
    now: (): Date => new Date(current),
    set(next: string): void {
      current = new Date(next).getTime();
    },
    advance(ms: number): void {
      current += ms;
    },
  };
}

export const noWait = async (): Promise<void> => {};

// ============================================================================
// Collaborators
// ============================================================================

export class InMemoryStoreRepository implements StoreRepository {
  private stores = new Map<string, Store>();

  constructor(stores: Store[] = []) {
    for (const store of stores) {
      this.stores.set(store.storeId, store);
    }
  }

  async getStore(storeId: string): Promise<Store | null> {
    return this.stores.get(storeId) ?? null;
  }

  async listStores(options: { includeInactive?: boolean } = {}): Promise<Store[]> {
    return [...this.stores.values()].filter((s) => options.includeInactive || s.isActive);
  }

  async getStoresByCity(city: string): Promise<Store[]> {
    return [...this.stores.values()].filter((s) => s.isActive && s.city === city);
  }

  async putStore(input: StoreInput): Promise<Store> {
    validateStoreInput(input, DEFAULT_ENGINE_CONFIG.boundingBox);
    const existing = this.stores.get(input.storeId);
    const store: Store = {
      ...input,
      isActive: input.isActive ?? existing?.isActive ?? true,
      createdAt: existing?.createdAt ?? '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    };
    this.stores.set(store.storeId, store);
    return store;
  }

  async deactivateStore(storeId: string): Promise<void> {
    const existing = this.stores.get(storeId);
    if (!existing) {
      throw new NotFoundError('Store', storeId);
    }
    this.stores.set(storeId, { ...existing, isActive: false });
  }
}

export class InMemoryTransactionSource implements TransactionSource {
  readonly calls: Array<{ storeId: string; fromDate: string; toDate: string }> = [];
  private series = new Map<string, TransactionPoint[]>();
  private failing = new Set<string>();

  set(storeId: string, points: TransactionPoint[]): this {
    this.series.set(storeId, points);
    return this;
  }

  failFor(storeId: string): this {
    this.failing.add(storeId);
    return this;
  }

  async getSeries(storeId: string, fromDate: string, toDate: string): Promise<TransactionPoint[]> {
    this.calls.push({ storeId, fromDate, toDate });
    if (this.failing.has(storeId)) {
      throw new ProviderUnavailableError('transactions', 'connection refused');
    }
    return (this.series.get(storeId) ?? []).filter((p) => p.date >= fromDate && p.date <= toDate);
  }
}

export class FakeWeatherProvider implements WeatherProvider {
  currentCalls = 0;
  forecastCalls = 0;
  failing = false;
  reading: WeatherReading = makeReading();
  forecast: WeatherForecastEntry[] = [];

  // When set, getCurrent waits on this before answering
  gate: Promise<void> | null = null;

  async getCurrent(): Promise<WeatherReading> {
    this.currentCalls++;
    if (this.gate) {
      await this.gate;
    }
    if (this.failing) {
      throw new ProviderUnavailableError('FakeWeather', 'timeout');
    }
    return this.reading;
  }

  async getForecast(): Promise<WeatherForecastEntry[]> {
    this.forecastCalls++;
    if (this.failing) {
      throw new ProviderUnavailableError('FakeWeather', 'timeout');
    }
    return this.forecast;
  }
}

/**
 * Generation store shared between engines in one test, standing in for the table
 */
export class InMemoryGenerationStore implements GenerationStore {
  proximity: ProximityGeneration | null = null;
  weather: WeatherGeneration | null = null;
  insights: InsightGeneration | null = null;
  saves = 0;
  failing = false;

  async saveProximity(generation: ProximityGeneration): Promise<void> {
    this.checkAvailable();
    this.proximity = generation;
    this.saves++;
  }

  async saveWeather(generation: WeatherGeneration): Promise<void> {
    this.checkAvailable();
    this.weather = generation;
    this.saves++;
  }

  async saveInsights(generation: InsightGeneration): Promise<void> {
    this.checkAvailable();
    this.insights = generation;
    this.saves++;
  }

  async latestProximity(): Promise<PublishedProximity | null> {
    if (!this.proximity) return null;
    const { generationId, computedAt, radiusKm, records } = this.proximity;
    return { generationId, computedAt, radiusKm, records };
  }

  async latestWeather(storeId: string): Promise<PublishedEntry<WeatherSnapshot> | null> {
    const snapshot = this.weather?.snapshots.get(storeId);
    return this.weather && snapshot
      ? { generationId: this.weather.generationId, computedAt: this.weather.computedAt, value: snapshot }
      : null;
  }

  async latestInsights(storeId: string): Promise<PublishedEntry<readonly InsightRecord[]> | null> {
    const insights = this.insights?.insights.get(storeId);
    return this.insights && insights
      ? { generationId: this.insights.generationId, computedAt: this.insights.computedAt, value: insights }
      : null;
  }

  private checkAvailable(): void {
    if (this.failing) {
      throw new ProviderUnavailableError('generations', 'throttled');
    }
  }
}

/**
 * A promise with its resolve function exposed
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
