import { v4 as uuid } from 'uuid';
import {
  CityStores,
  CompetitionSummary,
  CompetitorChain,
  DEFAULT_ENGINE_CONFIG,
  EngineConfig,
  InsightGeneration,
  InsightRecord,
  ProximityGeneration,
  ProximitySummary,
  Store,
  TrendGeneration,
  TrendSummary,
  WeatherForecast,
  WeatherSummary,
  isCompetitor,
  isCompetitorChain,
  matchesFilter,
} from '../types';
import { NotFoundError, ValidationError, errorMessage } from '../errors';
import { loadEngineConfig } from '../config';
import { createDynamoDBService } from './dynamodb';
import { GenerationStore, PublishedProximity } from './generation-store';
import { GeoProximityEngine } from './geo-proximity';
import { InsightAggregator } from './insight-aggregator';
import { JobRunResult, JobStatus, RefreshScheduler } from './refresh-scheduler';
import { SnapshotStore } from './snapshot-store';
import { StoreRepository, TransactionSource } from './store-repository';
import { TrendAnalyzer } from './trend-analyzer';
import { WeatherSnapshotCache } from './weather-cache';
import { WeatherProvider, createWeatherProvider } from './weather-provider';

export const JOB_NAMES = {
  weatherRefresh: 'weather-refresh',
  proximityRecompute: 'proximity-recompute',
  trendInsightRecompute: 'trend-insight-recompute',
} as const;

export type JobName = (typeof JOB_NAMES)[keyof typeof JOB_NAMES];

const HOUR_MS = 60 * 60 * 1000;

export interface StoreInsightsEngineDeps {
  repository: StoreRepository;
  transactions: TransactionSource;
  weatherProvider: WeatherProvider;
  generations?: GenerationStore; // durable copy of published generations
  config?: EngineConfig;
  now?: () => Date;
  wait?: (ms: number) => Promise<void>;
}

export interface OwnStoreFilter {
  city?: string;
  state?: string;
}

export interface CompetitorFilter {
  chain?: string;
  city?: string;
}

/**
 * Own-brand stores that insights are produced for
 */
function ownStores(stores: readonly Store[]): Store[] {
  return stores.filter((s) => s.isActive && !isCompetitor(s));
}

/**
 * Store insights engine
 *
 * Wires the registry, weather cache, trend analyzer and insight aggregator to
 * the scheduler. Jobs build each generation off to the side and publish it to
 * the snapshot store in one swap, then save it to the generation store when one
 * is configured. Reads go through `snapshots.current()` and fall back to the
 * latest saved generation, so a process that never runs jobs serves what the
 * scheduler process published.
 */
export class StoreInsightsEngine {
  readonly config: EngineConfig;
  readonly weather: WeatherSnapshotCache;
  readonly trends: TrendAnalyzer;
  readonly aggregator: InsightAggregator;
  readonly snapshots = new SnapshotStore();
  readonly scheduler: RefreshScheduler;

  private repository: StoreRepository;
  private generations: GenerationStore | null;
  private now: () => Date;
  private geo: { generationId: string; engine: GeoProximityEngine } | null = null;

  constructor(deps: StoreInsightsEngineDeps) {
    this.config = deps.config ?? DEFAULT_ENGINE_CONFIG;
    this.repository = deps.repository;
    this.generations = deps.generations ?? null;
    this.now = deps.now ?? (() => new Date());

    this.weather = new WeatherSnapshotCache(deps.weatherProvider, this.config, this.now, deps.wait);
    this.trends = new TrendAnalyzer(this.repository, deps.transactions, this.config, this.now);
    this.aggregator = new InsightAggregator(this.repository, this.snapshots, this.config, this.now);
    this.scheduler = new RefreshScheduler(
      { tickMs: this.config.schedulerTickMs, stopTimeoutMs: this.config.schedulerStopTimeoutMs },
      this.now
    );

    this.scheduler.register(JOB_NAMES.weatherRefresh, this.config.weatherRefreshIntervalHours * HOUR_MS, (signal) =>
      this.refreshWeather(signal)
    );
    this.scheduler.register(JOB_NAMES.proximityRecompute, this.config.proximityIntervalHours * HOUR_MS, () =>
      this.recomputeProximity()
    );
    this.scheduler.register(JOB_NAMES.trendInsightRecompute, this.config.trendIntervalHours * HOUR_MS, (signal) =>
      this.recomputeTrendsAndInsights(signal)
    );
  }

  // ============ Lifecycle ============

  /**
   * First boot: run every job once, proximity first so insights have competitors
   */
  async initialize(): Promise<JobRunResult[]> {
    console.log('[Engine] Initializing');
    const results: JobRunResult[] = [];
    for (const name of [JOB_NAMES.proximityRecompute, JOB_NAMES.weatherRefresh, JOB_NAMES.trendInsightRecompute]) {
      results.push(await this.scheduler.runNow(name));
    }
    console.log('[Engine] Initialized', { version: this.snapshots.current().version });
    return results;
  }

  start(): void {
    this.scheduler.start();
  }

  stop(timeoutMs?: number): Promise<void> {
    return this.scheduler.stop(timeoutMs);
  }

  // ============ Jobs ============

  async refreshWeather(signal: AbortSignal): Promise<void> {
    const stores = ownStores(await this.repository.listStores());

    await this.forEachStore(stores, signal, JOB_NAMES.weatherRefresh, async (store) => {
      await this.weather.refresh(store);
    });

    // Snapshots already taken are complete, so an interrupted run still publishes
    const generation = this.weather.toGeneration(
      stores.map((s) => s.storeId),
      uuid()
    );
    this.snapshots.publish('weather', generation);
    await this.generations?.saveWeather(generation);
    await this.publishInsights(stores);
  }

  async recomputeProximity(): Promise<void> {
    const stores = await this.repository.listStores();
    const engine = new GeoProximityEngine(stores);
    const generation = engine.buildGeneration(this.config.proximityRadiusKm, this.now().toISOString(), uuid());

    this.snapshots.publish('proximity', generation);
    console.log(`[Engine] Proximity generation ${generation.generationId}: ${generation.records.size} stores`);
    await this.generations?.saveProximity(generation);
    await this.publishInsights(ownStores(stores));
  }

  async recomputeTrendsAndInsights(signal: AbortSignal): Promise<void> {
    const stores = ownStores(await this.repository.listStores());
    const summaries = new Map<string, TrendSummary>();

    const processed = await this.forEachStore(stores, signal, JOB_NAMES.trendInsightRecompute, async (store) => {
      summaries.set(store.storeId, Object.freeze(await this.trends.computeTrend(store.storeId)));
    });

    if (processed < stores.length) {
      console.log('[Engine] Trend recompute interrupted, keeping previous generation');
      return;
    }

    const generation: TrendGeneration = Object.freeze({
      generationId: uuid(),
      computedAt: this.now().toISOString(),
      windowDays: this.config.trendWindowDays,
      summaries,
    });
    this.snapshots.publish('trends', generation);
    await this.publishInsights(stores);
  }

  /**
   * Rebuild insights for the given stores from one snapshot and publish them together
   */
  private async publishInsights(stores: readonly Store[]): Promise<void> {
    const snapshot = this.snapshots.current();
    const insights = new Map<string, readonly InsightRecord[]>();

    for (const store of stores) {
      insights.set(store.storeId, Object.freeze(this.aggregator.aggregateFrom(snapshot, store.storeId)));
    }

    const generation: InsightGeneration = Object.freeze({
      generationId: uuid(),
      computedAt: this.now().toISOString(),
      insights,
    });
    this.snapshots.publish('insights', generation);
    await this.generations?.saveInsights(generation);
  }

  /**
   * Run work for each store in parallel batches of `workerPoolSize`.
   * A store's failure is logged and does not affect the others.
   * Returns the number of stores processed before any stop signal.
   */
  private async forEachStore(
    stores: readonly Store[],
    signal: AbortSignal,
    job: string,
    work: (store: Store) => Promise<void>
  ): Promise<number> {
    const batchSize = this.config.workerPoolSize;
    let processed = 0;

    for (let i = 0; i < stores.length; i += batchSize) {
      if (signal.aborted) {
        console.log(`[Engine] ${job} stopping after ${processed}/${stores.length} stores`);
        break;
      }

      const batch = stores.slice(i, i + batchSize);
      await Promise.all(
        batch.map(async (store) => {
          try {
            await work(store);
          } catch (error) {
            console.error(`[Engine] ${job} failed for ${store.storeId}: ${errorMessage(error)}`);
          }
        })
      );
      processed += batch.length;
    }

    return processed;
  }

  // ============ Read surfaces ============

  /**
   * Insights for a store from the latest published generation
   */
  async latestInsights(storeId: string): Promise<readonly InsightRecord[]> {
    const published = this.snapshots.current().insights?.insights.get(storeId);
    if (published) {
      return published;
    }

    const saved = await this.generations?.latestInsights(storeId);
    if (saved) {
      return saved.value;
    }
    return this.aggregator.aggregate(storeId);
  }

  async proximitySummary(storeId: string, radiusKm: number = this.config.proximityRadiusKm): Promise<ProximitySummary> {
    const generation = this.snapshots.current().proximity;
    const fromGeneration = generation !== null && generation.stores.some((s) => s.storeId === storeId);

    // Deactivated stores are left out of generations but can still be looked up
    const engine =
      generation && fromGeneration
        ? this.geoFor(generation)
        : new GeoProximityEngine(await this.repository.listStores({ includeInactive: true }));

    const competitors = engine.findWithinRadius(storeId, radiusKm);

    return {
      storeId,
      radiusKm,
      computedAt: generation && fromGeneration ? generation.computedAt : null,
      competitorCount: competitors.length,
      nearest: competitors.length > 0 ? competitors[0] : null,
      byChain: engine.groupByChain(competitors),
      competitors,
    };
  }

  async weatherSummary(storeId: string): Promise<WeatherSummary> {
    await this.requireStore(storeId);

    const published = this.snapshots.current().weather?.snapshots.get(storeId);
    if (published) {
      return { storeId, state: this.weather.getState(storeId), snapshot: published };
    }

    const saved = await this.generations?.latestWeather(storeId);
    if (saved) {
      return { storeId, state: this.weather.freshness(saved.value), snapshot: saved.value };
    }
    return { storeId, state: this.weather.getState(storeId), snapshot: null };
  }

  async weatherForecast(storeId: string, days: number): Promise<WeatherForecast> {
    const store = await this.requireStore(storeId);
    return this.weather.getForecast(store, days);
  }

  async getStore(storeId: string): Promise<Store> {
    return this.requireStore(storeId);
  }

  /**
   * Active own-brand stores, optionally narrowed to a city and/or state
   */
  async listStores(filter: OwnStoreFilter = {}): Promise<Store[]> {
    const stores =
      filter.city !== undefined
        ? await this.repository.getStoresByCity(filter.city)
        : await this.repository.listStores();
    return ownStores(stores).filter((s) => matchesFilter(s, filter));
  }

  /**
   * Active competitor stores, optionally narrowed to a chain and/or city
   */
  async listCompetitors(filter: CompetitorFilter = {}): Promise<Store[]> {
    const { city } = filter;
    let chain: CompetitorChain | undefined;
    if (filter.chain !== undefined) {
      if (!isCompetitorChain(filter.chain)) {
        throw new ValidationError(`Unknown competitor chain "${filter.chain}"`);
      }
      chain = filter.chain;
    }

    const stores =
      city !== undefined ? await this.repository.getStoresByCity(city) : await this.repository.listStores();
    return stores.filter((s) => s.isActive && isCompetitor(s) && matchesFilter(s, { chain, city }));
  }

  async storesByCity(city: string): Promise<CityStores> {
    const stores = (await this.repository.getStoresByCity(city)).filter((s) => s.isActive);
    const ownStoresInCity = stores.filter((s) => !isCompetitor(s));
    const competitorStores = stores.filter(isCompetitor);

    return {
      city,
      ownStores: ownStoresInCity,
      competitorStores,
      ownCount: ownStoresInCity.length,
      competitorCount: competitorStores.length,
    };
  }

  /**
   * Latest proximity generation, from memory or from the generation store
   */
  async latestProximityGeneration(): Promise<PublishedProximity | null> {
    const published = this.snapshots.current().proximity;
    if (published) {
      return published;
    }
    return (await this.generations?.latestProximity()) ?? null;
  }

  async competitionSummary(): Promise<CompetitionSummary> {
    return new GeoProximityEngine(await this.repository.listStores()).competitionSummary();
  }

  jobStatus(): JobStatus[] {
    return this.scheduler.getJobs();
  }

  runNow(name: string): Promise<JobRunResult> {
    return this.scheduler.runNow(name);
  }

  private geoFor(generation: ProximityGeneration): GeoProximityEngine {
    if (!this.geo || this.geo.generationId !== generation.generationId) {
      this.geo = { generationId: generation.generationId, engine: new GeoProximityEngine(generation.stores) };
    }
    return this.geo.engine;
  }

  private async requireStore(storeId: string): Promise<Store> {
    const store = await this.repository.getStore(storeId);
    if (!store) {
      throw new NotFoundError('Store', storeId);
    }
    return store;
  }
}

/**
 * Factory function to create the engine from environment variables
 */
export function createStoreInsightsEngine(config: EngineConfig = loadEngineConfig()): StoreInsightsEngine {
  const db = createDynamoDBService(config.boundingBox);

  return new StoreInsightsEngine({
    repository: db,
    transactions: db,
    generations: db,
    weatherProvider: createWeatherProvider(config.utcOffsetMinutes),
    config,
  });
}
