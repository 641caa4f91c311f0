import {
  InsightGeneration,
  InsightRecord,
  ProximityGeneration,
  WeatherGeneration,
  WeatherSnapshot,
} from '../types';

export type PublishedKind = 'proximity' | 'weather' | 'insights';

/**
 * Header of the latest saved generation of one kind
 */
export interface PublishedPointer {
  kind: PublishedKind;
  generationId: string;
  computedAt: string;
  radiusKm?: number; // proximity only
}

/**
 * A saved proximity generation. The store set it was computed from stays with the writer.
 */
export type PublishedProximity = Omit<ProximityGeneration, 'stores'>;

/**
 * One store's entry from a saved generation
 */
export interface PublishedEntry<T> {
  generationId: string;
  computedAt: string;
  value: T;
}

/**
 * Durable copy of the published generations.
 *
 * The scheduler process writes each generation after publishing it in memory;
 * API processes that never run jobs read the latest one from here. A save writes
 * every per-store entry first and moves the `latest` pointer last, so readers
 * never see part of a generation.
 */
export interface GenerationStore {
  saveProximity(generation: ProximityGeneration): Promise<void>;
  saveWeather(generation: WeatherGeneration): Promise<void>;
  saveInsights(generation: InsightGeneration): Promise<void>;

  latestProximity(): Promise<PublishedProximity | null>;
  latestWeather(storeId: string): Promise<PublishedEntry<WeatherSnapshot> | null>;
  latestInsights(storeId: string): Promise<PublishedEntry<readonly InsightRecord[]> | null>;
}
