import { CompetitorStore, Store, StoreChain } from './store';

/**
 * Distance from an own-brand store to one competitor store
 */
export interface ProximityRecord {
  owningStoreId: string;
  competitorStoreId: string;
  competitorChain: StoreChain;
  distanceKm: number;
  computedAt: string; // ISO timestamp
}

/**
 * Competitor hit returned by radius queries
 */
export interface CompetitorDistance {
  competitor: CompetitorStore;
  distanceKm: number;
}

/**
 * One complete proximity recompute, published as a unit.
 * Records for each store are sorted ascending by distance.
 */
export interface ProximityGeneration {
  generationId: string;
  computedAt: string;
  radiusKm: number;
  records: ReadonlyMap<string, readonly ProximityRecord[]>;
  stores: readonly Store[]; // store set the generation was computed from
}

/**
 * Read-side summary for the chat layer
 */
export interface ProximitySummary {
  storeId: string;
  radiusKm: number;
  computedAt: string | null; // null until the first proximity cycle completes
  competitorCount: number;
  nearest: CompetitorDistance | null;
  byChain: Record<string, number>;
  competitors: CompetitorDistance[];
}

/**
 * Network-wide competition overview
 */
export interface CompetitionSummary {
  totalOwnStores: number;
  totalCompetitorStores: number;
  competitorsByChain: Record<string, number>;
  topCities: Array<{ city: string; storeCount: number }>;
  uniqueCities: number;
}
