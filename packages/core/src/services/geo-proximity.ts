import {
  CompetitionSummary,
  CompetitorDistance,
  CompetitorStore,
  GeoPoint,
  ProximityGeneration,
  ProximityRecord,
  Store,
  isCompetitor,
  OWN_BRAND_CHAIN,
} from '../types';
import { NotFoundError, ValidationError } from '../errors';

/**
 * Mean earth radius used by the spherical approximation
 */
export const EARTH_RADIUS_KM = 6371;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Great-circle distance in km between two points (haversine formula)
 */
export function haversineDistance(a: GeoPoint, b: GeoPoint): number {
  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);
  const deltaLat = toRadians(b.latitude - a.latitude);
  const deltaLon = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(deltaLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(deltaLon / 2) ** 2;

  // Clamp: rounding can push h a hair over 1 for antipodal points
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function byDistanceThenId(a: CompetitorDistance, b: CompetitorDistance): number {
  return a.distanceKm - b.distanceKm || compareIds(a.competitor.storeId, b.competitor.storeId);
}

/**
 * Geo proximity engine - pure computation over a fixed store set.
 * Build a new instance per proximity cycle; it never performs I/O.
 */
export class GeoProximityEngine {
  private stores: Map<string, Store>;
  private competitors: CompetitorStore[];

  constructor(stores: readonly Store[]) {
    this.stores = new Map(stores.map((s) => [s.storeId, s]));
    this.competitors = stores.filter(isCompetitor).filter((s) => s.isActive);
  }

  /**
   * Distance in km between two points
   */
  distance(a: GeoPoint, b: GeoPoint): number {
    return haversineDistance(a, b);
  }

  /**
   * Active competitors within radiusKm of a store, nearest first.
   * Ties are broken by competitor id so results are deterministic.
   */
  findWithinRadius(storeId: string, radiusKm: number): CompetitorDistance[] {
    if (!Number.isFinite(radiusKm) || radiusKm <= 0) {
      throw new ValidationError(`radiusKm must be a positive number, got ${radiusKm}`);
    }

    const store = this.requireStore(storeId);
    const hits: CompetitorDistance[] = [];

    for (const competitor of this.competitors) {
      if (competitor.storeId === store.storeId) continue;

      const distanceKm = haversineDistance(store.location, competitor.location);
      if (distanceKm <= radiusKm) {
        hits.push({ competitor, distanceKm });
      }
    }

    return hits.sort(byDistanceThenId);
  }

  /**
   * Closest active competitor regardless of distance
   */
  nearestCompetitor(storeId: string): CompetitorDistance | null {
    const store = this.requireStore(storeId);
    let nearest: CompetitorDistance | null = null;

    for (const competitor of this.competitors) {
      if (competitor.storeId === store.storeId) continue;

      const candidate = {
        competitor,
        distanceKm: haversineDistance(store.location, competitor.location),
      };
      if (nearest === null || byDistanceThenId(candidate, nearest) < 0) {
        nearest = candidate;
      }
    }

    return nearest;
  }

  /**
   * Count competitors per chain
   */
  groupByChain(records: ReadonlyArray<ProximityRecord | CompetitorDistance>): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const record of records) {
      const chain = 'competitor' in record ? record.competitor.chain : record.competitorChain;
      counts[chain] = (counts[chain] || 0) + 1;
    }
    return counts;
  }

  /**
   * Recompute proximity records for every active own-brand store
   */
  buildGeneration(radiusKm: number, computedAt: string, generationId: string): ProximityGeneration {
    const records = new Map<string, readonly ProximityRecord[]>();

    for (const store of this.stores.values()) {
      if (isCompetitor(store) || !store.isActive) continue;

      const storeRecords = this.findWithinRadius(store.storeId, radiusKm).map(
        (hit): ProximityRecord =>
          Object.freeze({
            owningStoreId: store.storeId,
            competitorStoreId: hit.competitor.storeId,
            competitorChain: hit.competitor.chain,
            distanceKm: hit.distanceKm,
            computedAt,
          })
      );
      records.set(store.storeId, Object.freeze(storeRecords));
    }

    return Object.freeze({
      generationId,
      computedAt,
      radiusKm,
      records,
      stores: Object.freeze([...this.stores.values()]),
    });
  }

  /**
   * Network-wide counts: stores per chain and the cities with the most own-brand stores
   */
  competitionSummary(): CompetitionSummary {
    const competitorsByChain: Record<string, number> = {};
    const cities = new Map<string, number>();
    let totalOwnStores = 0;
    let totalCompetitorStores = 0;

    for (const store of this.stores.values()) {
      if (!store.isActive) continue;

      if (store.chain === OWN_BRAND_CHAIN) {
        totalOwnStores++;
        cities.set(store.city, (cities.get(store.city) || 0) + 1);
      } else {
        totalCompetitorStores++;
        competitorsByChain[store.chain] = (competitorsByChain[store.chain] || 0) + 1;
      }
    }

    const topCities = [...cities.entries()]
      .sort((a, b) => b[1] - a[1] || compareIds(a[0], b[0]))
      .slice(0, 10)
      .map(([city, storeCount]) => ({ city, storeCount }));

    return {
      totalOwnStores,
      totalCompetitorStores,
      competitorsByChain,
      topCities,
      uniqueCities: cities.size,
    };
  }

  private requireStore(storeId: string): Store {
    const store = this.stores.get(storeId);
    if (!store) {
      throw new NotFoundError('Store', storeId);
    }
    return store;
  }
}
