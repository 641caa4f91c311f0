/**
 * Store location types
 */

/**
 * Chain that owns the canonical store network
 */
export const OWN_BRAND_CHAIN = 'V-Mart';

/**
 * Competitor chains tracked for proximity analysis
 */
export const COMPETITOR_CHAINS = [
  'V2 Retail',
  'Zudio',
  'Style Bazar',
  'Max Fashion',
  'Reliance Trends',
  'Pantaloons',
  'Shoppers Stop',
  'Lifestyle',
  'Westside',
  'Other',
] as const;

export type CompetitorChain = (typeof COMPETITOR_CHAINS)[number];
export type StoreChain = typeof OWN_BRAND_CHAIN | CompetitorChain;

export const STORE_CHAINS: readonly StoreChain[] = [OWN_BRAND_CHAIN, ...COMPETITOR_CHAINS];

/**
 * Latitude/longitude pair in decimal degrees
 */
export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/**
 * Country bounding box that every store location must fall inside
 */
export interface BoundingBox {
  minLatitude: number;
  maxLatitude: number;
  minLongitude: number;
  maxLongitude: number;
}

/**
 * Store - an own-brand or competitor retail location
 */
export interface Store {
  storeId: string; // Partition key, immutable
  name: string;
  chain: StoreChain;
  location: GeoPoint;

  // Address
  address: string;
  city: string;
  state: string;
  postalCode: string;

  // Contact metadata
  phone?: string;
  email?: string;
  managerName?: string;
  openingHours?: string;
  storeSizeSqft?: number;
  openedDate?: string; // YYYY-MM-DD

  // Stores are never deleted, only deactivated
  isActive: boolean;

  createdAt: string;
  updatedAt: string;
}

/**
 * A store that belongs to one of the competitor chains
 */
export type CompetitorStore = Store & { chain: CompetitorChain };

export function isCompetitor(store: Store): store is CompetitorStore {
  return store.chain !== OWN_BRAND_CHAIN;
}

export function isStoreChain(value: string): value is StoreChain {
  return (STORE_CHAINS as readonly string[]).includes(value);
}

/**
 * Input for registering a store (timestamps are filled in by the repository)
 */
export type StoreInput = Omit<Store, 'isActive' | 'createdAt' | 'updatedAt'> & {
  isActive?: boolean;
};

export function isCompetitorChain(value: string): value is CompetitorChain {
  return (COMPETITOR_CHAINS as readonly string[]).includes(value);
}

/**
 * Exact-match listing filter; unset fields match everything
 */
export interface StoreFilter {
  city?: string;
  state?: string;
  chain?: StoreChain;
}

export function matchesFilter(store: Store, filter: StoreFilter): boolean {
  return (
    (filter.city === undefined || store.city === filter.city) &&
    (filter.state === undefined || store.state === filter.state) &&
    (filter.chain === undefined || store.chain === filter.chain)
  );
}

/**
 * Active stores in one city, split into the own network and competitors
 */
export interface CityStores {
  city: string;
  ownStores: Store[];
  competitorStores: CompetitorStore[];
  ownCount: number;
  competitorCount: number;
}
