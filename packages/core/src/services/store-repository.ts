import { BoundingBox, Store, StoreInput, TransactionPoint, isStoreChain } from '../types';
import { ValidationError } from '../errors';

/**
 * Store registry - canonical and competitor stores.
 * Written by administrative tooling, read by the insights engine.
 */
export interface StoreRepository {
  getStore(storeId: string): Promise<Store | null>;
  listStores(options?: { includeInactive?: boolean }): Promise<Store[]>;
  getStoresByCity(city: string): Promise<Store[]>;
  putStore(input: StoreInput): Promise<Store>;
  deactivateStore(storeId: string): Promise<void>;
}

/**
 * Pull-based, read-only time series of sales and stock per store
 */
export interface TransactionSource {
  getSeries(storeId: string, fromDate: string, toDate: string): Promise<TransactionPoint[]>;
}

/**
 * Validate a store before it is written.
 * Coordinates must fall inside the configured country bounding box.
 */
export function validateStoreInput(input: StoreInput, boundingBox: BoundingBox): void {
  if (!input.storeId || input.storeId.trim() === '') {
    throw new ValidationError('storeId is required');
  }
  if (!input.name || input.name.trim() === '') {
    throw new ValidationError(`Store ${input.storeId}: name is required`);
  }
  if (!isStoreChain(input.chain)) {
    throw new ValidationError(`Store ${input.storeId}: unknown chain "${input.chain}"`);
  }

  const { latitude, longitude } = input.location;
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    throw new ValidationError(`Store ${input.storeId}: coordinates must be numbers`);
  }
  if (
    latitude < boundingBox.minLatitude ||
    latitude > boundingBox.maxLatitude ||
    longitude < boundingBox.minLongitude ||
    longitude > boundingBox.maxLongitude
  ) {
    throw new ValidationError(
      `Store ${input.storeId}: location (${latitude}, ${longitude}) is outside the supported region`
    );
  }
}
