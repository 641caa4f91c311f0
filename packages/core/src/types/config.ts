import { BoundingBox } from './store';

/**
 * Tunable thresholds and cadences for the insights engine
 */
export interface EngineConfig {
  // Country bounding box for store coordinates (default: India)
  boundingBox: BoundingBox;

  // Store-local time offset from UTC, used to bucket weather into periods
  utcOffsetMinutes: number;

  // Proximity
  proximityRadiusKm: number;
  highDensityCompetitorCount: number; // More than this many competitors in radius = high density
  closeCompetitorKm: number; // Nearest competitor at or under this distance is flagged

  // Weather
  weatherFreshTtlMinutes: number;
  weatherRetentionDays: number;
  weatherRetryBackoffMs: number;
  weatherVarianceBandPct: number;
  weatherMinMatchedSlots: number;

  // Trends
  trendWindowDays: number;
  negativeGrowthThresholdPct: number;
  positiveGrowthThresholdPct: number;

  // Inventory
  reorderThresholdDays: number; // Emit a reorder signal under this many days of cover
  criticalCoverDays: number; // Cover under this is an imminent stockout
  targetCoverDays: number; // Reorder quantity restores cover to this

  // Confidence: inputs older than these are scored as fully stale
  weatherMaxAgeHours: number;
  proximityMaxAgeHours: number;
  trendMaxAgeHours: number;

  // Scheduler
  weatherRefreshIntervalHours: number;
  proximityIntervalHours: number;
  trendIntervalHours: number;
  schedulerTickMs: number;
  schedulerStopTimeoutMs: number;
  workerPoolSize: number; // Stores processed in parallel per batch
}

/**
 * Default engine configuration
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  boundingBox: {
    minLatitude: 8.4,
    maxLatitude: 37.6,
    minLongitude: 68.7,
    maxLongitude: 97.25,
  },
  utcOffsetMinutes: 330, // IST

  proximityRadiusKm: 10,
  highDensityCompetitorCount: 5,
  closeCompetitorKm: 2,

  weatherFreshTtlMinutes: 180,
  weatherRetentionDays: 14,
  weatherRetryBackoffMs: 500,
  weatherVarianceBandPct: 15,
  weatherMinMatchedSlots: 2,

  trendWindowDays: 30,
  negativeGrowthThresholdPct: 10,
  positiveGrowthThresholdPct: 15,

  reorderThresholdDays: 7,
  criticalCoverDays: 3,
  targetCoverDays: 14,

  weatherMaxAgeHours: 12,
  proximityMaxAgeHours: 72,
  trendMaxAgeHours: 72,

  weatherRefreshIntervalHours: 3,
  proximityIntervalHours: 24,
  trendIntervalHours: 24,
  schedulerTickMs: 60 * 1000,
  schedulerStopTimeoutMs: 30 * 1000,
  workerPoolSize: 5,
};
