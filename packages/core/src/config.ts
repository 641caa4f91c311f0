import { DEFAULT_ENGINE_CONFIG, EngineConfig } from './types';
import { ValidationError } from './errors';

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Build the engine configuration from environment variables.
 * Anything not set falls back to DEFAULT_ENGINE_CONFIG.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;

  const config: EngineConfig = {
    boundingBox: {
      minLatitude: readNumber(env, 'BBOX_MIN_LATITUDE', d.boundingBox.minLatitude),
      maxLatitude: readNumber(env, 'BBOX_MAX_LATITUDE', d.boundingBox.maxLatitude),
      minLongitude: readNumber(env, 'BBOX_MIN_LONGITUDE', d.boundingBox.minLongitude),
      maxLongitude: readNumber(env, 'BBOX_MAX_LONGITUDE', d.boundingBox.maxLongitude),
    },
    utcOffsetMinutes: readNumber(env, 'STORE_UTC_OFFSET_MINUTES', d.utcOffsetMinutes),

    proximityRadiusKm: readNumber(env, 'PROXIMITY_RADIUS_KM', d.proximityRadiusKm),
    highDensityCompetitorCount: readNumber(env, 'HIGH_DENSITY_COMPETITOR_COUNT', d.highDensityCompetitorCount),
    closeCompetitorKm: readNumber(env, 'CLOSE_COMPETITOR_KM', d.closeCompetitorKm),

    weatherFreshTtlMinutes: readNumber(env, 'WEATHER_FRESH_TTL_MINUTES', d.weatherFreshTtlMinutes),
    weatherRetentionDays: readNumber(env, 'WEATHER_RETENTION_DAYS', d.weatherRetentionDays),
    weatherRetryBackoffMs: readNumber(env, 'WEATHER_RETRY_BACKOFF_MS', d.weatherRetryBackoffMs),
    weatherVarianceBandPct: readNumber(env, 'WEATHER_VARIANCE_BAND_PCT', d.weatherVarianceBandPct),
    weatherMinMatchedSlots: readNumber(env, 'WEATHER_MIN_MATCHED_SLOTS', d.weatherMinMatchedSlots),

    trendWindowDays: readNumber(env, 'TREND_WINDOW_DAYS', d.trendWindowDays),
    negativeGrowthThresholdPct: readNumber(env, 'NEGATIVE_GROWTH_THRESHOLD_PCT', d.negativeGrowthThresholdPct),
    positiveGrowthThresholdPct: readNumber(env, 'POSITIVE_GROWTH_THRESHOLD_PCT', d.positiveGrowthThresholdPct),

    reorderThresholdDays: readNumber(env, 'REORDER_THRESHOLD_DAYS', d.reorderThresholdDays),
    criticalCoverDays: readNumber(env, 'CRITICAL_COVER_DAYS', d.criticalCoverDays),
    targetCoverDays: readNumber(env, 'REORDER_TARGET_COVER_DAYS', d.targetCoverDays),

    weatherMaxAgeHours: readNumber(env, 'WEATHER_MAX_AGE_HOURS', d.weatherMaxAgeHours),
    proximityMaxAgeHours: readNumber(env, 'PROXIMITY_MAX_AGE_HOURS', d.proximityMaxAgeHours),
    trendMaxAgeHours: readNumber(env, 'TREND_MAX_AGE_HOURS', d.trendMaxAgeHours),

    weatherRefreshIntervalHours: readNumber(env, 'WEATHER_REFRESH_INTERVAL_HOURS', d.weatherRefreshIntervalHours),
    proximityIntervalHours: readNumber(env, 'PROXIMITY_INTERVAL_HOURS', d.proximityIntervalHours),
    trendIntervalHours: readNumber(env, 'TREND_INTERVAL_HOURS', d.trendIntervalHours),
    schedulerTickMs: readNumber(env, 'SCHEDULER_TICK_MS', d.schedulerTickMs),
    schedulerStopTimeoutMs: readNumber(env, 'SCHEDULER_STOP_TIMEOUT_MS', d.schedulerStopTimeoutMs),
    workerPoolSize: readNumber(env, 'WORKER_POOL_SIZE', d.workerPoolSize),
  };

  if (config.proximityRadiusKm <= 0) {
    throw new ValidationError('PROXIMITY_RADIUS_KM must be positive');
  }
  if (!Number.isInteger(config.trendWindowDays) || config.trendWindowDays <= 0) {
    throw new ValidationError('TREND_WINDOW_DAYS must be a positive integer');
  }
  if (!Number.isInteger(config.workerPoolSize) || config.workerPoolSize <= 0) {
    throw new ValidationError('WORKER_POOL_SIZE must be a positive integer');
  }
  if (config.criticalCoverDays > config.reorderThresholdDays) {
    throw new ValidationError('CRITICAL_COVER_DAYS cannot exceed REORDER_THRESHOLD_DAYS');
  }

  return config;
}
