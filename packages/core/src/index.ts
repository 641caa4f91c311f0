// Types
export * from './types';

// Errors & configuration
export * from './errors';
export * from './config';

// Utils
export * from './utils/dates';

// Services
export * from './services/store-repository';
export * from './services/dynamodb';
export * from './services/geo-proximity';
export * from './services/weather-provider';
export * from './services/weather-cache';
export * from './services/trend-analyzer';
export * from './services/snapshot-store';
export * from './services/generation-store';
export * from './services/insight-aggregator';
export * from './services/refresh-scheduler';

// Engine
export * from './services/insights-engine';
