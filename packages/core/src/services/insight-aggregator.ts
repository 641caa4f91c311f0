import {
  EngineConfig,
  INSIGHT_PRIORITIES,
  InputStatus,
  InsightInput,
  InsightRecord,
  ProximityRecord,
  Sourced,
  TrendSummary,
  WeatherSnapshot,
} from '../types';
import { NotFoundError } from '../errors';
import { hoursSince } from '../utils/dates';
import { EngineSnapshot, SnapshotStore } from './snapshot-store';
import { StoreRepository } from './store-repository';

export type InsightConfig = Pick<
  EngineConfig,
  | 'negativeGrowthThresholdPct'
  | 'positiveGrowthThresholdPct'
  | 'criticalCoverDays'
  | 'weatherVarianceBandPct'
  | 'weatherMinMatchedSlots'
  | 'highDensityCompetitorCount'
  | 'closeCompetitorKm'
  | 'weatherMaxAgeHours'
  | 'proximityMaxAgeHours'
  | 'trendMaxAgeHours'
>;

export interface NearbyCompetition {
  radiusKm: number;
  records: readonly ProximityRecord[]; // Nearest first
}

/**
 * Everything one store's insights are derived from
 */
export interface InsightInputs {
  storeId: string;
  generatedAt: string;
  trend: Sourced<TrendSummary>;
  weather: Sourced<WeatherSnapshot>;
  weatherHistory: readonly WeatherSnapshot[];
  proximity: Sourced<NearbyCompetition>;
}

type Draft = Omit<InsightRecord, 'insightId' | 'storeId' | 'generatedAt' | 'confidenceScore' | 'inputs' | 'inputAgesHours'> & {
  rule: string;
  basis: InsightInput[]; // Inputs the finding is computed from
};

const INPUT_WEIGHT: Record<InputStatus, number> = {
  present: 1,
  fallback: 0.5,
  absent: 0,
};

const round1 = (value: number): number => Math.round(value * 10) / 10;
const round2 = (value: number): number => Math.round(value * 100) / 100;
const round3 = (value: number): number => Math.round(value * 1000) / 1000;
const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

// ============ Rules ============

function salesInsight(trend: TrendSummary, config: InsightConfig): Draft {
  const growth = trend.growthRatePct;
  const metrics = {
    growthRatePct: growth,
    totalValue: trend.totalValue,
    priorTotalValue: trend.priorTotalValue,
    windowDays: trend.windowDays,
  };
  const peak = trend.peakPeriod
    ? ` Peak trading is ${trend.peakPeriod.dayName} ${trend.peakPeriod.period.toLowerCase()}.`
    : '';

  if (growth <= -config.negativeGrowthThresholdPct) {
    return {
      rule: 'sales-decline',
      basis: ['trend'],
      priority: 'high',
      category: 'sales',
      title: 'Significant Sales Decline Detected',
      message: `Sales have declined by ${Math.abs(growth).toFixed(1)}% over the last ${trend.windowDays} days compared with the previous ${trend.windowDays}.${peak}`,
      actions: [
        'Review pricing strategy and competitor prices',
        'Launch promotional campaigns',
        'Review product mix and inventory',
        'Increase marketing and visibility',
      ],
      supportingMetrics: metrics,
    };
  }

  if (growth >= config.positiveGrowthThresholdPct) {
    return {
      rule: 'sales-momentum',
      basis: ['trend'],
      priority: 'low',
      category: 'sales',
      title: `Sales Up ${growth.toFixed(1)}%`,
      message: `Sales grew ${growth.toFixed(1)}% over the last ${trend.windowDays} days.${peak}`,
      actions: ['Keep best-selling categories in stock', 'Extend the campaigns driving growth'],
      supportingMetrics: metrics,
    };
  }

  return {
    rule: 'sales-steady',
    basis: ['trend'],
    priority: 'low',
    category: 'sales',
    title: 'Sales Steady',
    message: `Sales changed ${growth >= 0 ? '+' : ''}${growth.toFixed(1)}% over the last ${trend.windowDays} days.${peak}`,
    actions: [],
    supportingMetrics: metrics,
  };
}

function inventoryInsight(trend: TrendSummary): Draft {
  const signals = trend.reorderSignals;
  const critical = signals.filter((s) => s.urgency === 'critical');
  const metrics: Record<string, number> = {
    reorderCategories: signals.length,
    criticalCategories: critical.length,
  };
  if (signals.length > 0) {
    metrics.minDaysOfCover = Math.min(...signals.map((s) => s.daysOfCover));
  }

  if (critical.length > 0) {
    return {
      rule: 'stockout-risk',
      basis: ['trend'],
      priority: 'critical',
      category: 'inventory',
      title: `Critical Stock Shortage: ${critical.length} ${critical.length === 1 ? 'Category' : 'Categories'}`,
      message: `The following categories need immediate restock: ${critical.map((s) => s.category).join(', ')}`,
      actions: critical.map((s) => `Reorder ${s.suggestedQuantity} units of ${s.category}`),
      supportingMetrics: metrics,
    };
  }

  if (signals.length > 0) {
    return {
      rule: 'reorder',
      basis: ['trend'],
      priority: 'high',
      category: 'inventory',
      title: `Reorder Needed: ${signals.length} ${signals.length === 1 ? 'Category' : 'Categories'}`,
      message: `Stock cover is running low for: ${signals.map((s) => `${s.category} (${s.daysOfCover.toFixed(1)} days)`).join(', ')}`,
      actions: signals.map((s) => `Reorder ${s.suggestedQuantity} units of ${s.category}`),
      supportingMetrics: metrics,
    };
  }

  return {
    rule: 'stock-healthy',
    basis: ['trend'],
    priority: 'low',
    category: 'inventory',
    title: 'Stock Levels Healthy',
    message: 'No category is below its reorder threshold.',
    actions: [],
    supportingMetrics: metrics,
  };
}

/**
 * Mean sales of slots observed under `condition` relative to all slots with
 * observed weather, as a percentage. Null when there are too few matched slots.
 * Synthetic snapshots carry no real condition and are left out.
 */
export function conditionSalesVariance(
  trend: TrendSummary,
  history: readonly WeatherSnapshot[],
  condition: string,
  minMatchedSlots: number
): { variancePct: number; matchedSlots: number; conditionSlots: number } | null {
  const conditions = new Map(
    history.filter((s) => s.source === 'provider').map((s) => [`${s.date}#${s.period}`, s.condition])
  );

  const matched: number[] = [];
  const underCondition: number[] = [];
  for (const slot of trend.slotTotals) {
    const observed = conditions.get(`${slot.date}#${slot.period}`);
    if (observed === undefined) continue;
    matched.push(slot.total);
    if (observed === condition) underCondition.push(slot.total);
  }

  if (matched.length < minMatchedSlots || underCondition.length === 0) {
    return null;
  }

  const mean = (values: number[]): number => values.reduce((a, b) => a + b, 0) / values.length;
  const baseline = mean(matched);

  return {
    variancePct: baseline === 0 ? 0 : round2(((mean(underCondition) - baseline) / baseline) * 100),
    matchedSlots: matched.length,
    conditionSlots: underCondition.length,
  };
}

function weatherActions(weather: WeatherSnapshot): string[] {
  if (weather.condition.includes('Rain')) {
    return [
      'Stock more umbrellas and rainwear',
      'Promote indoor and home products',
      'Increase online delivery capacity',
    ];
  }
  if (weather.temperatureC > 30) {
    return ['Promote summer wear', 'Ensure in-store cooling is optimal'];
  }
  return ['Monitor weather patterns', 'Maintain balanced inventory'];
}

function weatherInsight(
  weather: WeatherSnapshot,
  trend: TrendSummary | null,
  history: readonly WeatherSnapshot[],
  config: InsightConfig
): Draft {
  const variance = trend
    ? conditionSalesVariance(trend, history, weather.condition, config.weatherMinMatchedSlots)
    : null;

  const metrics: Record<string, number> = {
    temperatureC: weather.temperatureC,
    humidity: weather.humidity,
    windSpeedKmh: weather.windSpeedKmh,
  };
  if (variance) {
    metrics.salesVariancePct = variance.variancePct;
    metrics.matchedSlots = variance.matchedSlots;
  }

  if (variance && Math.abs(variance.variancePct) > config.weatherVarianceBandPct) {
    const direction = variance.variancePct > 0 ? 'Increase' : 'Decrease';
    return {
      rule: 'weather-variance',
      basis: ['weather', 'trend'],
      priority: 'medium',
      category: 'weather',
      title: `Weather Causing ${Math.abs(variance.variancePct).toFixed(1)}% Sales ${direction}`,
      message: `Current weather conditions (${weather.condition}) are significantly impacting sales.`,
      actions: weatherActions(weather),
      supportingMetrics: metrics,
    };
  }

  return {
    rule: 'weather-conditions',
    basis: trend ? ['weather', 'trend'] : ['weather'],
    priority: 'low',
    category: 'weather',
    title: `Current Conditions: ${weather.condition}, ${round1(weather.temperatureC)}°C`,
    message: weather.description
      ? `${weather.period} conditions: ${weather.description}.`
      : `${weather.period} conditions: ${weather.condition.toLowerCase()}.`,
    actions: weatherActions(weather),
    supportingMetrics: metrics,
  };
}

/**
 * Rough market share estimate from local competition
 */
export function estimateMarketShare(competitorCount: number, nearestKm: number): number {
  return Math.max(10, 50 - competitorCount * 3.5 + Math.min(10, nearestKm / 2));
}

function competitionStrategies(highDensity: boolean): string[] {
  const strategies = [
    'Strengthen loyalty programs and customer retention',
    'Differentiate with exclusive product lines',
    'Enhance in-store experience and customer service',
    'Leverage local marketing and community engagement',
  ];
  return highDensity ? ['Focus on price competitiveness for key categories', ...strategies] : strategies;
}

function competitionInsight(nearby: NearbyCompetition, config: InsightConfig): Draft {
  const { radiusKm, records } = nearby;
  const count = records.length;
  const nearest = records.length > 0 ? records[0] : null;

  const metrics: Record<string, number> = {
    competitorCount: count,
    radiusKm,
    estimatedMarketSharePct: round1(estimateMarketShare(count, nearest ? nearest.distanceKm : radiusKm)),
  };
  if (nearest) {
    metrics.nearestCompetitorKm = round2(nearest.distanceKm);
  }

  if (count > config.highDensityCompetitorCount) {
    return {
      rule: 'high-density',
      basis: ['proximity'],
      priority: 'high',
      category: 'competition',
      title: `High Competition Density: ${count} Competitors Nearby`,
      message: `Store faces intense competition with ${count} competitors within ${radiusKm}km radius.`,
      actions: competitionStrategies(true),
      supportingMetrics: metrics,
    };
  }

  if (nearest && nearest.distanceKm <= config.closeCompetitorKm) {
    return {
      rule: 'close-competitor',
      basis: ['proximity'],
      priority: 'medium',
      category: 'competition',
      title: `${nearest.competitorChain} Store ${nearest.distanceKm.toFixed(1)}km Away`,
      message: `The nearest competitor (${nearest.competitorChain}) is within ${config.closeCompetitorKm}km.`,
      actions: competitionStrategies(false),
      supportingMetrics: metrics,
    };
  }

  return {
    rule: 'competition-overview',
    basis: ['proximity'],
    priority: 'low',
    category: 'competition',
    title: `${count} ${count === 1 ? 'Competitor' : 'Competitors'} Within ${radiusKm}km`,
    message:
      count === 0
        ? `No competitor stores within ${radiusKm}km.`
        : `Nearest competitor is ${nearest ? nearest.distanceKm.toFixed(1) : '-'}km away.`,
    actions: [],
    supportingMetrics: metrics,
  };
}

// ============ Scoring ============

function statusOf<T>(input: Sourced<T>): InputStatus {
  return input.status;
}

function observedAtOf<T>(input: Sourced<T>): string | null {
  return input.status === 'absent' ? null : input.observedAt;
}

/**
 * Age in hours of each available input, measured against the newest input
 * rather than the wall clock so equal inputs always give equal ages.
 * Absent inputs have no age.
 */
export function inputAges(inputs: InsightInputs): Partial<Record<InsightInput, number>> {
  const observed: Array<[InsightInput, string | null]> = [
    ['trend', observedAtOf(inputs.trend)],
    ['weather', observedAtOf(inputs.weather)],
    ['proximity', observedAtOf(inputs.proximity)],
  ];

  const times = observed.map(([, at]) => at).filter((t): t is string => t !== null);
  if (times.length === 0) return {};
  const reference = new Date(Math.max(...times.map((t) => new Date(t).getTime())));

  const ages: Partial<Record<InsightInput, number>> = {};
  for (const [input, at] of observed) {
    if (at !== null) ages[input] = hoursSince(at, reference);
  }
  return ages;
}

/**
 * Confidence = 0.6 x completeness + 0.4 x recency.
 *
 * Completeness is the mean input weight across all of the store's inputs.
 * Recency is scored on the stalest input the finding is based on.
 */
function scoreConfidence(
  inputs: InsightInputs,
  ages: Partial<Record<InsightInput, number>>,
  basis: InsightInput[],
  config: InsightConfig
): number {
  const trendWeight =
    inputs.trend.status === 'absent'
      ? 0
      : inputs.trend.value.lowConfidence
        ? Math.min(INPUT_WEIGHT[inputs.trend.status], 0.5)
        : INPUT_WEIGHT[inputs.trend.status];
  const completeness =
    (trendWeight + INPUT_WEIGHT[statusOf(inputs.weather)] + INPUT_WEIGHT[statusOf(inputs.proximity)]) / 3;

  const maxAgeHours: Record<InsightInput, number> = {
    trend: config.trendMaxAgeHours,
    weather: config.weatherMaxAgeHours,
    proximity: config.proximityMaxAgeHours,
  };

  let recency = 1;
  for (const input of basis) {
    const age = ages[input];
    const score = age === undefined ? 0 : clamp01(1 - age / maxAgeHours[input]);
    recency = Math.min(recency, score);
  }

  return round3(0.6 * completeness + 0.4 * recency);
}

function compareInsights(a: InsightRecord, b: InsightRecord): number {
  return (
    INSIGHT_PRIORITIES.indexOf(a.priority) - INSIGHT_PRIORITIES.indexOf(b.priority) ||
    b.confidenceScore - a.confidenceScore ||
    compareStrings(a.category, b.category) ||
    compareStrings(a.insightId, b.insightId)
  );
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Derive a store's insight set from its inputs.
 * Categories whose inputs are absent are omitted. Pure and deterministic.
 */
export function buildInsights(inputs: InsightInputs, config: InsightConfig): InsightRecord[] {
  const drafts: Draft[] = [];

  const trend = inputs.trend.status === 'absent' ? null : inputs.trend.value;
  if (trend) {
    drafts.push(salesInsight(trend, config), inventoryInsight(trend));
  }
  if (inputs.weather.status !== 'absent') {
    drafts.push(weatherInsight(inputs.weather.value, trend, inputs.weatherHistory, config));
  }
  if (inputs.proximity.status !== 'absent') {
    drafts.push(competitionInsight(inputs.proximity.value, config));
  }

  const status: Record<InsightInput, InputStatus> = {
    trend: statusOf(inputs.trend),
    weather: statusOf(inputs.weather),
    proximity: statusOf(inputs.proximity),
  };
  const ages = inputAges(inputs);

  return drafts
    .map(({ rule, basis, ...draft }): InsightRecord => {
      const inputStatus: Partial<Record<InsightInput, InputStatus>> = {};
      const inputAgesHours: Partial<Record<InsightInput, number>> = {};
      for (const input of basis) {
        inputStatus[input] = status[input];
        const age = ages[input];
        if (age !== undefined) inputAgesHours[input] = round2(age);
      }

      return {
        insightId: `${inputs.storeId}:${draft.category}:${rule}`,
        storeId: inputs.storeId,
        generatedAt: inputs.generatedAt,
        ...draft,
        confidenceScore: scoreConfidence(inputs, ages, basis, config),
        inputs: inputStatus,
        inputAgesHours,
      };
    })
    .sort(compareInsights);
}

/**
 * Read one store's inputs out of a published snapshot
 */
export function collectInputs(snapshot: EngineSnapshot, storeId: string, generatedAt: string): InsightInputs {
  const summary = snapshot.trends?.summaries.get(storeId);
  const weather = snapshot.weather?.snapshots.get(storeId);
  const records = snapshot.proximity?.records.get(storeId);

  return {
    storeId,
    generatedAt,
    trend: summary ? { status: 'present', value: summary, observedAt: summary.computedAt } : { status: 'absent' },
    weather: weather
      ? { status: weather.source === 'provider' ? 'present' : 'fallback', value: weather, observedAt: weather.observedAt }
      : { status: 'absent' },
    weatherHistory: snapshot.weather?.history.get(storeId) ?? [],
    proximity:
      snapshot.proximity && records
        ? {
            status: 'present',
            value: { radiusKm: snapshot.proximity.radiusKm, records },
            observedAt: snapshot.proximity.computedAt,
          }
        : { status: 'absent' },
  };
}

/**
 * Insight aggregator - merges the latest proximity, weather and trend
 * generations into prioritised insight records
 */
export class InsightAggregator {
  constructor(
    private repository: StoreRepository,
    private snapshots: SnapshotStore,
    private config: InsightConfig,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Insights for one store from the latest published snapshot.
   * Missing inputs degrade the result; only an unknown store is an error.
   */
  async aggregate(storeId: string): Promise<InsightRecord[]> {
    const store = await this.repository.getStore(storeId);
    if (!store) {
      throw new NotFoundError('Store', storeId);
    }
    return this.aggregateFrom(this.snapshots.current(), storeId);
  }

  /**
   * Insights for one store from a given snapshot. Used by the recompute job so
   * every store in a cycle is built from the same generations.
   */
  aggregateFrom(snapshot: EngineSnapshot, storeId: string): InsightRecord[] {
    return buildInsights(collectInputs(snapshot, storeId, this.now().toISOString()), this.config);
  }
}
