import {
  DAY_PERIODS,
  DayPeriod,
  EngineConfig,
  PeakPeriod,
  ReorderRecommendation,
  ReorderThresholds,
  SlotTotal,
  TransactionPoint,
  TrendSummary,
} from '../types';
import { NotFoundError, ValidationError } from '../errors';
import { DAY_NAMES, addDays, dayOfWeek, daysBetween, localDateAndPeriod } from '../utils/dates';
import { StoreRepository, TransactionSource } from './store-repository';

export type TrendAnalyzerConfig = ReorderThresholds & Pick<EngineConfig, 'utcOffsetMinutes' | 'trendWindowDays'>;

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Percentage change from prior to current; 0 when there is no prior baseline
 */
export function growthPct(current: number, prior: number): number {
  if (prior === 0) return 0;
  return round2(((current - prior) / prior) * 100);
}

function compareChronological(a: { date: string; period: DayPeriod }, b: { date: string; period: DayPeriod }): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return DAY_PERIODS.indexOf(a.period) - DAY_PERIODS.indexOf(b.period);
}

/**
 * (day-of-week, period) bucket with the highest mean slot total.
 * A bucket's mean is taken over every occurrence of its weekday in the window,
 * so days without sales count as zero.
 * Slots must be in chronological order; ties go to the bucket seen first.
 */
function findPeakPeriod(slots: SlotTotal[], windowStart: string, windowDays: number): PeakPeriod | null {
  const weekdayCounts = new Array<number>(7).fill(0);
  for (let offset = 0; offset < windowDays; offset++) {
    weekdayCounts[dayOfWeek(addDays(windowStart, offset))]++;
  }

  const buckets = new Map<string, { dayOfWeek: number; period: DayPeriod; sum: number }>();

  for (const slot of slots) {
    const dow = dayOfWeek(slot.date);
    const key = `${dow}#${slot.period}`;
    const bucket = buckets.get(key) ?? { dayOfWeek: dow, period: slot.period, sum: 0 };
    bucket.sum += slot.total;
    buckets.set(key, bucket);
  }

  // Map iteration follows insertion order, i.e. first chronological occurrence
  let peak: PeakPeriod | null = null;
  for (const bucket of buckets.values()) {
    const meanValue = bucket.sum / weekdayCounts[bucket.dayOfWeek];
    if (peak === null || meanValue > peak.meanValue) {
      peak = {
        dayOfWeek: bucket.dayOfWeek,
        dayName: DAY_NAMES[bucket.dayOfWeek],
        period: bucket.period,
        meanValue,
      };
    }
  }

  return peak ? { ...peak, meanValue: round2(peak.meanValue) } : null;
}

/**
 * Reorder signals for categories whose days-of-cover is under the threshold.
 * Categories with no consumption in the window are skipped.
 */
function findReorderSignals(
  currentByCategory: Map<string, number>,
  latestStock: Map<string, number>,
  windowDays: number,
  thresholds: ReorderThresholds
): ReorderRecommendation[] {
  const signals: ReorderRecommendation[] = [];

  for (const [category, consumed] of currentByCategory) {
    const averageDailyConsumption = consumed / windowDays;
    if (averageDailyConsumption <= 0) continue;

    const currentStock = latestStock.get(category) ?? 0;
    const daysOfCover = currentStock / averageDailyConsumption;
    if (daysOfCover >= thresholds.reorderThresholdDays) continue;

    signals.push({
      category,
      currentStock,
      averageDailyConsumption: round2(averageDailyConsumption),
      daysOfCover: round2(daysOfCover),
      suggestedQuantity: Math.max(
        0,
        Math.ceil(thresholds.targetCoverDays * averageDailyConsumption - currentStock)
      ),
      urgency: daysOfCover < thresholds.criticalCoverDays ? 'critical' : 'high',
    });
  }

  return signals.sort(
    (a, b) => a.daysOfCover - b.daysOfCover || (a.category < b.category ? -1 : a.category > b.category ? 1 : 0)
  );
}

/**
 * Compare the window ending on `asOf` with the equal-length window before it.
 * Pure: the same series and arguments always produce the same summary.
 */
export function summarizeTrend(
  storeId: string,
  series: readonly TransactionPoint[],
  windowDays: number,
  asOf: string,
  thresholds: ReorderThresholds,
  computedAt: string
): TrendSummary {
  if (!Number.isInteger(windowDays) || windowDays <= 0) {
    throw new ValidationError(`windowDays must be a positive integer, got ${windowDays}`);
  }

  const windowStart = addDays(asOf, -(windowDays - 1));
  const priorStart = addDays(windowStart, -windowDays);

  const currentByCategory = new Map<string, number>();
  const priorByCategory = new Map<string, number>();
  const slots = new Map<string, SlotTotal>();
  const latestStock = new Map<string, TransactionPoint>();
  let earliest: string | null = null;

  for (const point of series) {
    if (point.date > asOf) continue;
    if (earliest === null || point.date < earliest) earliest = point.date;

    const latest = latestStock.get(point.category);
    if (!latest || compareChronological(point, latest) >= 0) {
      latestStock.set(point.category, point);
    }

    if (point.date >= windowStart) {
      currentByCategory.set(point.category, (currentByCategory.get(point.category) || 0) + point.value);

      const key = `${point.date}#${point.period}`;
      const slot = slots.get(key) ?? { date: point.date, period: point.period, total: 0 };
      slot.total += point.value;
      slots.set(key, slot);
    } else if (point.date >= priorStart) {
      priorByCategory.set(point.category, (priorByCategory.get(point.category) || 0) + point.value);
    }
  }

  const sum = (values: Map<string, number>): number => [...values.values()].reduce((a, b) => a + b, 0);
  const totalValue = sum(currentByCategory);
  const priorTotalValue = sum(priorByCategory);

  const categoryGrowth: Record<string, number> = {};
  const categories = [...new Set([...currentByCategory.keys(), ...priorByCategory.keys()])].sort();
  for (const category of categories) {
    categoryGrowth[category] = growthPct(
      currentByCategory.get(category) || 0,
      priorByCategory.get(category) || 0
    );
  }

  const slotTotals = [...slots.values()].sort(compareChronological);
  const daysOfHistory = earliest === null ? 0 : daysBetween(earliest, asOf) + 1;

  return {
    storeId,
    windowDays,
    windowStart,
    windowEnd: asOf,
    totalValue: round2(totalValue),
    priorTotalValue: round2(priorTotalValue),
    growthRatePct: growthPct(totalValue, priorTotalValue),
    peakPeriod: findPeakPeriod(slotTotals, windowStart, windowDays),
    categoryGrowth,
    reorderSignals: findReorderSignals(
      currentByCategory,
      new Map([...latestStock].map(([category, point]) => [category, point.stockLevel])),
      windowDays,
      thresholds
    ),
    slotTotals,
    daysOfHistory,
    lowConfidence: daysOfHistory < 2 * windowDays,
    computedAt,
  };
}

/**
 * Trend analyzer - pulls a store's series and summarises it
 */
export class TrendAnalyzer {
  constructor(
    private stores: Pick<StoreRepository, 'getStore'>,
    private source: TransactionSource,
    private config: TrendAnalyzerConfig,
    private now: () => Date = () => new Date()
  ) {}

  async computeTrend(storeId: string, windowDays: number = this.config.trendWindowDays): Promise<TrendSummary> {
    if (!Number.isInteger(windowDays) || windowDays <= 0) {
      throw new ValidationError(`windowDays must be a positive integer, got ${windowDays}`);
    }

    if (!(await this.stores.getStore(storeId))) {
      throw new NotFoundError('Store', storeId);
    }

    const instant = this.now();
    const { date: asOf } = localDateAndPeriod(instant, this.config.utcOffsetMinutes);
    const fromDate = addDays(asOf, -(2 * windowDays - 1));

    const series = await this.source.getSeries(storeId, fromDate, asOf);

    return summarizeTrend(storeId, series, windowDays, asOf, this.config, instant.toISOString());
  }
}
