import { DayPeriod } from './weather';

/**
 * One bucket of the transaction/inventory series for a store
 */
export interface TransactionPoint {
  date: string; // YYYY-MM-DD
  period: DayPeriod;
  category: string; // e.g. "Men's Wear", "Footwear"
  value: number; // Units sold in the bucket
  stockLevel: number; // On-hand units at the end of the bucket
}

/**
 * Restock recommendation for a category running low on cover
 */
export interface ReorderRecommendation {
  category: string;
  currentStock: number;
  averageDailyConsumption: number;
  daysOfCover: number;
  suggestedQuantity: number; // Units needed to restore target cover
  urgency: 'critical' | 'high';
}

/**
 * (day-of-week, period) bucket with the highest mean sales
 */
export interface PeakPeriod {
  dayOfWeek: number; // 0 = Sunday
  dayName: string;
  period: DayPeriod;
  meanValue: number;
}

/**
 * Sales total for one (date, period) slot of the current window
 */
export interface SlotTotal {
  date: string;
  period: DayPeriod;
  total: number;
}

/**
 * Trend statistics for a store over a window, compared to the preceding window
 */
export interface TrendSummary {
  storeId: string;
  windowDays: number;
  windowStart: string; // YYYY-MM-DD, inclusive
  windowEnd: string; // YYYY-MM-DD, inclusive
  totalValue: number;
  priorTotalValue: number;
  growthRatePct: number;
  peakPeriod: PeakPeriod | null;
  categoryGrowth: Record<string, number>;
  reorderSignals: ReorderRecommendation[];
  slotTotals: SlotTotal[];
  daysOfHistory: number;
  lowConfidence: boolean; // Less than two full windows of history
  computedAt: string;
}

/**
 * Thresholds that drive reorder signals
 */
export interface ReorderThresholds {
  reorderThresholdDays: number;
  criticalCoverDays: number;
  targetCoverDays: number;
}

/**
 * One trend recompute cycle, published as a unit
 */
export interface TrendGeneration {
  generationId: string;
  computedAt: string;
  windowDays: number;
  summaries: ReadonlyMap<string, TrendSummary>;
}
