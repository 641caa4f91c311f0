/**
 * Insight types - prioritized, scored findings per store
 */

export type InsightPriority = 'critical' | 'high' | 'medium' | 'low';

export const INSIGHT_PRIORITIES: readonly InsightPriority[] = ['critical', 'high', 'medium', 'low'];

export type InsightCategory = 'sales' | 'inventory' | 'weather' | 'competition';

/**
 * Availability of one input behind an insight
 */
export type InputStatus = 'present' | 'fallback' | 'absent';

export type InsightInput = 'trend' | 'weather' | 'proximity';

/**
 * A derived input tagged with how it was obtained.
 * Downstream code branches on `status` instead of probing for fields.
 */
export type Sourced<T> =
  | { status: 'present'; value: T; observedAt: string }
  | { status: 'fallback'; value: T; observedAt: string }
  | { status: 'absent' };

export interface InsightRecord {
  insightId: string; // storeId:category:rule
  storeId: string;
  generatedAt: string;
  priority: InsightPriority;
  category: InsightCategory;
  title: string;
  message: string;
  actions: string[];
  supportingMetrics: Record<string, number>;
  confidenceScore: number; // 0-1
  inputs: Partial<Record<InsightInput, InputStatus>>;
  inputAgesHours: Partial<Record<InsightInput, number>>; // hours behind the newest input
}

/**
 * One insight aggregation cycle, published as a unit
 */
export interface InsightGeneration {
  generationId: string;
  computedAt: string;
  insights: ReadonlyMap<string, readonly InsightRecord[]>;
}
