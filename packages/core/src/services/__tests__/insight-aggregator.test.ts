import { describe, it, expect } from 'vitest';
import {
  InsightAggregator,
  InsightInputs,
  buildInsights,
  conditionSalesVariance,
  estimateMarketShare,
} from '../insight-aggregator';
import { SnapshotStore } from '../snapshot-store';
import {
  DEFAULT_ENGINE_CONFIG,
  InsightRecord,
  ProximityRecord,
  ReorderRecommendation,
  Sourced,
  TrendSummary,
  WeatherSnapshot,
} from '../../types';
import { NotFoundError } from '../../errors';
import { InMemoryStoreRepository, makeClock, makeReading, makeStore } from '../../__tests__/fakes';

// ============================================================================
// HELPERS
// ============================================================================

const T0 = '2026-03-14T04:30:00.000Z';
const config = DEFAULT_ENGINE_CONFIG;

function present<T>(value: T, observedAt = T0): Sourced<T> {
  return { status: 'present', value, observedAt };
}

function makeTrend(overrides: Partial<TrendSummary> = {}): TrendSummary {
  return {
    storeId: 'VM-001',
    windowDays: 30,
    windowStart: '2026-02-13',
    windowEnd: '2026-03-14',
    totalValue: 1000,
    priorTotalValue: 1000,
    growthRatePct: 0,
    peakPeriod: null,
    categoryGrowth: {},
    reorderSignals: [],
    slotTotals: [],
    daysOfHistory: 60,
    lowConfidence: false,
    computedAt: T0,
    ...overrides,
  };
}

function makeWeather(overrides: Partial<WeatherSnapshot> = {}): WeatherSnapshot {
  return {
    ...makeReading(),
    storeId: 'VM-001',
    date: '2026-03-14',
    period: 'Morning',
    observedAt: T0,
    source: 'provider',
    ...overrides,
  };
}

function makeRecords(count: number, firstKm: number): ProximityRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    owningStoreId: 'VM-001',
    competitorStoreId: `C-${i + 1}`,
    competitorChain: 'Zudio',
    distanceKm: firstKm + i,
    computedAt: T0,
  }));
}

function signal(overrides: Partial<ReorderRecommendation> = {}): ReorderRecommendation {
  return {
    category: 'Footwear',
    currentStock: 10,
    averageDailyConsumption: 5,
    daysOfCover: 2,
    suggestedQuantity: 60,
    urgency: 'critical',
    ...overrides,
  };
}

function makeInputs(overrides: Partial<InsightInputs> = {}): InsightInputs {
  return {
    storeId: 'VM-001',
    generatedAt: '2026-03-14T05:00:00.000Z',
    trend: present(makeTrend()),
    weather: present(makeWeather()),
    weatherHistory: [],
    proximity: present({ radiusKm: 10, records: makeRecords(1, 5) }),
    ...overrides,
  };
}

function byCategory(insights: InsightRecord[], category: InsightRecord['category']): InsightRecord | undefined {
  return insights.find((i) => i.category === category);
}

// ============================================================================
// buildInsights - rules
// ============================================================================

describe('buildInsights', () => {
  it('produces one insight per category, critical first', () => {
    const insights = buildInsights(
      makeInputs({
        trend: present(
          makeTrend({
            growthRatePct: -20,
            reorderSignals: [signal()],
            slotTotals: [
              { date: '2026-03-12', period: 'Morning', total: 150 },
              { date: '2026-03-12', period: 'Evening', total: 50 },
              { date: '2026-03-13', period: 'Morning', total: 100 },
              { date: '2026-03-13', period: 'Evening', total: 999 },
            ],
          })
        ),
        weather: present(makeWeather({ condition: 'Rain', temperatureC: 24 })),
        weatherHistory: [
          makeWeather({ date: '2026-03-12', period: 'Morning', condition: 'Rain' }),
          makeWeather({ date: '2026-03-12', period: 'Evening', condition: 'Clear' }),
          makeWeather({ date: '2026-03-13', period: 'Morning', condition: 'Clear' }),
        ],
        proximity: present({ radiusKm: 10, records: makeRecords(6, 1) }),
      }),
      config
    );

    expect(insights.map((i) => [i.insightId, i.priority])).toEqual([
      ['VM-001:inventory:stockout-risk', 'critical'],
      ['VM-001:competition:high-density', 'high'],
      ['VM-001:sales:sales-decline', 'high'],
      ['VM-001:weather:weather-variance', 'medium'],
    ]);
    expect(insights.every((i) => i.confidenceScore === 1)).toBe(true);
  });

  describe('sales', () => {
    it('flags a decline at the negative threshold as high', () => {
      const sales = byCategory(buildInsights(makeInputs({ trend: present(makeTrend({ growthRatePct: -10 })) }), config), 'sales');
      expect(sales).toMatchObject({
        insightId: 'VM-001:sales:sales-decline',
        priority: 'high',
        title: 'Significant Sales Decline Detected',
        message: 'Sales have declined by 10.0% over the last 30 days compared with the previous 30.',
        supportingMetrics: { growthRatePct: -10, totalValue: 1000, priorTotalValue: 1000, windowDays: 30 },
      });
    });

    it('reports momentum above the positive threshold as low', () => {
      const sales = byCategory(buildInsights(makeInputs({ trend: present(makeTrend({ growthRatePct: 20 })) }), config), 'sales');
      expect(sales?.insightId).toBe('VM-001:sales:sales-momentum');
      expect(sales?.priority).toBe('low');
      expect(sales?.title).toBe('Sales Up 20.0%');
    });

    it('reports steady sales otherwise', () => {
      const sales = byCategory(buildInsights(makeInputs({ trend: present(makeTrend({ growthRatePct: 5 })) }), config), 'sales');
      expect(sales?.insightId).toBe('VM-001:sales:sales-steady');
      expect(sales?.message).toBe('Sales changed +5.0% over the last 30 days.');
    });

    it('mentions the peak period when there is one', () => {
      const trend = makeTrend({
        growthRatePct: 5,
        peakPeriod: { dayOfWeek: 6, dayName: 'Saturday', period: 'Evening', meanValue: 400 },
      });
      const sales = byCategory(buildInsights(makeInputs({ trend: present(trend) }), config), 'sales');
      expect(sales?.message).toBe('Sales changed +5.0% over the last 30 days. Peak trading is Saturday evening.');
    });
  });

  describe('inventory', () => {
    it('escalates critical cover to a stockout risk', () => {
      const trend = makeTrend({ reorderSignals: [signal(), signal({ category: 'Kids Wear', daysOfCover: 5, urgency: 'high' })] });
      const inventory = byCategory(buildInsights(makeInputs({ trend: present(trend) }), config), 'inventory');

      expect(inventory).toMatchObject({
        priority: 'critical',
        title: 'Critical Stock Shortage: 1 Category',
        message: 'The following categories need immediate restock: Footwear',
        actions: ['Reorder 60 units of Footwear'],
        supportingMetrics: { reorderCategories: 2, criticalCategories: 1, minDaysOfCover: 2 },
      });
    });

    it('flags non-critical reorder signals as high', () => {
      const trend = makeTrend({
        reorderSignals: [signal({ daysOfCover: 5, urgency: 'high', suggestedQuantity: 45 })],
      });
      const inventory = byCategory(buildInsights(makeInputs({ trend: present(trend) }), config), 'inventory');

      expect(inventory?.insightId).toBe('VM-001:inventory:reorder');
      expect(inventory?.priority).toBe('high');
      expect(inventory?.message).toBe('Stock cover is running low for: Footwear (5.0 days)');
    });

    it('reports healthy stock when nothing needs reordering', () => {
      const inventory = byCategory(buildInsights(makeInputs(), config), 'inventory');
      expect(inventory?.insightId).toBe('VM-001:inventory:stock-healthy');
      expect(inventory?.priority).toBe('low');
    });
  });

  describe('weather', () => {
    it('reports current conditions when too few slots have observed weather', () => {
      const weather = byCategory(buildInsights(makeInputs(), config), 'weather');

      expect(weather).toMatchObject({
        insightId: 'VM-001:weather:weather-conditions',
        priority: 'low',
        title: 'Current Conditions: Clear, 30°C',
        message: 'Morning conditions: clear sky.',
        supportingMetrics: { temperatureC: 30, humidity: 40, windSpeedKmh: 12 },
      });
      expect(weather?.supportingMetrics.salesVariancePct).toBeUndefined();
    });

    it('stays low while the variance is inside the band', () => {
      const trend = makeTrend({
        slotTotals: [
          { date: '2026-03-12', period: 'Morning', total: 110 },
          { date: '2026-03-13', period: 'Morning', total: 100 },
        ],
      });
      const insights = buildInsights(
        makeInputs({
          trend: present(trend),
          weatherHistory: [
            makeWeather({ date: '2026-03-12', condition: 'Clear' }),
            makeWeather({ date: '2026-03-13', condition: 'Rain' }),
          ],
        }),
        config
      );

      const weather = byCategory(insights, 'weather');
      expect(weather?.priority).toBe('low');
      // Clear slot 110 vs mean 105
      expect(weather?.supportingMetrics.salesVariancePct).toBe(4.76);
    });
  });

  describe('competition', () => {
    it('flags a nearby competitor as medium', () => {
      const insights = buildInsights(
        makeInputs({ proximity: present({ radiusKm: 10, records: makeRecords(2, 1.5) }) }),
        config
      );

      expect(byCategory(insights, 'competition')).toMatchObject({
        insightId: 'VM-001:competition:close-competitor',
        priority: 'medium',
        title: 'Zudio Store 1.5km Away',
        supportingMetrics: {
          competitorCount: 2,
          radiusKm: 10,
          nearestCompetitorKm: 1.5,
          estimatedMarketSharePct: 43.8,
        },
      });
    });

    it('reports an empty neighbourhood as low', () => {
      const insights = buildInsights(makeInputs({ proximity: present({ radiusKm: 10, records: [] }) }), config);

      expect(byCategory(insights, 'competition')).toMatchObject({
        insightId: 'VM-001:competition:competition-overview',
        priority: 'low',
        title: '0 Competitors Within 10km',
        message: 'No competitor stores within 10km.',
        supportingMetrics: { competitorCount: 0, radiusKm: 10, estimatedMarketSharePct: 55 },
      });
    });
  });
});

// ============================================================================
// buildInsights - confidence and degradation
// ============================================================================

describe('buildInsights confidence', () => {
  it('lowers confidence when weather is a fallback reading', () => {
    const insights = buildInsights(
      makeInputs({ weather: { status: 'fallback', value: makeWeather({ source: 'fallback' }), observedAt: T0 } }),
      config
    );

    expect(insights).toHaveLength(4);
    expect(insights.every((i) => i.confidenceScore === 0.9)).toBe(true);
    expect(byCategory(insights, 'weather')?.inputs).toEqual({ weather: 'fallback', trend: 'present' });
  });

  it('omits categories whose inputs are missing', () => {
    const insights = buildInsights(makeInputs({ weather: { status: 'absent' } }), config);

    expect(insights.map((i) => i.category).sort()).toEqual(['competition', 'inventory', 'sales']);
    expect(insights.every((i) => i.confidenceScore === 0.8)).toBe(true);
  });

  it('still reports weather when it is the only input', () => {
    const insights = buildInsights(
      makeInputs({ trend: { status: 'absent' }, proximity: { status: 'absent' } }),
      config
    );

    expect(insights.map((i) => i.insightId)).toEqual(['VM-001:weather:weather-conditions']);
    expect(insights[0].confidenceScore).toBe(0.6);
  });

  it('halves the trend weight for low-confidence trends', () => {
    const insights = buildInsights(makeInputs({ trend: present(makeTrend({ lowConfidence: true })) }), config);
    expect(insights.every((i) => i.confidenceScore === 0.9)).toBe(true);
  });

  it('scores recency on the stalest input behind each insight', () => {
    // Proximity is 36h older than the other inputs; max age 72h
    const insights = buildInsights(
      makeInputs({
        proximity: present({ radiusKm: 10, records: makeRecords(1, 5) }, '2026-03-12T16:30:00.000Z'),
      }),
      config
    );

    expect(byCategory(insights, 'competition')?.confidenceScore).toBe(0.8);
    expect(byCategory(insights, 'sales')?.confidenceScore).toBe(1);
  });

  it('reports how far each input lags the newest one', () => {
    const insights = buildInsights(
      makeInputs({
        proximity: present({ radiusKm: 10, records: makeRecords(1, 5) }, '2026-03-12T16:30:00.000Z'),
        weather: present(makeWeather({ observedAt: '2026-03-14T01:15:00.000Z' }), '2026-03-14T01:15:00.000Z'),
      }),
      config
    );

    expect(byCategory(insights, 'competition')?.inputAgesHours).toEqual({ proximity: 36 });
    expect(byCategory(insights, 'weather')?.inputAgesHours).toEqual({ weather: 3.25, trend: 0 });
    expect(byCategory(insights, 'sales')?.inputAgesHours).toEqual({ trend: 0 });
  });

  it('measures input ages independently of the generation time', () => {
    const early = buildInsights(makeInputs({ generatedAt: '2026-03-14T05:00:00.000Z' }), config);
    const late = buildInsights(makeInputs({ generatedAt: '2026-03-20T05:00:00.000Z' }), config);

    expect(late.map((i) => i.inputAgesHours)).toEqual(early.map((i) => i.inputAgesHours));
  });

  it('leaves absent inputs out of the ages', () => {
    const insights = buildInsights(makeInputs({ trend: { status: 'absent' }, proximity: { status: 'absent' } }), config);
    expect(insights[0].inputAgesHours).toEqual({ weather: 0 });
  });

  it('orders equal priorities by confidence, then category', () => {
    const insights = buildInsights(
      makeInputs({
        proximity: present({ radiusKm: 10, records: [] }, '2026-03-12T16:30:00.000Z'),
      }),
      config
    );

    // All low: sales/inventory/weather at 1, competition at 0.8
    expect(insights.map((i) => i.category)).toEqual(['inventory', 'sales', 'weather', 'competition']);
  });
});

// ============================================================================
// conditionSalesVariance / estimateMarketShare
// ============================================================================

describe('conditionSalesVariance', () => {
  const trend = makeTrend({
    slotTotals: [
      { date: '2026-03-12', period: 'Morning', total: 150 },
      { date: '2026-03-12', period: 'Evening', total: 50 },
      { date: '2026-03-13', period: 'Morning', total: 100 },
    ],
  });

  it('compares slots under the condition with all matched slots', () => {
    const history = [
      makeWeather({ date: '2026-03-12', period: 'Morning', condition: 'Rain' }),
      makeWeather({ date: '2026-03-12', period: 'Evening', condition: 'Clear' }),
      makeWeather({ date: '2026-03-13', period: 'Morning', condition: 'Clear' }),
    ];

    expect(conditionSalesVariance(trend, history, 'Rain', 2)).toEqual({
      variancePct: 50,
      matchedSlots: 3,
      conditionSlots: 1,
    });
  });

  it('ignores synthetic snapshots', () => {
    const history = [
      makeWeather({ date: '2026-03-12', period: 'Morning', condition: 'Rain' }),
      makeWeather({ date: '2026-03-12', period: 'Evening', condition: 'Clear', source: 'fallback' }),
    ];

    expect(conditionSalesVariance(trend, history, 'Rain', 2)).toBeNull();
  });
});

describe('estimateMarketShare', () => {
  it('drops with competitor count and never goes below 10', () => {
    expect(estimateMarketShare(2, 1.5)).toBe(43.75);
    expect(estimateMarketShare(20, 1)).toBe(10);
  });
});

// ============================================================================
// InsightAggregator
// ============================================================================

describe('InsightAggregator.aggregate', () => {
  function setup() {
    const repository = new InMemoryStoreRepository([makeStore({ storeId: 'VM-001' })]);
    const snapshots = new SnapshotStore();
    const clock = makeClock('2026-03-14T05:00:00.000Z');
    const aggregator = new InsightAggregator(repository, snapshots, config, clock.now);

    snapshots.publish('trends', {
      generationId: 't-1',
      computedAt: T0,
      windowDays: 30,
      summaries: new Map([['VM-001', makeTrend({ growthRatePct: -25 })]]),
    });
    snapshots.publish('weather', {
      generationId: 'w-1',
      computedAt: T0,
      snapshots: new Map([['VM-001', makeWeather()]]),
      history: new Map([['VM-001', [makeWeather()]]]),
    });

    return { aggregator, snapshots, clock };
  }

  it('throws NotFoundError for an unknown store', async () => {
    const { aggregator } = setup();
    await expect(aggregator.aggregate('missing')).rejects.toThrow(NotFoundError);
  });

  it('degrades without a proximity generation', async () => {
    const { aggregator } = setup();
    const insights = await aggregator.aggregate('VM-001');

    expect(insights.map((i) => i.category)).toEqual(['sales', 'inventory', 'weather']);
    expect(insights[0].confidenceScore).toBe(0.8);
  });

  it('is idempotent apart from generatedAt', async () => {
    const { aggregator, clock } = setup();

    const first = await aggregator.aggregate('VM-001');
    clock.advance(60 * 60 * 1000);
    const second = await aggregator.aggregate('VM-001');

    const strip = (records: InsightRecord[]) => records.map(({ generatedAt: _generatedAt, ...rest }) => rest);
    expect(JSON.stringify(strip(second))).toBe(JSON.stringify(strip(first)));
    expect(second[0].generatedAt).toBe('2026-03-14T06:00:00.000Z');
  });
});
