import { InsightGeneration, ProximityGeneration, TrendGeneration, WeatherGeneration } from '../types';

/**
 * Everything readers see, swapped as one immutable value.
 * A part is null until its first cycle has been published.
 */
export interface EngineSnapshot {
  version: number;
  proximity: ProximityGeneration | null;
  weather: WeatherGeneration | null;
  trends: TrendGeneration | null;
  insights: InsightGeneration | null;
}

export type SnapshotPart = Exclude<keyof EngineSnapshot, 'version'>;

/**
 * Versioned publication point for derived data.
 *
 * Writers build a generation off to the side and publish it; readers call
 * `current()` once and work from that value, so a read never mixes cycles.
 */
export class SnapshotStore {
  private snapshot: EngineSnapshot = Object.freeze({
    version: 0,
    proximity: null,
    weather: null,
    trends: null,
    insights: null,
  });

  current(): EngineSnapshot {
    return this.snapshot;
  }

  publish<K extends SnapshotPart>(part: K, generation: NonNullable<EngineSnapshot[K]>): EngineSnapshot {
    const next: EngineSnapshot = { ...this.snapshot, version: this.snapshot.version + 1 };
    next[part] = generation;
    this.snapshot = Object.freeze(next);
    return this.snapshot;
  }
}
