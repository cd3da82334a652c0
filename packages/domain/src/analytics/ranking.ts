import type { MetricsSummary, RankingEntry, RankingMetric } from '../entities/metrics.js';
import { compareIds } from './ordering.js';

export const RANKING_METRICS = [
  'total_km',
  'efficiency_l_per_100km',
  'total_cost',
  'trip_count',
] as const satisfies readonly RankingMetric[];

/** Lower fuel consumption ranks first; every other metric ranks highest first. */
const ASCENDING: ReadonlySet<RankingMetric> = new Set<RankingMetric>(['efficiency_l_per_100km']);

export function metricValue(summary: MetricsSummary, metric: RankingMetric): number | null {
  switch (metric) {
    case 'total_km':
      return summary.totalKm;
    case 'efficiency_l_per_100km':
      return summary.efficiencyLPer100Km;
    case 'total_cost':
      return summary.totalCost;
    case 'trip_count':
      return summary.tripCount;
  }
}

export interface RankCandidate {
  readonly entityId: string;
  readonly summary: MetricsSummary;
}

/**
 * Order candidates by `metric`. Entities whose metric is undefined go last,
 * flagged as insufficient data; ties fall back to the entity id.
 */
export function rankSummaries(candidates: readonly RankCandidate[], metric: RankingMetric): RankingEntry[] {
  const direction = ASCENDING.has(metric) ? 1 : -1;

  return candidates
    .map((candidate) => ({ entityId: candidate.entityId, value: metricValue(candidate.summary, metric) }))
    .sort((a, b) => {
      if (a.value === null || b.value === null) {
        if (a.value !== b.value) return a.value === null ? 1 : -1;
      } else if (a.value !== b.value) {
        return (a.value - b.value) * direction;
      }
      return compareIds(a.entityId, b.entityId);
    })
    .map((item, idx) => ({
      position: idx + 1,
      entityId: item.entityId,
      value: item.value,
      insufficientData: item.value === null,
    }));
}
