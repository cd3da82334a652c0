import type { EntityKind } from '../../entities/period.js';
import type {
  DriverMetricsResult,
  DriverRankingEntry,
  MonthlySummary,
  RankingMetric,
  VehicleMetricsResult,
  VehicleRankingEntry,
} from '../../entities/metrics.js';

// ---------------------------------------------------------------------------
// Inbound port
// ---------------------------------------------------------------------------

export interface FleetAnalyticsPort {
  computeDriverMetrics(driverId: string, periodStart: Date, periodEnd: Date): Promise<DriverMetricsResult>;
  computeVehicleMetrics(vehicleId: string, periodStart: Date, periodEnd: Date): Promise<VehicleMetricsResult>;
  rankDrivers(periodStart: Date, periodEnd: Date, metric: RankingMetric): Promise<DriverRankingEntry[]>;
  rankVehicles(periodStart: Date, periodEnd: Date, metric: RankingMetric): Promise<VehicleRankingEntry[]>;
  /** Always twelve entries, January first. */
  monthlyBreakdown(entityId: string, entityKind: EntityKind, year: number): Promise<MonthlySummary[]>;
  /** Metrics for every rostered driver, most kilometres first. */
  summarizeDrivers(periodStart: Date, periodEnd: Date): Promise<DriverMetricsResult[]>;
  /** Metrics for every rostered vehicle, most kilometres first. */
  summarizeVehicles(periodStart: Date, periodEnd: Date): Promise<VehicleMetricsResult[]>;
}
