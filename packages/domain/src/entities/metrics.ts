import type { EntityKind, Period } from './period.js';

export type RecordKind = 'movement' | 'fuel';

export type DataIssueType =
  | 'end_before_start'
  | 'invalid_end_timestamp'
  | 'invalid_distance'
  | 'negative_distance'
  | 'non_positive_liters'
  | 'invalid_cost';

/** A record the engine excluded from aggregation. */
export interface DataIssue {
  readonly recordKind: RecordKind;
  readonly recordId: string;
  readonly issue: DataIssueType;
}

export interface PurposeUsage {
  /** null groups trips recorded without a purpose */
  readonly purposeId: string | null;
  readonly tripCount: number;
  readonly totalKm: number;
}

export interface EntityUsage {
  readonly entityId: string;
  readonly tripCount: number;
  readonly totalKm: number;
}

/**
 * Aggregate over one entity and one period. Km, liters and cost are totalled
 * to the hundredth. Ratios are null whenever their denominator is zero.
 */
export interface MetricsSummary {
  readonly period: Period;
  readonly totalKm: number;
  readonly totalLiters: number;
  readonly totalCost: number;
  readonly tripCount: number;
  readonly efficiencyLPer100Km: number | null;
  readonly avgTripDistanceKm: number | null;
  readonly kmPerLiter: number | null;
  readonly costPerKm: number | null;
  /** Valid fuel fills in the window */
  readonly fuelFillCount: number;
  readonly avgLitersPerFill: number | null;
  readonly purposeBreakdown: PurposeUsage[];
  /** Movements in the window without an end timestamp; not aggregated */
  readonly openMovements: number;
  readonly skippedRecords: number;
  readonly dataIssues: DataIssue[];
}

export type MetricsOutcome = 'metrics' | 'empty_period';

export interface DriverMetrics extends MetricsSummary {
  readonly outcome: 'metrics';
  readonly driverId: string;
  /** Most used vehicles, at most five */
  readonly vehicleUsage: EntityUsage[];
}

export interface VehicleMetrics extends MetricsSummary {
  readonly outcome: 'metrics';
  readonly vehicleId: string;
  /** Drivers who used the vehicle most, at most five */
  readonly driverUsage: EntityUsage[];
}

/**
 * Returned instead of metrics when the window holds no closed movement.
 * Totals are zero and ratios null; fuel and data issues are still reported.
 */
export type EmptyPeriodResult<T extends { readonly outcome: MetricsOutcome }> = Omit<T, 'outcome'> & {
  readonly outcome: 'empty_period';
};

export type DriverMetricsResult = DriverMetrics | EmptyPeriodResult<DriverMetrics>;
export type VehicleMetricsResult = VehicleMetrics | EmptyPeriodResult<VehicleMetrics>;

export type RankingMetric = 'total_km' | 'efficiency_l_per_100km' | 'total_cost' | 'trip_count';

export interface RankingEntry {
  /** 1-based position in the ordered sequence */
  readonly position: number;
  readonly entityId: string;
  readonly value: number | null;
  /** Set when the metric is undefined for the entity (no kilometres driven) */
  readonly insufficientData: boolean;
}

export interface DriverRankingEntry extends Omit<RankingEntry, 'entityId'> {
  readonly driverId: string;
}

export interface VehicleRankingEntry extends Omit<RankingEntry, 'entityId'> {
  readonly vehicleId: string;
}

export interface MonthlySummary extends MetricsSummary {
  readonly entityKind: EntityKind;
  readonly entityId: string;
  readonly year: number;
  /** 1 = January ... 12 = December */
  readonly month: number;
}
