// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/movement-record.js';
export * from './entities/fuel-record.js';
export * from './entities/driver.js';
export * from './entities/vehicle.js';
export * from './entities/trip-purpose.js';
export * from './entities/period.js';
export * from './entities/metrics.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/fleet-analytics.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/record-store.port.js';

// ─── Analytics ────────────────────────────────────────────────────────────────
export { AnalyticsEngine } from './analytics/analytics-engine.js';
export { InvalidWindowError } from './analytics/errors.js';
export { aggregatePeriod, groupByEntity, USAGE_LIMIT } from './analytics/aggregate.js';
export type { EntityRef, PeriodAggregate } from './analytics/aggregate.js';
export { RANKING_METRICS, metricValue, rankSummaries } from './analytics/ranking.js';
export type { RankCandidate } from './analytics/ranking.js';
export { toPeriod, isWithin, monthPeriods, yearPeriod, MIN_YEAR, MAX_YEAR } from './analytics/period.js';
export { checkMovement, checkFuelRecord } from './analytics/record-checks.js';
export type { MovementCheck } from './analytics/record-checks.js';
export { compareIds } from './analytics/ordering.js';
