// Result types for report sections

import { CurrentCondition, DerivedMetrics, Forecast, WeatherAlert } from './domain.types';
import { WeatherError } from './error.types';

export enum SectionStatus {
  SUCCESS = 'SUCCESS',
  SKIPPED = 'SKIPPED',
  FAILED = 'FAILED'
}

/**
 * Outcome of one report section.
 * Discriminated union prevents invalid states.
 */
export type SectionResult<T> =
  | { readonly status: SectionStatus.SUCCESS; readonly data: T }
  | { readonly status: SectionStatus.SKIPPED; readonly reason: string }
  | { readonly status: SectionStatus.FAILED; readonly error: WeatherError };

export interface ConditionsReport {
  readonly condition: CurrentCondition;
  readonly metrics: DerivedMetrics;
}

export interface WeatherReport {
  readonly forecast: SectionResult<Forecast>;
  readonly alerts: SectionResult<readonly WeatherAlert[]>;
  readonly conditions: SectionResult<ConditionsReport>;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSectionSuccess<T>(
  result: SectionResult<T>
): result is { readonly status: SectionStatus.SUCCESS; readonly data: T } {
  return result.status === SectionStatus.SUCCESS;
}

export function isSectionFailure<T>(
  result: SectionResult<T>
): result is { readonly status: SectionStatus.FAILED; readonly error: WeatherError } {
  return result.status === SectionStatus.FAILED;
}

/**
 * True when the forecast or current-conditions section failed.
 * Alerts only enrich the forecast, so a failed alerts lookup is reported but not fatal.
 */
export function hasFailures(report: WeatherReport): boolean {
  return isSectionFailure(report.forecast) || isSectionFailure(report.conditions);
}
