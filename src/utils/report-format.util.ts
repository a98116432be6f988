// Rendering for the two consumers: people reading the terminal and the mobile client reading
// the delimited record. Pure functions; nothing here fetches or mutates.

import {
  CurrentCondition,
  DerivedMetrics,
  ForecastPeriod,
  ReportLocation,
  WeatherAlert
} from '../types/domain.types';
import { isSectionFailure, isSectionSuccess, WeatherReport } from '../types/result.types';

export const DEFAULT_DELIMITER = ';';
export const FORECAST_FIELD_SEPARATOR = '__,.,__';
export const FORECAST_MARKER = ':FCAST:';
export const NOT_AVAILABLE = 'NA';
export const UNAVAILABLE = 'unavailable';
const NOT_APPLICABLE = 'not applicable';

/**
 * Field order of the condition record. The mobile client splits positionally, so this
 * order and the field count are a wire contract: append only.
 */
export const CONDITION_FIELDS = [
  'loc',
  'temp',
  'dew',
  'cond',
  'wdir',
  'speed',
  'humid',
  'obstime',
  'chill',
  'humidx',
  'gust',
  'srise',
  'sset',
  'mrise',
  'mset',
  'hazard',
  'hazardurl'
] as const;

export type ConditionField = (typeof CONDITION_FIELDS)[number];

export interface ConditionRecordField {
  readonly key: string;
  readonly value: string;
}

export interface ConditionContext {
  location?: ReportLocation;
  alerts?: readonly WeatherAlert[];
  delimiter?: string;
}

// ============================================================================
// Human-readable output
// ============================================================================

function formatPeriod(period: ForecastPeriod): string {
  const trend = period.temperatureTrend ? `, ${period.temperatureTrend}` : '';
  const lines = [
    `${period.name} (${period.startTime} to ${period.endTime})`,
    `Temperature: ${period.temperature} ${period.temperatureUnit}${trend}`,
    `Wind: ${period.windSpeed} ${period.windDirection}`
  ];

  if (period.precipitationChance !== undefined) {
    lines.push(`Precipitation: ${period.precipitationChance}%`);
  }

  lines.push(period.shortForecast, period.detailedForecast);
  return lines.join('\n');
}

/** One block per period, in input order, separated by a blank line. */
export function buildForecastString(periods: readonly ForecastPeriod[]): string {
  return periods.map(formatPeriod).join('\n\n');
}

function withUnit(value: number | undefined, unit: string): string {
  return value === undefined ? UNAVAILABLE : `${value} ${unit}`;
}

export function buildConditionReport(condition: CurrentCondition, metrics: DerivedMetrics): string {
  const wind =
    condition.windString ??
    (condition.windMph !== undefined ? `${condition.windDirection ?? ''} ${condition.windMph} mph`.trim() : UNAVAILABLE);

  return [
    `Location: ${condition.location}`,
    `Station: ${condition.stationId ?? UNAVAILABLE}`,
    `Observed: ${condition.observationTime ?? UNAVAILABLE}`,
    `Weather: ${condition.weather ?? UNAVAILABLE}`,
    `Temperature: ${condition.temperatureString ?? `${condition.temperatureF} F`}`,
    `Dew Point: ${condition.dewpointString ?? withUnit(condition.dewpointF, 'F')}`,
    `Humidity: ${condition.relativeHumidity === undefined ? UNAVAILABLE : `${condition.relativeHumidity}%`}`,
    `Wind: ${wind}`,
    `Pressure: ${condition.pressureString ?? withUnit(condition.pressureMb, 'mb')}`,
    `Visibility: ${withUnit(condition.visibilityMi, 'mi')}`,
    `Wind Chill: ${metrics.windChill === undefined ? NOT_APPLICABLE : `${metrics.windChill} F`}`,
    `Humidex: ${metrics.humidex === undefined ? NOT_APPLICABLE : `${metrics.humidex} C`}`
  ].join('\n');
}

// ============================================================================
// Delimited output for the mobile client
// ============================================================================

// Keeps every value on one line and free of the delimiter
function sanitize(value: string, delimiter: string): string {
  return value.replace(/\r?\n/g, ' ').split(delimiter).join(',');
}

function orNA(value: string | number | undefined): string {
  return value === undefined ? NOT_AVAILABLE : String(value);
}

/**
 * The current conditions as `key:value` fields joined by the delimiter, always in
 * CONDITION_FIELDS order. Missing values print as NA; the client has no sun/moon data
 * source and expects lowercase `na` for those.
 */
export function buildConditionString(
  condition: CurrentCondition,
  metrics: DerivedMetrics,
  context: ConditionContext = {}
): string {
  const delimiter = context.delimiter ?? DEFAULT_DELIMITER;
  const hazard = context.alerts?.[0];

  const values: Record<ConditionField, string> = {
    loc: context.location ? `${context.location.city},${context.location.state}` : condition.location,
    temp: String(Math.trunc(condition.temperatureF)),
    dew: condition.dewpointF === undefined ? NOT_AVAILABLE : String(Math.trunc(condition.dewpointF)),
    cond: orNA(condition.weather),
    wdir: orNA(condition.windDirection),
    speed: orNA(condition.windMph),
    humid: orNA(condition.relativeHumidity),
    obstime: orNA(condition.observationTime),
    chill: orNA(metrics.windChill),
    humidx: orNA(metrics.humidex),
    gust: orNA(condition.windGustMph),
    srise: 'na',
    sset: 'na',
    mrise: 'na',
    mset: 'na',
    hazard: orNA(hazard?.event),
    hazardurl: orNA(hazard?.id)
  };

  return CONDITION_FIELDS.map(key => `${key}:${sanitize(values[key], delimiter)}`).join(delimiter);
}

/** Inverse of buildConditionString, as the client reads it: the key ends at the first colon. */
export function parseConditionString(record: string, delimiter: string = DEFAULT_DELIMITER): ConditionRecordField[] {
  return record.split(delimiter).map(field => {
    const separator = field.indexOf(':');
    return separator < 0
      ? { key: '', value: field }
      : { key: field.slice(0, separator), value: field.slice(separator + 1) };
  });
}

/**
 * Forecast periods as `name:short__,.,__High:temp__,.,__detailed`, joined by the delimiter.
 * High/Low follows the wording of the detailed forecast and carries over when it says neither.
 */
export function buildForecastRecord(periods: readonly ForecastPeriod[], delimiter: string = DEFAULT_DELIMITER): string {
  let highOrLow = 'High';

  return periods
    .map(period => {
      if (period.detailedForecast.includes('with a low')) {
        highOrLow = 'Low';
      } else if (period.detailedForecast.includes('with a high')) {
        highOrLow = 'High';
      }

      const name = sanitize(period.name, delimiter);
      const short = sanitize(period.shortForecast, delimiter);
      const detailed = sanitize(period.detailedForecast, delimiter);
      const temperature = Math.trunc(period.temperature);

      return `${name}:${short}${FORECAST_FIELD_SEPARATOR}${highOrLow}:${temperature}${FORECAST_FIELD_SEPARATOR}${detailed}`;
    })
    .join(delimiter);
}

export function buildAppRecord(
  conditionString: string,
  forecastRecord: string,
  delimiter: string = DEFAULT_DELIMITER
): string {
  return [conditionString, FORECAST_MARKER, forecastRecord].join(delimiter);
}

// ============================================================================
// Whole report
// ============================================================================

function formatAlerts(alerts: readonly WeatherAlert[]): string {
  if (alerts.length === 0) {
    return 'Active Alerts: none';
  }

  const lines = alerts.map(alert => `- ${alert.event} [${alert.severity}]: ${alert.headline ?? alert.id}`);
  return ['Active Alerts:', ...lines].join('\n');
}

/**
 * Stdout for one run: forecast, alerts, current conditions, then the delimited record
 * for the mobile client as the final line.
 */
export function renderReport(report: WeatherReport, delimiter: string = DEFAULT_DELIMITER): string {
  const blocks: string[] = [];
  const forecast = isSectionSuccess(report.forecast) ? report.forecast.data : undefined;
  const alerts = isSectionSuccess(report.alerts) ? report.alerts.data : undefined;

  if (forecast) {
    const header = [`Update Time: ${forecast.updateTime}`];
    if (forecast.forecastZone) {
      header.push(`Forecast Zone: ${forecast.forecastZone} (${forecast.forecastZoneUrl ?? UNAVAILABLE})`);
    }
    if (forecast.location) {
      header.push(`Location: ${forecast.location.city}, ${forecast.location.state}`);
    }
    header.push('Weather Forecast:');
    blocks.push(header.join('\n'), buildForecastString(forecast.periods));
  }

  if (alerts) {
    blocks.push(formatAlerts(alerts));
  }

  const forecastRecord = buildForecastRecord(forecast?.periods ?? [], delimiter);

  if (isSectionSuccess(report.conditions)) {
    const { condition, metrics } = report.conditions.data;
    const conditionString = buildConditionString(condition, metrics, {
      location: forecast?.location,
      alerts,
      delimiter
    });

    blocks.push(`Current Conditions:\n${buildConditionReport(condition, metrics)}`);
    blocks.push(buildAppRecord(conditionString, forecastRecord, delimiter));
  } else if (forecast) {
    blocks.push(forecastRecord);
  }

  return blocks.join('\n\n');
}

/** One line per failed section, for stderr. */
export function describeFailures(report: WeatherReport): string[] {
  const failures: string[] = [];

  if (isSectionFailure(report.forecast)) {
    failures.push(`Forecast unavailable (${report.forecast.error.name}): ${report.forecast.error.message}`);
  }
  if (isSectionFailure(report.alerts)) {
    failures.push(`Alerts unavailable (${report.alerts.error.name}): ${report.alerts.error.message}`);
  }
  if (isSectionFailure(report.conditions)) {
    failures.push(`Current conditions unavailable (${report.conditions.error.name}): ${report.conditions.error.message}`);
  }

  return failures;
}
