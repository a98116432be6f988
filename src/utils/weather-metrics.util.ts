// Derived "feels like" metrics. Pure functions, no I/O.

import { CurrentCondition, DerivedMetrics } from '../types/domain.types';

// NWS wind chill applicability
const WIND_CHILL_MAX_TEMP_F = 50;
const WIND_CHILL_MIN_WIND_MPH = 3;

// Magnus coefficients for dew point
const MAGNUS_A = 17.27;
const MAGNUS_B = 237.7;

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export function fahrenheitToCelsius(temperatureF: number): number {
  return roundToTenth(((temperatureF - 32) * 5) / 9);
}

/**
 * NWS wind chill in °F, or undefined outside T ≤ 50°F and V ≥ 3 mph.
 */
export function computeWindChill(temperatureF: number, windSpeedMph: number): number | undefined {
  if (!Number.isFinite(temperatureF) || !Number.isFinite(windSpeedMph)) return undefined;
  if (temperatureF > WIND_CHILL_MAX_TEMP_F || windSpeedMph < WIND_CHILL_MIN_WIND_MPH) return undefined;

  const windFactor = Math.pow(windSpeedMph, 0.16);
  return roundToTenth(35.74 + 0.6215 * temperatureF - 35.75 * windFactor + 0.4275 * temperatureF * windFactor);
}

/**
 * Canadian humidex in °C from air temperature and relative humidity.
 *
 * The dew point comes from the Magnus approximation, then the vapour pressure from the dew point.
 * Returns undefined for humidity outside (0, 100] and when the result would fall below the
 * air temperature (dry air), since humidex never reads colder than the air.
 */
export function computeHumidex(temperatureC: number, relativeHumidityPct: number): number | undefined {
  if (!Number.isFinite(temperatureC) || !Number.isFinite(relativeHumidityPct)) return undefined;
  if (relativeHumidityPct <= 0 || relativeHumidityPct > 100) return undefined;

  const alpha = (MAGNUS_A * temperatureC) / (MAGNUS_B + temperatureC) + Math.log(relativeHumidityPct / 100);
  const dewpointC = (MAGNUS_B * alpha) / (MAGNUS_A - alpha);

  const vapourPressure = 6.11 * Math.exp(5417.753 * (1 / 273.16 - 1 / (dewpointC + 273.15)));
  const humidex = temperatureC + 0.5555 * (vapourPressure - 10);

  return humidex >= temperatureC ? roundToTenth(humidex) : undefined;
}

/** Metrics for an observation; a missing input leaves that metric undefined. */
export function deriveMetrics(condition: CurrentCondition): DerivedMetrics {
  const temperatureC = condition.temperatureC ?? fahrenheitToCelsius(condition.temperatureF);

  return {
    windChill:
      condition.windMph === undefined ? undefined : computeWindChill(condition.temperatureF, condition.windMph),
    humidex:
      condition.relativeHumidity === undefined ? undefined : computeHumidex(temperatureC, condition.relativeHumidity)
  };
}
