import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { Coordinates, Forecast, ForecastPeriod } from '../../types/domain.types';
import { FetchFailure, GridResolutionFailure } from '../../types/error.types';
import { describeStatus, httpGet, NetworkError, readJson } from '../../utils/http.util';
import { IForecastProvider } from './forecast-provider.interface';

// NWS-specific JSON structure (internal to adapter), validated with zod
const PointsResponseSchema = z.object({
  properties: z.object({
    gridId: z.string().min(1),
    gridX: z.number().int(),
    gridY: z.number().int(),
    forecast: z.string().url(),
    forecastZone: z.string().url().optional(),
    relativeLocation: z
      .object({
        properties: z.object({
          city: z.string(),
          state: z.string()
        })
      })
      .optional()
  })
});

const PeriodSchema = z.object({
  number: z.number().int(),
  name: z.string(),
  startTime: z.string(),
  endTime: z.string(),
  isDaytime: z.boolean(),
  temperature: z.number(),
  temperatureUnit: z.string(),
  temperatureTrend: z.string().nullish(),
  probabilityOfPrecipitation: z.object({ value: z.number().nullable() }).nullish(),
  windSpeed: z.string(),
  windDirection: z.string(),
  icon: z.string().optional(),
  shortForecast: z.string(),
  detailedForecast: z.string()
});

const ForecastResponseSchema = z.object({
  properties: z.object({
    updateTime: z.string(),
    periods: z.array(PeriodSchema)
  })
});

type NwsPeriod = z.infer<typeof PeriodSchema>;

const GEO_JSON = 'application/geo+json';

/**
 * Forecasts from the National Weather Service API.
 *
 * NWS API flow:
 * 1. GET /points/{lat},{lon} → grid reference, forecast URL, zone and nearest city
 * 2. GET {forecastUrl} → ordered forecast periods
 */
@injectable()
export class NwsForecastProvider implements IForecastProvider {
  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  async fetchForecast(coords: Coordinates): Promise<Forecast> {
    const points = await this.resolveGrid(coords);
    const { forecast: forecastUrl, gridId, gridX, gridY, forecastZone, relativeLocation } = points.properties;

    const response = await this.get(forecastUrl, 'forecast');
    if (!response.ok) {
      throw new FetchFailure(`NWS forecast API error: ${describeStatus(response)}`, response.status);
    }

    const forecast = ForecastResponseSchema.safeParse(await readJson(response));
    if (!forecast.success) {
      throw new FetchFailure(`Invalid forecast data returned from the NWS API: ${forecast.error.issues[0]?.message}`);
    }

    return {
      updateTime: forecast.data.properties.updateTime,
      periods: forecast.data.properties.periods.map(period => this.toForecastPeriod(period)),
      gridReference: { gridId, gridX, gridY, forecastUrl },
      forecastZoneUrl: forecastZone,
      forecastZone: forecastZone ? lastPathSegment(forecastZone) : undefined,
      location: relativeLocation?.properties
    };
  }

  private async resolveGrid(coords: Coordinates): Promise<z.infer<typeof PointsResponseSchema>> {
    // NWS redirects requests with more than four decimal places
    const point = `${roundCoordinate(coords.latitude)},${roundCoordinate(coords.longitude)}`;
    const response = await this.get(`${this.config.endpoints.nwsApiUrl}/points/${point}`, 'points');

    if (response.status === 404) {
      throw new GridResolutionFailure(`NWS has no forecast grid for ${point} (outside coverage area)`, 404);
    }

    if (!response.ok) {
      throw new FetchFailure(`NWS points API error: ${describeStatus(response)}`, response.status);
    }

    const points = PointsResponseSchema.safeParse(await readJson(response));
    if (!points.success) {
      throw new GridResolutionFailure(`NWS points response for ${point} has no forecast grid`);
    }

    return points.data;
  }

  private async get(url: string, api: string): Promise<Response> {
    try {
      return await httpGet(url, {
        userAgent: this.config.http.userAgent,
        accept: GEO_JSON,
        timeoutMs: this.config.http.timeoutMs
      });
    } catch (error) {
      if (error instanceof NetworkError) {
        throw new FetchFailure(`Error fetching NWS ${api} data: ${error.message}`);
      }
      throw error;
    }
  }

  private toForecastPeriod(period: NwsPeriod): ForecastPeriod {
    return {
      number: period.number,
      name: period.name,
      startTime: period.startTime,
      endTime: period.endTime,
      isDaytime: period.isDaytime,
      temperature: period.temperature,
      temperatureUnit: period.temperatureUnit,
      temperatureTrend: period.temperatureTrend ?? undefined,
      precipitationChance: period.probabilityOfPrecipitation?.value ?? undefined,
      windSpeed: period.windSpeed,
      windDirection: period.windDirection,
      icon: period.icon,
      shortForecast: period.shortForecast,
      detailedForecast: period.detailedForecast
    };
  }
}

function roundCoordinate(value: number): number {
  return Math.round(value * 10000) / 10000;
}

// https://api.weather.gov/zones/forecast/CAZ017 → CAZ017
function lastPathSegment(url: string): string {
  const segments = url.split('/').filter(segment => segment.length > 0);
  return segments[segments.length - 1] ?? url;
}
