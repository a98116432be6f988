import { inject, injectable } from 'tsyringe';
import { IAlertsProvider } from '../adapters/alerts/alerts-provider.interface';
import { ICurrentConditionsProvider } from '../adapters/conditions/current-conditions-provider.interface';
import { IForecastProvider } from '../adapters/forecast/forecast-provider.interface';
import { IGeocoder } from '../adapters/geocoding/geocoder.interface';
import { AppConfig } from '../config/app.config';
import { Forecast, WeatherAlert } from '../types/domain.types';
import { WeatherError } from '../types/error.types';
import { ConditionsReport, SectionResult, SectionStatus, WeatherReport } from '../types/result.types';
import { deriveMetrics } from '../utils/weather-metrics.util';
import { IWeatherReportService } from './weather-report.interface';

/**
 * Runs the report sections one after another: geocode → forecast → alerts, then current conditions.
 * A WeatherError ends only its own section; anything else is a bug and propagates.
 */
@injectable()
export class WeatherReportService implements IWeatherReportService {
  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('IGeocoder') private readonly geocoder: IGeocoder,
    @inject('IForecastProvider') private readonly forecastProvider: IForecastProvider,
    @inject('IAlertsProvider') private readonly alertsProvider: IAlertsProvider,
    @inject('ICurrentConditionsProvider') private readonly conditionsProvider: ICurrentConditionsProvider
  ) {}

  async generateReport(): Promise<WeatherReport> {
    const forecast = await this.forecastSection();
    const alerts = await this.alertsSection(forecast);
    const conditions = await this.conditionsSection();

    return { forecast, alerts, conditions };
  }

  private async forecastSection(): Promise<SectionResult<Forecast>> {
    const request = this.config.forecast;
    if (!request) {
      return { status: SectionStatus.SKIPPED, reason: 'No ZIP code supplied' };
    }

    return this.runSection(async () => {
      const coords = await this.geocoder.geocode(request.zip, request.geocodeApiKey);
      return this.forecastProvider.fetchForecast(coords);
    });
  }

  private async alertsSection(forecast: SectionResult<Forecast>): Promise<SectionResult<readonly WeatherAlert[]>> {
    if (forecast.status !== SectionStatus.SUCCESS) {
      return { status: SectionStatus.SKIPPED, reason: 'No forecast available' };
    }

    const zone = forecast.data.forecastZone;
    if (!zone) {
      return { status: SectionStatus.SKIPPED, reason: 'Forecast has no zone' };
    }

    return this.runSection(() => this.alertsProvider.fetchActiveAlerts(zone));
  }

  private async conditionsSection(): Promise<SectionResult<ConditionsReport>> {
    const request = this.config.conditions;
    if (!request) {
      return { status: SectionStatus.SKIPPED, reason: 'Forecast-only mode' };
    }

    return this.runSection(async () => {
      const condition = await this.conditionsProvider.fetchCurrentConditions(request.airport);
      return { condition, metrics: deriveMetrics(condition) };
    });
  }

  private async runSection<T>(operation: () => Promise<T>): Promise<SectionResult<T>> {
    try {
      return { status: SectionStatus.SUCCESS, data: await operation() };
    } catch (error) {
      if (error instanceof WeatherError) {
        return { status: SectionStatus.FAILED, error };
      }
      throw error;
    }
  }
}
