import 'reflect-metadata';
import { container } from 'tsyringe';
import { IAlertsProvider } from '../adapters/alerts/alerts-provider.interface';
import { NwsAlertsProvider } from '../adapters/alerts/nws-alerts.provider';
import { ICurrentConditionsProvider } from '../adapters/conditions/current-conditions-provider.interface';
import { NwsCurrentObsProvider } from '../adapters/conditions/nws-current-obs.provider';
import { IForecastProvider } from '../adapters/forecast/forecast-provider.interface';
import { NwsForecastProvider } from '../adapters/forecast/nws-forecast.provider';
import { IGeocoder } from '../adapters/geocoding/geocoder.interface';
import { MapsCoGeocoder } from '../adapters/geocoding/maps-co.geocoder';
import { IWeatherReportService } from '../services/weather-report.interface';
import { WeatherReportService } from '../services/weather-report.service';
import { AppConfig } from './app.config';

export function setupDI(config: AppConfig): void {
  // Register configuration values
  container.register('AppConfig', { useValue: config });

  // Register adapters
  container.register<IGeocoder>('IGeocoder', {
    useClass: MapsCoGeocoder
  });

  container.register<IForecastProvider>('IForecastProvider', {
    useClass: NwsForecastProvider
  });

  container.register<IAlertsProvider>('IAlertsProvider', {
    useClass: NwsAlertsProvider
  });

  container.register<ICurrentConditionsProvider>('ICurrentConditionsProvider', {
    useClass: NwsCurrentObsProvider
  });

  // Register services
  container.register<IWeatherReportService>('IWeatherReportService', {
    useClass: WeatherReportService
  });
}
