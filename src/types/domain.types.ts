// Domain types - clean models isolated from external system formats

export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
}

export interface ForecastPeriod {
  readonly number: number;
  readonly name: string;
  readonly startTime: string;          // ISO 8601 with offset
  readonly endTime: string;            // ISO 8601 with offset
  readonly isDaytime: boolean;
  readonly temperature: number;
  readonly temperatureUnit: string;    // 'F' or 'C'
  readonly temperatureTrend?: string;
  readonly precipitationChance?: number; // percent
  readonly windSpeed: string;          // e.g. '5 to 10 mph'
  readonly windDirection: string;
  readonly icon?: string;
  readonly shortForecast: string;
  readonly detailedForecast: string;
}

export interface GridReference {
  readonly gridId: string;
  readonly gridX: number;
  readonly gridY: number;
  readonly forecastUrl: string;
}

export interface ReportLocation {
  readonly city: string;
  readonly state: string;
}

export interface Forecast {
  readonly updateTime: string;
  readonly periods: readonly ForecastPeriod[];
  readonly gridReference: GridReference;
  readonly forecastZone?: string;      // e.g. 'CAZ017'
  readonly forecastZoneUrl?: string;
  readonly location?: ReportLocation;
}

export interface WeatherAlert {
  readonly id: string;                 // alert URL
  readonly event: string;
  readonly headline?: string;
  readonly severity: string;
  readonly urgency: string;
  readonly certainty: string;
}

export interface CurrentCondition {
  readonly location: string;
  readonly temperatureF: number;
  readonly stationId?: string;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly observationTime?: string;
  readonly weather?: string;
  readonly temperatureString?: string;
  readonly temperatureC?: number;
  readonly relativeHumidity?: number;  // percent
  readonly windString?: string;
  readonly windDirection?: string;
  readonly windDegrees?: number;
  readonly windMph?: number;
  readonly windGustMph?: number;
  readonly windKt?: number;
  readonly pressureString?: string;
  readonly pressureMb?: number;
  readonly pressureIn?: number;
  readonly dewpointString?: string;
  readonly dewpointF?: number;
  readonly dewpointC?: number;
  readonly visibilityMi?: number;
  readonly iconUrl?: string;
  readonly observationUrl?: string;
}

export interface DerivedMetrics {
  readonly windChill?: number;         // Fahrenheit
  readonly humidex?: number;           // Celsius
}
