/**
 * Base class for every failure the report can hit.
 * statusCode is set when the failure came from an HTTP response.
 */
export class WeatherError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'WeatherError';
  }
}

/** Required input or credential missing, or a setting that cannot be used. */
export class ConfigurationError extends WeatherError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Geocoding returned nothing usable for the postal code. */
export class LookupFailure extends WeatherError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'LookupFailure';
  }
}

/** Coordinates could not be mapped to a forecast grid (e.g. outside NWS coverage). */
export class GridResolutionFailure extends WeatherError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'GridResolutionFailure';
  }
}

export class FetchFailure extends WeatherError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'FetchFailure';
  }
}

/** The document arrived but the fields we need are not in it. */
export class ParseFailure extends WeatherError {
  constructor(message: string) {
    super(message);
    this.name = 'ParseFailure';
  }
}
