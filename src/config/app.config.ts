import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../types/error.types';
import {
  CONDITION_FIELDS,
  DEFAULT_DELIMITER,
  FORECAST_FIELD_SEPARATOR,
  FORECAST_MARKER
} from '../utils/report-format.util';
import { CliOptions } from './cli-args';

export interface AppConfig {
  // Present when the forecast section was requested
  forecast?: {
    zip: string;
    geocodeApiKey: string;
  };
  // Present unless running in forecast-only mode
  conditions?: {
    airport: string;
  };
  forecastOnly: boolean;
  http: {
    userAgent: string;
    timeoutMs: number;
  };
  endpoints: {
    geocodeUrl: string;
    nwsApiUrl: string;
    currentObsUrl: string;
  };
  alerts: {
    urgency: string[];
    severity: string[];
    certainty: string[];
  };
  output: {
    delimiter: string;
  };
}

const TimeoutSchema = z.coerce
  .number()
  .int('REQUEST_TIMEOUT_MS must be an integer')
  .min(1000, 'REQUEST_TIMEOUT_MS must be at least 1000')
  .max(120000, 'REQUEST_TIMEOUT_MS must be at most 120000');

const UrlSchema = z.string().url();

/** Flag wins over environment; blank values count as absent. */
function pick(flag: string | undefined, envValue: string | undefined): string | undefined {
  const value = (flag ?? envValue)?.trim();
  return value ? value : undefined;
}

// Text the record always carries verbatim; a delimiter found inside it would split a field
const RESERVED_RECORD_TEXT = [...CONDITION_FIELDS, 'na', 'NA', FORECAST_MARKER, FORECAST_FIELD_SEPARATOR, ':', ','];

function parseDelimiter(value: string | undefined): string {
  const delimiter = value || DEFAULT_DELIMITER;
  if (/\s/.test(delimiter)) {
    throw new ConfigurationError('RECORD_DELIMITER cannot contain whitespace');
  }

  const collision = RESERVED_RECORD_TEXT.find(text => text.includes(delimiter) || delimiter.includes(text));
  if (collision !== undefined) {
    throw new ConfigurationError(`RECORD_DELIMITER "${delimiter}" collides with "${collision}" in the record`);
  }

  return delimiter;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function parseUrl(name: string, value: string | undefined, fallback: string): string {
  const result = UrlSchema.safeParse(value ?? fallback);
  if (!result.success) {
    throw new ConfigurationError(`${name} must be a valid URL`);
  }
  return result.data.replace(/\/+$/, '');
}

export function loadConfig(cli: CliOptions, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const zip = pick(cli.zip, env.ZIP);
  const geocodeApiKey = pick(cli.gcApiKey, env.GC_API_KEY);
  const airport = pick(cli.airport, env.AIRPORT);

  if (zip && !geocodeApiKey) {
    throw new ConfigurationError(
      'GC_API_KEY not found in command line or environment variables (required to geocode the ZIP code)'
    );
  }

  if (cli.forecastOnly && !zip) {
    throw new ConfigurationError('ZIP not found in command line or environment variables (required with --forecast_only)');
  }

  if (!cli.forecastOnly && !airport) {
    throw new ConfigurationError(
      'AIRPORT not found in command line or environment variables (use --forecast_only to skip current conditions)'
    );
  }

  const timeout = TimeoutSchema.safeParse(env.REQUEST_TIMEOUT_MS ?? '10000');
  if (!timeout.success) {
    throw new ConfigurationError(timeout.error.issues[0]?.message ?? 'Invalid REQUEST_TIMEOUT_MS');
  }

  const delimiter = parseDelimiter(env.RECORD_DELIMITER);

  return {
    forecast: zip && geocodeApiKey ? { zip, geocodeApiKey } : undefined,
    conditions: !cli.forecastOnly && airport ? { airport: airport.toUpperCase() } : undefined,
    forecastOnly: cli.forecastOnly,
    http: {
      userAgent: env.NWS_USER_AGENT || 'wx-report/1.0 (wx-report@example.com)',
      timeoutMs: timeout.data
    },
    endpoints: {
      geocodeUrl: parseUrl('GEOCODE_URL', env.GEOCODE_URL, 'https://geocode.maps.co/search'),
      nwsApiUrl: parseUrl('NWS_API_URL', env.NWS_API_URL, 'https://api.weather.gov'),
      currentObsUrl: parseUrl(
        'CURRENT_OBS_URL',
        env.CURRENT_OBS_URL,
        'https://forecast.weather.gov/xml/current_obs/display.php'
      )
    },
    alerts: {
      urgency: parseList(env.ALERT_URGENCY, ['Immediate', 'Expected', 'Future']),
      severity: parseList(env.ALERT_SEVERITY, ['Extreme', 'Severe', 'Moderate']),
      certainty: parseList(env.ALERT_CERTAINTY, ['Observed', 'Likely'])
    },
    output: {
      delimiter
    }
  };
}
