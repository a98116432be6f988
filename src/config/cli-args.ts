import { parseArgs } from 'util';
import { ConfigurationError } from '../types/error.types';

export interface CliOptions {
  zip?: string;
  gcApiKey?: string;
  airport?: string;
  forecastOnly: boolean;
  help: boolean;
}

export const USAGE = `Usage: wx-report [--zip <zip>] [--gc_api_key <key>] [--airport <id>] [--forecast_only]

Fetch the 7-day NWS forecast for a ZIP code and the latest observation from an airport station.

Options:
  --zip <zip>          ZIP code of the location (env: ZIP)
  --gc_api_key <key>   API key for the geocode.maps.co geocoding API (env: GC_API_KEY)
  --airport <id>       Airport identifier for current conditions, e.g. KFAT (env: AIRPORT)
  --forecast_only      Only fetch and print the forecast
  -h, --help           Show this help`;

export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        zip: { type: 'string' },
        gc_api_key: { type: 'string' },
        airport: { type: 'string' },
        forecast_only: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false }
      },
      strict: true,
      allowPositionals: false
    });

    return {
      zip: values.zip,
      gcApiKey: values.gc_api_key,
      airport: values.airport,
      forecastOnly: values.forecast_only ?? false,
      help: values.help ?? false
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${message}\n\n${USAGE}`);
  }
}
