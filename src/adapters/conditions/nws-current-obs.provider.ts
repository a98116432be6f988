import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { CurrentCondition } from '../../types/domain.types';
import { FetchFailure, ParseFailure } from '../../types/error.types';
import { describeStatus, httpGet, NetworkError } from '../../utils/http.util';
import { ICurrentConditionsProvider } from './current-conditions-provider.interface';

// Tag values are kept as text; numbers are converted below so "Calm" or "NA" degrade to undefined
const field = z.string().optional();

const ObservationSchema = z.object({
  current_observation: z.object({
    location: field,
    station_id: field,
    latitude: field,
    longitude: field,
    observation_time: field,
    weather: field,
    temperature_string: field,
    temp_f: field,
    temp_c: field,
    relative_humidity: field,
    wind_string: field,
    wind_dir: field,
    wind_degrees: field,
    wind_mph: field,
    wind_gust_mph: field,
    wind_kt: field,
    pressure_string: field,
    pressure_mb: field,
    pressure_in: field,
    dewpoint_string: field,
    dewpoint_f: field,
    dewpoint_c: field,
    visibility_mi: field,
    icon_url_base: field,
    icon_url_name: field,
    ob_url: field
  })
});

type Observation = z.infer<typeof ObservationSchema>['current_observation'];

/**
 * Latest observation from the NWS current_obs XML feed for an airport station.
 * The forecast API has no point readings, so the nearest reporting airport stands in.
 */
@injectable()
export class NwsCurrentObsProvider implements ICurrentConditionsProvider {
  private readonly parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    trimValues: true
  });

  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  async fetchCurrentConditions(airportCode: string): Promise<CurrentCondition> {
    const url = new URL(this.config.endpoints.currentObsUrl);
    url.searchParams.set('stid', airportCode);

    let response: Response;
    try {
      response = await httpGet(url.toString(), {
        userAgent: this.config.http.userAgent,
        accept: 'application/xml',
        timeoutMs: this.config.http.timeoutMs
      });
    } catch (error) {
      if (error instanceof NetworkError) {
        throw new FetchFailure(`Error fetching current conditions for ${airportCode}: ${error.message}`);
      }
      throw error;
    }

    if (!response.ok) {
      throw new FetchFailure(`Current conditions feed error for ${airportCode}: ${describeStatus(response)}`, response.status);
    }

    return this.parseObservation(airportCode, decodeXml(airportCode, await response.arrayBuffer()));
  }

  parseObservation(airportCode: string, xml: string): CurrentCondition {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new ParseFailure(`Malformed observation document for ${airportCode}: ${validation.err.msg}`);
    }

    const parsed = ObservationSchema.safeParse(this.parser.parse(xml));
    if (!parsed.success) {
      throw new ParseFailure(`No current_observation found for ${airportCode} (station may be offline)`);
    }

    const obs = parsed.data.current_observation;
    const location = text(obs.location);
    const temperatureF = toNumber(obs.temp_f);

    if (!location) {
      throw new ParseFailure(`Observation for ${airportCode} has no location`);
    }

    if (temperatureF === undefined) {
      throw new ParseFailure(`Observation for ${airportCode} has no temperature`);
    }

    return {
      location,
      temperatureF,
      stationId: text(obs.station_id),
      latitude: toNumber(obs.latitude),
      longitude: toNumber(obs.longitude),
      observationTime: text(obs.observation_time),
      weather: text(obs.weather),
      temperatureString: text(obs.temperature_string),
      temperatureC: toNumber(obs.temp_c),
      relativeHumidity: toNumber(obs.relative_humidity),
      windString: text(obs.wind_string),
      windDirection: text(obs.wind_dir),
      windDegrees: toNumber(obs.wind_degrees),
      windMph: toNumber(obs.wind_mph),
      windGustMph: toNumber(obs.wind_gust_mph),
      windKt: toNumber(obs.wind_kt),
      pressureString: text(obs.pressure_string),
      pressureMb: toNumber(obs.pressure_mb),
      pressureIn: toNumber(obs.pressure_in),
      dewpointString: text(obs.dewpoint_string),
      dewpointF: toNumber(obs.dewpoint_f),
      dewpointC: toNumber(obs.dewpoint_c),
      visibilityMi: toNumber(obs.visibility_mi),
      iconUrl: iconUrl(obs),
      observationUrl: text(obs.ob_url)
    };
  }
}

const XML_ENCODING = /<\?xml[^>]*encoding=["']([A-Za-z0-9._-]+)["']/;

// The feed is served as ISO-8859-1; the prolog names the charset, UTF-8 when it is absent
function decodeXml(airportCode: string, body: ArrayBuffer): string {
  const head = new TextDecoder('latin1').decode(new Uint8Array(body, 0, Math.min(200, body.byteLength)));
  const label = XML_ENCODING.exec(head)?.[1] ?? 'utf-8';

  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(label);
  } catch {
    throw new ParseFailure(`Observation for ${airportCode} uses unsupported encoding ${label}`);
  }
  return decoder.decode(body);
}

function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function toNumber(value: string | undefined): number | undefined {
  const trimmed = text(value);
  if (trimmed === undefined) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function iconUrl(obs: Observation): string | undefined {
  const base = text(obs.icon_url_base);
  const name = text(obs.icon_url_name);
  return base && name ? `${base}${name}` : undefined;
}
