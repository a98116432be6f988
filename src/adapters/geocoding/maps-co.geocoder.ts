import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { Coordinates } from '../../types/domain.types';
import { LookupFailure } from '../../types/error.types';
import { describeStatus, httpGet, NetworkError, readJson } from '../../utils/http.util';
import { IGeocoder } from './geocoder.interface';

// geocode.maps.co returns coordinates as numeric strings
const coordinate = (limit: number) =>
  z.union([z.string().trim().min(1), z.number()]).pipe(z.coerce.number().finite().min(-limit).max(limit));

const SearchResultSchema = z.object({
  lat: coordinate(90),
  lon: coordinate(180),
  display_name: z.string().optional()
});

const SearchResponseSchema = z.array(z.unknown());

@injectable()
export class MapsCoGeocoder implements IGeocoder {
  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  async geocode(zipCode: string, apiKey: string): Promise<Coordinates> {
    const url = new URL(this.config.endpoints.geocodeUrl);
    url.searchParams.set('q', zipCode);
    url.searchParams.set('api_key', apiKey);

    let response: Response;
    try {
      response = await httpGet(url.toString(), { timeoutMs: this.config.http.timeoutMs });
    } catch (error) {
      if (error instanceof NetworkError) {
        throw new LookupFailure(`Error fetching geolocation data for ${zipCode}: ${error.message}`);
      }
      throw error;
    }

    if (response.status === 401 || response.status === 403) {
      throw new LookupFailure(`Geocoding API rejected the API key (${describeStatus(response)})`, response.status);
    }

    if (response.status === 429) {
      throw new LookupFailure('Geocoding API quota exceeded (HTTP 429)', response.status);
    }

    if (!response.ok) {
      throw new LookupFailure(`Geocoding API error: ${describeStatus(response)}`, response.status);
    }

    const body = SearchResponseSchema.safeParse(await readJson(response));
    if (!body.success) {
      throw new LookupFailure('Malformed geocoding response: expected a list of results');
    }

    if (body.data.length === 0) {
      throw new LookupFailure(`No results found for ZIP code ${zipCode}`);
    }

    // Results are ranked; take the first one
    const first = SearchResultSchema.safeParse(body.data[0]);
    if (!first.success) {
      throw new LookupFailure('Latitude or longitude not found in geocoding response');
    }

    return {
      latitude: first.data.lat,
      longitude: first.data.lon
    };
  }
}
