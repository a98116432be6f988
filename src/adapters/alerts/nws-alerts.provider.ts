import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { WeatherAlert } from '../../types/domain.types';
import { FetchFailure } from '../../types/error.types';
import { describeStatus, httpGet, NetworkError, readJson } from '../../utils/http.util';
import { IAlertsProvider } from './alerts-provider.interface';

const AlertFeatureSchema = z.object({
  id: z.string(),
  properties: z.object({
    event: z.string(),
    headline: z.string().nullish(),
    severity: z.string(),
    urgency: z.string(),
    certainty: z.string()
  })
});

const AlertsResponseSchema = z.object({
  features: z.array(AlertFeatureSchema)
});

const ALERT_LIMIT = 500;

@injectable()
export class NwsAlertsProvider implements IAlertsProvider {
  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  async fetchActiveAlerts(zone: string): Promise<WeatherAlert[]> {
    const { urgency, severity, certainty } = this.config.alerts;
    const url = new URL(`${this.config.endpoints.nwsApiUrl}/alerts/active`);
    url.searchParams.set('zone', zone);
    url.searchParams.set('urgency', urgency.join(','));
    url.searchParams.set('severity', severity.join(','));
    url.searchParams.set('certainty', certainty.join(','));
    url.searchParams.set('limit', String(ALERT_LIMIT));

    let response: Response;
    try {
      response = await httpGet(url.toString(), {
        userAgent: this.config.http.userAgent,
        accept: 'application/geo+json',
        timeoutMs: this.config.http.timeoutMs
      });
    } catch (error) {
      if (error instanceof NetworkError) {
        throw new FetchFailure(`Error fetching NWS alerts for ${zone}: ${error.message}`);
      }
      throw error;
    }

    if (!response.ok) {
      throw new FetchFailure(`NWS alerts API error: ${describeStatus(response)}`, response.status);
    }

    const body = AlertsResponseSchema.safeParse(await readJson(response));
    if (!body.success) {
      throw new FetchFailure(`Invalid alerts data returned from the NWS API for ${zone}`);
    }

    return body.data.features.map(feature => ({
      id: feature.id,
      event: feature.properties.event,
      headline: feature.properties.headline ?? undefined,
      severity: feature.properties.severity,
      urgency: feature.properties.urgency,
      certainty: feature.properties.certainty
    }));
  }
}
