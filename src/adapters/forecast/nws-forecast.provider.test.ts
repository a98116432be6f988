import 'reflect-metadata';
import { NwsForecastProvider } from './nws-forecast.provider';
import { loadConfig } from '../../config/app.config';
import { FetchFailure, GridResolutionFailure } from '../../types/error.types';

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

const pointsBody = {
  properties: {
    gridId: 'HNX',
    gridX: 84,
    gridY: 105,
    forecast: 'https://api.weather.gov/gridpoints/HNX/84,105/forecast',
    forecastZone: 'https://api.weather.gov/zones/forecast/CAZ323',
    relativeLocation: {
      properties: { city: 'Wawona', state: 'CA' }
    }
  }
};

const forecastBody = {
  properties: {
    updateTime: '2026-10-18T09:12:44+00:00',
    periods: [
      {
        number: 1,
        name: 'Today',
        startTime: '2026-10-18T06:00:00-07:00',
        endTime: '2026-10-18T18:00:00-07:00',
        isDaytime: true,
        temperature: 71,
        temperatureUnit: 'F',
        temperatureTrend: null,
        probabilityOfPrecipitation: { unitCode: 'wmoUnit:percent', value: 20 },
        windSpeed: '5 to 10 mph',
        windDirection: 'W',
        icon: 'https://api.weather.gov/icons/land/day/sct?size=medium',
        shortForecast: 'Mostly Sunny',
        detailedForecast: 'Mostly sunny, with a high near 71.'
      },
      {
        number: 2,
        name: 'Tonight',
        startTime: '2026-10-18T18:00:00-07:00',
        endTime: '2026-10-19T06:00:00-07:00',
        isDaytime: false,
        temperature: 38,
        temperatureUnit: 'F',
        temperatureTrend: 'rising',
        probabilityOfPrecipitation: { unitCode: 'wmoUnit:percent', value: null },
        windSpeed: '5 mph',
        windDirection: 'NW',
        shortForecast: 'Clear',
        detailedForecast: 'Clear, with a low around 38.'
      }
    ]
  }
};

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : '',
    json: async () => body
  };
}

describe('NwsForecastProvider', () => {
  let provider: NwsForecastProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    const config = loadConfig(
      { zip: '93142', gcApiKey: 'test-key', forecastOnly: true, help: false },
      { NWS_USER_AGENT: 'wx-report-test' }
    );
    provider = new NwsForecastProvider(config);
  });

  describe('fetchForecast - Successful responses', () => {
    it('should resolve the grid then return the periods in provider order', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(pointsBody));
      mockFetch.mockResolvedValueOnce(jsonResponse(forecastBody));

      const forecast = await provider.fetchForecast({ latitude: 37.5365, longitude: -119.6555 });

      expect(forecast.updateTime).toBe('2026-10-18T09:12:44+00:00');
      expect(forecast.periods.map(p => p.name)).toEqual(['Today', 'Tonight']);
      expect(forecast.gridReference).toEqual({
        gridId: 'HNX',
        gridX: 84,
        gridY: 105,
        forecastUrl: 'https://api.weather.gov/gridpoints/HNX/84,105/forecast'
      });
      expect(forecast.forecastZone).toBe('CAZ323');
      expect(forecast.forecastZoneUrl).toBe('https://api.weather.gov/zones/forecast/CAZ323');
      expect(forecast.location).toEqual({ city: 'Wawona', state: 'CA' });
    });

    it('should map NWS period fields onto the domain model', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(pointsBody));
      mockFetch.mockResolvedValueOnce(jsonResponse(forecastBody));

      const forecast = await provider.fetchForecast({ latitude: 37.5365, longitude: -119.6555 });

      expect(forecast.periods[0]).toEqual({
        number: 1,
        name: 'Today',
        startTime: '2026-10-18T06:00:00-07:00',
        endTime: '2026-10-18T18:00:00-07:00',
        isDaytime: true,
        temperature: 71,
        temperatureUnit: 'F',
        temperatureTrend: undefined,
        precipitationChance: 20,
        windSpeed: '5 to 10 mph',
        windDirection: 'W',
        icon: 'https://api.weather.gov/icons/land/day/sct?size=medium',
        shortForecast: 'Mostly Sunny',
        detailedForecast: 'Mostly sunny, with a high near 71.'
      });
      expect(forecast.periods[1].temperatureTrend).toBe('rising');
      expect(forecast.periods[1].precipitationChance).toBeUndefined();
    });

    it('should round coordinates to four decimals and send the NWS headers', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(pointsBody));
      mockFetch.mockResolvedValueOnce(jsonResponse(forecastBody));

      await provider.fetchForecast({ latitude: 37.536512345, longitude: -119.655549 });

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(mockFetch.mock.calls[0][0]).toBe('https://api.weather.gov/points/37.5365,-119.6555');
      expect(mockFetch.mock.calls[0][1]).toMatchObject({
        headers: { 'User-Agent': 'wx-report-test', Accept: 'application/geo+json' }
      });
      expect(mockFetch.mock.calls[1][0]).toBe('https://api.weather.gov/gridpoints/HNX/84,105/forecast');
    });
  });

  describe('fetchForecast - Failures', () => {
    it('should throw GridResolutionFailure when the point is outside coverage', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ title: 'Data Unavailable For Requested Point' }, 404));

      await expect(provider.fetchForecast({ latitude: 51.5072, longitude: -0.1276 })).rejects.toThrow(
        'NWS has no forecast grid for 51.5072,-0.1276 (outside coverage area)'
      );
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should throw GridResolutionFailure when the points response has no forecast URL', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ properties: { gridId: 'HNX', gridX: 84, gridY: 105 } }));

      await expect(provider.fetchForecast({ latitude: 37.5, longitude: -119.6 })).rejects.toThrow(
        GridResolutionFailure
      );
    });

    it('should throw FetchFailure when the points API returns a server error', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, 500));

      const error = await provider.fetchForecast({ latitude: 37.5, longitude: -119.6 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchFailure);
      expect(error).toMatchObject({ message: 'NWS points API error: HTTP 500', statusCode: 500 });
    });

    it('should throw FetchFailure when the forecast API fails', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(pointsBody));
      mockFetch.mockResolvedValueOnce(jsonResponse({}, 503));

      await expect(provider.fetchForecast({ latitude: 37.5, longitude: -119.6 })).rejects.toThrow(
        'NWS forecast API error: HTTP 503'
      );
    });

    it('should throw FetchFailure when forecast periods are missing', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(pointsBody));
      mockFetch.mockResolvedValueOnce(jsonResponse({ properties: { updateTime: '2026-10-18T09:12:44+00:00' } }));

      await expect(provider.fetchForecast({ latitude: 37.5, longitude: -119.6 })).rejects.toThrow(FetchFailure);
    });

    it('should throw FetchFailure on a network error', async () => {
      mockFetch.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(provider.fetchForecast({ latitude: 37.5, longitude: -119.6 })).rejects.toThrow(
        'Error fetching NWS points data: connect ECONNREFUSED'
      );
    });
  });
});
