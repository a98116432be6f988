import { computeHumidex, computeWindChill, deriveMetrics, fahrenheitToCelsius } from './weather-metrics.util';

describe('weather metrics', () => {
  describe('computeWindChill', () => {
    it('should compute wind chill inside the applicable range', () => {
      expect(computeWindChill(40, 10)).toBe(33.6);
      expect(computeWindChill(0, 15)).toBe(-19.4);
    });

    it('should apply at the threshold boundaries', () => {
      expect(computeWindChill(50, 3)).toBe(49.7);
    });

    it('should return undefined when the temperature is above 50°F', () => {
      expect(computeWindChill(60, 10)).toBeUndefined();
      expect(computeWindChill(50.1, 10)).toBeUndefined();
    });

    it('should return undefined when the wind is below 3 mph', () => {
      expect(computeWindChill(30, 2.9)).toBeUndefined();
      expect(computeWindChill(30, 0)).toBeUndefined();
    });

    it('should return undefined for non-numeric input', () => {
      expect(computeWindChill(Number.NaN, 10)).toBeUndefined();
    });
  });

  describe('computeHumidex', () => {
    it('should exceed the air temperature in warm humid air', () => {
      const humidex = computeHumidex(30, 70);

      expect(humidex).toBe(41.2);
      expect(humidex).toBeGreaterThan(30);
    });

    it('should compute humidex for moderate conditions', () => {
      expect(computeHumidex(25, 50)).toBe(28.3);
    });

    it('should return undefined when the air is too dry to raise the reading', () => {
      expect(computeHumidex(20, 40)).toBeUndefined();
      expect(computeHumidex(4.4, 70)).toBeUndefined();
    });

    it('should return undefined for humidity outside (0, 100]', () => {
      expect(computeHumidex(30, 0)).toBeUndefined();
      expect(computeHumidex(30, 120)).toBeUndefined();
    });
  });

  describe('deriveMetrics', () => {
    it('should compute both metrics from an observation', () => {
      expect(
        deriveMetrics({ location: 'Test Field', temperatureF: 40, temperatureC: 4.4, windMph: 10, relativeHumidity: 70 })
      ).toEqual({ windChill: 33.6, humidex: undefined });
    });

    it('should fall back to a converted Celsius temperature', () => {
      expect(fahrenheitToCelsius(86)).toBe(30);
      expect(deriveMetrics({ location: 'Test Field', temperatureF: 86, relativeHumidity: 70 })).toEqual({
        windChill: undefined,
        humidex: 41.2
      });
    });
  });
});
