import { parseCliArgs } from './cli-args';
import { ConfigurationError } from '../types/error.types';

describe('parseCliArgs', () => {
  it('should read every flag', () => {
    expect(
      parseCliArgs(['--zip', '93142', '--gc_api_key', 'test-key', '--airport', 'KFAT', '--forecast_only'])
    ).toEqual({
      zip: '93142',
      gcApiKey: 'test-key',
      airport: 'KFAT',
      forecastOnly: true,
      help: false
    });
  });

  it('should accept --flag=value syntax', () => {
    expect(parseCliArgs(['--zip=93142']).zip).toBe('93142');
  });

  it('should default to no inputs and forecast-only off', () => {
    expect(parseCliArgs([])).toEqual({
      zip: undefined,
      gcApiKey: undefined,
      airport: undefined,
      forecastOnly: false,
      help: false
    });
  });

  it('should recognise -h', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('should throw ConfigurationError for unknown flags', () => {
    expect(() => parseCliArgs(['--city', 'Fresno'])).toThrow(ConfigurationError);
  });

  it('should throw ConfigurationError when a value is missing', () => {
    expect(() => parseCliArgs(['--zip'])).toThrow(ConfigurationError);
  });
});
