import { WeatherReport } from '../types/result.types';

export interface IWeatherReportService {
  generateReport(): Promise<WeatherReport>;
}
