import { WeatherAlert } from '../../types/domain.types';

export interface IAlertsProvider {
  fetchActiveAlerts(zone: string): Promise<WeatherAlert[]>;
}
