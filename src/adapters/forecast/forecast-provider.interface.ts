import { Coordinates, Forecast } from '../../types/domain.types';

export interface IForecastProvider {
  fetchForecast(coords: Coordinates): Promise<Forecast>;
}
