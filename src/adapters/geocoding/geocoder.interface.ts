import { Coordinates } from '../../types/domain.types';

export interface IGeocoder {
  geocode(zipCode: string, apiKey: string): Promise<Coordinates>;
}
