import { CurrentCondition } from '../../types/domain.types';

export interface ICurrentConditionsProvider {
  fetchCurrentConditions(airportCode: string): Promise<CurrentCondition>;
}
