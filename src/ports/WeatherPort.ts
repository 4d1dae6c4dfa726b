export type Units = 'metric' | 'imperial' | 'standard';

export interface CurrentConditions {
  /** City name as resolved by the provider, e.g. "London" for "london". */
  cityName: string;
  temperature: number;
  humidity: number;
  description: string;
  windSpeed: number;
  observedAt: Date;
  units: Units;
}

export interface ForecastEntry {
  timestamp: Date;
  temperature: number;
  humidity: number;
  description: string;
  windSpeed: number;
}

export interface Forecast {
  cityName: string;
  units: Units;
  entries: ForecastEntry[];
}

export interface WeatherPort {
  getCurrentConditions(city: string): Promise<CurrentConditions>;
  /** 5-day forecast in 3-hour slots. */
  getForecast(city: string): Promise<Forecast>;
}
