import type { WeatherPort, CurrentConditions, ForecastEntry, Units } from '../../ports/WeatherPort.js';
import { WeatherProviderError, type FetchErrorKind } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface CityWeather {
  city: string;
  units: Units;
  current: CurrentConditions;
  forecast: ForecastEntry[];
}

export interface FetchError {
  kind: FetchErrorKind;
  /** The city as the user typed it (trimmed). */
  city: string;
  message: string;
}

export type FetchResult = { ok: true; weather: CityWeather } | { ok: false; error: FetchError };

export interface CityWeatherFetcher {
  fetchCityWeather(city: string): Promise<FetchResult>;
}

/**
 * Looks up current conditions and then the forecast for one city.
 * A provider failure on either call ends the lookup and comes back as a FetchError;
 * anything else is rethrown.
 */
export class WeatherService implements CityWeatherFetcher {
  private readonly logger = createLogger({ service: 'WeatherService' });

  constructor(private readonly weatherPort: WeatherPort) {}

  async fetchCityWeather(city: string): Promise<FetchResult> {
    const logger = this.logger.child({ city });

    try {
      const current = await this.weatherPort.getCurrentConditions(city);
      const forecast = await this.weatherPort.getForecast(city);

      return {
        ok: true,
        weather: {
          city: current.cityName,
          units: current.units,
          current,
          forecast: forecast.entries,
        },
      };
    } catch (error) {
      if (error instanceof WeatherProviderError) {
        logger.info({ kind: error.kind, code: error.code }, 'Weather lookup failed');
        return { ok: false, error: { kind: error.kind, city, message: error.message } };
      }
      throw error;
    }
  }
}
