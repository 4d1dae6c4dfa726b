import { z } from 'zod';
import type {
  WeatherPort,
  CurrentConditions,
  Forecast,
  ForecastEntry,
  Units,
} from '../../ports/WeatherPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import {
  ApiKeyRejectedError,
  CityNotFoundError,
  MalformedResponseError,
  NetworkFailureError,
  ProviderResponseError,
} from '../../utils/errors.js';

export type FetchLike = (input: URL, init?: { signal?: AbortSignal }) => Promise<Response>;

const conditionSchema = z.object({ description: z.string() });

const currentResponseSchema = z.object({
  name: z.string(),
  dt: z.number(),
  main: z.object({ temp: z.number(), humidity: z.number() }),
  weather: z.array(conditionSchema).min(1),
  wind: z.object({ speed: z.number() }),
});

const forecastItemSchema = z.object({
  dt: z.number(),
  main: z.object({ temp: z.number(), humidity: z.number() }),
  weather: z.array(conditionSchema).min(1),
  wind: z.object({ speed: z.number() }),
});

const forecastResponseSchema = z.object({
  city: z.object({ name: z.string() }),
  list: z.array(forecastItemSchema),
});

type OpenWeatherForecastItem = z.infer<typeof forecastItemSchema>;

export class OpenWeatherAdapter implements WeatherPort {
  private readonly logger = createLogger({ adapter: 'OpenWeatherAdapter' });
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly units: Units;
  private readonly timeoutMs: number;
  private readonly forecastSlots: number;

  constructor(
    config: Config,
    private readonly fetcher: FetchLike = (input, init) => fetch(input, init)
  ) {
    this.apiKey = config.openWeatherApiKey;
    this.baseUrl = config.openWeatherBaseUrl.replace(/\/+$/, '');
    this.units = config.units;
    this.timeoutMs = config.requestTimeoutMs;
    this.forecastSlots = config.forecastSlots;
  }

  async getCurrentConditions(city: string): Promise<CurrentConditions> {
    const body = await this.request('weather', city);
    const data = this.parse(currentResponseSchema, body, 'current weather');

    return {
      cityName: data.name,
      temperature: roundOne(data.main.temp),
      humidity: data.main.humidity,
      description: data.weather[0]?.description ?? 'unknown',
      windSpeed: roundOne(data.wind.speed),
      observedAt: fromUnix(data.dt),
      units: this.units,
    };
  }

  async getForecast(city: string): Promise<Forecast> {
    const body = await this.request('forecast', city, { cnt: String(this.forecastSlots) });
    const data = this.parse(forecastResponseSchema, body, 'forecast');

    return {
      cityName: data.city.name,
      units: this.units,
      entries: data.list.map((item: OpenWeatherForecastItem): ForecastEntry => ({
        timestamp: fromUnix(item.dt),
        temperature: roundOne(item.main.temp),
        humidity: item.main.humidity,
        description: item.weather[0]?.description ?? 'unknown',
        windSpeed: roundOne(item.wind.speed),
      })),
    };
  }

  private async request(
    endpoint: 'weather' | 'forecast',
    city: string,
    extraParams: Record<string, string> = {}
  ): Promise<unknown> {
    const logger = this.logger.child({ method: 'request', endpoint, city });

    const url = new URL(`${this.baseUrl}/${endpoint}`);
    url.searchParams.set('q', city);
    url.searchParams.set('appid', this.apiKey);
    url.searchParams.set('units', this.units);
    for (const [key, value] of Object.entries(extraParams)) {
      url.searchParams.set(key, value);
    }

    logger.debug('Requesting OpenWeather data');

    let response: Response;
    try {
      response = await this.fetcher(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = describeNetworkError(error, this.timeoutMs);
      logger.debug({ reason }, 'OpenWeather request failed before a response');
      throw new NetworkFailureError(reason, { cause: error });
    }

    if (response.status === 404) {
      throw new CityNotFoundError(city);
    }
    if (response.status === 401) {
      throw new ApiKeyRejectedError(401, 'OpenWeather rejected the API key (401)');
    }
    if (!response.ok) {
      logger.debug({ status: response.status }, 'OpenWeather API request failed');
      throw new ProviderResponseError(response.status, `OpenWeather API error: ${response.status}`);
    }

    try {
      const body: unknown = await response.json();
      logger.debug('OpenWeather data received');
      return body;
    } catch (error) {
      throw new MalformedResponseError(`OpenWeather ${endpoint} response is not valid JSON`, {
        cause: error,
      });
    }
  }

  private parse<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'body';
      throw new MalformedResponseError(`OpenWeather ${what} response is missing or has an invalid '${field}'`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

function fromUnix(unixTimestamp: number): Date {
  return new Date(unixTimestamp * 1000);
}

function describeNetworkError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `request timed out after ${timeoutMs} ms`;
  }
  if (!(error instanceof Error)) {
    return String(error);
  }
  // undici reports "fetch failed" and keeps the socket/DNS error as the cause
  return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
}
