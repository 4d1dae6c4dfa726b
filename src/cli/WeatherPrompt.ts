import type { ConsolePort } from '../ports/ConsolePort.js';
import type { CityWeatherFetcher } from '../core/weather/WeatherService.js';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { isQuitCommand, parseCityInput } from './cityInput.js';
import { formatCityWeather, formatFetchError } from './formatWeather.js';

export const BANNER = "Enter city names (separated by commas) or 'quit' to exit.";
export const PROMPT = 'Cities: ';

/**
 * Interactive loop: one line of comma-separated cities per prompt, cities handled in order.
 * Ends on the quit keyword or when the console runs out of input or is closed.
 * A ConfigError (e.g. a rejected API key) ends the session by rejecting `run()`.
 */
export class WeatherPrompt {
  private readonly logger = createLogger({ component: 'WeatherPrompt' });

  constructor(
    private readonly fetcher: CityWeatherFetcher,
    private readonly consolePort: ConsolePort
  ) {}

  async run(): Promise<void> {
    this.consolePort.print(BANNER);

    for (;;) {
      const line = await this.consolePort.readLine(PROMPT);
      if (line === undefined || isQuitCommand(line)) {
        this.consolePort.print('Exiting...');
        return;
      }
      await this.handleLine(line);
    }
  }

  async handleLine(line: string): Promise<void> {
    for (const city of parseCityInput(line)) {
      // Closed mid-line (Ctrl-C): leave the remaining cities unfetched.
      if (this.consolePort.isClosed()) {
        return;
      }
      this.consolePort.print(`\nFetching weather for ${city}...`);
      try {
        const result = await this.fetcher.fetchCityWeather(city);
        this.consolePort.print(result.ok ? formatCityWeather(result.weather) : formatFetchError(result.error));
      } catch (error) {
        if (error instanceof ConfigError) {
          throw error;
        }
        this.logger.error({ error, city }, 'Unexpected error while fetching weather');
        const message = error instanceof Error ? error.message : String(error);
        this.consolePort.print(`Unexpected error for '${city}': ${message}`);
      }
    }
  }
}
