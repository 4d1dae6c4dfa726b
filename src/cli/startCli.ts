import { loadConfig, type Config } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { OpenWeatherAdapter, type FetchLike } from '../adapters/weather/OpenWeatherAdapter.js';
import { WeatherService } from '../core/weather/WeatherService.js';
import type { ConsolePort } from '../ports/ConsolePort.js';
import { WeatherPrompt } from './WeatherPrompt.js';

export interface CliOptions {
  env: NodeJS.ProcessEnv;
  consolePort: ConsolePort;
  errorOutput: { write(text: string): unknown };
  /** Defaults to the global fetch. */
  fetcher?: FetchLike;
}

const logger = createLogger({ component: 'startCli' });

const KEY_HINT = 'Set OPENWEATHER_API_KEY in the environment or in a .env file.';

/**
 * Validates the configuration, then runs the weather prompt until it ends.
 * Resolves to the process exit code; the console is closed either way.
 */
export async function startCli(options: CliOptions): Promise<number> {
  const { consolePort, errorOutput } = options;

  try {
    let config: Config;
    try {
      config = loadConfig(options.env);
    } catch (error) {
      if (error instanceof ConfigError) {
        errorOutput.write(`${error.message}\n${KEY_HINT}\n`);
        return 1;
      }
      throw error;
    }

    logger.debug({ units: config.units, forecastSlots: config.forecastSlots }, 'Starting city weather prompt');

    const weatherService = new WeatherService(new OpenWeatherAdapter(config, options.fetcher));
    try {
      await new WeatherPrompt(weatherService, consolePort).run();
      return 0;
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.warn({ code: error.code }, 'Session ended by a configuration error');
        errorOutput.write(`${error.message}\n${KEY_HINT}\n`);
        return 1;
      }
      throw error;
    }
  } finally {
    consolePort.close();
  }
}
