import { describe, it, expect, vi } from 'vitest';
import { startCli } from '../../cli/startCli.js';
import { BANNER } from '../../cli/WeatherPrompt.js';
import type { FetchLike } from '../../adapters/weather/OpenWeatherAdapter.js';
import { ScriptedConsole } from '../helpers/ScriptedConsole.js';

const env = {
  OPENWEATHER_API_KEY: 'test-key',
  OPENWEATHER_BASE_URL: 'https://weather.example.test/data/2.5',
};

const KEY_HINT = 'Set OPENWEATHER_API_KEY in the environment or in a .env file.';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function collectingOutput() {
  const written: string[] = [];
  return {
    written,
    write: (text: string) => {
      written.push(text);
      return true;
    },
  };
}

describe('startCli', () => {
  it('reports a missing API key and exits 1 before prompting', async () => {
    const consolePort = new ScriptedConsole(['London']);
    const errorOutput = collectingOutput();
    const fetcher = vi.fn<FetchLike>();

    const code = await startCli({ env: {}, consolePort, errorOutput, fetcher });

    expect(code).toBe(1);
    expect(errorOutput.written).toEqual([
      `Configuration validation failed:\nopenWeatherApiKey: OPENWEATHER_API_KEY is required\n${KEY_HINT}\n`,
    ]);
    expect(consolePort.prompts).toEqual([]);
    expect(consolePort.printed).toEqual([]);
    expect(consolePort.isClosed()).toBe(true);
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('reports an invalid LOG_LEVEL as a configuration error', async () => {
    const consolePort = new ScriptedConsole([]);
    const errorOutput = collectingOutput();

    const code = await startCli({ env: { ...env, LOG_LEVEL: 'verbose' }, consolePort, errorOutput });

    expect(code).toBe(1);
    expect(errorOutput.written[0]).toMatch(/^Configuration validation failed:\nlogLevel: /);
    expect(consolePort.prompts).toEqual([]);
  });

  it('ends the session after the first request when the key is rejected', async () => {
    const consolePort = new ScriptedConsole(['London, Paris', 'Berlin', 'quit']);
    const errorOutput = collectingOutput();
    const fetcher = vi.fn<FetchLike>().mockImplementation(async () => jsonResponse({ cod: 401 }, 401));

    const code = await startCli({ env, consolePort, errorOutput, fetcher });

    expect(code).toBe(1);
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(errorOutput.written).toEqual([`OpenWeather rejected the API key (401)\n${KEY_HINT}\n`]);
    expect(consolePort.printed).toEqual([BANNER, '\nFetching weather for London...']);
    expect(consolePort.isClosed()).toBe(true);
  });

  it('runs the prompt and exits 0 on quit', async () => {
    const consolePort = new ScriptedConsole(['London', 'quit']);
    const errorOutput = collectingOutput();
    const fetcher = vi.fn<FetchLike>().mockImplementation(async (url) =>
      url.pathname.endsWith('/weather')
        ? jsonResponse({
            name: 'London',
            dt: 1635778800,
            main: { temp: 15, humidity: 80 },
            weather: [{ description: 'Cloudy' }],
            wind: { speed: 5 },
          })
        : jsonResponse({ city: { name: 'London' }, list: [] })
    );

    const code = await startCli({ env, consolePort, errorOutput, fetcher });

    expect(code).toBe(0);
    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(errorOutput.written).toEqual([]);
    expect(consolePort.output).toContain('Temperature: 15.0°C');
    expect(consolePort.output).toContain('Condition: Cloudy');
    expect(consolePort.printed.at(-1)).toBe('Exiting...');
  });
});
