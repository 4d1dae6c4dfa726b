import type { CurrentConditions, ForecastEntry, Units } from '../ports/WeatherPort.js';
import type { CityWeather, FetchError } from '../core/weather/WeatherService.js';

const UNIT_SYMBOLS: Record<Units, { temperature: string; speed: string }> = {
  metric: { temperature: '°C', speed: 'm/s' },
  imperial: { temperature: '°F', speed: 'mph' },
  standard: { temperature: 'K', speed: 'm/s' },
};

export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

function formatTemperature(value: number, units: Units): string {
  return `${value.toFixed(1)}${UNIT_SYMBOLS[units].temperature}`;
}

function formatSpeed(value: number, units: Units): string {
  return `${value.toFixed(1)} ${UNIT_SYMBOLS[units].speed}`;
}

export function formatCurrentConditions(current: CurrentConditions): string {
  return [
    `Weather for ${current.cityName}:`,
    `Temperature: ${formatTemperature(current.temperature, current.units)}`,
    `Condition: ${current.description}`,
    `Humidity: ${current.humidity}%`,
    `Wind Speed: ${formatSpeed(current.windSpeed, current.units)}`,
    `Observed: ${formatTimestamp(current.observedAt)}`,
  ].join('\n');
}

export function formatForecastEntry(entry: ForecastEntry, units: Units): string {
  return [
    formatTimestamp(entry.timestamp),
    formatTemperature(entry.temperature, units),
    entry.description,
    `Humidity ${entry.humidity}%`,
    `Wind ${formatSpeed(entry.windSpeed, units)}`,
  ].join(' | ');
}

export function formatForecast(city: string, entries: ForecastEntry[], units: Units): string {
  if (entries.length === 0) {
    return `No forecast available for '${city}'.`;
  }
  return [`5-Day Forecast for ${city}:`, ...entries.map((entry) => formatForecastEntry(entry, units))].join(
    '\n'
  );
}

export function formatCityWeather(weather: CityWeather): string {
  return `${formatCurrentConditions(weather.current)}\n\n${formatForecast(weather.city, weather.forecast, weather.units)}`;
}

export function formatFetchError(error: FetchError): string {
  switch (error.kind) {
    case 'CityNotFound':
      return `City '${error.city}' not found.`;
    case 'NetworkFailure':
      return `Network error for '${error.city}': ${error.message}`;
    case 'MalformedResponse':
      return `Unexpected response for '${error.city}': ${error.message}`;
    case 'ProviderError':
      return `Weather service error for '${error.city}': ${error.message}`;
  }
}
