export type FetchErrorKind = 'CityNotFound' | 'NetworkFailure' | 'MalformedResponse' | 'ProviderError';

export class WeatherCliError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WeatherCliError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends WeatherCliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

/** The provider refused the configured API key; no further request can succeed. */
export class ApiKeyRejectedError extends ConfigError {
  public readonly status: number;

  constructor(status: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ApiKeyRejectedError';
    this.status = status;
  }
}

/** Base for failures reported by a weather provider; `kind` selects the user-facing message. */
export class WeatherProviderError extends WeatherCliError {
  public readonly kind: FetchErrorKind;

  constructor(kind: FetchErrorKind, message: string, options?: ErrorOptions) {
    super(message, `PROVIDER_${kind.toUpperCase()}`, options);
    this.name = 'WeatherProviderError';
    this.kind = kind;
  }
}

export class CityNotFoundError extends WeatherProviderError {
  constructor(city: string, options?: ErrorOptions) {
    super('CityNotFound', `City '${city}' not found`, options);
    this.name = 'CityNotFoundError';
  }
}

export class NetworkFailureError extends WeatherProviderError {
  constructor(message: string, options?: ErrorOptions) {
    super('NetworkFailure', message, options);
    this.name = 'NetworkFailureError';
  }
}

export class MalformedResponseError extends WeatherProviderError {
  constructor(message: string, options?: ErrorOptions) {
    super('MalformedResponse', message, options);
    this.name = 'MalformedResponseError';
  }
}

export class ProviderResponseError extends WeatherProviderError {
  public readonly status: number;

  constructor(status: number, message: string, options?: ErrorOptions) {
    super('ProviderError', message, options);
    this.name = 'ProviderResponseError';
    this.status = status;
  }
}
