export class UnsupportedEventError extends Error {
  name = "UnsupportedEventError";
}

export class ConfigError extends Error {
  name = "ConfigError";
}

/** The execution backend could not even be tried; the batch goes back to pending. */
export class EngineUnavailableError extends Error {
  name = "EngineUnavailableError";
}

/** No durable write could be made, so nothing may be marked processed. */
export class StoreUnavailableError extends Error {
  name = "StoreUnavailableError";
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
