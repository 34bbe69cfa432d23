/**
 * Base for every error the CLI raises on purpose. `code` is a stable
 * machine-readable tag (`CONFIG_ERROR`, `TRANSPORT_ERROR`, ...) that log
 * records carry alongside the message.
 */
export class PromptlogError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "PromptlogError";
  }
}

export class ConfigError extends PromptlogError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

export class StorageError extends PromptlogError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORAGE_ERROR", cause);
    this.name = "StorageError";
  }
}

/** No response was obtained from the API at all. */
export class TransportError extends PromptlogError {
  constructor(message: string, cause?: unknown) {
    super(message, "TRANSPORT_ERROR", cause);
    this.name = "TransportError";
  }
}

export class EmptyResponseError extends PromptlogError {
  constructor(message = "Empty response from API") {
    super(message, "EMPTY_RESPONSE");
    this.name = "EmptyResponseError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
