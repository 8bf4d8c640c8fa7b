export class SearchgateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SearchgateError';
  }
}

export class ConfigurationError extends SearchgateError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Base class for failures talking to the external web-search provider.
 * `status` is the HTTP status the provider answered with, or 0 when the
 * request never produced a response.
 */
export class WebSearchError extends SearchgateError {
  constructor(
    message: string,
    code: string,
    public readonly status: number,
    cause?: Error,
  ) {
    super(message, code, cause);
    this.name = 'WebSearchError';
  }
}

export class ProviderTransportError extends WebSearchError {
  constructor(message: string, cause?: Error) {
    super(message, 'PROVIDER_TRANSPORT_ERROR', 0, cause);
    this.name = 'ProviderTransportError';
  }
}

export class ProviderHttpError extends WebSearchError {
  constructor(
    status: number,
    public readonly body: string,
  ) {
    super(`Provider responded with HTTP ${String(status)}: ${body}`, 'PROVIDER_HTTP_ERROR', status);
    this.name = 'ProviderHttpError';
  }
}

export class ProviderResponseError extends WebSearchError {
  constructor(message: string, status: number, cause?: Error) {
    super(message, 'PROVIDER_RESPONSE_ERROR', status, cause);
    this.name = 'ProviderResponseError';
  }
}

export class QuotaError extends SearchgateError {
  constructor(message: string) {
    super(message, 'QUOTA_ERROR');
    this.name = 'QuotaError';
  }
}

export class ToolError extends SearchgateError {
  constructor(message: string, cause?: Error) {
    super(message, 'TOOL_ERROR', cause);
    this.name = 'ToolError';
  }
}

export class PersistenceError extends SearchgateError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class SchemaValidationError extends SearchgateError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}
