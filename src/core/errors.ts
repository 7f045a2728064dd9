/**
 * Application error hierarchy
 *
 * Every error carries a machine-readable code and the HTTP status the web
 * layer should answer with.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'APP_ERROR',
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public readonly details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not Found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
  }
}

export class DatabaseError extends AppError {
  constructor(message: string) {
    super(message, 'DATABASE_ERROR', 500);
  }
}

// LLM errors

export class LLMError extends AppError {
  constructor(message: string, public readonly provider?: string) {
    super(message, 'LLM_ERROR', 502);
  }
}

export class UnsupportedProviderError extends AppError {
  constructor(provider: string) {
    super(`Unsupported provider: ${provider}`, 'UNSUPPORTED_PROVIDER', 400);
  }
}

export class ProviderNotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'PROVIDER_NOT_FOUND', 400);
  }
}

export class NoProvidersConfiguredError extends AppError {
  constructor(message: string = 'No LLM providers configured. Add an API key in the settings page.') {
    super(message, 'NO_PROVIDERS', 503);
  }
}

export interface ProviderAttemptError {
  provider: string;
  message: string;
}

export class AllProvidersFailedError extends AppError {
  constructor(public readonly attempts: ProviderAttemptError[]) {
    const providers = new Set(attempts.map((a) => a.provider));
    super(
      `All ${providers.size} providers failed. Errors: ${attempts
        .map((a) => `${a.provider}: ${a.message}`)
        .join('; ')}`,
      'ALL_PROVIDERS_FAILED',
      502
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
