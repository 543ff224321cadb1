export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly isOperational: boolean;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

export class FetchError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Fetch Error: ${message}`, context);
  }
}

export class ScrapingError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Scraping Error: ${message}`, context);
  }
}

/**
 * No header run and no date/time-shaped token near the top of the page.
 * The page content and its tokens are kept for the debug dump.
 */
export class LayoutNotRecognizedError extends ScrapingError {
  constructor(
    public readonly content: string,
    public readonly tokens: readonly string[],
    context?: Record<string, unknown>
  ) {
    super('Layout not recognized', { ...context, tokenCount: tokens.length });
  }
}

export class EmptyPageError extends ScrapingError {
  constructor(page: number, context?: Record<string, unknown>) {
    super(`Parsed 0 records on page ${page}`, { ...context, page });
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Validation Error: ${message}`, context);
  }
}
