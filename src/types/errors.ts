/**
 * Custom error classes for the mapping and evaluation pipeline.
 */

/**
 * Error thrown when a language model call fails (transport, provider, auth).
 */
export class LLMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LLMError';
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

/**
 * Kinds of unusable model output.
 */
export type ResponseFormatKind =
  | 'empty_output'
  | 'max_token'
  | 'recitation'
  | 'no_json_array'
  | 'invalid_escape'
  | 'json_decode';

/**
 * Error thrown when a model response cannot be turned into JSON.
 */
export class ResponseFormatError extends Error {
  public readonly kind: ResponseFormatKind;

  constructor(kind: ResponseFormatKind, message: string) {
    super(message);
    this.name = 'ResponseFormatError';
    this.kind = kind;
    Object.setPrototypeOf(this, ResponseFormatError.prototype);
  }
}

/**
 * Error thrown when SQL text cannot be abstracted into a template.
 */
export class ParseError extends Error {
  public readonly position: number | null;

  constructor(message: string, position: number | null = null) {
    super(position === null ? message : `${message} (at offset ${position})`);
    this.name = 'ParseError';
    this.position = position;
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * Error thrown when the run-wide failure budget is spent.
 */
export class BudgetExhaustedError extends Error {
  public readonly limit: number;

  constructor(limit: number, lastError?: string) {
    super(
      `Failure budget of ${limit} exhausted` + (lastError ? `: ${lastError}` : '')
    );
    this.name = 'BudgetExhaustedError';
    this.limit = limit;
    Object.setPrototypeOf(this, BudgetExhaustedError.prototype);
  }
}

/**
 * Error thrown when dataset files are missing or invalid.
 */
export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetError';
    Object.setPrototypeOf(this, DatasetError.prototype);
  }
}

/**
 * Error thrown when the settings file or environment is invalid.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Render any thrown value as a one-line reason string.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
