/**
 * Custom error classes for sqlchat.
 *
 * Gateway errors (timeouts, bad upstream replies, unparseable JSON) are
 * recovered inside the classification layers. Generation, validation and
 * execution errors reach the caller, which answers without retrieved context.
 */

/**
 * Base class for failures talking to the completion endpoint.
 */
export class GatewayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GatewayError';
    Object.setPrototypeOf(this, GatewayError.prototype);
  }
}

/**
 * The completion endpoint did not answer within the call's deadline.
 */
export class TimeoutError extends GatewayError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`LLM call timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Non-2xx status, network failure or malformed response envelope.
 */
export class UpstreamError extends GatewayError {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'UpstreamError';
    this.status = status;
    Object.setPrototypeOf(this, UpstreamError.prototype);
  }
}

/**
 * Model reply could not be read as a single JSON object.
 */
export class JsonExtractionError extends Error {
  public readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = 'JsonExtractionError';
    this.raw = raw;
    Object.setPrototypeOf(this, JsonExtractionError.prototype);
  }
}

/**
 * Generated SQL failed the read-only safety check.
 */
export class ValidationError extends Error {
  public readonly sql: string;

  constructor(message: string, sql: string) {
    super(message);
    this.name = 'ValidationError';
    this.sql = sql;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when SQL generation fails.
 */
export class SQLGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SQLGenerationError';
    Object.setPrototypeOf(this, SQLGenerationError.prototype);
  }
}

/**
 * Error thrown when SQL execution fails.
 */
export class SQLExecutionError extends Error {
  public readonly sql: string;

  constructor(message: string, sql: string) {
    super(message);
    this.name = 'SQLExecutionError';
    this.sql = sql;
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }
}

/**
 * Invalid environment configuration.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
