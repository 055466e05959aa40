/**
 * Azure Agent — Error Types
 */

export class AgentError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = "AgentError";
    this.statusCode = statusCode;
  }
}

/** Raised when an environment variable cannot be parsed. */
export class ConfigError extends AgentError {
  constructor(message: string) {
    super(message, 500);
    this.name = "ConfigError";
  }
}

/** Raised for malformed chat completion requests. Maps to HTTP 400. */
export class RequestValidationError extends AgentError {
  constructor(message: string) {
    super(message, 400);
    this.name = "RequestValidationError";
  }
}

export class AuthenticationError extends AgentError {
  constructor(message = "Unauthorized") {
    super(message, 401);
    this.name = "AuthenticationError";
  }
}
