export class MalformedCredentialsError extends Error {
  constructor(message: string, public code: string = "MALFORMED_CREDENTIALS") {
    super(message);
    this.name = "MalformedCredentialsError";
  }
}

export class DriverTimeoutError extends Error {
  constructor(message: string, public code: string = "DRIVER_TIMEOUT") {
    super(message);
    this.name = "DriverTimeoutError";
  }
}

export class NavigationError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "NavigationError";
  }
}

export class RateLimitedOrBlockedError extends Error {
  constructor(message: string, public code: string = "RATE_LIMITED_OR_BLOCKED") {
    super(message);
    this.name = "RateLimitedOrBlockedError";
  }
}

export class DestinationUnavailableError extends Error {
  constructor(message: string, public code: string = "DESTINATION_UNAVAILABLE") {
    super(message);
    this.name = "DestinationUnavailableError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public code: string = "CONFIG_ERROR") {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorCode(error: unknown, fallback = "UNKNOWN_ERROR"): string {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return fallback;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class InteractiveLoginRequiredError extends Error {
  constructor(message: string, public code: string = "INTERACTIVE_LOGIN_REQUIRED") {
    super(message);
    this.name = "InteractiveLoginRequiredError";
  }
}
