/**
 * Custom Error Types
 * Structured errors for channel resolution, upstream calls and configuration
 */

/**
 * Base error class for all channel-pulse errors
 */
export class ChannelPulseError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = "ChannelPulseError";
    this.code = code;
    this.context = options?.context;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or invalid credential / identifier. Fatal for the request.
 */
export class ConfigurationError extends ChannelPulseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", { context });
    this.name = "ConfigurationError";
  }
}

/**
 * A channel reference could not be mapped to a channel ID
 */
export class ResolutionError extends ChannelPulseError {
  public readonly reference: string;

  constructor(message: string, reference: string, context?: Record<string, unknown>) {
    super(message, "RESOLUTION_ERROR", {
      context: { reference, ...context },
    });
    this.name = "ResolutionError";
    this.reference = reference;
  }
}

/**
 * Network failure, non-2xx response or malformed payload from any
 * external collaborator (video platform, table store, answering service)
 */
export class UpstreamTransportError extends ChannelPulseError {
  public readonly service: string;
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    message: string,
    service: string,
    options?: {
      cause?: Error;
      statusCode?: number;
      endpoint?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "UPSTREAM_ERROR", {
      cause: options?.cause,
      context: { service, ...options?.context },
    });
    this.name = "UpstreamTransportError";
    this.service = service;
    this.statusCode = options?.statusCode;
    this.endpoint = options?.endpoint;
  }
}

/**
 * Validation errors (request bodies, inputs)
 */
export class ValidationError extends ChannelPulseError {
  public readonly field?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context });
    this.name = "ValidationError";
    this.field = options?.field;
  }
}

/**
 * Type guard to check if error is a channel-pulse error
 */
export function isChannelPulseError(error: unknown): error is ChannelPulseError {
  return error instanceof ChannelPulseError;
}

/**
 * Short description of an error for log context
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
