/**
 * Structured errors for address resolution.
 * Every failure the resolver reports is an AddressResolverError; the code tells callers what went wrong.
 */

export type AddressErrorCode =
  // Raised by the address resolver itself
  | "VALIDATION_ERROR"
  | "RESOLUTION_ERROR"
  | "FORMAT_ERROR"
  | "LOOKUP_ERROR"
  // Raised by geocoders, surfaced as the cause of a RESOLUTION_ERROR
  | "AUTH_FAILED"
  | "RATE_LIMITED"
  | "GEOCODER_ERROR"
  | "MALFORMED_RESPONSE"
  | "TIMEOUT"
  | "NETWORK_ERROR";

export interface AddressErrorDetails {
  code: AddressErrorCode;
  message: string;
  /** Input field the error refers to (validation only) */
  field?: string;
  /** HTTP status from the geocoding API when applicable */
  httpStatus?: number;
  /** Underlying cause for logging (e.g. a ZodError or a geocoder error) */
  cause?: unknown;
}

export class AddressResolverError extends Error {
  readonly details: AddressErrorDetails;

  constructor(details: AddressErrorDetails) {
    super(details.message);
    this.name = "AddressResolverError";
    this.details = details;
    Object.setPrototypeOf(this, AddressResolverError.prototype);
  }

  get code(): AddressErrorCode {
    return this.details.code;
  }

  get httpStatus(): number | undefined {
    return this.details.httpStatus;
  }

  /** Serialize for API responses or logging */
  toJSON(): AddressErrorDetails {
    return { ...this.details, cause: undefined };
  }
}

export function isAddressResolverError(e: unknown): e is AddressResolverError {
  return e instanceof AddressResolverError;
}

/** Required field empty or mistyped, or state not in the registry */
export function validationError(message: string, field?: string, cause?: unknown): AddressResolverError {
  return new AddressResolverError({
    code: "VALIDATION_ERROR",
    message,
    field,
    cause,
  });
}

/** Coordinates could not be resolved; cause carries the geocoder error */
export function resolutionError(message: string, cause?: unknown): AddressResolverError {
  return new AddressResolverError({
    code: "RESOLUTION_ERROR",
    message,
    cause,
  });
}

/** Serialized input is not a well-formed record */
export function formatError(message: string, cause?: unknown): AddressResolverError {
  return new AddressResolverError({
    code: "FORMAT_ERROR",
    message,
    cause,
  });
}

/** Registry lookup for a code that is not a member */
export function lookupError(code: string): AddressResolverError {
  return new AddressResolverError({
    code: "LOOKUP_ERROR",
    message: `${code} is not a registered state`,
  });
}

export function authError(message: string, httpStatus?: number): AddressResolverError {
  return new AddressResolverError({
    code: "AUTH_FAILED",
    message,
    httpStatus,
  });
}

/** Build rate limit error (429) */
export function rateLimitError(retryAfter?: number): AddressResolverError {
  return new AddressResolverError({
    code: "RATE_LIMITED",
    message: retryAfter
      ? `Rate limit exceeded. Retry after ${retryAfter}s`
      : "Rate limit exceeded",
    httpStatus: 429,
  });
}

/** Non-success status from the geocoding API */
export function geocoderError(message: string, httpStatus?: number): AddressResolverError {
  return new AddressResolverError({
    code: "GEOCODER_ERROR",
    message,
    httpStatus,
  });
}

export function malformedResponseError(message: string, cause?: unknown): AddressResolverError {
  return new AddressResolverError({
    code: "MALFORMED_RESPONSE",
    message,
    cause,
  });
}

export function timeoutError(operation: string): AddressResolverError {
  return new AddressResolverError({
    code: "TIMEOUT",
    message: `Request timed out: ${operation}`,
  });
}

export function networkError(message: string, cause?: unknown): AddressResolverError {
  return new AddressResolverError({
    code: "NETWORK_ERROR",
    message,
    cause,
  });
}
