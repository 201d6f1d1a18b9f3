/** Base error for all authentication failures. */
export class AuthError extends Error {
  override name = 'AuthError';
}

/** Issuer, redirect URL or discovery result is missing or unusable. */
export class ConfigurationError extends AuthError {
  override name = 'ConfigurationError';
}

/** No valid session. Re-authentication through the interactive flow is required. */
export class NotAuthenticatedError extends AuthError {
  override name = 'NotAuthenticatedError';

  constructor(message = 'Not authenticated', options?: ErrorOptions) {
    super(message, options);
  }
}

/** The flow or refresh succeeded but the credential state could not be persisted. */
export class FailedToSaveStateError extends AuthError {
  override name = 'FailedToSaveStateError';
}

/** A refresh finished after a login or logout had replaced the state it started from. */
export class StaleCredentialError extends AuthError {
  override name = 'StaleCredentialError';

  constructor(options?: ErrorOptions) {
    super('Credential state changed while the token was being refreshed', options);
  }
}

/** An interactive flow is already awaiting its callback. */
export class FlowInProgressError extends AuthError {
  override name = 'FlowInProgressError';

  constructor(options?: ErrorOptions) {
    super('An authorization flow is already in progress', options);
  }
}

/** Provider error code reported when the user backs out of the authorization page. */
export const USER_CANCELLED_ERROR_CODE = 'access_denied';

/**
 * The authorization callback carried a provider error, or failed validation.
 */
export class AuthorizationFlowError extends AuthError {
  override name = 'AuthorizationFlowError';

  constructor(
    public readonly code: string,
    public readonly description?: string,
    options?: ErrorOptions,
  ) {
    super(description ? `Authorization failed: ${code}. ${description}` : `Authorization failed: ${code}`, options);
  }
}

/**
 * Token endpoint returned an error response.
 *
 * Carries the HTTP status so a rejected grant (4xx) can be told apart
 * from a transport failure.
 */
export class OAuthTokenError extends AuthError {
  override name = 'OAuthTokenError';

  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code?: string,
  ) {
    super(message);
  }
}

/** A secret-store write or delete failed. */
export class CredentialStoreError extends AuthError {
  override name = 'CredentialStoreError';
}

export function isUserCancellationError(error: unknown): boolean {
  return error instanceof AuthorizationFlowError && error.code === USER_CANCELLED_ERROR_CODE;
}

// Feature flags

export class FlagError extends Error {
  override name = 'FlagError';
}

export class FlagNotFoundError extends FlagError {
  override name = 'FlagNotFoundError';

  constructor(public readonly code: string) {
    super(`Flag "${code}" not found`);
  }
}

export class FlagIncorrectTypeError extends FlagError {
  override name = 'FlagIncorrectTypeError';
}

/** The token carries no usable `feature_flags` claim at all. */
export class FlagUnknownError extends FlagError {
  override name = 'FlagUnknownError';

  constructor() {
    super('No feature flags are available in the access token');
  }
}

// Account API

export class ApiError extends Error {
  override name = 'ApiError';
}

export class InvalidUrlError extends ApiError {
  override name = 'InvalidUrlError';
}

export class InvalidResponseError extends ApiError {
  override name = 'InvalidResponseError';
}

export class ServerError extends ApiError {
  override name = 'ServerError';

  constructor(public readonly status: number) {
    super(`Server responded with status ${status}`);
  }
}

export class DecodingError extends ApiError {
  override name = 'DecodingError';
}
