/**
 * Base class for every error raised by the client and the coordinator
 */
export class MelCloudError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Rejected credentials or a rejected session
 */
export class AuthenticationError extends MelCloudError {}

/**
 * Non-2xx response, transport failure or malformed body
 */
export class ApiError extends MelCloudError {
  readonly status?: number

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, options)
    this.status = status
  }
}

export class RateLimitError extends ApiError {
  constructor(message = 'Rate limited by MELCloud Home (HTTP 429)', options?: ErrorOptions) {
    super(message, 429, options)
  }
}

/**
 * Out-of-range value, unknown enum value or unmet capability precondition.
 * Always raised before any network call.
 */
export class ValidationError extends MelCloudError {}

export class DeviceNotFoundError extends MelCloudError {
  readonly unitId: string

  constructor(unitId: string) {
    super(`Unit "${unitId}" not found in the last snapshot`)
    this.unitId = unitId
  }
}

export class ConfigError extends MelCloudError {}
