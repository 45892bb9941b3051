import { ErrorBody, FieldError } from './WeatherDomain'

export type ErrorKind =
  | 'ValidationError'
  | 'SchemaError'
  | 'ConfigurationError'
  | 'LocationNotFoundError'
  | 'UpstreamError'
  | 'InternalError'
  | 'RouteNotFoundError'
  | 'HttpError'

/*
  Base of every error the service answers with. `message` is what gets logged,
  `responseMessage` is what the client sees.
 */
export abstract class ServiceError extends Error {
  abstract readonly kind: ErrorKind
  abstract readonly statusCode: number

  get responseMessage(): string {
    return this.message
  }

  toBody(timestamp: Date = new Date()): ErrorBody {
    return {
      error: this.kind,
      message: this.responseMessage,
      timestamp,
      status_code: this.statusCode
    }
  }
}

export class ValidationError extends ServiceError {
  readonly kind = 'ValidationError'
  readonly statusCode = 400
}

export class SchemaError extends ServiceError {
  readonly kind = 'SchemaError'
  readonly statusCode = 422

  constructor(readonly details: FieldError[]) {
    super(details.map(d => d.message).join('; '))
  }

  toBody(timestamp: Date = new Date()): ErrorBody {
    return { ...super.toBody(timestamp), details: this.details }
  }
}

export class ConfigurationError extends ServiceError {
  readonly kind = 'ConfigurationError'
  readonly statusCode = 500

  get responseMessage(): string {
    return 'Weather service configuration error'
  }
}

// Upstream rejected our credential
export class CredentialError extends ConfigurationError {}

export class LocationNotFoundError extends ServiceError {
  readonly kind = 'LocationNotFoundError'
  readonly statusCode = 404

  get responseMessage(): string {
    return 'Location not found'
  }
}

export type UpstreamFailure = 'timeout' | 'network' | 'status' | 'decode'

export class UpstreamError extends ServiceError {
  readonly kind = 'UpstreamError'
  readonly statusCode = 503

  constructor(message: string, readonly reason: UpstreamFailure, readonly upstreamStatus?: number, readonly body?: string) {
    super(message)
  }

  get responseMessage(): string {
    return 'Weather service temporarily unavailable'
  }
}

export class InternalError extends ServiceError {
  readonly kind = 'InternalError'
  readonly statusCode = 500

  constructor(message: string, cause?: unknown) {
    super(message, { cause })
  }

  get responseMessage(): string {
    return 'Internal server error'
  }
}

export class RouteNotFoundError extends ServiceError {
  readonly kind = 'RouteNotFoundError'
  readonly statusCode = 404
}

// Errors raised by express and its middleware (http-errors style) carry their own status
export class HttpError extends ServiceError {
  readonly kind = 'HttpError'

  constructor(message: string, readonly statusCode: number, private readonly expose: boolean) {
    super(message)
  }

  get responseMessage(): string {
    return this.expose ? this.message : 'Internal server error'
  }
}

export function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) {
    return err
  }
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 600) {
    const expose = 'expose' in err ? err.expose === true : err.status < 500
    return new HttpError(err.message, err.status, expose)
  }
  return new InternalError(err instanceof Error ? err.message : String(err), err)
}
