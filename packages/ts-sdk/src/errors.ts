/**
 * Base class for every error the client raises. `code` is a short machine
 * readable tag and `status` the HTTP status of the response, when there was one.
 */
export class ForceError extends Error {
  public code?: string
  public status?: number

  constructor(message: string, code?: string, status?: number) {
    super(message)
    this.name = 'ForceError'
    this.code = code
    this.status = status
  }
}

/**
 * The request never produced a usable response: connection failure, timeout,
 * or an HTTP error status whose body carried no service error.
 */
export class TransportError extends ForceError {
  constructor(message: string, code = 'TRANSPORT_ERROR', status?: number) {
    super(message, code, status)
    this.name = 'TransportError'
  }
}

/**
 * The response body could not be read as an XML document.
 */
export class DecodeError extends ForceError {
  constructor(message: string, status?: number) {
    super(message, 'DECODE_ERROR', status)
    this.name = 'DecodeError'
  }
}

/**
 * The service rejected the request and said why. `code` and `serviceMessage`
 * are passed through as the service sent them.
 */
export class ServiceError extends ForceError {
  public readonly serviceMessage: string

  constructor(code: string, serviceMessage: string, status?: number) {
    super(`${code}: ${serviceMessage}`, code, status)
    this.name = 'ServiceError'
    this.serviceMessage = serviceMessage
  }
}

export class AuthenticationError extends ForceError {
  constructor(message: string, code = 'AUTHENTICATION_ERROR', status?: number) {
    super(message, code, status)
    this.name = 'AuthenticationError'
  }
}

export class ConfigurationError extends ForceError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR')
    this.name = 'ConfigurationError'
  }
}
