export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * A persisted forwarder configuration is missing a required field or holds a
 * value that cannot be interpreted. Blocks activation of the forwarder.
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public field?: string
  ) {
    super(400, message, true);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** Reported (not thrown) when a forward attempt ends without a 200. */
export class DeliveryFailure extends ServiceError {
  constructor(
    forwarder: string,
    originalError: Error,
    public status?: number
  ) {
    super(forwarder, 'forward', originalError, true);
    Object.setPrototypeOf(this, DeliveryFailure.prototype);
  }
}

export class SetupCheckFailure extends ServiceError {
  constructor(originalError: Error, public status?: number) {
    super('ManagedRelay', 'checkLinked', originalError, true);
    Object.setPrototypeOf(this, SetupCheckFailure.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
