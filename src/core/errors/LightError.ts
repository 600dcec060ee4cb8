export enum ErrorType {
  VALIDATION_ERROR = 'validation_error',
  TRANSIENT_LINK_ERROR = 'transient_link_error',
  CAPACITY_EXHAUSTED = 'capacity_exhausted',
  DEVICE_UNAVAILABLE = 'device_unavailable',
  CONFIGURATION_ERROR = 'configuration_error',
  CANCELLED = 'cancelled'
}

/**
 * Base class for every error raised by lumenlink.
 */
export class LightError extends Error {
  public readonly code: ErrorType;
  public readonly deviceId?: string;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    code: ErrorType,
    message: string,
    deviceId?: string,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'LightError';
    this.code = code;
    this.deviceId = deviceId;
    this.context = context;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      deviceId: this.deviceId,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack
    };
  }
}

/**
 * Malformed command, payload or intent. Never retried.
 */
export class ValidationError extends LightError {
  constructor(message: string, field?: string, value?: unknown, deviceId?: string) {
    super(ErrorType.VALIDATION_ERROR, message, deviceId, { field, value });
    this.name = 'ValidationError';
  }
}

export class FrameValidationError extends ValidationError {
  constructor(message: string, field?: string, value?: unknown) {
    super(message, field, value);
    this.name = 'FrameValidationError';
  }
}

export class IntentValidationError extends ValidationError {
  constructor(message: string, field: string, value: unknown, deviceId?: string) {
    super(message, field, value, deviceId);
    this.name = 'IntentValidationError';
  }
}

/**
 * Connect, write or disconnect failure on the radio link.
 */
export class TransientLinkError extends LightError {
  constructor(message: string, deviceId?: string, cause?: unknown) {
    super(ErrorType.TRANSIENT_LINK_ERROR, message, deviceId, {
      cause: cause instanceof Error ? cause.message : cause
    });
    this.name = 'TransientLinkError';
    this.cause = cause;
  }
}

export class CapacityExhaustedError extends LightError {
  constructor(message: string, deviceId?: string, capacity?: number, queued?: number) {
    super(ErrorType.CAPACITY_EXHAUSTED, message, deviceId, { capacity, queued });
    this.name = 'CapacityExhaustedError';
  }
}

export class DeviceUnavailableError extends LightError {
  constructor(deviceId: string, attempts: number) {
    super(
      ErrorType.DEVICE_UNAVAILABLE,
      `Device ${deviceId} unavailable after ${attempts} connection attempts`,
      deviceId,
      { attempts }
    );
    this.name = 'DeviceUnavailableError';
  }
}

export class ConfigurationError extends LightError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(ErrorType.CONFIGURATION_ERROR, message, undefined, { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class CancelledError extends LightError {
  constructor(message = 'Operation cancelled', deviceId?: string) {
    super(ErrorType.CANCELLED, message, deviceId);
    this.name = 'CancelledError';
  }
}

export function isLightError(error: unknown): error is LightError {
  return error instanceof LightError;
}
