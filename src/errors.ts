export type TrackingErrorCode =
  | 'CONFIGURATION'
  | 'VALIDATION'
  | 'SEALED_BUILDER'
  | 'ALREADY_COMPLETED'
  | 'CLIENT_CLOSED'
  | 'DELIVERY';

export class TrackingError extends Error {
  readonly code: TrackingErrorCode;

  constructor(code: TrackingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Missing or invalid setup value. Raised where the value is needed and never retried.
 */
export class ConfigurationError extends TrackingError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

/**
 * A single malformed record. Other buffered records are unaffected.
 */
export class ValidationError extends TrackingError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('VALIDATION', message);
    this.details = details;
  }
}

export class SealedBuilderError extends TrackingError {
  readonly interactionId: string;

  constructor(interactionId: string) {
    super('SEALED_BUILDER', `Interaction ${interactionId} has already been finished`);
    this.interactionId = interactionId;
  }
}

export class AlreadyCompletedError extends TrackingError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('ALREADY_COMPLETED', `Session ${sessionId} has already been completed`);
    this.sessionId = sessionId;
  }
}

export class ClientClosedError extends TrackingError {
  constructor() {
    super('CLIENT_CLOSED', 'Tracking client has been shut down');
  }
}

/**
 * Transport failure. Carried inside delivery results, never thrown to callers.
 */
export class DeliveryError extends TrackingError {
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, options: { retryable?: boolean; status?: number; cause?: unknown } = {}) {
    super('DELIVERY', message, { cause: options.cause });
    this.retryable = options.retryable ?? true;
    this.status = options.status;
  }

  static from(error: unknown): DeliveryError {
    if (error instanceof DeliveryError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new DeliveryError(message, { retryable: true, cause: error });
  }
}
