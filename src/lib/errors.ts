export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Raised when a time slot would end before it starts.
 * Equal bounds are a valid zero-duration slot and never raise this.
 */
export class InvalidIntervalError extends ValidationError {
  constructor(start: string, end: string) {
    super(`Time slot end ${end} is before its start ${start}`, { start, end });
    this.name = 'InvalidIntervalError';
  }
}

export class InvalidInstantError extends ValidationError {
  constructor(reason: string, explanation?: string | null) {
    super(`Invalid instant: ${reason}`, { reason, explanation: explanation ?? undefined });
    this.name = 'InvalidInstantError';
  }
}
