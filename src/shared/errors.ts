export class RelaypostError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RelaypostError';
  }
}

export class ConfigError extends RelaypostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends RelaypostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class InvalidPlatformError extends RelaypostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_PLATFORM', details);
    this.name = 'InvalidPlatformError';
  }
}

export class PostStateError extends RelaypostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'POST_STATE_ERROR', details);
    this.name = 'PostStateError';
  }
}

/**
 * Platform rejected our credentials. Never retried.
 */
export class AdapterAuthError extends RelaypostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ADAPTER_AUTH_ERROR', details);
    this.name = 'AdapterAuthError';
  }
}

/**
 * Network or 5xx-class failure from a platform. Retried with backoff.
 */
export class AdapterTransientError extends RelaypostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ADAPTER_TRANSIENT_ERROR', details);
    this.name = 'AdapterTransientError';
  }
}

export class ExhaustedRetriesError extends RelaypostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXHAUSTED_RETRIES', details);
    this.name = 'ExhaustedRetriesError';
  }
}

export class ScheduleError extends RelaypostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SCHEDULE_ERROR', details);
    this.name = 'ScheduleError';
  }
}

export class DispatchError extends RelaypostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DISPATCH_ERROR', details);
    this.name = 'DispatchError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
