/**
 * Error hierarchy for collection generation and sync.
 */

export interface ErrorOptions {
  cause?: Error;
  runId?: string;
  retryable?: boolean | null;
  suggestion?: string | null;
}

export class SyncError extends Error {
  static readonly DEFAULT_RETRYABLE: boolean | null = null;

  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly runId?: string;
  readonly timestamp: string;
  readonly retryable: boolean | null;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'SyncError';
    this.code = code;
    this.details = details ?? {};
    this.cause = options?.cause;
    this.runId = options?.runId;
    this.timestamp = new Date().toISOString();
    const ctor: unknown = this.constructor;
    const defaultRetryable = isSyncErrorClass(ctor) ? ctor.DEFAULT_RETRYABLE : null;
    this.retryable = options?.retryable !== undefined ? options.retryable : defaultRetryable;
    this.suggestion = options?.suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    if (this.runId !== undefined) {
      obj.run_id = this.runId;
    }
    obj.timestamp = this.timestamp;
    if (this.retryable !== null) {
      obj.retryable = this.retryable;
    }
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

function isSyncErrorClass(value: unknown): value is typeof SyncError {
  return typeof value === 'function' && (value === SyncError || value.prototype instanceof SyncError);
}

export class ConfigNotFoundError extends SyncError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  readonly configPath: string;

  constructor(configPath: string, options?: ErrorOptions) {
    super('CONFIG_NOT_FOUND', `Configuration file not found: ${configPath}`, { configPath }, options);
    this.name = 'ConfigNotFoundError';
    this.configPath = configPath;
  }
}

export class ConfigError extends SyncError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, {}, options);
    this.name = 'ConfigError';
  }
}

export class InvalidInputError extends SyncError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(message: string = 'Invalid input', options?: ErrorOptions) {
    super('GENERAL_INVALID_INPUT', message, {}, options);
    this.name = 'InvalidInputError';
  }
}

/** Unknown scope target. Raised before any remote call is made. */
export class NotFoundError extends SyncError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  readonly target: string;
  readonly targetKind: string;

  constructor(targetKind: string, target: string, options?: ErrorOptions) {
    super('NOT_FOUND', `${targetKind} not found: ${target}`, { targetKind, target }, options);
    this.name = 'NotFoundError';
    this.target = target;
    this.targetKind = targetKind;
  }
}

/** Folder/leaf kind mismatch between the canonical and remote trees. */
export class ConflictError extends SyncError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  readonly key: string;

  constructor(key: string, canonicalKind: string, remoteKind: string, options?: ErrorOptions) {
    super(
      'TREE_CONFLICT',
      `Kind mismatch at '${key}': canonical ${canonicalKind}, remote ${remoteKind}`,
      { key, canonicalKind, remoteKind },
      options,
    );
    this.name = 'ConflictError';
    this.key = key;
  }
}

export class TransientRemoteError extends SyncError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = true;

  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super('REMOTE_TRANSIENT', message, details, options);
    this.name = 'TransientRemoteError';
  }
}

export class RateLimitError extends TransientRemoteError {
  readonly retryAfterMs: number | null;

  constructor(retryAfterMs: number | null, options?: ErrorOptions) {
    super(
      retryAfterMs === null ? 'Remote rate limit exceeded' : `Remote rate limit exceeded, retry after ${retryAfterMs}ms`,
      { retryAfterMs },
      options,
    );
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class RemoteTimeoutError extends TransientRemoteError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: ErrorOptions) {
    super(`Remote call ${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs }, options);
    this.name = 'RemoteTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** Non-transient remote rejection, or a transient one that ran out of attempts. */
export class RemoteApplyError extends SyncError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: ErrorOptions) {
    super('REMOTE_APPLY_FAILED', message, { status }, options);
    this.name = 'RemoteApplyError';
    this.status = status;
  }
}

/** The remote tree could not be fetched; there is nothing to diff against. */
export class RemoteFetchError extends SyncError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(message: string, options?: ErrorOptions) {
    super('REMOTE_FETCH_FAILED', message, {}, options);
    this.name = 'RemoteFetchError';
  }
}

export class SyncCancelledError extends SyncError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(message: string = 'Sync run was cancelled', options?: ErrorOptions) {
    super('SYNC_CANCELLED', message, {}, options);
    this.name = 'SyncCancelledError';
  }
}

/** Wrap any thrown value in an Error so it can be chained as a cause. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
