export interface AppErrorOptions {
  message: string;
  code: string;
  /** False for bugs and unexpected failures; true for conditions callers can act on. */
  isOperational?: boolean;
  /** Whether {@link withRetry} may try the failed call again. */
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export interface AppErrorJSON {
  name: string;
  code: string;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

/** Base class of every error the packages raise on purpose. */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(options: AppErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.details = options.details;

    // Subclasses keep their own prototype when compiled down.
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  /** Log-friendly shape; stack and cause are left to the logger's error serializer. */
  toJSON(): AppErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(this.details === undefined ? {} : { details: this.details }),
    };
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
