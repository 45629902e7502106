/**
 * Custom Error Types
 * Structured errors for the settings and scripting layers
 */

/**
 * Base error class for all subfilter errors
 */
export class SubfilterError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "SubfilterError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends SubfilterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Validation errors (options, node input)
 */
export class ValidationError extends SubfilterError {
  public readonly field?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
  }
}

/**
 * The scripting runtime or context could not be constructed
 */
export class EngineInitError extends SubfilterError {
  constructor(message: string, cause?: Error) {
    super(message, "ENGINE_INIT_ERROR", { cause, retryable: false });
    this.name = "EngineInitError";
  }
}

/**
 * The script threw while its top-level program ran
 */
export class ScriptExceptionError extends SubfilterError {
  /** String form of the thrown value */
  public readonly exception: string;

  constructor(exception: string, context?: Record<string, unknown>) {
    super(`Script threw an exception: ${exception}`, "SCRIPT_EXCEPTION", {
      context,
      retryable: false,
    });
    this.name = "ScriptExceptionError";
    this.exception = exception;
  }
}

/**
 * The script could not be compiled or evaluated (syntax error, engine fault)
 */
export class ScriptEvalError extends SubfilterError {
  constructor(message: string, options?: { cause?: Error; context?: Record<string, unknown> }) {
    super(message, "SCRIPT_EVAL_ERROR", { ...options, retryable: false });
    this.name = "ScriptEvalError";
  }
}

/**
 * The script ran but exposes no callable `filter`
 */
export class MissingFilterFunctionError extends SubfilterError {
  constructor(functionName = "filter") {
    super(`Script does not define a callable "${functionName}" function`, "MISSING_FILTER_FUNCTION", {
      context: { functionName },
      retryable: false,
    });
    this.name = "MissingFilterFunctionError";
  }
}

/**
 * The script ran but exposes no callable `compare`
 */
export class MissingSortFunctionError extends SubfilterError {
  constructor(functionName = "compare") {
    super(`Script does not define a callable "${functionName}" function`, "MISSING_SORT_FUNCTION", {
      context: { functionName },
      retryable: false,
    });
    this.name = "MissingSortFunctionError";
  }
}

/**
 * A single call into a script function failed
 */
export class ScriptCallError extends SubfilterError {
  public readonly functionName: string;

  constructor(
    message: string,
    functionName: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "SCRIPT_CALL_ERROR", { ...options, retryable: false });
    this.name = "ScriptCallError";
    this.functionName = functionName;
  }
}

/**
 * Stage-level failures reported by the filter and sort evaluators
 */
export type ScriptStageError =
  | EngineInitError
  | ScriptExceptionError
  | ScriptEvalError
  | MissingFilterFunctionError
  | MissingSortFunctionError;

/**
 * Type guard to check if error is a subfilter error
 */
export function isSubfilterError(error: unknown): error is SubfilterError {
  return error instanceof SubfilterError;
}

/**
 * Wrap an unknown error into a subfilter error
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): SubfilterError {
  if (isSubfilterError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SubfilterError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new SubfilterError(
    typeof error === "string" ? error : defaultMessage,
    "UNKNOWN_ERROR"
  );
}
