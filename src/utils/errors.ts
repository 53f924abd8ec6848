/**
 * Error taxonomy for the risk engine.
 *
 * Every error carries a stable `code` and a `retryable` flag so callers can
 * decide between backing off, skipping a record, or exiting.
 */

export class RiskEngineError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message);
    this.name = "RiskEngineError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Feed or store temporarily unreachable. The operation is retried with the
 * feed marker unchanged.
 */
export class TransientIOError extends RiskEngineError {
  public readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(
      `${operation} failed: ${cause instanceof Error ? cause.message : String(cause ?? "unknown error")}`,
      "TRANSIENT_IO",
      { retryable: true, cause }
    );
    this.name = "TransientIOError";
    this.operation = operation;
  }
}

/**
 * Missing or invalid configuration. Fatal at startup.
 */
export class ConfigError extends RiskEngineError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `Invalid configuration (${problems.length} problem${problems.length === 1 ? "" : "s"}): ${problems.join("; ")}`,
      "CONFIG_INVALID"
    );
    this.name = "ConfigError";
    this.problems = problems;
  }
}

/**
 * A notification channel was unreachable or rejected the payload.
 */
export class NotificationDeliveryError extends RiskEngineError {
  public readonly channel: string;
  public readonly statusCode?: number;

  constructor(
    channel: string,
    message: string,
    options: { statusCode?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(`[${channel}] ${message}`, "NOTIFICATION_DELIVERY", {
      retryable: options.retryable ?? true,
      cause: options.cause,
    });
    this.name = "NotificationDeliveryError";
    this.channel = channel;
    this.statusCode = options.statusCode;
  }
}

/**
 * A malformed transaction or stored record. Feed rows are skipped and
 * logged; other reads fail.
 */
export class DataIntegrityError extends RiskEngineError {
  public readonly transactionId: number | null;
  public readonly fields: Record<string, unknown>;

  constructor(message: string, transactionId: number | null, fields: Record<string, unknown> = {}) {
    super(message, "DATA_INTEGRITY");
    this.name = "DataIntegrityError";
    this.transactionId = transactionId;
    this.fields = fields;
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof RiskEngineError && error.retryable;
}
