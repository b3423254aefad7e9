/**
 * Error types surfaced by the model. Each carries a stable `code`
 * alongside the message, matching ValidationError records.
 */

export type ModelErrorCode =
  | "UNSUPPORTED_STATE"
  | "UNKNOWN_PARAM_PATH"
  | "NOT_POSITIVE_DEFINITE"
  | "INVALID_CORRELATION"
  | "INVALID_CONFIG";

export class ModelError extends Error {
  readonly code: ModelErrorCode;

  constructor(code: ModelErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedStateError extends ModelError {
  readonly state: string;

  constructor(state: string, supported: readonly string[]) {
    super(
      "UNSUPPORTED_STATE",
      `Unknown state '${state}'. Supported: ${supported.join(", ")}`
    );
    this.state = state;
  }
}

export class UnknownParamPathError extends ModelError {
  readonly path: string;

  constructor(path: string) {
    super(
      "UNKNOWN_PARAM_PATH",
      `'${path}' is not a sweepable parameter (e.g. buy.mortgageRate, investment.returnRate)`
    );
    this.path = path;
  }
}

/** Covariance matrix could not be factored; the volatility/correlation config is invalid. */
export class CholeskyError extends ModelError {
  constructor(column: number, pivot: number) {
    super(
      "NOT_POSITIVE_DEFINITE",
      `Covariance matrix is not positive definite (pivot ${pivot.toExponential(3)} at column ${column})`
    );
  }
}

export class InvalidCorrelationError extends ModelError {
  constructor(message: string) {
    super("INVALID_CORRELATION", message);
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends ModelError {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super("INVALID_CONFIG", message);
    this.issues = issues;
  }
}
