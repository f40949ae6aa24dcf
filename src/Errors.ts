/** Error codes for harness failures */
export type HarnessErrorCode =
  | "Configuration"
  | "InsufficientSamples"
  | "CallableFailure";

/** Base class for errors raised by the harness itself */
export class HarnessError extends Error {
  readonly code: HarnessErrorCode;

  constructor(code: HarnessErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HarnessError";
    this.code = code;
  }
}

/** Invalid run configuration: fatal to the run, never retried */
export class ConfigurationError extends HarnessError {
  constructor(message: string) {
    super("Configuration", message);
    this.name = "ConfigurationError";
  }
}

/** Too few samples survived outlier rejection to build an interval */
export class InsufficientSamplesError extends HarnessError {
  readonly retained: number;
  readonly total: number;

  constructor(retained: number, total: number, label?: string) {
    const prefix = label ? `${label}: ` : "";
    const msg = `${prefix}${retained} of ${total} samples remain after outlier rejection, at least 3 required`;
    super("InsufficientSamples", msg);
    this.name = "InsufficientSamplesError";
    this.retained = retained;
    this.total = total;
  }
}

/** The implementation under test threw while being measured or set up */
export class CallableFailure extends HarnessError {
  readonly caseName: string;

  constructor(caseName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("CallableFailure", `Case "${caseName}" failed: ${detail}`, { cause });
    this.name = "CallableFailure";
    this.caseName = caseName;
  }
}

/** @return true for any error raised by the harness */
export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}
