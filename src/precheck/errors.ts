export type InputErrorCode = "invalid_input" | "unsupported_upgrade_path" | "prompt_cancelled";
export type ProbeErrorCode = "probe_failed" | "probe_timeout" | "unsafe_identifier";
export type PrecheckErrorCode = InputErrorCode | "connectivity" | ProbeErrorCode;

export class PrecheckError extends Error {
  code: PrecheckErrorCode;
  details: Record<string, unknown>;

  constructor(code: PrecheckErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "PrecheckError";
    this.code = code;
    this.details = details;
  }
}

// Fatal, raised before any connection is attempted (or before the session opens).
export class InputValidationError extends PrecheckError {
  constructor(code: InputErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
    this.name = "InputValidationError";
  }
}

// Fatal: version detection or database listing could not reach the server.
export class ConnectivityError extends PrecheckError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("connectivity", message, details);
    this.name = "ConnectivityError";
  }
}

export class ProbeError extends PrecheckError {
  declare code: ProbeErrorCode;
  database: string | null;
  probeId: string;

  constructor(code: ProbeErrorCode, message: string, opts: { database: string | null; probeId: string; cause?: unknown }) {
    super(code, message, { database: opts.database, probe_id: opts.probeId });
    this.name = "ProbeError";
    this.database = opts.database;
    this.probeId = opts.probeId;
    if (opts.cause !== undefined) this.cause = opts.cause;
  }
}

export function isPrecheckError(err: unknown): err is PrecheckError {
  return err instanceof PrecheckError;
}
