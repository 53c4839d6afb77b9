import { LabError, errorMessage, type LabErrorCode } from "../core/errors.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type Failure = {
  ok: false;
  error: string;
  code: string;
  exitCode: ExitCode;
  detail?: Record<string, unknown>;
};

export type CommandResult<T> = ({ ok: true } & T) | Failure;

const EXIT_BY_CODE: Record<LabErrorCode, ExitCode> = {
  TRANSIENT_SERVICE_ERROR: EXIT.SERVICE_ERROR,
  AUTH_ERROR: EXIT.SERVICE_ERROR,
  SERVICE_ERROR: EXIT.SERVICE_ERROR,
  NOT_FOUND: EXIT.INVALID_ARGS,
  CONFIG_ERROR: EXIT.INVALID_ARGS,
  CONFLICT: EXIT.CONFLICT,
  REGRESSION_DETECTED: EXIT.REGRESSION,
  INVALID_TRANSITION: EXIT.FAILED,
  RETRY_LIMIT_EXCEEDED: EXIT.FAILED,
  TRUNK_VALIDATION_FAILED: EXIT.FAILED,
  STATE_ERROR: EXIT.FAILED,
};

export function fail(code: string, error: string, exitCode: ExitCode, detail?: Record<string, unknown>): Failure {
  return detail ? { ok: false, code, error, exitCode, detail } : { ok: false, code, error, exitCode };
}

export function isFailure(res: { ok: boolean }): res is Failure {
  return !res.ok;
}

/** Turn a thrown error into a command failure; unknown errors exit with FAILED. */
export function failure(e: unknown): Failure {
  if (e instanceof LabError) {
    const { code: _code, message: _message, ...detail } = e.toJSON();
    return fail(e.code, e.message, EXIT_BY_CODE[e.code], detail);
  }
  return fail("UNEXPECTED", errorMessage(e), EXIT.FAILED);
}
