export class PukError extends Error {
  override name = "PukError";
  readonly exit_code: number;

  constructor(message: string, opts: { exit_code?: number; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.exit_code = opts.exit_code ?? 1;
  }
}

export type ValidationErrorCode =
  | "malformed_playbook"
  | "missing_parameter"
  | "type_conversion"
  | "unknown_parameter"
  | "path_escape"
  | "invalid_assignment"
  | "invalid_settings";

/** Bad input detected before any agent-runtime interaction. Never retried. */
export class ValidationError extends PukError {
  override name = "ValidationError";
  readonly code: ValidationErrorCode;
  readonly key?: string;

  constructor(code: ValidationErrorCode, message: string, opts: { key?: string; cause?: unknown } = {}) {
    super(message, { exit_code: 2, cause: opts.cause });
    this.code = code;
    this.key = opts.key;
  }
}

export class PolicyViolationError extends PukError {
  override name = "PolicyViolationError";

  constructor(message: string) {
    super(message, { exit_code: 3 });
  }
}

export class AgentRuntimeError extends PukError {
  override name = "AgentRuntimeError";

  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { exit_code: 4, cause: opts.cause });
  }
}

export class RunNotFoundError extends PukError {
  override name = "RunNotFoundError";
  readonly run_ref: string;

  constructor(runRef: string, runsRoot: string) {
    super(`Run not found: '${runRef}' does not exist under ${runsRoot}`, { exit_code: 5 });
    this.run_ref = runRef;
  }
}

export class RunBusyError extends PukError {
  override name = "RunBusyError";
  readonly holder_pid: number | null;

  constructor(runDir: string, holderPid: number | null) {
    const holder = holderPid === null ? "another process" : `pid ${holderPid}`;
    super(`Run busy: ${runDir} is locked by ${holder}`, { exit_code: 5 });
    this.holder_pid = holderPid;
  }
}

export class RunCreateError extends PukError {
  override name = "RunCreateError";

  constructor(runDir: string, opts: { cause?: unknown } = {}) {
    super(`Cannot create run directory: ${runDir} already exists`, { exit_code: 5, cause: opts.cause });
  }
}

export class InvalidStatusTransitionError extends PukError {
  override name = "InvalidStatusTransitionError";

  constructor(from: string, to: string) {
    super(`Invalid run status transition: ${from} -> ${to}`, { exit_code: 6 });
  }
}

export class LedgerCorruptError extends PukError {
  override name = "LedgerCorruptError";

  constructor(message: string) {
    super(message, { exit_code: 6 });
  }
}

/** Disk full, permission denied, or any other failure to persist ledger state. */
export class LedgerIoError extends PukError {
  override name = "LedgerIoError";

  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { exit_code: 6, cause: opts.cause });
  }
}

export class InterruptedError extends PukError {
  override name = "InterruptedError";

  constructor(message = "Interrupted") {
    super(message, { exit_code: 130 });
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
