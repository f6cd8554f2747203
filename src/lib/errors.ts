/**
 * Error taxonomy for rendering and running scripts.
 */

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TemplateError extends Error {
  public readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = 'TemplateError';
    this.line = line;
  }
}

export class CredentialError extends Error {
  public readonly keyPath: string;

  constructor(keyPath: string, message: string, cause?: unknown) {
    super(
      cause === undefined ? message : `${message}: ${describeError(cause)}`,
      { cause }
    );
    this.name = 'CredentialError';
    this.keyPath = keyPath;
  }
}

export class ConnectionError extends Error {
  public readonly host: string;

  constructor(host: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConnectionError';
    this.host = host;
  }
}

export class ConnectionExhaustedError extends ConnectionError {
  public readonly attempts: number;

  constructor(host: string, attempts: number, cause?: unknown) {
    const reason = cause === undefined ? '' : ` (last error: ${describeError(cause)})`;
    super(
      host,
      `failed to connect to ${host} after ${attempts} attempts, giving up${reason}`,
      cause
    );
    this.name = 'ConnectionExhaustedError';
    this.attempts = attempts;
  }
}

export class SessionError extends Error {
  public readonly host: string;

  constructor(host: string, cause: unknown) {
    super(`failed to create session on ${host}: ${describeError(cause)}`, {
      cause,
    });
    this.name = 'SessionError';
    this.host = host;
  }
}

export interface ExecutionFailure {
  /**
   * @description Why the script failed, e.g. "exit status 2".
   */
  reason: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal?: string | null;
  cause?: unknown;
}

export class ExecutionError extends Error {
  public readonly stdout: string;
  public readonly stderr: string;
  public readonly exitCode: number | null;
  public readonly signal: string | null;

  constructor(failure: ExecutionFailure) {
    super(
      `script execution failed: ${failure.reason}\nSTDOUT: ${failure.stdout}\nSTDERR: ${failure.stderr}`,
      { cause: failure.cause }
    );
    this.name = 'ExecutionError';
    this.stdout = failure.stdout;
    this.stderr = failure.stderr;
    this.exitCode = failure.exitCode;
    this.signal = failure.signal ?? null;
  }
}

/**
 * Describes how a process or remote command ended when it did not exit 0.
 */
export function exitReason(
  exitCode: number | null,
  signal?: string | null
): string {
  if (exitCode !== null) {
    return `exit status ${exitCode}`;
  }
  if (signal) {
    return `terminated by signal ${signal}`;
  }
  return 'exit status missing';
}
