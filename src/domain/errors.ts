/**
 * Failure taxonomy shared by every controller component.
 *
 * - `fatal`: the affected subsystem stops for good; a mandatory one takes the
 *   whole controller down.
 * - `feature`: one optional capability is disabled for the session.
 * - `recoverable`: reported, then the owning loop reconnects or respawns.
 * - `malformed`: one inbound record is skipped.
 */
export type FailureKind = 'fatal' | 'feature' | 'recoverable' | 'malformed';

export type ControllerErrorCode =
  | 'invalid-target'
  | 'mandatory-feature-unavailable'
  | 'executable-not-found'
  | 'spawn-failed'
  | 'process-write-failed'
  | 'port-in-use'
  | 'connect-timeout'
  | 'connection-refused'
  | 'connection-closed'
  | 'malformed-record';

export class ControllerError extends Error {
  public readonly kind: FailureKind;
  public readonly code: ControllerErrorCode;

  constructor(
    message: string,
    options: { kind: FailureKind; code: ControllerErrorCode; cause?: unknown },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = options.kind;
    this.code = options.code;
  }
}

export class InvalidTargetError extends ControllerError {
  constructor(
    public readonly target: string,
    reason: string,
  ) {
    super(`Invalid connection target ${JSON.stringify(target)}: ${reason}`, {
      kind: 'fatal',
      code: 'invalid-target',
    });
  }
}

export class MandatoryFeatureError extends ControllerError {
  constructor(message: string, cause?: unknown) {
    super(message, { kind: 'fatal', code: 'mandatory-feature-unavailable', cause });
  }
}

export class ExecutableNotFoundError extends ControllerError {
  constructor(
    public readonly executable: string,
    cause?: unknown,
  ) {
    super(`Executable '${executable}' not found`, {
      kind: 'feature',
      code: 'executable-not-found',
      cause,
    });
  }
}

export class SpawnError extends ControllerError {
  constructor(
    public readonly executable: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to start '${executable}': ${detail}`, {
      kind: 'recoverable',
      code: 'spawn-failed',
      cause,
    });
  }
}

export class ProcessWriteError extends ControllerError {
  constructor(
    public readonly processName: string,
    cause?: unknown,
  ) {
    const detail = cause === undefined ? 'input closed' : cause instanceof Error ? cause.message : String(cause);
    super(`${processName} stdin pipe broken (${detail})`, {
      kind: 'feature',
      code: 'process-write-failed',
      cause,
    });
  }
}

export class PortInUseError extends ControllerError {
  constructor(
    public readonly port: number,
    cause?: unknown,
  ) {
    super(`Port ${port} already in use`, { kind: 'feature', code: 'port-in-use', cause });
  }
}

export class ConnectTimeoutError extends ControllerError {
  constructor(
    public readonly target: string,
    public readonly timeoutMs: number,
  ) {
    super(`Connection to ${target} timed out after ${timeoutMs} ms`, {
      kind: 'recoverable',
      code: 'connect-timeout',
    });
  }
}

export class ConnectionRefusedError extends ControllerError {
  constructor(
    public readonly target: string,
    cause?: unknown,
  ) {
    super(`Connection to ${target} refused`, {
      kind: 'recoverable',
      code: 'connection-refused',
      cause,
    });
  }
}

export class ConnectionClosedError extends ControllerError {
  constructor(message = 'connection closed') {
    super(message, { kind: 'recoverable', code: 'connection-closed' });
  }
}

export class MalformedRecordError extends ControllerError {
  constructor(message: string, cause?: unknown) {
    super(message, { kind: 'malformed', code: 'malformed-record', cause });
  }
}

export type FailureClass = FailureKind | 'cancelled';

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Maps a thrown value to its disposition. Only structured kinds are trusted;
 * unknown errors default to recoverable.
 */
export function classifyFailure(error: unknown): FailureClass {
  if (isAbortError(error)) {
    return 'cancelled';
  }
  if (error instanceof ControllerError) {
    return error.kind;
  }
  return 'recoverable';
}
