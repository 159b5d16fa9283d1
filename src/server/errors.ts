export type TruthStateErrorCode = "LOCK_TIMEOUT" | "BACKEND_UNAVAILABLE" | "ENGINE_REJECTED";

export class TruthStateError extends Error {
  constructor(
    public readonly code: TruthStateErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The bounded wait for a session lock ran out. Callers decide whether to retry. */
export class LockTimeoutError extends TruthStateError {
  constructor(
    public readonly key: string,
    public readonly timeoutMs: number
  ) {
    super("LOCK_TIMEOUT", `Timed out after ${timeoutMs}ms waiting for lock on "${key}"`);
  }
}

/** The shared backend could not serve a call. Never reported as an absent snapshot. */
export class BackendUnavailableError extends TruthStateError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("BACKEND_UNAVAILABLE", `State backend unavailable during ${operation}: ${detail}`, {
      cause
    });
  }
}

export class EngineRejectedError extends TruthStateError {
  constructor(public readonly reason: string) {
    super("ENGINE_REJECTED", reason);
  }
}
