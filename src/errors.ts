export type ParseErrorKind = "invalid_format" | "zero_duration";
export type SolverErrorKind = "past_target" | "infeasible";
export type StateErrorKind = "already_running" | "not_running" | "already_paused" | "not_paused";

export class PomodoroError extends Error {
  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ParseError extends PomodoroError {
  constructor(
    readonly kind: ParseErrorKind,
    message: string
  ) {
    super(message, kind);
  }
}

export class SolverError extends PomodoroError {
  constructor(
    readonly kind: SolverErrorKind,
    message: string
  ) {
    super(message, kind);
  }
}

const STATE_MESSAGES: Record<StateErrorKind, string> = {
  already_running: "A pomodoro is already running. Stop it before starting another.",
  not_running: "No pomodoro is running.",
  already_paused: "The pomodoro is already paused.",
  not_paused: "The pomodoro is not paused."
};

export class StateError extends PomodoroError {
  constructor(readonly kind: StateErrorKind) {
    super(STATE_MESSAGES[kind], kind);
  }
}

export class StoreError extends PomodoroError {
  constructor(message: string, cause?: unknown) {
    super(message, "store_failure", { cause });
  }
}

export class WatchError extends PomodoroError {
  constructor(message: string, cause?: unknown) {
    super(message, "watch_failure", { cause });
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
