export type Phase = "work" | "break" | "finished";

export interface Schedule {
  readonly repetitions: number;
  readonly workMs: number;
  readonly breakMs: number;
}

export interface TimerState {
  id: string;
  schedule: Schedule;
  startedAt: string;
  pausedAt?: string;
  totalPausedMs: number;
}

export interface ClockSnapshot {
  phase: Phase;
  nextPhase: Phase;
  repetition: number;
  totalRepetitions: number;
  remainingMs: number;
  elapsedMs: number;
  isPaused: boolean;
}

export interface CommandResult {
  message: string;
  state?: TimerState;
  snapshot?: ClockSnapshot;
}
