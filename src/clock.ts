import { addMilliseconds, differenceInMilliseconds, parseISO } from "date-fns";
import { scheduleSpanMs } from "./schedule.js";
import type { ClockSnapshot, Phase, TimerState } from "./types.js";

export function effectiveElapsedMs(state: TimerState, now: Date): number {
  const sinceStart = differenceInMilliseconds(now, parseISO(state.startedAt));
  const currentPause = state.pausedAt ? Math.max(differenceInMilliseconds(now, parseISO(state.pausedAt)), 0) : 0;
  return Math.max(sinceStart - state.totalPausedMs - currentPause, 0);
}

// Tolerance for the fractional durations the solver produces.
const SPAN_EPSILON_MS = 1e-6;

export function evaluate(state: TimerState, now: Date): ClockSnapshot {
  const { repetitions, workMs, breakMs } = state.schedule;
  const elapsedMs = effectiveElapsedMs(state, now);
  const base = {
    totalRepetitions: repetitions,
    elapsedMs,
    isPaused: state.pausedAt !== undefined
  };

  if (elapsedMs >= scheduleSpanMs(state.schedule) - SPAN_EPSILON_MS) {
    return {
      ...base,
      phase: "finished",
      nextPhase: "finished",
      repetition: repetitions,
      remainingMs: 0
    };
  }

  const cycleMs = workMs + breakMs;
  const repetition = Math.min(Math.floor(elapsedMs / cycleMs) + 1, repetitions);
  const workEnd = (repetition - 1) * cycleMs + workMs;
  if (elapsedMs < workEnd || repetition === repetitions) {
    return {
      ...base,
      phase: "work",
      nextPhase: nextAfterWork(repetition === repetitions, breakMs),
      repetition,
      remainingMs: Math.max(workEnd - elapsedMs, 0)
    };
  }

  return {
    ...base,
    phase: "break",
    nextPhase: "work",
    repetition,
    remainingMs: repetition * cycleMs - elapsedMs
  };
}

export function projectedEnd(state: TimerState, now: Date): Date {
  const spanMs = scheduleSpanMs(state.schedule);
  return addMilliseconds(now, Math.max(spanMs - effectiveElapsedMs(state, now), 0));
}

function nextAfterWork(isLast: boolean, breakMs: number): Phase {
  if (isLast) {
    return "finished";
  }
  return breakMs > 0 ? "break" : "work";
}
