import { differenceInMilliseconds, isValid, parse } from "date-fns";
import { z } from "zod";
import { ParseError, SolverError } from "./errors.js";
import { MAX_REPETITIONS, createSchedule } from "./schedule.js";
import type { Schedule } from "./types.js";

export const MIN_WORK_MS = 1000;

// Deviations closer than this are treated as equal so float noise cannot break ties.
const TIE_EPSILON_MS = 1e-6;

const clockTimeSchema = z.string().trim().regex(/^\d{1,2}:\d{2}$/, "Expected a time like 17:30.");

// Keeps the break, recomputes repetitions and changes work as little as possible.
// Equally close candidates resolve to the higher repetition count.
export function solveUntil(base: Schedule, startTime: Date, targetEnd: Date): Schedule {
  const spanMs = differenceInMilliseconds(targetEnd, startTime);
  if (spanMs <= 0) {
    throw new SolverError("past_target", "The target end time has already passed.");
  }

  const { workMs, breakMs } = base;
  const workFor = (repetitions: number) => (spanMs - (repetitions - 1) * breakMs) / repetitions;
  const feasible = (repetitions: number) =>
    repetitions >= 1 && repetitions <= MAX_REPETITIONS && workFor(repetitions) >= MIN_WORK_MS;

  const estimate = Math.min(Math.max(Math.round((spanMs + breakMs) / (workMs + breakMs)), 1), MAX_REPETITIONS);

  let best: { repetitions: number; deviation: number } | undefined;
  for (const repetitions of candidatesAround(estimate, feasible)) {
    const deviation = Math.abs(workFor(repetitions) - workMs);
    if (
      best === undefined ||
      deviation < best.deviation - TIE_EPSILON_MS ||
      (Math.abs(deviation - best.deviation) <= TIE_EPSILON_MS && repetitions > best.repetitions)
    ) {
      best = { repetitions, deviation };
    }
  }

  if (!best) {
    throw new SolverError("infeasible", "Not enough time left before the target for even one work interval.");
  }

  return createSchedule(best.repetitions, workFor(best.repetitions), breakMs);
}

// Work shrinks as repetitions grow, so the upward walk stops at its first miss.
function* candidatesAround(estimate: number, feasible: (repetitions: number) => boolean): Generator<number> {
  let lowerOpen = true;
  let upperOpen = true;
  for (let offset = 0; lowerOpen || upperOpen; offset += 1) {
    if (lowerOpen) {
      const candidate = estimate - offset;
      if (candidate < 1) {
        lowerOpen = false;
      } else if (feasible(candidate)) {
        yield candidate;
      }
    }
    if (upperOpen && offset > 0) {
      const candidate = estimate + offset;
      if (feasible(candidate)) {
        yield candidate;
      } else {
        upperOpen = false;
      }
    }
  }
}

export function parseClockTime(value: string, reference: Date): Date {
  const checked = clockTimeSchema.safeParse(value);
  if (!checked.success) {
    throw new ParseError("invalid_format", `Invalid time "${value}". ${checked.error.issues[0]?.message ?? ""}`.trim());
  }
  const parsed = parse(checked.data, "H:mm", reference);
  if (!isValid(parsed)) {
    throw new ParseError("invalid_format", `Invalid time "${value}". Hours run 0-23 and minutes 0-59.`);
  }
  return parsed;
}
