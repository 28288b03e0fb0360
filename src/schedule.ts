import { ParseError } from "./errors.js";
import type { Schedule } from "./types.js";

export const MINUTE_MS = 60_000;
export const MAX_REPETITIONS = 1000;

export const DEFAULT_SCHEDULE: Schedule = Object.freeze({
  repetitions: 4,
  workMs: 45 * MINUTE_MS,
  breakMs: 10 * MINUTE_MS
});

const UNIT_MS: Record<string, number> = {
  h: 60 * MINUTE_MS,
  m: MINUTE_MS,
  s: 1000
};

const DEFINITION_PATTERN = /^(\d+)?(?:p(\d+)([a-z]*))?(?:b(\d+)([a-z]*))?$/;

export function parseSchedule(definition: string): Schedule {
  const normalized = definition.trim().toLowerCase();
  if (!normalized) {
    return DEFAULT_SCHEDULE;
  }

  const match = DEFINITION_PATTERN.exec(normalized);
  if (!match) {
    throw new ParseError("invalid_format", `Could not parse schedule "${definition}". Expected something like 4p45b10.`);
  }

  const [, repetitionsText, workText, workUnit, breakText, breakUnit] = match;
  const repetitions = repetitionsText === undefined ? DEFAULT_SCHEDULE.repetitions : toInteger(repetitionsText, definition);
  const workMs = workText === undefined ? DEFAULT_SCHEDULE.workMs : toDurationMs(workText, workUnit, definition);
  const breakMs = breakText === undefined ? DEFAULT_SCHEDULE.breakMs : toDurationMs(breakText, breakUnit, definition);

  if (repetitions === 0) {
    throw new ParseError("zero_duration", "A pomodoro needs at least one repetition.");
  }
  if (workMs === 0) {
    throw new ParseError("zero_duration", "Work intervals must be longer than zero.");
  }
  if (repetitions > MAX_REPETITIONS) {
    throw new ParseError("invalid_format", `A pomodoro has at most ${MAX_REPETITIONS} repetitions.`);
  }

  const schedule = createSchedule(repetitions, workMs, breakMs);
  if (!Number.isSafeInteger(scheduleSpanMs(schedule))) {
    throw new ParseError("invalid_format", `Schedule "${definition}" is too long.`);
  }
  return schedule;
}

export function createSchedule(repetitions: number, workMs: number, breakMs: number): Schedule {
  return Object.freeze({ repetitions, workMs, breakMs });
}

export function formatSchedule(schedule: Schedule): string {
  return `${schedule.repetitions}p${formatDurationToken(schedule.workMs)}b${formatDurationToken(schedule.breakMs)}`;
}

export function scheduleSpanMs(schedule: Schedule): number {
  return schedule.repetitions * schedule.workMs + (schedule.repetitions - 1) * schedule.breakMs;
}

function formatDurationToken(ms: number): string {
  if (ms % MINUTE_MS === 0) {
    return String(ms / MINUTE_MS);
  }
  return `${Math.round(ms / 1000)}s`;
}

function toInteger(text: string, definition: string): number {
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new ParseError("invalid_format", `Number "${text}" in "${definition}" is out of range.`);
  }
  return value;
}

function toDurationMs(text: string, unit: string | undefined, definition: string): number {
  const multiplier = unit ? UNIT_MS[unit] : MINUTE_MS;
  if (multiplier === undefined) {
    throw new ParseError("invalid_format", `Unknown duration unit "${unit}" in "${definition}". Use h, m or s.`);
  }
  const ms = toInteger(text, definition) * multiplier;
  if (!Number.isSafeInteger(ms)) {
    throw new ParseError("invalid_format", `Duration "${text}${unit ?? ""}" in "${definition}" is out of range.`);
  }
  return ms;
}
