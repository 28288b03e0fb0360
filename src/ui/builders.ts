import { format, parseISO } from "date-fns";
import { projectedEnd } from "../clock.js";
import { formatSchedule } from "../schedule.js";
import type { ClockSnapshot, Phase, TimerState } from "../types.js";

const FILE_LABELS: Record<Phase, string> = {
  work: "Work",
  break: "Break",
  finished: "Done"
};

export const FINISHED_STATUS = "pomodoro finished";
export const FINISHED_FILE = "Done!";
export const IDLE_STATUS = "idle: no pomodoro running";

export function formatClock(ms: number): string {
  const totalSeconds = Math.max(Math.ceil(ms / 1000), 0);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(Math.round(ms / 1000), 0);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours} hour${hours === 1 ? "" : "s"}`;
  }
  if (minutes > 0 && seconds > 0) {
    return `${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes === 1 ? "" : "s"}`;
  }
  return `${seconds} second${seconds === 1 ? "" : "s"}`;
}

export function renderStatus(snapshot: ClockSnapshot): string {
  if (snapshot.phase === "finished") {
    return FINISHED_STATUS;
  }
  const line = `${snapshot.phase} ${formatClock(snapshot.remainingMs)} (next: ${snapshot.nextPhase}) ${snapshot.repetition}/${snapshot.totalRepetitions}`;
  return snapshot.isPaused ? `${line} [paused]` : line;
}

export function renderFile(snapshot: ClockSnapshot): string {
  if (snapshot.phase === "finished") {
    return FINISHED_FILE;
  }
  const line = `${FILE_LABELS[snapshot.phase]} ${formatClock(snapshot.remainingMs)} ${snapshot.repetition}/${snapshot.totalRepetitions}`;
  return snapshot.isPaused ? `${line} (paused)` : line;
}

export function renderIdle(): string {
  return IDLE_STATUS;
}

export function renderInfo(state: TimerState, snapshot: ClockSnapshot, now: Date): string {
  const { repetitions, workMs, breakMs } = state.schedule;
  const pausedMs = state.totalPausedMs + (state.pausedAt ? Math.max(now.getTime() - parseISO(state.pausedAt).getTime(), 0) : 0);
  const lines = [
    `Schedule:  ${formatSchedule(state.schedule)} (${repetitions} × ${formatDuration(workMs)} work, ${formatDuration(breakMs)} break)`,
    `Run:       ${state.id}`,
    `Started:   ${formatTimestamp(state.startedAt)}`,
    `Ends:      ${snapshot.phase === "finished" ? "finished" : format(projectedEnd(state, now), "yyyy-MM-dd HH:mm:ss")}`,
    `Elapsed:   ${formatDuration(snapshot.elapsedMs)}`,
    `Paused:    ${formatDuration(pausedMs)}`,
    `Status:    ${renderStatus(snapshot)}`
  ];
  if (state.pausedAt) {
    lines.push(`Paused at: ${formatTimestamp(state.pausedAt)}`);
  }
  return lines.join("\n");
}

function formatTimestamp(iso: string): string {
  return format(parseISO(iso), "yyyy-MM-dd HH:mm:ss");
}
