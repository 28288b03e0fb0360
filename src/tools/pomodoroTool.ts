import { z } from "zod";
import { evaluate } from "../clock.js";
import { StateError } from "../errors.js";
import { formatSchedule, parseSchedule } from "../schedule.js";
import { parseClockTime, solveUntil } from "../solver.js";
import { PomodoroStore } from "../state/timerStore.js";
import type { CommandResult } from "../types.js";
import { formatDuration, renderIdle, renderInfo, renderStatus } from "../ui/builders.js";

export const startInput = z.object({
  definition: z.string().max(64).default(""),
  until: z.string().min(1).optional()
});

export class PomodoroToolset {
  constructor(private readonly store: PomodoroStore) {}

  async start(input: z.input<typeof startInput>, now = new Date()): Promise<CommandResult> {
    const parsed = startInput.parse(input);
    const base = parseSchedule(parsed.definition);
    const schedule = parsed.until ? solveUntil(base, now, parseClockTime(parsed.until, now)) : base;

    const state = await this.store.start({ schedule }, now);
    const snapshot = evaluate(state, now);
    return {
      message: `Started ${formatSchedule(schedule)}: ${renderStatus(snapshot)}`,
      state,
      snapshot
    };
  }

  async status(now = new Date()): Promise<CommandResult> {
    const state = await this.store.current();
    if (!state) {
      return { message: renderIdle() };
    }
    const snapshot = evaluate(state, now);
    return { message: renderStatus(snapshot), state, snapshot };
  }

  async pause(now = new Date()): Promise<CommandResult> {
    const state = await this.store.pause(now);
    const snapshot = evaluate(state, now);
    return { message: `Paused: ${renderStatus(snapshot)}`, state, snapshot };
  }

  async unpause(now = new Date()): Promise<CommandResult> {
    const state = await this.store.unpause(now);
    const snapshot = evaluate(state, now);
    return {
      message: `Resumed (${formatDuration(state.totalPausedMs)} paused in total): ${renderStatus(snapshot)}`,
      state,
      snapshot
    };
  }

  async stop(now = new Date()): Promise<CommandResult> {
    const state = await this.store.stop();
    const snapshot = evaluate(state, now);
    return {
      message: `Stopped ${formatSchedule(state.schedule)} at ${snapshot.repetition}/${snapshot.totalRepetitions}.`,
      state,
      snapshot
    };
  }

  async info(now = new Date()): Promise<CommandResult> {
    const state = await this.store.current();
    if (!state) {
      throw new StateError("not_running");
    }
    const snapshot = evaluate(state, now);
    return { message: renderInfo(state, snapshot, now), state, snapshot };
  }
}
