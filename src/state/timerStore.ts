import { differenceInMilliseconds, parseISO } from "date-fns";
import { v4 as uuid } from "uuid";
import { StateError } from "../errors.js";
import type { Schedule, TimerState } from "../types.js";
import type { TimerStorage } from "./timerStorage.js";

export class PomodoroStore {
  constructor(private readonly storage: TimerStorage) {}

  current(): Promise<TimerState | undefined> {
    return this.storage.load();
  }

  async start(input: { schedule: Schedule }, now = new Date()): Promise<TimerState> {
    if (await this.storage.load()) {
      throw new StateError("already_running");
    }

    const state: TimerState = {
      id: uuid(),
      schedule: input.schedule,
      startedAt: now.toISOString(),
      totalPausedMs: 0
    };
    await this.storage.save(state);
    return state;
  }

  async pause(now = new Date()): Promise<TimerState> {
    const state = await this.requireState();
    if (state.pausedAt) {
      throw new StateError("already_paused");
    }

    const updated: TimerState = {
      ...state,
      pausedAt: now.toISOString()
    };
    await this.storage.save(updated);
    return updated;
  }

  async unpause(now = new Date()): Promise<TimerState> {
    const { pausedAt, ...rest } = await this.requireState();
    if (!pausedAt) {
      throw new StateError("not_paused");
    }

    const pausedFor = Math.max(differenceInMilliseconds(now, parseISO(pausedAt)), 0);
    const updated: TimerState = {
      ...rest,
      totalPausedMs: rest.totalPausedMs + pausedFor
    };
    await this.storage.save(updated);
    return updated;
  }

  async stop(): Promise<TimerState> {
    const state = await this.requireState();
    if (!(await this.storage.delete())) {
      throw new StateError("not_running");
    }
    return state;
  }

  private async requireState(): Promise<TimerState> {
    const state = await this.storage.load();
    if (!state) {
      throw new StateError("not_running");
    }
    return state;
  }
}
