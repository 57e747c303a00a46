/**
 * Test doubles shared across suites
 */

import type { Clock } from "../src/clock.js";
import type { Logger } from "../src/logging.js";
import type { BotResponse } from "../src/response.js";
import { createResponse } from "../src/response.js";

export interface ManualClock extends Clock {
  /** Every duration passed to sleep, in order */
  readonly sleeps: number[];
  /** Run `listener` after each sleep advances the time */
  onSleep(listener: (now: number) => void): void;
}

/**
 * Clock whose sleep advances time instantly
 */
export function createManualClock(start = 0): ManualClock {
  let current = start;
  const sleeps: number[] = [];
  const listeners: Array<(now: number) => void> = [];

  return {
    sleeps,
    now: () => current,
    sleep: async (ms) => {
      sleeps.push(ms);
      current += ms;
      for (const listener of listeners) {
        listener(current);
      }
    },
    onSleep: (listener) => {
      listeners.push(listener);
    },
  };
}

export type LogLevel = keyof Logger;

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export function createRecordingLogger() {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };

  const logger: Logger = {
    debug: record("debug"),
    info: record("info"),
    warning: record("warning"),
    error: record("error"),
  };

  return {
    logger,
    entries,
    messages: (level: LogLevel) =>
      entries.filter((entry) => entry.level === level).map((e) => e.message),
  };
}

export function makeResponse(body: string, id = 2): BotResponse {
  return createResponse(
    { id, author: "bot", body, createdAt: new Date(0) },
    0,
  );
}
