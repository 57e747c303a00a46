/**
 * Fixed-interval polling utility and the responder wait built on it
 */

import type { MessageId, RawMessage, TriggerChannel } from "./channel.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { Logger } from "./logging.js";
import { consoleLogger } from "./logging.js";
import type { BotResponse } from "./response.js";
import { createResponse } from "./response.js";
import { describeError, isChannelUnavailable } from "./errors.js";

/**
 * Configuration for the poller
 */
export interface PollerConfig {
  /** Delay between fetches in milliseconds */
  intervalMs: number;
  /** Total timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Result from polling operation
 */
export interface PollResult<T> {
  /** Whether the condition was met before timeout */
  success: boolean;
  /** The final data from the fetch function */
  data: T | null;
  /** Number of poll attempts made */
  attempts: number;
  /** Total time spent polling in milliseconds */
  totalTimeMs: number;
}

/**
 * Optional collaborators for a poll loop
 */
export interface PollHooks<T> {
  clock?: Clock;
  /** Called after each successful fetch */
  onPoll?: (data: T, attempt: number, elapsed: number) => void;
  /** Called when a fetch throws; the loop keeps polling */
  onError?: (error: unknown, attempt: number, elapsed: number) => void;
}

/**
 * Poll until a condition is met or timeout
 *
 * A fetch that throws counts as "not yet". The loop never sleeps past the
 * timeout.
 */
export async function pollUntil<T>(
  fetchFn: () => Promise<T>,
  conditionFn: (data: T) => boolean,
  config: PollerConfig,
  hooks: PollHooks<T> = {},
): Promise<PollResult<T>> {
  const clock = hooks.clock ?? systemClock;
  const startTime = clock.now();
  let attempts = 0;
  let lastData: T | null = null;

  while (clock.now() - startTime < config.timeoutMs) {
    attempts++;

    try {
      const data = await fetchFn();
      lastData = data;

      if (hooks.onPoll) {
        hooks.onPoll(data, attempts, clock.now() - startTime);
      }

      if (conditionFn(data)) {
        return {
          success: true,
          data,
          attempts,
          totalTimeMs: clock.now() - startTime,
        };
      }
    } catch (error) {
      if (hooks.onError) {
        hooks.onError(error, attempts, clock.now() - startTime);
      }
    }

    const remainingTime = config.timeoutMs - (clock.now() - startTime);
    if (remainingTime <= 0) {
      break;
    }

    await clock.sleep(Math.min(config.intervalMs, remainingTime));
  }

  return {
    success: false,
    data: lastData,
    attempts,
    totalTimeMs: clock.now() - startTime,
  };
}

/**
 * Pick the earliest message by `responder` after the watermark.
 * Messages from anyone else are ignored, however early they arrive.
 */
export function selectResponse(
  messages: readonly RawMessage[],
  watermark: MessageId,
  responder: string,
): RawMessage | null {
  let earliest: RawMessage | null = null;
  for (const message of messages) {
    if (message.id <= watermark || message.author !== responder) {
      continue;
    }
    if (earliest === null || message.id < earliest.id) {
      earliest = message;
    }
  }
  return earliest;
}

export interface WaitForResponseOptions {
  /** Only messages after this id count */
  watermark: MessageId;
  /** Author identity of the responder */
  responder: string;
  timeoutMs: number;
  intervalMs: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Wait for the responder to reply after the watermark.
 *
 * @returns the pending response, or null on timeout
 */
export async function waitForResponse(
  channel: TriggerChannel,
  options: WaitForResponseOptions,
): Promise<BotResponse | null> {
  const { watermark, responder, timeoutMs, intervalMs } = options;
  const logger = options.logger ?? consoleLogger;

  logger.info(`Waiting up to ${timeoutMs / 1000}s for @${responder} response`);

  const result = await pollUntil(
    async () =>
      selectResponse(await channel.listSince(watermark), watermark, responder),
    (message) => message !== null,
    { intervalMs, timeoutMs },
    {
      clock: options.clock,
      onError: (error) => {
        if (isChannelUnavailable(error)) {
          logger.warning(`Channel unavailable while polling: ${error.message}`);
        } else {
          logger.error(`Error polling channel: ${describeError(error)}`);
        }
      },
    },
  );

  if (result.success && result.data) {
    logger.info(
      `@${responder} responded after ${(result.totalTimeMs / 1000).toFixed(1)}s`,
    );
    return createResponse(result.data, result.totalTimeMs);
  }

  logger.warning(
    `Timeout after ${timeoutMs / 1000}s waiting for @${responder} response`,
  );
  return null;
}
