/**
 * Retry state machine.
 *
 * One pass through posting → waiting → validating is an attempt. A failed
 * attempt goes through cleanup and a backoff before the next one, until
 * either a response passes or the attempts run out.
 *
 * Side effects are invoked fromPromise services, so attempts are strictly
 * sequential: the next trigger is never posted while a wait is outstanding.
 */

import { assign, fromPromise, setup } from "xstate";
import type { MessageId } from "./channel.js";
import type { Logger } from "./logging.js";
import type { BotResponse } from "./response.js";
import {
  EXHAUSTED_DETAIL,
  POST_FAILED_DETAIL,
  exhaustedResponse,
} from "./response.js";
import { describeError } from "./errors.js";

export const STATES = {
  posting: "posting",
  waiting: "waiting",
  validating: "validating",
  attemptFailed: "attemptFailed",
  cleaningUp: "cleaningUp",
  deciding: "deciding",
  backingOff: "backingOff",
  passed: "passed",
  exhausted: "exhausted",
} as const;

export type RetryState = (typeof STATES)[keyof typeof STATES];

export type AttemptOutcome = "passed" | "failed" | "timeout" | "post_failed";

/**
 * Log entry for one attempt
 */
export interface AttemptRecord {
  /** 1-based attempt number */
  readonly attempt: number;
  /** Trigger message id, null if the post failed */
  readonly triggerId: MessageId | null;
  /** Validated response, if one was observed */
  readonly response: BotResponse | null;
  readonly outcome: AttemptOutcome;
  /** Ids removed while cleaning up after a failure */
  readonly deleted: readonly MessageId[];
}

/**
 * Final result of a run
 */
export interface RunReport {
  readonly response: BotResponse;
  readonly attempts: readonly AttemptRecord[];
}

/**
 * Side effects the machine invokes
 */
export interface RetryServices {
  postTrigger(body: string): Promise<MessageId>;
  /** Resolves null on timeout */
  waitForResponse(watermark: MessageId): Promise<BotResponse | null>;
  validate(response: BotResponse): BotResponse;
  /** Best-effort deletion; resolves the ids actually removed */
  cleanUp(ids: MessageId[]): Promise<MessageId[]>;
  sleep(ms: number): Promise<void>;
  logger: Logger;
}

export interface RetryMachineInput {
  triggerBody: string;
  responder: string;
  maxRetries: number;
  retryDelayMs: number;
  autoDeleteOnFailure: boolean;
}

export interface RetryContext extends RetryMachineInput {
  attempt: number;
  triggerId: MessageId | null;
  /** Id of the most recently posted trigger; replies are looked for after it */
  watermark: MessageId;
  /** Response of the current attempt */
  response: BotResponse | null;
  /** Most recent validated response across all attempts */
  lastResponse: BotResponse | null;
  attempts: AttemptRecord[];
}

function recordAttempt(
  context: RetryContext,
  outcome: AttemptOutcome,
): AttemptRecord[] {
  return [
    ...context.attempts,
    {
      attempt: context.attempt,
      triggerId: context.triggerId,
      response: context.response,
      outcome,
      deleted: [],
    },
  ];
}

function markDeleted(
  attempts: AttemptRecord[],
  deleted: MessageId[],
): AttemptRecord[] {
  const last = attempts[attempts.length - 1];
  if (!last) {
    return attempts;
  }
  return [...attempts.slice(0, -1), { ...last, deleted }];
}

/**
 * Messages left behind by the current attempt: the trigger, then the reply
 */
export function cleanupTargets(context: RetryContext): MessageId[] {
  const ids: MessageId[] = [];
  if (context.triggerId !== null) {
    ids.push(context.triggerId);
  }
  if (context.response !== null) {
    ids.push(context.response.id);
  }
  return ids;
}

/**
 * Build the run report from a finished machine's context.
 *
 * A passing response wins; otherwise the last observed (failed) response;
 * otherwise a synthetic failure.
 */
export function buildReport(context: RetryContext, now: Date): RunReport {
  const attempts = context.attempts;

  if (context.response?.passed === true) {
    return { response: context.response, attempts };
  }
  if (context.lastResponse) {
    return { response: context.lastResponse, attempts };
  }

  const last = attempts[attempts.length - 1];
  const detail =
    last?.outcome === "post_failed" ? POST_FAILED_DETAIL : EXHAUSTED_DETAIL;
  return { response: exhaustedResponse(detail, now), attempts };
}

export function createRetryMachine(services: RetryServices) {
  const { logger } = services;

  return setup({
    types: {
      context: {} as RetryContext,
      input: {} as RetryMachineInput,
    },
    actors: {
      postTrigger: fromPromise<MessageId, { body: string }>(({ input }) =>
        services.postTrigger(input.body),
      ),
      pollResponse: fromPromise<BotResponse | null, { watermark: MessageId }>(
        ({ input }) => services.waitForResponse(input.watermark),
      ),
      cleanUp: fromPromise<MessageId[], { ids: MessageId[] }>(({ input }) =>
        services.cleanUp(input.ids),
      ),
      backOff: fromPromise<void, { delayMs: number }>(({ input }) =>
        services.sleep(input.delayMs),
      ),
    },
    guards: {
      responsePassed: ({ context }) => context.response?.passed === true,
      shouldCleanUp: ({ context }) =>
        context.autoDeleteOnFailure && cleanupTargets(context).length > 0,
      hasAttemptsLeft: ({ context }) => context.attempt < context.maxRetries,
    },
  }).createMachine({
    id: "retry",
    initial: STATES.posting,
    context: ({ input }) => ({
      ...input,
      attempt: 0,
      triggerId: null,
      watermark: 0,
      response: null,
      lastResponse: null,
      attempts: [],
    }),

    states: {
      [STATES.posting]: {
        entry: [
          assign({
            attempt: ({ context }) => context.attempt + 1,
            triggerId: null,
            response: null,
          }),
          ({ context }) =>
            logger.info(
              `Test attempt ${context.attempt}/${context.maxRetries}`,
            ),
        ],
        invoke: {
          src: "postTrigger",
          input: ({ context }) => ({ body: context.triggerBody }),
          onDone: {
            target: STATES.waiting,
            actions: assign({
              triggerId: ({ event }) => event.output,
              watermark: ({ event }) => event.output,
            }),
          },
          onError: {
            target: STATES.attemptFailed,
            actions: [
              ({ event }) =>
                logger.error(
                  `Failed to post trigger: ${describeError(event.error)}`,
                ),
              assign({
                attempts: ({ context }) =>
                  recordAttempt(context, "post_failed"),
              }),
            ],
          },
        },
      },

      [STATES.waiting]: {
        invoke: {
          src: "pollResponse",
          input: ({ context }) => ({ watermark: context.watermark }),
          onDone: [
            {
              guard: ({ event }) => event.output === null,
              target: STATES.attemptFailed,
              actions: [
                ({ context }) =>
                  logger.warning(`No response from @${context.responder}`),
                assign({
                  attempts: ({ context }) => recordAttempt(context, "timeout"),
                }),
              ],
            },
            {
              target: STATES.validating,
              actions: assign({ response: ({ event }) => event.output }),
            },
          ],
          onError: {
            target: STATES.attemptFailed,
            actions: [
              ({ event }) =>
                logger.error(
                  `Waiting for a response failed: ${describeError(event.error)}`,
                ),
              assign({
                attempts: ({ context }) => recordAttempt(context, "timeout"),
              }),
            ],
          },
        },
      },

      [STATES.validating]: {
        entry: assign(({ context }) => {
          const response =
            context.response && services.validate(context.response);
          return {
            response,
            lastResponse: response ?? context.lastResponse,
          };
        }),
        always: [
          { guard: "responsePassed", target: STATES.passed },
          {
            target: STATES.attemptFailed,
            actions: [
              ({ context }) =>
                logger.warning(
                  `Test failed: ${context.response?.error ?? "no detail"}`,
                ),
              assign({
                attempts: ({ context }) => recordAttempt(context, "failed"),
              }),
            ],
          },
        ],
      },

      [STATES.attemptFailed]: {
        always: [
          { guard: "shouldCleanUp", target: STATES.cleaningUp },
          { target: STATES.deciding },
        ],
      },

      [STATES.cleaningUp]: {
        invoke: {
          src: "cleanUp",
          input: ({ context }) => ({ ids: cleanupTargets(context) }),
          onDone: {
            target: STATES.deciding,
            actions: assign({
              attempts: ({ context, event }) =>
                markDeleted(context.attempts, event.output),
            }),
          },
          onError: {
            target: STATES.deciding,
            actions: ({ event }) =>
              logger.error(`Cleanup failed: ${describeError(event.error)}`),
          },
        },
      },

      [STATES.deciding]: {
        always: [
          { guard: "hasAttemptsLeft", target: STATES.backingOff },
          { target: STATES.exhausted },
        ],
      },

      [STATES.backingOff]: {
        entry: ({ context }) =>
          logger.info(`Retrying in ${context.retryDelayMs / 1000}s`),
        invoke: {
          src: "backOff",
          input: ({ context }) => ({ delayMs: context.retryDelayMs }),
          onDone: STATES.posting,
          onError: STATES.posting,
        },
      },

      [STATES.passed]: {
        type: "final",
        entry: [
          assign({
            attempts: ({ context }) => recordAttempt(context, "passed"),
          }),
          () => logger.info("Test passed"),
        ],
      },

      [STATES.exhausted]: {
        type: "final",
        entry: ({ context }) =>
          logger.error(`Test failed after ${context.maxRetries} attempts`),
      },
    },
  });
}
