/**
 * Bot tester: drives verification runs against a trigger channel.
 *
 * Usage:
 *   const tester = new BotTester(
 *     { responderIdentity: "deploy-bot", channelIdentity: "ops#42" },
 *     channel,
 *   );
 *   const passed = await tester.runSimple("@deploy-bot ship it");
 */

import { createActor, waitFor } from "xstate";
import type { MessageId, TriggerChannel } from "./channel.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { TestConfig, TestConfigInput, Timings } from "./config.js";
import { loadTestConfigFromEnv, parseTestConfig, toTimings } from "./config.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logging.js";
import { consoleLogger } from "./logging.js";
import type { RunReport } from "./machine.js";
import { buildReport, createRetryMachine } from "./machine.js";
import { waitForResponse } from "./poller.js";
import type { BotResponse } from "./response.js";
import type { Validator } from "./validators.js";
import {
  hasSuccessIndicators,
  noErrorKeywords,
  validateResponse,
} from "./validators.js";

export interface BotTesterOptions {
  logger?: Logger;
  clock?: Clock;
}

export interface RunOptions {
  /** Overrides the configured cleanup policy for this run */
  autoDeleteOnFailure?: boolean;
}

export class BotTester {
  readonly config: TestConfig;

  private readonly channel: TriggerChannel;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly timings: Timings;

  /**
   * @throws ConfigurationError if the configuration is invalid
   */
  constructor(
    config: TestConfigInput,
    channel: TriggerChannel,
    options: BotTesterOptions = {},
  ) {
    this.config = parseTestConfig(config);
    this.timings = toTimings(this.config);
    this.channel = channel;
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Post a trigger message.
   * Channel errors propagate; the retry loop turns them into attempt failures.
   */
  async postTrigger(body: string): Promise<MessageId> {
    const id = await this.channel.post(body);
    this.logger.info(
      `Posted trigger message ${id} to ${this.config.channelIdentity}`,
    );
    return id;
  }

  /**
   * Wait for the responder to reply after `sinceId`.
   *
   * @param timeoutSeconds - overrides the configured max wait; anything but a
   *   positive finite number falls back to it
   * @returns the pending response, or null on timeout
   */
  waitForResponse(
    sinceId: MessageId,
    timeoutSeconds?: number,
  ): Promise<BotResponse | null> {
    const hasOverride =
      timeoutSeconds !== undefined &&
      Number.isFinite(timeoutSeconds) &&
      timeoutSeconds > 0;

    return waitForResponse(this.channel, {
      watermark: sinceId,
      responder: this.config.responderIdentity,
      timeoutMs: hasOverride ? timeoutSeconds * 1000 : this.timings.maxWaitMs,
      intervalMs: this.timings.pollIntervalMs,
      clock: this.clock,
      logger: this.logger,
    });
  }

  validate(response: BotResponse, validators: readonly Validator[]): BotResponse {
    return validateResponse(response, validators);
  }

  /**
   * Delete a message. Never throws; failures are logged and reported as false.
   */
  async deleteMessage(id: MessageId): Promise<boolean> {
    try {
      const removed = await this.channel.delete(id);
      if (removed) {
        this.logger.info(`Deleted message ${id}`);
      } else {
        this.logger.warning(`Message ${id} was already gone`);
      }
      return removed;
    } catch (error) {
      this.logger.error(
        `Failed to delete message ${id}: ${describeError(error)}`,
      );
      return false;
    }
  }

  /**
   * Run up to `maxRetries` attempts and report every one of them.
   * Runtime failures end up in the report, never thrown.
   */
  async run(
    triggerBody: string,
    validators: readonly Validator[],
    options: RunOptions = {},
  ): Promise<RunReport> {
    const machine = createRetryMachine({
      postTrigger: (body) => this.postTrigger(body),
      waitForResponse: (watermark) => this.waitForResponse(watermark),
      validate: (response) => this.validate(response, validators),
      cleanUp: (ids) => this.cleanUp(ids),
      sleep: (ms) => this.clock.sleep(ms),
      logger: this.logger,
    });

    const actor = createActor(machine, {
      input: {
        triggerBody,
        responder: this.config.responderIdentity,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.timings.retryDelayMs,
        autoDeleteOnFailure:
          options.autoDeleteOnFailure ?? this.config.autoDeleteOnFailure,
      },
    });

    actor.subscribe((snapshot) => {
      this.logger.debug(`[state] ${String(snapshot.value)}`);
    });

    actor.start();
    const finalSnapshot = await waitFor(actor, (s) => s.status === "done");

    return buildReport(finalSnapshot.context, new Date(this.clock.now()));
  }

  /**
   * Run with retries and return the final response.
   * Inspect `passed` and `error` on the result.
   */
  async runWithRetry(
    triggerBody: string,
    validators: readonly Validator[],
    options: RunOptions = {},
  ): Promise<BotResponse> {
    const report = await this.run(triggerBody, validators, options);
    return report.response;
  }

  /**
   * Expect a clean reply, plus success indicators when `expectSuccess`.
   */
  async runSimple(triggerBody: string, expectSuccess = true): Promise<boolean> {
    const validators: Validator[] = [noErrorKeywords];
    if (expectSuccess) {
      validators.push(hasSuccessIndicators);
    }

    const response = await this.runWithRetry(triggerBody, validators);
    return response.passed === true;
  }

  private async cleanUp(ids: MessageId[]): Promise<MessageId[]> {
    const deleted: MessageId[] = [];
    for (const id of ids) {
      if (await this.deleteMessage(id)) {
        deleted.push(id);
      }
    }
    return deleted;
  }
}

/**
 * Build a tester from `BOTCHECK_*` environment variables.
 */
export function createBotTesterFromEnv(
  channel: TriggerChannel,
  env: Record<string, string | undefined> = process.env,
  options: BotTesterOptions = {},
): BotTester {
  return new BotTester(loadTestConfigFromEnv(env), channel, options);
}
