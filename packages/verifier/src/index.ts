export { BotTester, createBotTesterFromEnv } from "./tester.js";
export type { BotTesterOptions, RunOptions } from "./tester.js";
export {
  TestConfigSchema,
  parseTestConfig,
  loadTestConfigFromEnv,
  toTimings,
} from "./config.js";
export type { TestConfig, TestConfigInput, Timings } from "./config.js";
export type { MessageId, RawMessage, TriggerChannel } from "./channel.js";
export { MemoryChannel } from "./channels/memory.js";
export type { MemoryChannelOptions, PostHandler } from "./channels/memory.js";
export {
  EXHAUSTED_DETAIL,
  POST_FAILED_DETAIL,
  createResponse,
  finalizeResponse,
  exhaustedResponse,
  isValidated,
} from "./response.js";
export type { BotResponse, ValidationOutcome } from "./response.js";
export {
  ERROR_KEYWORDS,
  SUCCESS_KEYWORDS,
  containsText,
  noErrorKeywords,
  hasSuccessIndicators,
  custom,
  runValidators,
  validateResponse,
} from "./validators.js";
export type { Validator, ValidatorKind } from "./validators.js";
export { pollUntil, selectResponse, waitForResponse } from "./poller.js";
export type {
  PollerConfig,
  PollResult,
  PollHooks,
  WaitForResponseOptions,
} from "./poller.js";
export {
  STATES,
  createRetryMachine,
  buildReport,
  cleanupTargets,
} from "./machine.js";
export type {
  AttemptOutcome,
  AttemptRecord,
  RetryContext,
  RetryMachineInput,
  RetryServices,
  RetryState,
  RunReport,
} from "./machine.js";
export {
  ChannelUnavailableError,
  ConfigurationError,
  describeError,
  isChannelUnavailable,
} from "./errors.js";
export type { ChannelOperation } from "./errors.js";
export { consoleLogger, actionsLogger, silentLogger } from "./logging.js";
export type { Logger } from "./logging.js";
export { systemClock } from "./clock.js";
export type { Clock } from "./clock.js";
