/**
 * Test configuration.
 *
 * Validated with Zod once per run; an invalid configuration fails fast with a
 * ConfigurationError before anything is posted.
 */

import { z } from "zod";
import { parseEnv } from "znv";
import { ConfigurationError, describeError } from "./errors.js";

/**
 * Schema for a verification run
 */
export const TestConfigSchema = z
  .object({
    /** Author identity of the automated responder to watch for */
    responderIdentity: z.string().min(1, "Responder identity is required"),
    /** Identity of the channel the trigger is posted to */
    channelIdentity: z.string().min(1, "Channel identity is required"),
    /** Maximum wait per attempt */
    maxWaitSeconds: z.number().int().positive().default(120),
    /** Delay between channel reads while waiting */
    pollIntervalSeconds: z.number().int().positive().default(5),
    /** Total attempts, including the first */
    maxRetries: z.number().int().min(1).default(3),
    /** Delay before the next attempt after a failure */
    retryDelaySeconds: z.number().int().min(0).default(60),
    /** Delete the trigger and reply of a failed attempt */
    autoDeleteOnFailure: z.boolean().default(true),
  })
  .strict()
  .refine((config) => config.pollIntervalSeconds <= config.maxWaitSeconds, {
    message: "Poll interval must not exceed max wait",
    path: ["pollIntervalSeconds"],
  });

export type TestConfigInput = z.input<typeof TestConfigSchema>;
export type TestConfig = Readonly<z.output<typeof TestConfigSchema>>;

/**
 * Millisecond timings derived from a TestConfig
 */
export interface Timings {
  maxWaitMs: number;
  pollIntervalMs: number;
  retryDelayMs: number;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a configuration and apply defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseTestConfig(input: unknown): TestConfig {
  const result = TestConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid test configuration",
      formatIssues(result.error),
    );
  }
  return Object.freeze(result.data);
}

function readEnv(env: Record<string, string | undefined>) {
  return parseEnv(env, {
    BOTCHECK_RESPONDER: z.string().min(1),
    BOTCHECK_CHANNEL: z.string().min(1),
    BOTCHECK_MAX_WAIT_SECONDS: z.number().int().optional(),
    BOTCHECK_POLL_INTERVAL_SECONDS: z.number().int().optional(),
    BOTCHECK_MAX_RETRIES: z.number().int().optional(),
    BOTCHECK_RETRY_DELAY_SECONDS: z.number().int().optional(),
    BOTCHECK_AUTO_DELETE_ON_FAILURE: z.boolean().optional(),
  });
}

/**
 * Load a configuration from `BOTCHECK_*` environment variables.
 * Unset optional variables fall back to the schema defaults.
 */
export function loadTestConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): TestConfig {
  let raw: ReturnType<typeof readEnv>;
  try {
    raw = readEnv(env);
  } catch (error) {
    throw new ConfigurationError("Invalid environment", [
      describeError(error),
    ]);
  }

  return parseTestConfig({
    responderIdentity: raw.BOTCHECK_RESPONDER,
    channelIdentity: raw.BOTCHECK_CHANNEL,
    maxWaitSeconds: raw.BOTCHECK_MAX_WAIT_SECONDS,
    pollIntervalSeconds: raw.BOTCHECK_POLL_INTERVAL_SECONDS,
    maxRetries: raw.BOTCHECK_MAX_RETRIES,
    retryDelaySeconds: raw.BOTCHECK_RETRY_DELAY_SECONDS,
    autoDeleteOnFailure: raw.BOTCHECK_AUTO_DELETE_ON_FAILURE,
  });
}

export function toTimings(config: TestConfig): Timings {
  return {
    maxWaitMs: config.maxWaitSeconds * 1000,
    pollIntervalMs: config.pollIntervalSeconds * 1000,
    retryDelayMs: config.retryDelaySeconds * 1000,
  };
}
