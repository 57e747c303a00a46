/**
 * Response model.
 *
 * A response is frozen when first observed and finalized exactly once, when
 * validation attaches its outcome.
 */

import type { MessageId, RawMessage } from "./channel.js";

export const EXHAUSTED_DETAIL = "all retry attempts exhausted";
export const POST_FAILED_DETAIL = "trigger post failed";

/**
 * One observed reply from the responder
 */
export interface BotResponse {
  /** Message identity; 0 for a synthetic response */
  readonly id: MessageId;
  readonly body: string;
  readonly createdAt: Date;
  readonly author: string;
  /** Time from the start of the wait to the observation */
  readonly elapsedMs: number;
  /** null until validated */
  readonly passed: boolean | null;
  /** Aggregated failure detail, set only when the response failed */
  readonly error: string | null;
}

/**
 * Outcome attached by validation
 */
export interface ValidationOutcome {
  passed: boolean;
  failures: string[];
}

export function createResponse(
  message: RawMessage,
  elapsedMs: number,
): BotResponse {
  return Object.freeze({
    id: message.id,
    body: message.body,
    createdAt: message.createdAt,
    author: message.author,
    elapsedMs,
    passed: null,
    error: null,
  });
}

export function isValidated(response: BotResponse): boolean {
  return response.passed !== null;
}

/**
 * Attach a validation outcome, producing the final record.
 *
 * @throws Error if the response was already validated
 */
export function finalizeResponse(
  response: BotResponse,
  outcome: ValidationOutcome,
): BotResponse {
  if (isValidated(response)) {
    throw new Error(`Response ${response.id} has already been validated`);
  }
  return Object.freeze({
    ...response,
    passed: outcome.passed,
    error: outcome.failures.length > 0 ? outcome.failures.join("; ") : null,
  });
}

/**
 * Failing response returned when no attempt observed a reply.
 */
export function exhaustedResponse(
  detail: string,
  createdAt: Date,
): BotResponse {
  return Object.freeze({
    id: 0,
    body: "",
    createdAt,
    author: "",
    elapsedMs: 0,
    passed: false,
    error: detail,
  });
}
