/**
 * Response validators.
 *
 * Each validator is a tagged strategy object. A set of them is composed with
 * strict AND; every failing name is reported, and a validator that throws
 * counts as failing instead of aborting the run.
 */

import type { BotResponse, ValidationOutcome } from "./response.js";
import { finalizeResponse } from "./response.js";
import { describeError } from "./errors.js";

export type ValidatorKind =
  | "containsText"
  | "noErrorKeywords"
  | "hasSuccessIndicators"
  | "custom";

export interface Validator {
  readonly kind: ValidatorKind;
  /** Name used in failure details */
  readonly name: string;
  evaluate(response: BotResponse): boolean;
}

/** Terms that indicate the responder hit a problem */
export const ERROR_KEYWORDS = [
  "error:",
  "failed:",
  "exception:",
  "traceback",
  "could not",
  "unable to",
] as const;

/** Terms that indicate the responder finished its work */
export const SUCCESS_KEYWORDS = [
  "complete",
  "success",
  "committed",
  "pushed",
  "changes",
  "modified",
  "updated",
] as const;

function includesAny(body: string, keywords: readonly string[]): boolean {
  const lower = body.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

/**
 * Passes when the body contains `expected`, ignoring case
 */
export function containsText(expected: string): Validator {
  const needle = expected.toLowerCase();
  return {
    kind: "containsText",
    name: `containsText(${JSON.stringify(expected)})`,
    evaluate: (response) => response.body.toLowerCase().includes(needle),
  };
}

export const noErrorKeywords: Validator = {
  kind: "noErrorKeywords",
  name: "noErrorKeywords",
  evaluate: (response) => !includesAny(response.body, ERROR_KEYWORDS),
};

export const hasSuccessIndicators: Validator = {
  kind: "hasSuccessIndicators",
  name: "hasSuccessIndicators",
  evaluate: (response) => includesAny(response.body, SUCCESS_KEYWORDS),
};

/**
 * Wrap a caller-supplied predicate over the raw body text
 */
export function custom(
  name: string,
  predicate: (body: string) => boolean,
): Validator {
  return {
    kind: "custom",
    name,
    evaluate: (response) => predicate(response.body),
  };
}

/**
 * Run every validator against a response.
 * An empty set passes.
 */
export function runValidators(
  response: BotResponse,
  validators: readonly Validator[],
): ValidationOutcome {
  const failures: string[] = [];

  for (const validator of validators) {
    try {
      if (!validator.evaluate(response)) {
        failures.push(`Validator ${validator.name} failed`);
      }
    } catch (error) {
      failures.push(`Validator ${validator.name} error: ${describeError(error)}`);
    }
  }

  return { passed: failures.length === 0, failures };
}

/**
 * Validate a pending response and return it finalized
 */
export function validateResponse(
  response: BotResponse,
  validators: readonly Validator[],
): BotResponse {
  return finalizeResponse(response, runValidators(response, validators));
}
