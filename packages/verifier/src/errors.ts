/**
 * Error taxonomy.
 *
 * Only `ConfigurationError` ever reaches a caller of the retry controller.
 * Channel failures are absorbed into the attempt outcome.
 */

/** Operations a trigger channel exposes. */
export type ChannelOperation = "post" | "listSince" | "delete";

/**
 * Transient failure talking to a trigger channel.
 */
export class ChannelUnavailableError extends Error {
  constructor(
    public readonly operation: ChannelOperation,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ChannelUnavailableError";
  }
}

/**
 * Invalid test configuration, raised before any attempt begins.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

export function isChannelUnavailable(
  error: unknown,
): error is ChannelUnavailableError {
  return error instanceof ChannelUnavailableError;
}

/**
 * Render any thrown value for a log line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
