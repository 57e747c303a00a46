/**
 * Trigger channel contract.
 *
 * Anything thread-like satisfies it: an issue tracker, a chat room, or the
 * in-memory channel used in tests. The channel may be shared with other
 * writers; callers filter by author.
 */

/** Channel-assigned message identity, increasing within a channel */
export type MessageId = number;

/**
 * A message as read back from the channel
 */
export interface RawMessage {
  readonly id: MessageId;
  readonly author: string;
  readonly body: string;
  readonly createdAt: Date;
}

export interface TriggerChannel {
  /**
   * Append a new message.
   * @throws ChannelUnavailableError when the channel cannot be written to
   */
  post(body: string): Promise<MessageId>;

  /** Messages with an id strictly greater than `watermark`, preferably ascending */
  listSince(watermark: MessageId): Promise<RawMessage[]>;

  /** Remove a message. Resolves false when it does not exist. */
  delete(id: MessageId): Promise<boolean>;
}
