/**
 * In-memory trigger channel.
 *
 * Stands in for a real message board in tests and dry runs. Scripted
 * responders hook `onPost`; transient outages are injected with `failNext`.
 */

import type { MessageId, RawMessage, TriggerChannel } from "../channel.js";
import type { Clock } from "../clock.js";
import { systemClock } from "../clock.js";
import type { ChannelOperation } from "../errors.js";
import { ChannelUnavailableError, describeError } from "../errors.js";
import type { Logger } from "../logging.js";
import { consoleLogger } from "../logging.js";

/**
 * Called after every successful post, before `post` resolves.
 * A handler that throws is logged; the post still succeeds.
 */
export type PostHandler = (
  trigger: RawMessage,
  channel: MemoryChannel,
) => void | Promise<void>;

export interface MemoryChannelOptions {
  /** Channel identity (default: "memory") */
  identity?: string;
  /** Author recorded on messages created by `post` (default: "tester") */
  author?: string;
  clock?: Clock;
  /** Receives post handler failures */
  logger?: Logger;
}

export class MemoryChannel implements TriggerChannel {
  readonly identity: string;
  readonly author: string;

  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly store = new Map<MessageId, RawMessage>();
  private readonly handlers: PostHandler[] = [];
  private readonly pendingFailures: Record<ChannelOperation, number> = {
    post: 0,
    listSince: 0,
    delete: 0,
  };
  private nextId: MessageId = 1;

  constructor(options: MemoryChannelOptions = {}) {
    this.identity = options.identity ?? "memory";
    this.author = options.author ?? "tester";
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? consoleLogger;
  }

  async post(body: string): Promise<MessageId> {
    this.consumeFailure("post");
    const trigger = this.append(this.author, body);
    for (const handler of this.handlers) {
      try {
        await handler(trigger, this);
      } catch (error) {
        this.logger.error(
          `Post handler failed for message ${trigger.id}: ${describeError(error)}`,
        );
      }
    }
    return trigger.id;
  }

  async listSince(watermark: MessageId): Promise<RawMessage[]> {
    this.consumeFailure("listSince");
    return this.messages().filter((message) => message.id > watermark);
  }

  async delete(id: MessageId): Promise<boolean> {
    this.consumeFailure("delete");
    return this.store.delete(id);
  }

  /**
   * Add a message as any participant, bypassing post handlers
   */
  append(author: string, body: string): RawMessage {
    const message: RawMessage = Object.freeze({
      id: this.nextId++,
      author,
      body,
      createdAt: new Date(this.clock.now()),
    });
    this.store.set(message.id, message);
    return message;
  }

  onPost(handler: PostHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Make the next `times` calls to `operation` throw ChannelUnavailableError
   */
  failNext(operation: ChannelOperation, times = 1): void {
    this.pendingFailures[operation] += times;
  }

  /** Current contents, ascending by id */
  messages(): RawMessage[] {
    return [...this.store.values()].sort((a, b) => a.id - b.id);
  }

  has(id: MessageId): boolean {
    return this.store.has(id);
  }

  private consumeFailure(operation: ChannelOperation): void {
    if (this.pendingFailures[operation] > 0) {
      this.pendingFailures[operation]--;
      throw new ChannelUnavailableError(
        operation,
        `Channel ${this.identity} is unavailable (${operation})`,
      );
    }
  }
}
