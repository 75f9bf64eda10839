/**
 * StreamDispatcher - drains a MessageChannel and routes each message to the
 * handler registered for its kind. A failing handler is logged and the loop
 * moves on to the next message.
 */

import { toError } from "../../errors/app.errors";
import { silentLogger, type Logger } from "../../utils/logger.util";
import type { MessageChannel } from "./message-channel";
import type { StreamMessage, StreamMessageKind } from "./message-classifier";

type Handler<K extends StreamMessageKind> = (
  message: Extract<StreamMessage, { kind: K }>,
) => void | Promise<void>;

export type StreamHandlers = { [K in StreamMessageKind]?: Handler<K> };

export class StreamDispatcher {
  private readonly counts = new Map<StreamMessageKind, number>();

  constructor(
    private readonly channel: MessageChannel<StreamMessage>,
    private readonly handlers: StreamHandlers,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Runs until the channel is closed and drained; resolves with the number
   * of messages dispatched
   */
  async run(): Promise<number> {
    let dispatched = 0;
    for await (const message of this.channel) {
      this.counts.set(message.kind, (this.counts.get(message.kind) ?? 0) + 1);
      try {
        await this.dispatch(message);
      } catch (err) {
        this.logger.error(`Handler for ${message.kind} message failed`, toError(err));
      }
      dispatched++;
    }
    return dispatched;
  }

  countOf(kind: StreamMessageKind): number {
    return this.counts.get(kind) ?? 0;
  }

  private async dispatch(message: StreamMessage): Promise<void> {
    const h = this.handlers;
    switch (message.kind) {
      case "general":
        return h.general?.(message);
      case "quote":
        return h.quote?.(message);
      case "depth":
        return h.depth?.(message);
      case "tradePrint":
        return h.tradePrint?.(message);
      case "trade":
        return h.trade?.(message);
      case "order":
        return h.order?.(message);
      case "position":
        return h.position?.(message);
      case "unknown":
        return h.unknown?.(message);
    }
  }
}
