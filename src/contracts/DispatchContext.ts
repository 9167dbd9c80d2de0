import { randomUUID } from "crypto";

/**
 * Whether a message is being sent to one handler or published to many.
 */
export type DispatchKind = "send" | "publish";

/**
 * Represents the context of a message being dispatched by the mediator.
 * Handlers receive it alongside the message.
 */
export class DispatchContext {
  /**
   * Gets the unique identifier of this dispatch.
   */
  public readonly messageId: string;

  /**
   * Gets whether the message was sent or published.
   */
  public readonly kind: DispatchKind;

  /**
   * Gets the cancellation signal of the dispatch, if any.
   * Handlers that do I/O should pass it on.
   */
  public readonly cancellation?: AbortSignal;

  /**
   * Creates a new instance of the DispatchContext class.
   * @param kind Whether the message is being sent or published
   * @param messageId The unique identifier for this dispatch
   * @param cancellation Optional cancellation signal
   */
  constructor(kind: DispatchKind, messageId: string, cancellation?: AbortSignal) {
    this.kind = kind;
    this.messageId = messageId;
    this.cancellation = cancellation;
  }

  /**
   * Creates a new DispatchContext with a random UUID.
   */
  static create(kind: DispatchKind, cancellation?: AbortSignal): DispatchContext {
    return new DispatchContext(kind, randomUUID(), cancellation);
  }
}
