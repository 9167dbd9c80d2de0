import { MessageType, messageTypeName } from "./MessageType";

/**
 * The two handler capabilities the mediator resolves.
 */
export type HandlerKind = "request" | "notification";

/**
 * Describes the handler(s) the mediator is asking a factory for:
 * which capability and which message type they must serve.
 */
export class HandlerDescriptor {
  private constructor(
    public readonly kind: HandlerKind,
    public readonly messageType: MessageType
  ) {}

  /**
   * Describes the single handler of a request type.
   */
  static forRequest(messageType: MessageType): HandlerDescriptor {
    return new HandlerDescriptor("request", messageType);
  }

  /**
   * Describes the handlers of a notification type.
   */
  static forNotification(messageType: MessageType): HandlerDescriptor {
    return new HandlerDescriptor("notification", messageType);
  }

  /** Gets the name of the message type, e.g. "CreateOrder" */
  get messageTypeName(): string {
    return messageTypeName(this.messageType);
  }

  toString(): string {
    const contract = this.kind === "request" ? "IRequestHandler" : "INotificationHandler";
    return `${contract}<${this.messageTypeName}>`;
  }
}
