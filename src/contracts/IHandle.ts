import { DispatchContext } from "./DispatchContext";
import { INotification } from "./INotification";
import { IRequest, ResponseOf } from "./IRequest";

/**
 * Defines a handler for messages of type TMessage.
 * @template TMessage The type of message to be handled
 * @template TResult The result of handling; void for notifications
 */
export interface IHandle<TMessage, TResult> {
  /**
   * Handles the specified message.
   * Implementations may complete synchronously or return a promise.
   * @param message The message to be handled
   * @param context The context of the dispatch
   */
  handleAsync(message: TMessage, context: DispatchContext): TResult | Promise<TResult>;
}

/**
 * A handler that answers one request type.
 */
export interface IRequestHandler<TRequest extends IRequest<unknown>, TResponse = ResponseOf<TRequest>>
  extends IHandle<TRequest, TResponse> {}

/**
 * A handler that reacts to one notification type.
 */
export interface INotificationHandler<TNotification extends INotification> extends IHandle<TNotification, void> {}

/**
 * Checks whether a resolved value exposes the handler capability.
 * Only the shape is checked; the message type it serves is the resolver's responsibility.
 * @param value The value returned by a handler factory
 */
export function isHandler<TMessage, TResult>(value: unknown): value is IHandle<TMessage, TResult> {
  return (
    typeof value === "object" &&
    value !== null &&
    "handleAsync" in value &&
    typeof value.handleAsync === "function"
  );
}

/**
 * Gets a readable name for a handler instance.
 */
export function handlerName(handler: object): string {
  return handler.constructor.name || "<anonymous handler>";
}
