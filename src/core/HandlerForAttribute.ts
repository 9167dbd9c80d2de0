import "reflect-metadata";
import { HandlerKind } from "../contracts/HandlerDescriptor";
import { INotification } from "../contracts/INotification";
import { IRequest } from "../contracts/IRequest";
import { MessageType, isMessageType } from "../contracts/MessageType";

const requestTypeKey = "mediator:request-type";
const notificationTypeKey = "mediator:notification-type";

/**
 * Decorator factory declaring which request type a handler class serves.
 * @param requestType The request type the handler answers
 * @returns A decorator function that applies handler metadata to a class
 */
export function RequestHandlerFor<TRequest extends IRequest<unknown>>(requestType: MessageType<TRequest>): ClassDecorator {
  return function (target: Function): void {
    Reflect.defineMetadata(requestTypeKey, requestType, target);
  };
}

/**
 * Decorator factory declaring which notification type a handler class reacts to.
 * @param notificationType The notification type the handler reacts to
 * @returns A decorator function that applies handler metadata to a class
 */
export function NotificationHandlerFor<TNotification extends INotification>(
  notificationType: MessageType<TNotification>
): ClassDecorator {
  return function (target: Function): void {
    Reflect.defineMetadata(notificationTypeKey, notificationType, target);
  };
}

/**
 * The message type a handler class was declared for.
 */
export interface HandlerDeclaration {
  readonly kind: HandlerKind;
  readonly messageType: MessageType;
}

/**
 * Reads the declaration left by {@link RequestHandlerFor} or {@link NotificationHandlerFor}.
 * @param handlerClass The handler class
 * @returns The declaration, or undefined if the class is not decorated
 */
export function getHandlerDeclaration(handlerClass: object): HandlerDeclaration | undefined {
  const requestType: unknown = Reflect.getMetadata(requestTypeKey, handlerClass);
  if (isMessageType(requestType)) {
    return { kind: "request", messageType: requestType };
  }

  const notificationType: unknown = Reflect.getMetadata(notificationTypeKey, handlerClass);
  if (isMessageType(notificationType)) {
    return { kind: "notification", messageType: notificationType };
  }

  return undefined;
}
