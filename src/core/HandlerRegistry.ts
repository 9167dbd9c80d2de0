import { HandlerDescriptor, HandlerKind } from "../contracts/HandlerDescriptor";
import { IHandle, INotificationHandler, IRequestHandler } from "../contracts/IHandle";
import { IHandlerFactory } from "../contracts/IHandlerFactory";
import { IMediator } from "../contracts/IMediator";
import { INotification } from "../contracts/INotification";
import { IRequest } from "../contracts/IRequest";
import { HandlerAmbiguityError, HandlerRegistrationError } from "../contracts/MediatorExceptions";
import { MessageType, isMessageType, messageTypeName } from "../contracts/MessageType";
import { getHandlerDeclaration } from "./HandlerForAttribute";

/**
 * Creates a handler instance when the mediator resolves it.
 * Receives the dispatching mediator, for handlers that dispatch further.
 */
export type HandlerFactoryFunc<THandler> = (
  mediator: IMediator,
  descriptor: HandlerDescriptor
) => THandler | Promise<THandler>;

/**
 * An explicit map from message type to handler factories.
 *
 * Requests resolve on their exact type. Notifications resolve on their type and
 * every ancestor class, nearest first, so a handler registered against a base
 * notification class also receives derived notifications. Factories run on every
 * resolution; the registry keeps no handler instances.
 *
 * @example
 * ```typescript
 * const registry = new HandlerRegistry()
 *   .addRequestHandler(GetUser, () => new GetUserHandler(users))
 *   .addNotificationHandler(UserCreated, () => new SendWelcomeMail(mailer));
 * const mediator = new Mediator(registry);
 * ```
 */
export class HandlerRegistry implements IHandlerFactory {
  private readonly registrations: Record<HandlerKind, Map<MessageType, HandlerFactoryFunc<unknown>[]>> = {
    request: new Map(),
    notification: new Map(),
  };

  /**
   * Registers the handler of a request type.
   * Registering a second handler for the same type is allowed here but makes
   * sending that request fail with HandlerAmbiguityError.
   * @param requestType The request class
   * @param factory Creates the handler
   * @returns The registry for method chaining
   */
  addRequestHandler<TRequest extends IRequest<unknown>>(
    requestType: MessageType<TRequest>,
    factory: HandlerFactoryFunc<IRequestHandler<TRequest>>
  ): this {
    return this.register("request", requestType, factory);
  }

  /**
   * Registers one more handler of a notification type.
   * @param notificationType The notification class, or a base class of it
   * @param factory Creates the handler
   * @returns The registry for method chaining
   */
  addNotificationHandler<TNotification extends INotification>(
    notificationType: MessageType<TNotification>,
    factory: HandlerFactoryFunc<INotificationHandler<TNotification>>
  ): this {
    return this.register("notification", notificationType, factory);
  }

  /**
   * Registers a handler class decorated with @RequestHandlerFor or @NotificationHandlerFor.
   * @param handlerClass The decorated handler class
   * @param factory Creates the handler
   * @returns The registry for method chaining
   * @throws HandlerRegistrationError if the class carries no declaration
   */
  add<THandler extends IHandle<never, unknown>>(
    handlerClass: abstract new (...args: never[]) => THandler,
    factory: HandlerFactoryFunc<THandler>
  ): this {
    const declaration = getHandlerDeclaration(handlerClass);
    if (!declaration) {
      throw new HandlerRegistrationError(
        `${handlerClass.name} declares no message type; decorate it with @RequestHandlerFor or @NotificationHandlerFor.`
      );
    }
    return this.register(declaration.kind, declaration.messageType, factory);
  }

  /**
   * Checks whether any handler is registered directly against a message type.
   */
  has(messageType: MessageType): boolean {
    return this.count("request", messageType) + this.count("notification", messageType) > 0;
  }

  /**
   * Gets how many handlers of a kind are registered directly against a message type.
   */
  count(kind: HandlerKind, messageType: MessageType): number {
    return this.registrations[kind].get(messageType)?.length ?? 0;
  }

  /**
   * Resolves the single handler of a request type.
   * @throws HandlerAmbiguityError if more than one handler is registered
   */
  resolveOne(descriptor: HandlerDescriptor, mediator: IMediator): unknown {
    const factories = this.registrations[descriptor.kind].get(descriptor.messageType) ?? [];
    if (factories.length === 0) {
      return undefined;
    }
    if (factories.length > 1) {
      throw new HandlerAmbiguityError(descriptor.messageType, factories.length);
    }
    return factories[0](mediator, descriptor);
  }

  /**
   * Resolves every handler of a notification type, including those registered
   * against its ancestor classes.
   */
  async resolveMany(descriptor: HandlerDescriptor, mediator: IMediator): Promise<unknown[]> {
    const table = this.registrations[descriptor.kind];
    const factories = lineageOf(descriptor.messageType).flatMap((type) => table.get(type) ?? []);
    return Promise.all(factories.map((factory) => factory(mediator, descriptor)));
  }

  private register(kind: HandlerKind, messageType: MessageType, factory: HandlerFactoryFunc<unknown>): this {
    if (!isMessageType(messageType)) {
      throw new HandlerRegistrationError(`Handlers must be registered against a class, got ${typeof messageType}.`);
    }
    if (typeof factory !== "function") {
      throw new HandlerRegistrationError(`The ${kind} handler factory for ${messageTypeName(messageType)} is not a function.`);
    }

    const factories = this.registrations[kind].get(messageType);
    if (factories) {
      factories.push(factory);
    } else {
      this.registrations[kind].set(messageType, [factory]);
    }
    return this;
  }
}

/**
 * Lists a class followed by its ancestor classes.
 */
function lineageOf(type: MessageType): MessageType[] {
  const lineage: MessageType[] = [];
  let current: unknown = type;
  while (isMessageType(current) && current !== Function.prototype) {
    lineage.push(current);
    current = Object.getPrototypeOf(current);
  }
  return lineage;
}
