import { IHandle, INotificationHandler, IRequestHandler } from "../contracts/IHandle";
import { IHandlerFactory } from "../contracts/IHandlerFactory";
import { INotification } from "../contracts/INotification";
import { IRequest } from "../contracts/IRequest";
import { HandlerRegistrationError } from "../contracts/MediatorExceptions";
import { MessageType } from "../contracts/MessageType";
import { IStrategyNotification } from "../strategies/IStrategy";
import { registerStrategyHandlers } from "../strategies/StrategyNotificationHandler";
import { HandlerFactoryFunc, HandlerRegistry } from "./HandlerRegistry";
import { Mediator } from "./Mediator";
import { MediatorLogger, MediatorOptions } from "./MediatorOptions";

/**
 * A builder class for configuring and creating Mediator instances.
 * Handlers go into a {@link HandlerRegistry} unless an external factory is supplied.
 */
export class MediatorBuilder {
  private readonly registry = new HandlerRegistry();
  private hasRegistrations = false;
  private factory?: IHandlerFactory;
  private logger?: MediatorLogger;
  private timeoutMs?: number;

  /**
   * Registers the handler of a request type.
   * @returns The builder instance for method chaining
   */
  addRequestHandler<TRequest extends IRequest<unknown>>(
    requestType: MessageType<TRequest>,
    factory: HandlerFactoryFunc<IRequestHandler<TRequest>>
  ): MediatorBuilder {
    this.registry.addRequestHandler(requestType, factory);
    this.hasRegistrations = true;
    return this;
  }

  /**
   * Registers a handler of a notification type.
   * @returns The builder instance for method chaining
   */
  addNotificationHandler<TNotification extends INotification>(
    notificationType: MessageType<TNotification>,
    factory: HandlerFactoryFunc<INotificationHandler<TNotification>>
  ): MediatorBuilder {
    this.registry.addNotificationHandler(notificationType, factory);
    this.hasRegistrations = true;
    return this;
  }

  /**
   * Registers a handler class decorated with @RequestHandlerFor or @NotificationHandlerFor.
   * @returns The builder instance for method chaining
   */
  add<THandler extends IHandle<never, unknown>>(
    handlerClass: abstract new (...args: never[]) => THandler,
    factory: HandlerFactoryFunc<THandler>
  ): MediatorBuilder {
    this.registry.add(handlerClass, factory);
    this.hasRegistrations = true;
    return this;
  }

  /**
   * Registers the strategy handler for each notification type.
   * @returns The builder instance for method chaining
   */
  addStrategyHandlers(...notificationTypes: MessageType<IStrategyNotification>[]): MediatorBuilder {
    registerStrategyHandlers(this.registry, ...notificationTypes);
    this.hasRegistrations = notificationTypes.length > 0 || this.hasRegistrations;
    return this;
  }

  /**
   * Resolves handlers through an external factory instead of the builder's registry.
   * @returns The builder instance for method chaining
   */
  useFactory(factory: IHandlerFactory): MediatorBuilder {
    this.factory = factory;
    return this;
  }

  /**
   * Sets where dispatch diagnostics are written.
   * @returns The builder instance for method chaining
   */
  withLogger(logger: MediatorLogger): MediatorBuilder {
    this.logger = logger;
    return this;
  }

  /**
   * Applies a time limit to every dispatch.
   * @returns The builder instance for method chaining
   */
  withTimeout(timeoutMs: number): MediatorBuilder {
    this.timeoutMs = timeoutMs;
    return this;
  }

  /**
   * Builds the mediator.
   * @throws HandlerRegistrationError if handlers were registered and an external factory was also supplied
   * @throws RangeError if the timeout is not a positive number
   */
  build(): Mediator {
    if (this.factory && this.hasRegistrations) {
      throw new HandlerRegistrationError(
        "Handlers were registered on the builder, but useFactory() replaces its registry. Register them with the factory instead."
      );
    }

    const options = new MediatorOptions({ logger: this.logger, timeoutMs: this.timeoutMs });
    return new Mediator(this.factory ?? this.registry, options);
  }
}
