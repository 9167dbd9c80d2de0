import { DispatchContext } from "../contracts/DispatchContext";
import { IMediator } from "../contracts/IMediator";
import { MessageType } from "../contracts/MessageType";
import { HandlerRegistry } from "../core/HandlerRegistry";
import { AsyncNotificationHandler } from "../core/NotificationHandler";
import { IStrategyNotification, isStrategy } from "./IStrategy";

/**
 * Handles any notification exposing a strategy by applying that strategy with the
 * mediator. The notification type decides the follow-up work; neither this handler
 * nor the mediator needs to know about it.
 * @template TNotification The notification type it is registered for
 */
export class StrategyNotificationHandler<TNotification extends IStrategyNotification>
  extends AsyncNotificationHandler<TNotification>
{
  /**
   * @param mediator The mediator the strategy dispatches through
   */
  constructor(protected readonly mediator: IMediator) {
    super();
  }

  protected async handleCore(notification: TNotification, context: DispatchContext): Promise<void> {
    const strategy: unknown = notification.strategy;
    if (!isStrategy(strategy)) {
      throw new TypeError(`${notification.constructor.name} carries no strategy to apply.`);
    }
    await strategy.applyAsync(this.mediator, context.cancellation);
  }
}

/**
 * Registers the strategy handler against each notification type.
 * @param registry The registry to add to
 * @param notificationTypes Notification classes exposing a strategy
 * @returns The registry for method chaining
 */
export function registerStrategyHandlers(
  registry: HandlerRegistry,
  ...notificationTypes: MessageType<IStrategyNotification>[]
): HandlerRegistry {
  for (const notificationType of notificationTypes) {
    registry.addNotificationHandler(notificationType, (mediator) => new StrategyNotificationHandler(mediator));
  }
  return registry;
}
