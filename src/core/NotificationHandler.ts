import { DispatchContext } from "../contracts/DispatchContext";
import { INotificationHandler } from "../contracts/IHandle";
import { INotification } from "../contracts/INotification";

/**
 * Base class for notification handlers whose work is synchronous.
 * @template TNotification The notification type handled
 */
export abstract class NotificationHandler<TNotification extends INotification>
  implements INotificationHandler<TNotification>
{
  async handleAsync(notification: TNotification, context: DispatchContext): Promise<void> {
    this.handleCore(notification, context);
  }

  /**
   * Reacts to a notification.
   * @param notification The notification that was published
   * @param context The context of the dispatch
   */
  protected abstract handleCore(notification: TNotification, context: DispatchContext): void;
}

/**
 * Base class for notification handlers that need to await.
 */
export abstract class AsyncNotificationHandler<TNotification extends INotification>
  implements INotificationHandler<TNotification>
{
  async handleAsync(notification: TNotification, context: DispatchContext): Promise<void> {
    await this.handleCore(notification, context);
  }

  protected abstract handleCore(notification: TNotification, context: DispatchContext): Promise<void>;
}
