import { IMediator } from "../contracts/IMediator";
import { INotification } from "../contracts/INotification";

/**
 * A behaviour object carried by a notification, describing the follow-up work
 * to perform when the notification is handled.
 */
export interface IStrategy {
  /**
   * Performs the follow-up work, typically by sending further requests.
   * @param mediator The mediator to dispatch through
   * @param cancellation The cancellation signal of the dispatch that triggered it
   */
  applyAsync(mediator: IMediator, cancellation?: AbortSignal): void | Promise<void>;
}

/**
 * A notification that exposes a strategy.
 */
export interface IStrategyNotification extends INotification {
  readonly strategy: IStrategy;
}

/**
 * Checks whether a value exposes the strategy capability.
 */
export function isStrategy(value: unknown): value is IStrategy {
  return (
    typeof value === "object" &&
    value !== null &&
    "applyAsync" in value &&
    typeof value.applyAsync === "function"
  );
}
