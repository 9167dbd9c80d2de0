import { INotification } from "./INotification";
import { IRequest } from "./IRequest";

/**
 * The single entry point application code uses to dispatch messages.
 */
export interface IMediator {
  /**
   * Sends a request to its single handler and returns the response.
   * @param request The request to send
   * @param cancellation Optional signal; once aborted the mediator stops waiting
   * @returns A promise resolving to the handler's response
   * @throws {HandlerNotFoundError} If no handler is registered for the request type
   * @throws {HandlerAmbiguityError} If resolution yielded more than one handler
   * @throws {OperationCanceledError} If the dispatch was cancelled
   * Errors thrown by the handler itself are rethrown unchanged.
   */
  sendAsync<TResponse>(request: IRequest<TResponse>, cancellation?: AbortSignal): Promise<TResponse>;

  /**
   * Publishes a notification to every handler registered for its type.
   * Handlers run concurrently; the promise settles once all of them have.
   * @param notification The notification to publish
   * @param cancellation Optional signal; once aborted the mediator stops waiting
   * @throws {PublishError} If one or more handlers failed
   * @throws {OperationCanceledError} If the dispatch was cancelled
   */
  publishAsync(notification: INotification, cancellation?: AbortSignal): Promise<void>;
}
