import { DispatchContext } from "../contracts/DispatchContext";
import { HandlerDescriptor } from "../contracts/HandlerDescriptor";
import { IHandle, handlerName, isHandler } from "../contracts/IHandle";
import { IHandlerFactory } from "../contracts/IHandlerFactory";
import { IMediator } from "../contracts/IMediator";
import { INotification } from "../contracts/INotification";
import { IRequest } from "../contracts/IRequest";
import {
  HandlerAmbiguityError,
  HandlerExecutionError,
  HandlerNotFoundError,
  HandlerResolutionError,
  MediatorError,
  OperationCanceledError,
  PublishError,
} from "../contracts/MediatorExceptions";
import { MessageType, messageTypeName, messageTypeOf } from "../contracts/MessageType";
import { awaitWithCancellation, linkCancellation, throwIfCanceled } from "./Cancellation";
import { MediatorLogger, MediatorOptions } from "./MediatorOptions";

/**
 * Dispatches requests to their single handler and notifications to all of theirs.
 * Handlers are looked up through the injected factory on every dispatch; the
 * mediator keeps no state between calls.
 */
export class Mediator implements IMediator {
  private readonly logger: MediatorLogger;
  private readonly timeoutMs?: number;

  /**
   * Creates a new mediator.
   * @param factory The resolution capability supplying handlers
   * @param options Optional configuration
   */
  constructor(
    private readonly factory: IHandlerFactory,
    options: MediatorOptions = new MediatorOptions()
  ) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Sends a request to its single handler.
   * @param request The request to send
   * @param cancellation Optional cancellation signal
   * @returns A promise that resolves with the handler's response
   */
  async sendAsync<TResponse>(request: IRequest<TResponse>, cancellation?: AbortSignal): Promise<TResponse> {
    const messageType = dispatchTypeOf(request, "sendAsync");
    const linked = linkCancellation(cancellation, this.timeoutMs);

    try {
      throwIfCanceled(linked.signal);
      const context = DispatchContext.create("send", linked.signal);
      this.logger.debug("Mediator.sendAsync:", {
        messageType: messageTypeName(messageType),
        messageId: context.messageId,
      });

      const handler = await this.resolveRequestHandler<TResponse>(messageType, linked.signal);
      const work = invoke(handler, request, context).catch((error: unknown) => {
        throw nestedFailure(handler, error);
      });

      return await awaitWithCancellation(work, linked.signal, (abandoned) => {
        void abandoned.catch((error: unknown) => {
          this.logger.warn("Mediator.sendAsync: handler failed after the dispatch was canceled", {
            messageType: messageTypeName(messageType),
            messageId: context.messageId,
            error,
          });
        });
      });
    } finally {
      linked.dispose();
    }
  }

  /**
   * Publishes a notification to all of its handlers.
   * Every handler runs to completion; failures are collected into one PublishError.
   * @param notification The notification to publish
   * @param cancellation Optional cancellation signal
   */
  async publishAsync(notification: INotification, cancellation?: AbortSignal): Promise<void> {
    const messageType = dispatchTypeOf(notification, "publishAsync");
    const linked = linkCancellation(cancellation, this.timeoutMs);

    try {
      throwIfCanceled(linked.signal);
      const context = DispatchContext.create("publish", linked.signal);
      const handlers = await this.resolveNotificationHandlers(messageType, linked.signal);

      this.logger.debug("Mediator.publishAsync:", {
        messageType: messageTypeName(messageType),
        messageId: context.messageId,
        handlerCount: handlers.length,
      });

      if (handlers.length === 0) {
        return;
      }

      const work = Promise.allSettled(handlers.map((handler) => invoke(handler, notification, context)));
      const outcomes = await awaitWithCancellation(work, linked.signal, (abandoned) => {
        void abandoned.then((late) => {
          const failed = late.filter((outcome) => outcome.status === "rejected").length;
          if (failed > 0) {
            this.logger.warn("Mediator.publishAsync: handlers failed after the dispatch was canceled", {
              messageType: messageTypeName(messageType),
              messageId: context.messageId,
              failed,
            });
          }
        });
      });

      const failures: HandlerExecutionError[] = [];
      handlers.forEach((handler, index) => {
        const outcome = outcomes[index];
        if (outcome.status === "rejected") {
          failures.push(new HandlerExecutionError(handlerName(handler), outcome.reason));
        }
      });

      if (failures.length > 0) {
        const error = new PublishError(messageType, failures, handlers.length);
        this.logger.error("Mediator.publishAsync failed:", {
          messageType: messageTypeName(messageType),
          messageId: context.messageId,
          failures: failures.map((failure) => failure.message),
        });
        throw error;
      }
    } finally {
      linked.dispose();
    }
  }

  private async resolveRequestHandler<TResponse>(
    messageType: MessageType,
    signal?: AbortSignal
  ): Promise<IHandle<IRequest<TResponse>, TResponse>> {
    const descriptor = HandlerDescriptor.forRequest(messageType);
    const resolved = await this.resolve(descriptor, () => this.factory.resolveOne(descriptor, this), signal);

    const candidates: unknown[] =
      resolved == null ? [] : isHandler(resolved) || !isIterable(resolved) ? [resolved] : [...resolved];
    if (candidates.length === 0) {
      throw new HandlerNotFoundError(messageType);
    }
    if (candidates.length > 1) {
      throw new HandlerAmbiguityError(messageType, candidates.length);
    }

    const handler = candidates[0];
    if (!isHandler<IRequest<TResponse>, TResponse>(handler)) {
      throw new HandlerResolutionError(
        messageType,
        `Resolved ${describeValue(handler)} for ${descriptor}, which does not expose handleAsync.`
      );
    }
    return handler;
  }

  private async resolveNotificationHandlers(
    messageType: MessageType,
    signal?: AbortSignal
  ): Promise<IHandle<INotification, void>[]> {
    const descriptor = HandlerDescriptor.forNotification(messageType);
    const resolved = await this.resolve(descriptor, () => this.factory.resolveMany(descriptor, this), signal);

    if (resolved == null) {
      return [];
    }
    if (!isIterable(resolved)) {
      throw new HandlerResolutionError(
        messageType,
        `Resolved ${describeValue(resolved)} for ${descriptor}, which is not a sequence of handlers.`
      );
    }

    const handlers: IHandle<INotification, void>[] = [];
    for (const candidate of resolved) {
      if (!isHandler<INotification, void>(candidate)) {
        throw new HandlerResolutionError(
          messageType,
          `Resolved ${describeValue(candidate)} for ${descriptor}, which does not expose handleAsync.`
        );
      }
      handlers.push(candidate);
    }
    return handlers;
  }

  /**
   * Runs a factory lookup. Mediator errors pass through; anything else the factory
   * throws becomes a HandlerResolutionError.
   */
  private async resolve(
    descriptor: HandlerDescriptor,
    lookup: () => unknown,
    signal?: AbortSignal
  ): Promise<unknown> {
    try {
      return await awaitWithCancellation(Promise.resolve().then(lookup), signal, (abandoned) => {
        void abandoned.catch((error: unknown) => {
          this.logger.warn("Mediator: handler resolution failed after the dispatch was canceled", {
            descriptor: descriptor.toString(),
            error,
          });
        });
      });
    } catch (error) {
      if (error instanceof MediatorError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new HandlerResolutionError(descriptor.messageType, `Resolving ${descriptor} failed: ${reason}`, error);
    }
  }
}

/**
 * Starts a handler in its own microtask so that a synchronous throw becomes a
 * rejection and sibling handlers are not held up.
 */
function invoke<TMessage, TResult>(
  handler: IHandle<TMessage, TResult>,
  message: TMessage,
  context: DispatchContext
): Promise<TResult> {
  return Promise.resolve().then(() => handler.handleAsync(message, context));
}

/**
 * A mediator error escaping a handler belongs to a dispatch the handler made itself,
 * so it is reported as a failure of that handler. Other errors pass through unchanged,
 * as does cancellation.
 */
function nestedFailure(handler: object, error: unknown): unknown {
  if (error instanceof MediatorError && !(error instanceof OperationCanceledError)) {
    return new HandlerExecutionError(handlerName(handler), error);
  }
  return error;
}

function dispatchTypeOf(message: unknown, operation: string): MessageType {
  if (typeof message !== "object" || message === null) {
    throw new TypeError(`${operation} expects a message object, got ${describeValue(message)}.`);
  }
  return messageTypeOf(message);
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    return `an instance of ${value.constructor?.name || "Object"}`;
  }
  return typeof value;
}
