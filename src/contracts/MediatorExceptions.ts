import { MessageType, messageTypeName } from "./MessageType";

/**
 * Base class for all mediator errors.
 */
export class MediatorError extends Error {
  /**
   * Creates a new instance of the MediatorError class.
   * @param message Optional error message
   * @param cause Optional underlying error
   */
  constructor(message?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "MediatorError";
  }
}

/**
 * Error thrown when a request has no registered handler.
 */
export class HandlerNotFoundError extends MediatorError {
  /**
   * Creates a new instance of the HandlerNotFoundError class.
   * @param messageType The request type nothing was registered for
   */
  constructor(public readonly messageType: MessageType) {
    super(`No handler was registered for request type ${messageTypeName(messageType)}.`);
    this.name = "HandlerNotFoundError";
  }
}

/**
 * Error thrown when resolution yields more than one handler where exactly one is required.
 * This is a wiring defect, reported at dispatch time.
 */
export class HandlerAmbiguityError extends MediatorError {
  /**
   * Creates a new instance of the HandlerAmbiguityError class.
   * @param messageType The request type being resolved
   * @param candidateCount How many handlers were returned
   */
  constructor(
    public readonly messageType: MessageType,
    public readonly candidateCount: number
  ) {
    super(
      `Expected exactly one handler for request type ${messageTypeName(messageType)} but resolved ${candidateCount}.`
    );
    this.name = "HandlerAmbiguityError";
  }
}

/**
 * Error thrown when a handler factory fails or returns something that is not a handler.
 */
export class HandlerResolutionError extends MediatorError {
  /**
   * Creates a new instance of the HandlerResolutionError class.
   * @param messageType The message type being resolved
   * @param message Description of what went wrong
   * @param cause Optional error thrown by the factory
   */
  constructor(
    public readonly messageType: MessageType,
    message: string,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = "HandlerResolutionError";
  }
}

/**
 * Records the failure of one notification handler during a publish.
 * The handler's own error is kept as `cause`.
 */
export class HandlerExecutionError extends MediatorError {
  /**
   * Creates a new instance of the HandlerExecutionError class.
   * @param handlerName The name of the handler that failed
   * @param cause The error the handler threw
   */
  constructor(
    public readonly handlerName: string,
    cause: unknown
  ) {
    super(`Handler ${handlerName} failed: ${describe(cause)}`, cause);
    this.name = "HandlerExecutionError";
  }
}

/**
 * Error thrown by a publish after every handler has settled and at least one failed.
 */
export class PublishError extends MediatorError {
  /**
   * Creates a new instance of the PublishError class.
   * @param messageType The notification type that was published
   * @param failures One entry per failed handler
   * @param handlerCount How many handlers were invoked in total
   */
  constructor(
    public readonly messageType: MessageType,
    public readonly failures: readonly HandlerExecutionError[],
    public readonly handlerCount: number
  ) {
    super(
      `${failures.length} of ${handlerCount} handler(s) failed for notification type ${messageTypeName(messageType)}.`
    );
    this.name = "PublishError";
  }
}

/**
 * Error thrown when a dispatch is cancelled or times out.
 * Handlers that already started are not rolled back.
 */
export class OperationCanceledError extends MediatorError {
  /**
   * Creates a new instance of the OperationCanceledError class.
   * @param reason The abort reason of the signal
   */
  constructor(public readonly reason?: unknown) {
    super("The operation was canceled.", reason);
    this.name = "OperationCanceledError";
  }
}

/**
 * Error thrown when a handler cannot be registered.
 */
export class HandlerRegistrationError extends MediatorError {
  constructor(message?: string) {
    super(message || "The handler could not be registered.");
    this.name = "HandlerRegistrationError";
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
