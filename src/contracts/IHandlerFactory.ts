import { HandlerDescriptor } from "./HandlerDescriptor";
import { IMediator } from "./IMediator";

/**
 * Resolves the single handler of a request type.
 * Returns undefined (or null) when nothing is registered.
 */
export type SingleInstanceFactory = (descriptor: HandlerDescriptor, mediator: IMediator) => unknown;

/**
 * Resolves every handler of a notification type. May return an empty sequence.
 */
export type MultiInstanceFactory = (
  descriptor: HandlerDescriptor,
  mediator: IMediator
) => Iterable<unknown> | Promise<Iterable<unknown>> | null | undefined;

/**
 * The resolution capability the mediator depends on. It is supplied by the
 * environment: an explicit registry, a container, or plain functions.
 *
 * Both lookups must be free of side effects the mediator can observe. Results are
 * validated by the mediator, so a misconfigured resolver surfaces as a
 * {@link HandlerResolutionError} or {@link HandlerAmbiguityError} rather than as a call
 * into the wrong object.
 */
export interface IHandlerFactory {
  /**
   * Resolves at most one handler.
   * @param descriptor The handler being asked for
   * @param mediator The dispatching mediator, for handlers that dispatch further
   * @returns The handler, or undefined when none is registered
   */
  resolveOne(descriptor: HandlerDescriptor, mediator: IMediator): unknown;

  /**
   * Resolves all handlers, possibly none.
   * @param descriptor The handlers being asked for
   * @param mediator The dispatching mediator, for handlers that dispatch further
   */
  resolveMany(
    descriptor: HandlerDescriptor,
    mediator: IMediator
  ): Iterable<unknown> | Promise<Iterable<unknown>> | null | undefined;
}
