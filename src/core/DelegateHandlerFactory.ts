import { HandlerDescriptor } from "../contracts/HandlerDescriptor";
import { IHandlerFactory, MultiInstanceFactory, SingleInstanceFactory } from "../contracts/IHandlerFactory";
import { IMediator } from "../contracts/IMediator";

/**
 * Adapts two plain lookup functions, typically closures over a container's own
 * resolve methods, to the factory contract the mediator consumes.
 *
 * @example
 * ```typescript
 * const factory = new DelegateHandlerFactory(
 *   (descriptor) => container.tryResolve(descriptor.toString()),
 *   (descriptor) => container.resolveAll(descriptor.toString())
 * );
 * const mediator = new Mediator(factory);
 * ```
 */
export class DelegateHandlerFactory implements IHandlerFactory {
  /**
   * Creates a new delegate factory.
   * @param single Resolves the single handler of a request type
   * @param multi Resolves the handlers of a notification type
   */
  constructor(
    private readonly single: SingleInstanceFactory,
    private readonly multi: MultiInstanceFactory
  ) {}

  resolveOne(descriptor: HandlerDescriptor, mediator: IMediator): unknown {
    return this.single(descriptor, mediator);
  }

  resolveMany(
    descriptor: HandlerDescriptor,
    mediator: IMediator
  ): Iterable<unknown> | Promise<Iterable<unknown>> | null | undefined {
    return this.multi(descriptor, mediator);
  }
}
