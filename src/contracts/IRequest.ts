/**
 * Represents an action to perform, answered by exactly one handler.
 * The response type is carried by a phantom property that is never assigned at run time.
 * @template TResponse The type of response the handler produces
 */
export interface IRequest<TResponse> {
  /** Type-level marker only. */
  readonly _responseType?: TResponse;
}

/**
 * Extracts the response type of a request type.
 */
export type ResponseOf<TRequest> = TRequest extends IRequest<infer TResponse> ? TResponse : never;

/**
 * Base class for requests. Subclasses inherit the declared response type, which is
 * what lets the mediator infer the result type of a send.
 * @example
 * ```typescript
 * class GetUser extends MediatorRequest<User> {
 *   constructor(public readonly id: string) { super(); }
 * }
 * const user = await mediator.sendAsync(new GetUser("42")); // User
 * ```
 */
export abstract class MediatorRequest<TResponse> implements IRequest<TResponse> {
  declare readonly _responseType?: TResponse;
}
