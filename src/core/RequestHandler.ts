import { DispatchContext } from "../contracts/DispatchContext";
import { IRequestHandler } from "../contracts/IHandle";
import { IRequest, ResponseOf } from "../contracts/IRequest";

/**
 * Base class for request handlers whose work is synchronous.
 * Derived classes implement handleCore; the base adapts it to the handler contract.
 * @template TRequest The request type served
 * @template TResponse The response produced
 */
export abstract class RequestHandler<TRequest extends IRequest<unknown>, TResponse = ResponseOf<TRequest>>
  implements IRequestHandler<TRequest, TResponse>
{
  async handleAsync(request: TRequest, context: DispatchContext): Promise<TResponse> {
    return this.handleCore(request, context);
  }

  /**
   * Produces the response for a request.
   * @param request The request to handle
   * @param context The context of the dispatch
   */
  protected abstract handleCore(request: TRequest, context: DispatchContext): TResponse;
}

/**
 * Base class for request handlers that need to await.
 */
export abstract class AsyncRequestHandler<TRequest extends IRequest<unknown>, TResponse = ResponseOf<TRequest>>
  implements IRequestHandler<TRequest, TResponse>
{
  async handleAsync(request: TRequest, context: DispatchContext): Promise<TResponse> {
    return await this.handleCore(request, context);
  }

  protected abstract handleCore(request: TRequest, context: DispatchContext): Promise<TResponse>;
}
