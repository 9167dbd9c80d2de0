import { IMediator } from "../contracts/IMediator";
import { IRequest } from "../contracts/IRequest";
import { IStrategy } from "./IStrategy";

/**
 * A request carrying a text message.
 */
export interface IMessageRequest extends IRequest<unknown> {
  readonly message: string;
}

/**
 * Sends a follow-up request of the same type as the wrapped one, its message
 * suffixed with the configured number: "Ping" with 2 becomes "Ping2".
 * @template TRequest The request type being re-sent
 */
export class SendMoreRequestsStrategy<TRequest extends IMessageRequest> implements IStrategy {
  /**
   * @param requestType Creates a request of the wrapped type from a message
   * @param request The request the notification wraps
   * @param numberOfRequests The number appended to the follow-up message
   * @throws RangeError if numberOfRequests is not a non-negative integer
   */
  constructor(
    private readonly requestType: new (message: string) => TRequest,
    private readonly request: TRequest,
    public readonly numberOfRequests: number
  ) {
    if (!Number.isInteger(numberOfRequests) || numberOfRequests < 0) {
      throw new RangeError(`numberOfRequests must be a non-negative integer, got ${numberOfRequests}.`);
    }
  }

  async applyAsync(mediator: IMediator, cancellation?: AbortSignal): Promise<void> {
    const followUp = new this.requestType(this.request.message + String(this.numberOfRequests));
    await mediator.sendAsync(followUp, cancellation);
  }
}
