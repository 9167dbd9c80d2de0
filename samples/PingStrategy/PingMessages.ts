import { MediatorRequest } from "../../src/contracts/IRequest";
import { IStrategy, IStrategyNotification } from "../../src/strategies/IStrategy";
import { IMessageRequest, SendMoreRequestsStrategy } from "../../src/strategies/SendMoreRequestsStrategy";

export class Pong {
  constructor(public readonly message: string) {}
}

export class Ping extends MediatorRequest<Pong> implements IMessageRequest {
  constructor(public readonly message: string) {
    super();
  }
}

/**
 * Published once a ping was answered; asks for a follow-up ping.
 */
export class PingAnswered implements IStrategyNotification {
  readonly strategy: IStrategy;

  constructor(ping: Ping, followUps: number) {
    this.strategy = new SendMoreRequestsStrategy(Ping, ping, followUps);
  }
}
