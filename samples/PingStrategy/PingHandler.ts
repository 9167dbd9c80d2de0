import { DispatchContext } from "../../src/contracts/DispatchContext";
import { RequestHandlerFor } from "../../src/core/HandlerForAttribute";
import { RequestHandler } from "../../src/core/RequestHandler";
import { Ping, Pong } from "./PingMessages";

@RequestHandlerFor(Ping)
export class PingHandler extends RequestHandler<Ping, Pong> {
  protected handleCore(request: Ping, context: DispatchContext): Pong {
    console.log(`PingHandler received "${request.message}" (${context.messageId})`);
    return new Pong(`${request.message} Pong`);
  }
}
