import "reflect-metadata";
import { MediatorBuilder } from "../../src/core/MediatorBuilder";
import { silentLogger } from "../../src/core/MediatorOptions";
import { PingHandler } from "./PingHandler";
import { Ping, PingAnswered } from "./PingMessages";

async function main() {
  const verbose = process.argv.includes("--verbose");

  const mediator = new MediatorBuilder()
    .add(PingHandler, () => new PingHandler())
    .addStrategyHandlers(PingAnswered)
    .withLogger(verbose ? console : silentLogger)
    .withTimeout(5_000)
    .build();

  const ping = new Ping("Ping");
  const pong = await mediator.sendAsync(ping);
  console.log(`Reply: ${pong.message}`);

  // The strategy sends a single follow-up request, "Ping2"
  await mediator.publishAsync(new PingAnswered(ping, 2));
}

main().catch(console.error);
