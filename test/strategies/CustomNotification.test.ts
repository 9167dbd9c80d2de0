import { describe, it, expect } from '@jest/globals';
import { HandlerRegistry } from '../../src/core/HandlerRegistry';
import { Mediator } from '../../src/core/Mediator';
import { MediatorBuilder } from '../../src/core/MediatorBuilder';
import { MediatorOptions, silentLogger } from '../../src/core/MediatorOptions';
import { DelegateHandlerFactory } from '../../src/core/DelegateHandlerFactory';
import { DispatchContext } from '../../src/contracts/DispatchContext';
import { HandlerDescriptor } from '../../src/contracts/HandlerDescriptor';
import { IMediator } from '../../src/contracts/IMediator';
import { HandlerNotFoundError, PublishError } from '../../src/contracts/MediatorExceptions';
import { RequestHandler } from '../../src/core/RequestHandler';
import { SendMoreRequestsStrategy } from '../../src/strategies/SendMoreRequestsStrategy';
import { StrategyNotificationHandler, registerStrategyHandlers } from '../../src/strategies/StrategyNotificationHandler';
import {
  CustomNotification,
  CustomNotificationBase,
  CustomRequest,
  CustomRequestHandler,
  CustomResponse,
  PlainNotice,
  StringWriter,
} from './helpers/CustomMessages';
import { Gate, flush } from '../core/helpers/TestMessages';

class ContextRecordingHandler extends RequestHandler<CustomRequest, CustomResponse> {
  public readonly contexts: DispatchContext[] = [];
  public readonly messages: string[] = [];

  protected handleCore(request: CustomRequest, context: DispatchContext): CustomResponse {
    this.messages.push(request.message);
    this.contexts.push(context);
    return new CustomResponse(request.message);
  }
}

describe('CustomNotification', () => {
  const quiet = () => new MediatorOptions({ logger: silentLogger });

  it('should send one follow-up request through the registry', async () => {
    const writer = new StringWriter();
    const registry = registerStrategyHandlers(
      new HandlerRegistry().addRequestHandler(CustomRequest, () => new CustomRequestHandler(writer)),
      CustomNotification
    );
    const mediator = new Mediator(registry, quiet());

    await mediator.publishAsync(new CustomNotification(new CustomRequest('Ping')));

    expect(writer.toString()).toContain('Ping2');
    expect(writer.lines).toEqual(['Ping2']);
  });

  it('should send the follow-up through a delegate factory keyed by handler name', async () => {
    const writer = new StringWriter();
    const single = new Map<string, (mediator: IMediator) => unknown>([
      ['IRequestHandler<CustomRequest>', () => new CustomRequestHandler(writer)],
    ]);
    const multi = new Map<string, (mediator: IMediator) => unknown[]>([
      ['INotificationHandler<CustomNotification>', (mediator) => [new StrategyNotificationHandler(mediator)]],
    ]);
    const mediator = new Mediator(
      new DelegateHandlerFactory(
        (descriptor, dispatcher) => single.get(descriptor.toString())?.(dispatcher),
        (descriptor, dispatcher) => multi.get(descriptor.toString())?.(dispatcher)
      ),
      quiet()
    );

    await mediator.publishAsync(new CustomNotification(new CustomRequest('Ping')));

    expect(writer.lines).toEqual(['Ping2']);
  });

  it('should send the follow-up through a built mediator', async () => {
    const writer = new StringWriter();
    const mediator = new MediatorBuilder()
      .addRequestHandler(CustomRequest, () => new CustomRequestHandler(writer))
      .addStrategyHandlers(CustomNotification)
      .withLogger(silentLogger)
      .build();

    await mediator.publishAsync(new CustomNotification(new CustomRequest('Ping')));

    expect(writer.lines).toEqual(['Ping2']);
  });

  it('should apply the strategy once when registered against the base notification class', async () => {
    const writer = new StringWriter();
    const mediator = new MediatorBuilder()
      .addRequestHandler(CustomRequest, () => new CustomRequestHandler(writer))
      .addStrategyHandlers(CustomNotificationBase)
      .withLogger(silentLogger)
      .build();

    await mediator.publishAsync(new CustomNotification(new CustomRequest('Ping')));

    expect(writer.lines).toEqual(['Ping2']);
  });

  it('should run the follow-up alongside a sibling handler and wait for both', async () => {
    const writer = new StringWriter();
    const gate = new Gate();
    const log: string[] = [];
    const registry = registerStrategyHandlers(
      new HandlerRegistry().addRequestHandler(CustomRequest, () => new CustomRequestHandler(writer)),
      CustomNotification
    ).addNotificationHandler(CustomNotification, () => ({
      handleAsync: async () => {
        log.push('sibling started');
        await gate.opened;
        log.push('sibling done');
      },
    }));
    const mediator = new Mediator(registry, quiet());
    let settled = false;

    const publishing = mediator.publishAsync(new CustomNotification(new CustomRequest('Ping'))).then(() => {
      settled = true;
    });
    await flush();

    expect(writer.lines).toEqual(['Ping2']);
    expect(log).toEqual(['sibling started']);
    expect(settled).toBe(false);

    gate.open();
    await publishing;

    expect(settled).toBe(true);
    expect(log).toEqual(['sibling started', 'sibling done']);
  });

  it('should report a follow-up request nobody handles', async () => {
    const mediator = new Mediator(registerStrategyHandlers(new HandlerRegistry(), CustomNotification), quiet());

    const error = await mediator
      .publishAsync(new CustomNotification(new CustomRequest('Ping')))
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PublishError);
    if (error instanceof PublishError) {
      expect(error.failures).toHaveLength(1);
      expect(error.failures[0].handlerName).toBe('StrategyNotificationHandler');
      expect(error.failures[0].cause).toBeInstanceOf(HandlerNotFoundError);
    }
  });

  it('should fail a notification that carries no strategy', async () => {
    const mediator = new Mediator(
      new DelegateHandlerFactory(
        () => undefined,
        (descriptor, dispatcher) =>
          descriptor.messageType === PlainNotice ? [new StrategyNotificationHandler(dispatcher)] : []
      ),
      quiet()
    );

    const error = await mediator.publishAsync(new PlainNotice()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PublishError);
    if (error instanceof PublishError) {
      expect(error.failures[0].message).toBe(
        'Handler StrategyNotificationHandler failed: PlainNotice carries no strategy to apply.'
      );
    }
  });
});

describe('SendMoreRequestsStrategy', () => {
  it('should send the wrapped request type with the count appended', async () => {
    const handler = new ContextRecordingHandler();
    const mediator = new Mediator(
      new HandlerRegistry().addRequestHandler(CustomRequest, () => handler),
      new MediatorOptions({ logger: silentLogger })
    );
    const controller = new AbortController();

    await new SendMoreRequestsStrategy(CustomRequest, new CustomRequest('Ping'), 3).applyAsync(
      mediator,
      controller.signal
    );

    expect(handler.messages).toEqual(['Ping3']);
    expect(handler.contexts[0].cancellation).toBe(controller.signal);
  });

  it('should append zero for a count of zero', async () => {
    const handler = new ContextRecordingHandler();
    const mediator = new Mediator(
      new HandlerRegistry().addRequestHandler(CustomRequest, () => handler),
      new MediatorOptions({ logger: silentLogger })
    );

    await new SendMoreRequestsStrategy(CustomRequest, new CustomRequest('Ping'), 0).applyAsync(mediator);

    expect(handler.messages).toEqual(['Ping0']);
  });

  it.each([-1, 1.5, Number.NaN])('should reject a count of %p', (count) => {
    expect(() => new SendMoreRequestsStrategy(CustomRequest, new CustomRequest('Ping'), count)).toThrow(RangeError);
  });

  it('should describe the follow-up handler it needs', () => {
    expect(HandlerDescriptor.forRequest(CustomRequest).toString()).toBe('IRequestHandler<CustomRequest>');
  });
});
