import { describe, it, expect, jest } from '@jest/globals';
import { MediatorBuilder } from '../../src/core/MediatorBuilder';
import { MediatorOptions, silentLogger } from '../../src/core/MediatorOptions';
import { RequestHandlerFor } from '../../src/core/HandlerForAttribute';
import { DelegateHandlerFactory } from '../../src/core/DelegateHandlerFactory';
import { HandlerNotFoundError, HandlerRegistrationError } from '../../src/contracts/MediatorExceptions';
import { Ping, PingHandler, Pinged, RecordingHandler, createTestLogger } from './helpers/TestMessages';

@RequestHandlerFor(Ping)
class DeclaredPingHandler extends PingHandler {}

describe('MediatorBuilder', () => {
  it('should build a mediator over the registered handlers', async () => {
    const log: string[] = [];
    const mediator = new MediatorBuilder()
      .addRequestHandler(Ping, () => new PingHandler())
      .addNotificationHandler(Pinged, () => new RecordingHandler('a', log))
      .addNotificationHandler(Pinged, () => new RecordingHandler('b', log))
      .withLogger(silentLogger)
      .build();

    await expect(mediator.sendAsync(new Ping('Ping'))).resolves.toBe('Ping Pong');
    await mediator.publishAsync(new Pinged('hello'));
    expect(log).toEqual(['a:hello', 'b:hello']);
  });

  it('should register decorated handler classes', async () => {
    const mediator = new MediatorBuilder()
      .add(DeclaredPingHandler, () => new DeclaredPingHandler())
      .withLogger(silentLogger)
      .build();

    await expect(mediator.sendAsync(new Ping('Ping'))).resolves.toBe('Ping Pong');
  });

  it('should build a mediator with no handlers that reports missing ones', async () => {
    const mediator = new MediatorBuilder().withLogger(silentLogger).build();

    await expect(mediator.sendAsync(new Ping('x'))).rejects.toBeInstanceOf(HandlerNotFoundError);
    await expect(mediator.publishAsync(new Pinged('x'))).resolves.toBeUndefined();
  });

  it('should resolve through an external factory when one is supplied', async () => {
    const single = jest.fn(() => new PingHandler());
    const mediator = new MediatorBuilder()
      .useFactory(new DelegateHandlerFactory(single, () => []))
      .withLogger(silentLogger)
      .build();

    await expect(mediator.sendAsync(new Ping('Ping'))).resolves.toBe('Ping Pong');
    expect(single).toHaveBeenCalledTimes(1);
  });

  it('should refuse registrations that an external factory would hide', () => {
    const builder = new MediatorBuilder()
      .addRequestHandler(Ping, () => new PingHandler())
      .useFactory(new DelegateHandlerFactory(() => undefined, () => []));

    expect(() => builder.build()).toThrow(HandlerRegistrationError);
  });

  it('should write diagnostics to the configured logger', async () => {
    const logger = createTestLogger();
    const mediator = new MediatorBuilder()
      .addRequestHandler(Ping, () => new PingHandler())
      .withLogger(logger)
      .build();

    await mediator.sendAsync(new Ping('Ping'));

    expect(logger.debug).toHaveBeenCalledWith(
      'Mediator.sendAsync:',
      expect.objectContaining({ messageType: 'Ping' })
    );
  });

  it('should reject an invalid timeout when building', () => {
    const builder = new MediatorBuilder().withTimeout(0);

    expect(() => builder.build()).toThrow(RangeError);
  });
});

describe('MediatorOptions', () => {
  it('should default to the console and no timeout', () => {
    const options = new MediatorOptions();

    expect(options.logger).toBe(console);
    expect(options.timeoutMs).toBeUndefined();
  });

  it('should keep a positive timeout', () => {
    expect(new MediatorOptions({ timeoutMs: 250 }).timeoutMs).toBe(250);
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])('should reject a timeout of %p', (timeoutMs) => {
    expect(() => new MediatorOptions({ timeoutMs })).toThrow(RangeError);
  });
});
