/**
 * Accept loop lifecycle tests against a fake listener, so that only the
 * bind/unbind state machine and callback isolation are exercised here.
 * Transport-specific behaviour lives with each transport.
 */

import { describe, it, expect } from '@effect/vitest';
import { Array, Effect, Option, Queue, Ref, pipe } from 'effect';
import { makeAcceptLoop, type OpenListener } from './accept-loop';
import { ConnectionId, makeDisconnectSignal, type Connection } from './connection';
import { format, inproc } from './endpoint';
import { BindFailed } from './errors';
import { DefaultSocketConfiguration, makeSocketConfiguration } from './socket-configuration';

// =============================================================================
// Fakes
// =============================================================================

const endpoint = inproc('accept-loop-test');

const makeFakeConnection = (name: string): Effect.Effect<Connection> =>
  pipe(
    makeDisconnectSignal(),
    Effect.map(
      (signal): Connection => ({
        id: ConnectionId(name),
        transport: 'Inproc',
        endpoint,
        remoteAddress: name,
        read: () => Effect.never,
        peek: () => Effect.never,
        write: () => Effect.void,
        disconnected: signal.await,
        isConnected: Effect.map(signal.isSet, (isSet) => !isSet),
        close: Effect.asVoid(signal.notify),
      })
    )
  );

const makeFakeTransport = (failFirstOpen = false) =>
  Effect.gen(function* () {
    const queues = yield* Ref.make<readonly Queue.Queue<Connection>[]>([]);
    const attempts = yield* Ref.make(0);

    const openListener: OpenListener = (options) =>
      Effect.gen(function* () {
        const attempt = yield* Ref.getAndUpdate(attempts, (n) => n + 1);
        if (failFirstOpen && attempt === 0) {
          return yield* Effect.fail(
            new BindFailed({ message: 'port in use', endpoint: format(options.endpoint) })
          );
        }
        const pending = yield* Queue.unbounded<Connection>();
        yield* Ref.update(queues, (current) => [...current, pending]);
        return {
          address: options.endpoint,
          accept: Queue.take(pending),
          close: Queue.shutdown(pending),
        };
      });

    const currentQueue = pipe(
      Ref.get(queues),
      Effect.map(Array.last),
      Effect.flatMap((queue) => queue)
    );

    const push = (connection: Connection) =>
      pipe(
        currentQueue,
        Effect.flatMap((queue) => Queue.offer(queue, connection)),
        Effect.orDie
      );

    return { openListener, push, queues, currentQueue };
  });

// =============================================================================
// Tests
// =============================================================================

describe('AcceptLoop', () => {
  it.effect('hands accepted connections to onConnected with the socket configuration', () =>
    Effect.gen(function* () {
      const transport = yield* makeFakeTransport();
      const events = yield* Queue.unbounded<string>();
      const socketConfiguration = makeSocketConfiguration({
        ...DefaultSocketConfiguration,
        sendBufferSize: 1024,
      });
      const loop = yield* makeAcceptLoop('fake', transport.openListener);

      yield* loop.bind({
        endpoint,
        nodeType: 'Responder',
        socketConfiguration,
        onConnected: (connection, configuration) =>
          Queue.offer(events, `${connection.id}:${configuration.sendBufferSize}`),
      });

      yield* transport.push(yield* makeFakeConnection('first'));
      yield* transport.push(yield* makeFakeConnection('second'));

      expect(yield* Queue.take(events)).toBe('first:1024');
      expect(yield* Queue.take(events)).toBe('second:1024');

      yield* loop.unbind();
    })
  );

  it.effect('fails with AlreadyBound while bound', () =>
    Effect.gen(function* () {
      const transport = yield* makeFakeTransport();
      const loop = yield* makeAcceptLoop('fake', transport.openListener);

      yield* loop.bind({ endpoint, nodeType: 'Responder' });
      const error = yield* Effect.flip(loop.bind({ endpoint, nodeType: 'Responder' }));

      expect(error._tag).toBe('AlreadyBound');
      yield* loop.unbind();
    })
  );

  it.effect('keeps accepting after onConnected fails or throws', () =>
    Effect.gen(function* () {
      const transport = yield* makeFakeTransport();
      const events = yield* Queue.unbounded<string>();
      const loop = yield* makeAcceptLoop('fake', transport.openListener);

      yield* loop.bind({
        endpoint,
        nodeType: 'Responder',
        onConnected: (connection) => {
          if (connection.id === 'throws') {
            throw new Error('handler threw');
          }
          return connection.id === 'dies'
            ? Effect.die('handler died')
            : Queue.offer(events, connection.id);
        },
      });

      yield* transport.push(yield* makeFakeConnection('throws'));
      yield* transport.push(yield* makeFakeConnection('dies'));
      yield* transport.push(yield* makeFakeConnection('healthy'));

      expect(yield* Queue.take(events)).toBe('healthy');
      yield* loop.unbind();
    })
  );

  it.effect('notifies onDisconnected exactly once', () =>
    Effect.gen(function* () {
      const transport = yield* makeFakeTransport();
      const connected = yield* Queue.unbounded<Connection>();
      const disconnected = yield* Queue.unbounded<string>();
      const loop = yield* makeAcceptLoop('fake', transport.openListener);

      yield* loop.bind({
        endpoint,
        nodeType: 'Responder',
        onConnected: (connection) => Queue.offer(connected, connection),
        onDisconnected: (connection) => Queue.offer(disconnected, connection.id),
      });

      yield* transport.push(yield* makeFakeConnection('client'));
      const connection = yield* Queue.take(connected);

      yield* connection.close;
      yield* connection.close;

      expect(yield* Queue.take(disconnected)).toBe('client');
      yield* Effect.yieldNow();
      expect(yield* Queue.size(disconnected)).toBe(0);

      yield* loop.unbind();
    })
  );

  it.effect('unbind closes the listener and allows binding again', () =>
    Effect.gen(function* () {
      const transport = yield* makeFakeTransport();
      const loop = yield* makeAcceptLoop('fake', transport.openListener);

      yield* loop.bind({ endpoint, nodeType: 'Responder' });
      const firstQueue = yield* transport.currentQueue;

      yield* loop.unbind();
      yield* loop.unbind();

      expect(yield* Queue.isShutdown(firstQueue)).toBe(true);
      expect(yield* loop.isBound).toBe(false);
      expect(Option.isNone(yield* loop.address)).toBe(true);

      yield* loop.bind({ endpoint, nodeType: 'Responder' });
      expect((yield* Ref.get(transport.queues)).length).toBe(2);
      expect(yield* loop.address).toEqual(Option.some(endpoint));

      yield* loop.unbind();
    })
  );

  it.effect('releases the reservation when opening the listener fails', () =>
    Effect.gen(function* () {
      const transport = yield* makeFakeTransport(true);
      const loop = yield* makeAcceptLoop('fake', transport.openListener);

      const error = yield* Effect.flip(loop.bind({ endpoint, nodeType: 'Responder' }));
      expect(error._tag).toBe('BindFailed');

      yield* loop.bind({ endpoint, nodeType: 'Responder' });
      expect(yield* loop.isBound).toBe(true);

      yield* loop.unbind();
    })
  );
});
