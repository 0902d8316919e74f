/**
 * Accept Loop Contract Tests
 *
 * Lifecycle behaviour shared by every accept loop: bind is listening on
 * return, each client is handed over once, disconnects are reported once,
 * callback failures never stop the loop, and unbind releases the endpoint.
 */

import { describe, it, expect } from '@effect/vitest';
import { Duration, Effect, Option, Queue, Scope, pipe } from 'effect';
import type {
  AcceptLoop,
  ConnectError,
  Connection,
  ConnectionId,
  Endpoint,
} from '@framewire/transport';

// =============================================================================
// Test Context Interface
// =============================================================================

export interface AcceptLoopTestContext {
  readonly makeAcceptLoop: () => Effect.Effect<AcceptLoop>;

  // A fresh endpoint to bind; an OS-assigned port is fine
  readonly makeEndpoint: () => Effect.Effect<Endpoint>;

  readonly connect: (endpoint: Endpoint) => Effect.Effect<Connection, ConnectError>;
}

export type AcceptLoopTestRunner = (
  name: string,
  setup: () => Effect.Effect<AcceptLoopTestContext>
) => void;

// =============================================================================
// Helpers
// =============================================================================

const bounded = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  Effect.timeout(effect, Duration.seconds(5));

const boundAddress = (loop: AcceptLoop) =>
  pipe(
    loop.address,
    Effect.flatMap((address) => address)
  );

const connectScoped = (context: AcceptLoopTestContext, endpoint: Endpoint) =>
  Effect.acquireRelease(context.connect(endpoint), (connection) => connection.close);

// =============================================================================
// Contract Tests Implementation
// =============================================================================

export const runAcceptLoopContractTests: AcceptLoopTestRunner = (name, setup) => {
  const withLoop = <A, E>(
    test: (context: AcceptLoopTestContext, loop: AcceptLoop) => Effect.Effect<A, E, Scope.Scope>
  ): Effect.Effect<A, unknown, Scope.Scope> =>
    Effect.gen(function* () {
      const context = yield* setup();
      const loop = yield* Effect.acquireRelease(context.makeAcceptLoop(), (acquired) =>
        acquired.unbind()
      );
      return yield* test(context, loop);
    });

  describe(`${name} AcceptLoop Contract`, () => {
    it.scopedLive('is listening as soon as bind returns', () =>
      withLoop((context, loop) =>
        Effect.gen(function* () {
          const accepted = yield* Queue.unbounded<Connection>();
          yield* loop.bind({
            endpoint: yield* context.makeEndpoint(),
            nodeType: 'Responder',
            onConnected: (connection) => Queue.offer(accepted, connection),
          });

          const client = yield* connectScoped(context, yield* boundAddress(loop));
          const server = yield* bounded(Queue.take(accepted));

          yield* client.write(Uint8Array.from([1, 2]));
          expect(Array.from(yield* bounded(server.read(2)))).toEqual([1, 2]);
          expect(yield* loop.isBound).toBe(true);
        })
      )
    );

    it.scopedLive('hands every client to onConnected once', () =>
      withLoop((context, loop) =>
        Effect.gen(function* () {
          const accepted = yield* Queue.unbounded<ConnectionId>();
          yield* loop.bind({
            endpoint: yield* context.makeEndpoint(),
            nodeType: 'Responder',
            onConnected: (connection) => Queue.offer(accepted, connection.id),
          });
          const address = yield* boundAddress(loop);

          yield* connectScoped(context, address);
          yield* connectScoped(context, address);
          yield* connectScoped(context, address);

          const first = yield* bounded(Queue.take(accepted));
          const second = yield* bounded(Queue.take(accepted));
          const third = yield* bounded(Queue.take(accepted));

          expect(new Set([first, second, third]).size).toBe(3);
        })
      )
    );

    it.scopedLive('reports a client disconnect exactly once', () =>
      withLoop((context, loop) =>
        Effect.gen(function* () {
          const accepted = yield* Queue.unbounded<ConnectionId>();
          const disconnected = yield* Queue.unbounded<ConnectionId>();
          yield* loop.bind({
            endpoint: yield* context.makeEndpoint(),
            nodeType: 'Responder',
            onConnected: (connection) => Queue.offer(accepted, connection.id),
            onDisconnected: (connection) => Queue.offer(disconnected, connection.id),
          });

          const client = yield* context.connect(yield* boundAddress(loop));
          const acceptedId = yield* bounded(Queue.take(accepted));
          yield* client.close;

          expect(yield* bounded(Queue.take(disconnected))).toBe(acceptedId);
          yield* Effect.sleep(Duration.millis(50));
          expect(yield* Queue.size(disconnected)).toBe(0);
        })
      )
    );

    it.scopedLive('keeps accepting after onConnected fails', () =>
      withLoop((context, loop) =>
        Effect.gen(function* () {
          const accepted = yield* Queue.unbounded<ConnectionId>();
          let calls = 0;
          yield* loop.bind({
            endpoint: yield* context.makeEndpoint(),
            nodeType: 'Responder',
            onConnected: (connection) => {
              calls += 1;
              return calls === 1
                ? Effect.fail('rejected first client')
                : Queue.offer(accepted, connection.id);
            },
          });
          const address = yield* boundAddress(loop);

          yield* connectScoped(context, address);
          yield* Effect.sleep(Duration.millis(20));
          yield* connectScoped(context, address);

          yield* bounded(Queue.take(accepted));
          expect(calls).toBe(2);
        })
      )
    );

    it.scopedLive('rejects a second bind while bound', () =>
      withLoop((context, loop) =>
        Effect.gen(function* () {
          const endpoint = yield* context.makeEndpoint();
          yield* loop.bind({ endpoint, nodeType: 'Responder' });

          const error = yield* Effect.flip(loop.bind({ endpoint, nodeType: 'Responder' }));
          expect(error._tag).toBe('AlreadyBound');
        })
      )
    );

    it.scopedLive('stops accepting after unbind and can bind again', () =>
      withLoop((context, loop) =>
        Effect.gen(function* () {
          yield* loop.bind({ endpoint: yield* context.makeEndpoint(), nodeType: 'Responder' });
          const address = yield* boundAddress(loop);

          yield* loop.unbind(true);
          yield* loop.unbind(true);

          expect(yield* loop.isBound).toBe(false);
          expect(Option.isNone(yield* loop.address)).toBe(true);
          yield* Effect.flip(context.connect(address));

          const accepted = yield* Queue.unbounded<ConnectionId>();
          yield* loop.bind({
            endpoint: yield* context.makeEndpoint(),
            nodeType: 'Responder',
            onConnected: (connection) => Queue.offer(accepted, connection.id),
          });
          yield* connectScoped(context, yield* boundAddress(loop));
          yield* bounded(Queue.take(accepted));
        })
      )
    );
  });
};
