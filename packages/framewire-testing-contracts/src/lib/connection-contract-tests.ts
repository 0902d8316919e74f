/**
 * Connection Contract Tests
 *
 * Behaviour every Connection implementation must share, whatever carries the
 * bytes: ordering, exact-size reads, close semantics and the one-shot
 * disconnect notification. A transport runs the suite against itself by
 * supplying a factory for connected pairs.
 *
 * ## Usage
 *
 * ```typescript
 * runConnectionContractTests('Virtual', () =>
 *   Effect.succeed({ makeConnectionPair: () => makeVirtualPair() })
 * );
 * ```
 *
 * The factory runs inside the test's scope; pairs are expected to be closed
 * when that scope closes.
 */

import { describe, it, expect } from '@effect/vitest';
import { Duration, Effect, Fiber, Scope, pipe } from 'effect';
import type { Connection } from '@framewire/transport';

// =============================================================================
// Test Context Interface
// =============================================================================

/**
 * Two ends of one established connection. `initiator` dialled, `acceptor` was accepted.
 */
export interface ConnectionPair {
  readonly initiator: Connection;
  readonly acceptor: Connection;
}

export interface ConnectionTestContext {
  readonly makeConnectionPair: () => Effect.Effect<ConnectionPair, unknown, Scope.Scope>;
}

export type ConnectionTestRunner = (
  name: string,
  setup: () => Effect.Effect<ConnectionTestContext>
) => void;

// =============================================================================
// Helpers
// =============================================================================

const bytes = (...values: number[]) => Uint8Array.from(values);

const patterned = (size: number) => Uint8Array.from({ length: size }, (_, index) => index % 251);

// every wait in the suite is bounded, so a broken transport fails instead of hanging
const bounded = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  Effect.timeout(effect, Duration.seconds(5));

// =============================================================================
// Contract Tests Implementation
// =============================================================================

export const runConnectionContractTests: ConnectionTestRunner = (name, setup) => {
  const withPair = <A, E>(
    test: (pair: ConnectionPair) => Effect.Effect<A, E>
  ): Effect.Effect<A, unknown, Scope.Scope> =>
    pipe(
      setup(),
      Effect.flatMap((context) => context.makeConnectionPair()),
      Effect.flatMap(test)
    );

  describe(`${name} Connection Contract`, () => {
    describe('Byte Stream', () => {
      it.scopedLive('delivers initiator writes to the acceptor in order', () =>
        withPair(({ initiator, acceptor }) =>
          Effect.gen(function* () {
            yield* initiator.write(bytes(1, 2, 3));
            yield* initiator.write(bytes(4, 5, 6, 7));
            yield* initiator.write(bytes(8));

            const received = yield* bounded(acceptor.read(8));
            expect(Array.from(received)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
          })
        )
      );

      it.scopedLive('delivers acceptor writes to the initiator in order', () =>
        withPair(({ initiator, acceptor }) =>
          Effect.gen(function* () {
            yield* acceptor.write(bytes(10, 20));
            yield* acceptor.write(bytes(30));

            const received = yield* bounded(initiator.read(3));
            expect(Array.from(received)).toEqual([10, 20, 30]);
          })
        )
      );

      it.scopedLive('reads exactly the requested size across write boundaries', () =>
        withPair(({ initiator, acceptor }) =>
          Effect.gen(function* () {
            yield* initiator.write(bytes(1, 2, 3));
            yield* initiator.write(bytes(4, 5));

            const first = yield* bounded(acceptor.read(2));
            const second = yield* bounded(acceptor.read(3));

            expect(Array.from(first)).toEqual([1, 2]);
            expect(Array.from(second)).toEqual([3, 4, 5]);
          })
        )
      );

      it.scopedLive('peek leaves the bytes for the next read', () =>
        withPair(({ initiator, acceptor }) =>
          Effect.gen(function* () {
            yield* initiator.write(bytes(7, 8, 9));

            const peeked = yield* bounded(acceptor.peek(2));
            const read = yield* bounded(acceptor.read(3));

            expect(Array.from(peeked)).toEqual([7, 8]);
            expect(Array.from(read)).toEqual([7, 8, 9]);
          })
        )
      );

      it.scopedLive('carries a large payload byte-exact', () =>
        withPair(({ initiator, acceptor }) =>
          Effect.gen(function* () {
            const payload = patterned(256 * 1024);

            const reader = yield* Effect.fork(bounded(acceptor.read(payload.length)));
            yield* initiator.write(payload);
            const received = yield* Fiber.join(reader);

            expect(received.length).toBe(payload.length);
            expect(Buffer.from(received).equals(Buffer.from(payload))).toBe(true);
          })
        )
      );

      it.scopedLive('an interrupted read consumes nothing', () =>
        withPair(({ initiator, acceptor }) =>
          Effect.gen(function* () {
            const reader = yield* Effect.fork(acceptor.read(4));
            yield* Effect.sleep(Duration.millis(10));
            yield* Fiber.interrupt(reader);

            yield* initiator.write(bytes(1, 2, 3, 4));

            const received = yield* bounded(acceptor.read(4));
            expect(Array.from(received)).toEqual([1, 2, 3, 4]);
          })
        )
      );
    });

    describe('Close', () => {
      it.scopedLive('close is idempotent and disconnects the closing end', () =>
        withPair(({ initiator }) =>
          Effect.gen(function* () {
            yield* initiator.close;
            yield* initiator.close;

            yield* bounded(initiator.disconnected);
            expect(yield* initiator.isConnected).toBe(false);
          })
        )
      );

      it.scopedLive('the peer observes the close', () =>
        withPair(({ initiator, acceptor }) =>
          Effect.gen(function* () {
            yield* initiator.close;

            yield* bounded(acceptor.disconnected);
            expect(yield* acceptor.isConnected).toBe(false);

            const error = yield* Effect.flip(bounded(acceptor.read(1)));
            expect(error._tag).toBe('ConnectionClosed');
          })
        )
      );

      it.scopedLive('bytes written before close are still delivered', () =>
        withPair(({ initiator, acceptor }) =>
          Effect.gen(function* () {
            yield* initiator.write(bytes(9, 9));
            yield* initiator.close;

            const received = yield* bounded(acceptor.read(2));
            expect(Array.from(received)).toEqual([9, 9]);
          })
        )
      );

      it.scopedLive('a blocked read wakes when the peer closes', () =>
        withPair(({ initiator, acceptor }) =>
          Effect.gen(function* () {
            const reader = yield* Effect.fork(Effect.flip(bounded(acceptor.read(1))));
            yield* Effect.sleep(Duration.millis(10));

            yield* initiator.close;

            const error = yield* Fiber.join(reader);
            expect(error._tag).toBe('ConnectionClosed');
          })
        )
      );

      it.scopedLive('writes after close fail with ConnectionClosed', () =>
        withPair(({ initiator }) =>
          Effect.gen(function* () {
            yield* initiator.close;

            const error = yield* Effect.flip(initiator.write(bytes(1)));
            expect(error._tag).toBe('ConnectionClosed');
          })
        )
      );
    });
  });
};
