/**
 * Virtual Connection
 *
 * An in-process duplex byte stream. Both ends are created together: each end
 * reads from its own byte queue, and a write on one end lands in the other
 * end's queue. The two ends share one disconnect signal, so closing either end
 * ends both directions and notifies both.
 */

import { Effect, pipe } from 'effect';
import {
  ConnectionClosed,
  formatEndpoint,
  makeByteQueue,
  makeConnectionId,
  makeDisconnectSignal,
  type ByteQueue,
  type Connection,
  type ConnectionId,
  type DisconnectSignal,
  type InprocEndpoint,
} from '@framewire/transport';

// =============================================================================
// Types
// =============================================================================

export interface VirtualConnection extends Connection {
  readonly transport: 'Inproc';
  readonly endpoint: InprocEndpoint;
}

export type VirtualConnectionPair = readonly [
  // the end handed to the accepter
  accepterEnd: VirtualConnection,
  // the end returned to the connecting side
  connectorEnd: VirtualConnection,
];

interface EndState {
  readonly id: ConnectionId;
  readonly inbound: ByteQueue;
}

// =============================================================================
// Helpers
// =============================================================================

const closedError = (id: ConnectionId) =>
  new ConnectionClosed({ message: 'Virtual connection closed', connectionId: id });

const closePair = (signal: DisconnectSignal, ends: readonly EndState[]): Effect.Effect<void> =>
  pipe(
    signal.notify,
    Effect.flatMap((first) =>
      first
        ? Effect.forEach(ends, (end) => end.inbound.end(closedError(end.id)), { discard: true })
        : Effect.void
    ),
    Effect.uninterruptible
  );

const makeEnd = (
  endpoint: InprocEndpoint,
  self: EndState,
  peer: EndState,
  signal: DisconnectSignal,
  close: Effect.Effect<void>
): VirtualConnection => ({
  id: self.id,
  transport: 'Inproc',
  endpoint,
  remoteAddress: formatEndpoint(endpoint),
  read: (size) => self.inbound.take(size),
  peek: (size) => self.inbound.peek(size),
  write: (bytes) =>
    pipe(
      signal.isSet,
      Effect.flatMap((isClosed) =>
        isClosed
          ? Effect.fail(closedError(self.id))
          : peer.inbound.offer(bytes)
      )
    ),
  disconnected: signal.await,
  isConnected: Effect.map(signal.isSet, (isClosed) => !isClosed),
  close,
});

// =============================================================================
// Constructor
// =============================================================================

/**
 * Creates both ends of a virtual connection on the given endpoint.
 */
export const makeVirtualConnectionPair = (
  endpoint: InprocEndpoint
): Effect.Effect<VirtualConnectionPair> =>
  Effect.gen(function* () {
    const signal = yield* makeDisconnectSignal();
    const accepter: EndState = {
      id: yield* makeConnectionId('Inproc'),
      inbound: yield* makeByteQueue(),
    };
    const connector: EndState = {
      id: yield* makeConnectionId('Inproc'),
      inbound: yield* makeByteQueue(),
    };
    const close = closePair(signal, [accepter, connector]);

    return [
      makeEnd(endpoint, accepter, connector, signal, close),
      makeEnd(endpoint, connector, accepter, signal, close),
    ] as const;
  });
