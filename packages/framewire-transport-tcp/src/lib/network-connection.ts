/**
 * Network Connection
 *
 * Wraps a connected `net.Socket` in the Connection contract. Inbound chunks are
 * buffered in a byte queue as they arrive, so frame reads never see the
 * socket's chunk boundaries. The socket is paused while the queue holds more
 * than the receive buffer size and nobody reads, leaving the rest to TCP flow
 * control. Socket events are bridged into Effect with `Effect.runSync`;
 * everything they run is synchronous.
 */

import type { Socket } from 'node:net';
import { Duration, Effect, pipe } from 'effect';
import {
  ConnectionClosed,
  ConnectionIOError,
  formatEndpoint,
  makeByteQueue,
  makeConnectionId,
  makeDisconnectSignal,
  nodeTypeHasReceiveTimeout,
  tcp,
  toMillisOrZero,
  type ByteQueue,
  type Connection,
  type ConnectionId,
  type DisconnectSignal,
  type NodeType,
  type SocketConfiguration,
  type TcpEndpoint,
} from '@framewire/transport';

// =============================================================================
// Socket Options
// =============================================================================

/**
 * The socket parameters a connection was set up with. Node does not expose
 * SO_SNDBUF/SO_RCVBUF: the receive buffer size bounds the inbound byte queue,
 * the send buffer size is recorded as configured.
 */
export interface SocketOptions {
  readonly noDelay: boolean;
  readonly sendBufferSize: number;
  readonly receiveBufferSize: number;
  readonly sendTimeout: Duration.Duration;
  readonly receiveTimeout: Duration.Duration;
}

export const socketOptionsFor = (
  configuration: SocketConfiguration,
  nodeType: NodeType
): SocketOptions => ({
  noDelay: true,
  sendBufferSize: configuration.sendBufferSize,
  receiveBufferSize: configuration.receiveBufferSize,
  sendTimeout: configuration.sendTimeout,
  receiveTimeout: nodeTypeHasReceiveTimeout(nodeType)
    ? configuration.receiveTimeout
    : Duration.infinity,
});

export interface NetworkConnection extends Connection {
  readonly transport: 'Tcp';
  readonly endpoint: TcpEndpoint;
  readonly socketOptions: SocketOptions;
}

export const isNetworkConnection = (connection: Connection): connection is NetworkConnection =>
  connection.transport === 'Tcp' && 'socketOptions' in connection;

// =============================================================================
// Pending Sockets
// =============================================================================

/**
 * Keeps an error on a socket that is not wrapped yet from crashing the
 * process. The error stays readable through `socket.errored`.
 */
export const holdPendingError = (_error: Error): void => undefined;

// =============================================================================
// Event Bridging
// =============================================================================

const closedError = (id: ConnectionId, message: string) =>
  new ConnectionClosed({ message, connectionId: id });

const ioError = (id: ConnectionId, message: string, cause?: unknown) =>
  new ConnectionIOError({ message, connectionId: id, cause });

const remoteAddressOf = (socket: Socket): string =>
  socket.remoteAddress !== undefined && socket.remotePort !== undefined
    ? formatEndpoint(tcp(socket.remoteAddress, socket.remotePort))
    : 'unknown';

const attachSocketEvents = (
  socket: Socket,
  id: ConnectionId,
  inbound: ByteQueue,
  signal: DisconnectSignal,
  receiveTimeoutMillis: number
): void => {
  socket.on('data', (chunk: Buffer) => {
    Effect.runSync(
      pipe(
        inbound.offer(chunk),
        Effect.catchAll(() => Effect.logDebug('Dropped bytes received after close')),
        Effect.annotateLogs('connectionId', id)
      )
    );
  });

  socket.on('end', () => {
    Effect.runSync(inbound.end(closedError(id, 'Connection closed by peer')));
  });

  socket.on('error', (error: Error) => {
    Effect.runSync(
      pipe(
        inbound.fail(ioError(id, `Socket error: ${error.message}`, error)),
        Effect.zipRight(Effect.logDebug('Socket error', error)),
        Effect.annotateLogs('connectionId', id)
      )
    );
  });

  socket.on('close', () => {
    Effect.runSync(
      pipe(
        inbound.end(closedError(id, 'Connection closed')),
        Effect.zipRight(signal.notify),
        Effect.asVoid
      )
    );
  });

  if (receiveTimeoutMillis > 0) {
    socket.setTimeout(receiveTimeoutMillis, () => {
      Effect.runSync(
        inbound.fail(ioError(id, `Nothing received for ${receiveTimeoutMillis}ms`))
      );
      socket.destroy();
    });
  }
};

// the socket may have gone away while it waited to be wrapped
const adoptSocketState = (
  socket: Socket,
  id: ConnectionId,
  inbound: ByteQueue,
  signal: DisconnectSignal
): Effect.Effect<void> => {
  if (socket.errored !== null) {
    return pipe(
      inbound.fail(ioError(id, `Socket error: ${socket.errored.message}`, socket.errored)),
      Effect.zipRight(signal.notify),
      Effect.asVoid
    );
  }
  return socket.destroyed
    ? pipe(inbound.end(closedError(id, 'Connection closed')), Effect.zipRight(signal.notify), Effect.asVoid)
    : Effect.void;
};

// =============================================================================
// Writes
// =============================================================================

const writeSocket = (
  socket: Socket,
  id: ConnectionId,
  bytes: Uint8Array
): Effect.Effect<void, ConnectionClosed | ConnectionIOError> =>
  Effect.async<void, ConnectionClosed | ConnectionIOError>((resume) => {
    socket.write(bytes, (error) => {
      if (error === undefined || error === null) {
        resume(Effect.void);
      } else if (socket.destroyed) {
        resume(Effect.fail(closedError(id, 'Connection closed during write')));
      } else {
        resume(Effect.fail(ioError(id, `Write failed: ${error.message}`, error)));
      }
    });
  });

/**
 * A write that outlives the send timeout ends the connection: its bytes may
 * still be queued in the socket, and nothing may follow them.
 */
const withSendTimeout =
  (
    id: ConnectionId,
    sendTimeout: Duration.Duration,
    abandon: (error: ConnectionIOError) => Effect.Effect<void>
  ) =>
  (
    write: Effect.Effect<void, ConnectionClosed | ConnectionIOError>
  ): Effect.Effect<void, ConnectionClosed | ConnectionIOError> => {
    const millis = toMillisOrZero(sendTimeout);
    return millis === 0
      ? write
      : pipe(
          write,
          Effect.timeout(Duration.millis(millis)),
          Effect.catchTag('TimeoutException', () => {
            const error = ioError(id, `Write did not complete within ${millis}ms`);
            return pipe(
              Effect.logWarning(error.message),
              Effect.annotateLogs('connectionId', id),
              Effect.zipRight(abandon(error)),
              Effect.zipRight(Effect.fail(error))
            );
          })
        );
  };

// =============================================================================
// Constructor
// =============================================================================

/**
 * Takes ownership of a connected socket.
 */
export const makeNetworkConnection = (
  socket: Socket,
  endpoint: TcpEndpoint,
  socketOptions: SocketOptions
): Effect.Effect<NetworkConnection> =>
  Effect.gen(function* () {
    const id = yield* makeConnectionId('Tcp');
    const inbound = yield* makeByteQueue({
      highWaterMark: socketOptions.receiveBufferSize,
      pause: () => socket.pause(),
      resume: () => socket.resume(),
    });
    const signal = yield* makeDisconnectSignal();

    yield* Effect.sync(() => {
      socket.setNoDelay(socketOptions.noDelay);
      attachSocketEvents(socket, id, inbound, signal, toMillisOrZero(socketOptions.receiveTimeout));
      socket.removeListener('error', holdPendingError);
    });
    yield* adoptSocketState(socket, id, inbound, signal);

    const close = pipe(
      inbound.end(closedError(id, 'Connection closed')),
      Effect.zipRight(Effect.sync(() => socket.destroy())),
      Effect.zipRight(signal.notify),
      Effect.asVoid,
      Effect.uninterruptible
    );

    const abandon = (error: ConnectionIOError): Effect.Effect<void> =>
      pipe(
        inbound.fail(error),
        Effect.zipRight(Effect.sync(() => socket.destroy())),
        Effect.zipRight(signal.notify),
        Effect.asVoid,
        Effect.uninterruptible
      );

    return {
      id,
      transport: 'Tcp',
      endpoint,
      remoteAddress: remoteAddressOf(socket),
      socketOptions,
      read: (size) => inbound.take(size),
      peek: (size) => inbound.peek(size),
      write: (bytes) =>
        pipe(
          signal.isSet,
          Effect.flatMap((isClosed) =>
            isClosed
              ? Effect.fail(closedError(id, 'Connection closed'))
              : pipe(
                  writeSocket(socket, id, bytes),
                  withSendTimeout(id, socketOptions.sendTimeout, abandon)
                )
          )
        ),
      disconnected: signal.await,
      isConnected: Effect.map(signal.isSet, (isClosed) => !isClosed),
      close,
    };
  });
