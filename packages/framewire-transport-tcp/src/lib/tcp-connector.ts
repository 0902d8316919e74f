/**
 * TCP Connector
 *
 * Dials a TCP endpoint and wraps the socket as a NetworkConnection with the
 * same socket options the accept loop applies. Refusal and the connect
 * timeout both fail with ConnectFailed.
 */

import { connect, type Socket } from 'node:net';
import { Duration, Effect, pipe } from 'effect';
import {
  ConnectFailed,
  DefaultSocketConfiguration,
  formatEndpoint,
  requireTcp,
  toMillisOrZero,
  validateEndpoint,
  type ConnectError,
  type ConnectOptions,
  type TcpEndpoint,
} from '@framewire/transport';
import {
  holdPendingError,
  makeNetworkConnection,
  socketOptionsFor,
  type NetworkConnection,
} from './network-connection';

const dial = (endpoint: TcpEndpoint): Effect.Effect<Socket, ConnectFailed> =>
  Effect.async<Socket, ConnectFailed>((resume) => {
    const socket = connect({ host: endpoint.host, port: endpoint.port });

    const onError = (error: Error) => {
      socket.destroy();
      resume(
        Effect.fail(
          new ConnectFailed({
            message: `Cannot connect to ${formatEndpoint(endpoint)}: ${error.message}`,
            endpoint: formatEndpoint(endpoint),
            cause: error,
          })
        )
      );
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      socket.on('error', holdPendingError);
      socket.off('error', onError);
      resume(Effect.succeed(socket));
    });

    return Effect.sync(() => {
      socket.destroy();
    });
  });

const withConnectTimeout =
  (endpoint: TcpEndpoint, connectTimeout: Duration.Duration) =>
  (dialing: Effect.Effect<Socket, ConnectFailed>): Effect.Effect<Socket, ConnectFailed> => {
    const millis = toMillisOrZero(connectTimeout);
    return millis === 0
      ? dialing
      : Effect.timeoutFail(dialing, {
          duration: Duration.millis(millis),
          onTimeout: () =>
            new ConnectFailed({
              message: `Connecting to ${formatEndpoint(endpoint)} timed out after ${millis}ms`,
              endpoint: formatEndpoint(endpoint),
            }),
        });
  };

/**
 * Opens a connection to a TCP endpoint. Without a node type the connection is
 * set up as a Requester.
 */
export const connectTcp = (
  options: ConnectOptions
): Effect.Effect<NetworkConnection, ConnectError> =>
  Effect.gen(function* () {
    const endpoint = yield* requireTcp(options.endpoint);
    yield* validateEndpoint(endpoint);
    const configuration = options.socketConfiguration ?? DefaultSocketConfiguration;

    const connection = yield* Effect.uninterruptibleMask((restore) =>
      pipe(
        restore(withConnectTimeout(endpoint, configuration.connectTimeout)(dial(endpoint))),
        Effect.flatMap((socket) =>
          makeNetworkConnection(
            socket,
            endpoint,
            socketOptionsFor(configuration, options.nodeType ?? 'Requester')
          )
        )
      )
    );

    yield* pipe(
      Effect.logDebug(`Connected to ${formatEndpoint(endpoint)}`),
      Effect.annotateLogs('connectionId', connection.id)
    );
    return connection;
  });
