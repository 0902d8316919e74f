/**
 * TCP Listener
 *
 * Opens a `net.Server` for the accept loop. `bind` returns only once the OS is
 * listening. Sockets the server accepts wait in a pending queue until the
 * accept loop takes them; closing the listener destroys whatever is still
 * pending. A server `'error'` after listening (a failed accept, for example)
 * is logged and the listener keeps accepting.
 */

import { lookup } from 'node:dns';
import { createServer, type Server, type Socket } from 'node:net';
import { Effect, Queue, pipe } from 'effect';
import type { ReadonlyDeep } from 'type-fest';
import {
  BindFailed,
  formatEndpoint,
  makeAcceptLoop,
  requireTcp,
  tcp,
  validateEndpoint,
  type AcceptLoop,
  type Listener,
  type OpenListener,
  type TcpEndpoint,
} from '@framewire/transport';
import { holdPendingError, makeNetworkConnection, socketOptionsFor } from './network-connection';

// =============================================================================
// Node Boundary
// =============================================================================

/**
 * Resolves a host name to the address the server binds to.
 */
export const resolveHost = (endpoint: ReadonlyDeep<TcpEndpoint>): Effect.Effect<string, BindFailed> =>
  Effect.async<string, BindFailed>((resume) => {
    lookup(endpoint.host, (error, address) => {
      if (error) {
        resume(
          Effect.fail(
            new BindFailed({
              message: `Cannot resolve host ${endpoint.host}`,
              endpoint: formatEndpoint(endpoint),
              cause: error,
            })
          )
        );
      } else {
        resume(Effect.succeed(address));
      }
    });
  });

const acceptInto = (pending: Queue.Queue<Socket>) => (socket: Socket) => {
  socket.on('error', holdPendingError);
  Effect.runSync(
    pipe(
      Queue.offer(pending, socket),
      // the listener closed while this connection arrived
      Effect.catchAllCause(() => Effect.sync(() => socket.destroy()))
    )
  );
};

const logServerError = (endpoint: TcpEndpoint) => (error: Error) => {
  Effect.runSync(
    pipe(
      Effect.logWarning('Listener error, still accepting', error),
      Effect.annotateLogs({ component: 'tcp', endpoint: formatEndpoint(endpoint) })
    )
  );
};

const listen = (
  endpoint: TcpEndpoint,
  host: string,
  pending: Queue.Queue<Socket>
): Effect.Effect<{ readonly server: Server; readonly address: TcpEndpoint }, BindFailed> =>
  Effect.async<{ readonly server: Server; readonly address: TcpEndpoint }, BindFailed>(
    (resume) => {
      const server = createServer(acceptInto(pending));

      const onError = (error: Error) => {
        server.close();
        resume(
          Effect.fail(
            new BindFailed({
              message: `Cannot listen on ${formatEndpoint(endpoint)}: ${error.message}`,
              endpoint: formatEndpoint(endpoint),
              cause: error,
            })
          )
        );
      };

      server.once('error', onError);
      server.listen(endpoint.port, host, () => {
        server.off('error', onError);
        const info = server.address();
        const address =
          info !== null && typeof info === 'object'
            ? tcp(info.address, info.port)
            : tcp(host, endpoint.port);
        server.on('error', logServerError(address));
        resume(Effect.succeed({ server, address }));
      });

      return Effect.sync(() => {
        server.close();
      });
    }
  );

const closeListener = (server: Server, pending: Queue.Queue<Socket>): Effect.Effect<void> =>
  pipe(
    Effect.sync(() => {
      server.close();
    }),
    Effect.zipRight(Queue.takeAll(pending)),
    Effect.flatMap((sockets) =>
      Effect.forEach(sockets, (socket) => Effect.sync(() => socket.destroy()), { discard: true })
    ),
    Effect.zipRight(Queue.shutdown(pending)),
    Effect.uninterruptible
  );

// =============================================================================
// Listener & Accept Loop
// =============================================================================

export const openTcpListener: OpenListener = (options) =>
  Effect.gen(function* () {
    const endpoint = yield* requireTcp(options.endpoint);
    yield* validateEndpoint(endpoint);
    const host = yield* resolveHost(endpoint);
    const pending = yield* Queue.unbounded<Socket>();
    const { server, address } = yield* listen(endpoint, host, pending);
    const socketOptions = socketOptionsFor(options.socketConfiguration, options.nodeType);

    const listener: Listener = {
      address,
      accept: Effect.uninterruptibleMask((restore) =>
        pipe(
          restore(Queue.take(pending)),
          Effect.flatMap((socket) => makeNetworkConnection(socket, address, socketOptions))
        )
      ),
      close: closeListener(server, pending),
    };
    return listener;
  });

export const makeTcpAcceptLoop = (): Effect.Effect<AcceptLoop> =>
  makeAcceptLoop('tcp', openTcpListener);
