import { describe, it, expect } from '@effect/vitest';
import { Duration, Effect, Fiber, Queue, pipe } from 'effect';
import {
  DefaultSocketConfiguration,
  bindScoped,
  inproc,
  isTcp,
  makeSocketConfiguration,
  tcp,
  toMillisOrZero,
  type AcceptLoop,
  type ConnectionId,
} from '@framewire/transport';
import { isNetworkConnection, socketOptionsFor, type NetworkConnection } from './network-connection';
import { connectTcp } from './tcp-connector';
import { makeTcpAcceptLoop } from './tcp-listener';

const boundAddress = (loop: AcceptLoop) =>
  pipe(
    loop.address,
    Effect.flatMap((address) => address)
  );

describe('TCP transport', () => {
  describe('socketOptionsFor', () => {
    const configuration = makeSocketConfiguration({
      ...DefaultSocketConfiguration,
      receiveTimeout: Duration.seconds(3),
    });

    it('keeps the receive timeout for nodes that wait for replies', () => {
      const options = socketOptionsFor(configuration, 'Requester');
      expect(Duration.toMillis(options.receiveTimeout)).toBe(3000);
      expect(options.noDelay).toBe(true);
    });

    it('disables the receive timeout for other nodes', () => {
      const options = socketOptionsFor(configuration, 'Publisher');
      expect(toMillisOrZero(options.receiveTimeout)).toBe(0);
    });
  });

  describe('AcceptLoop', () => {
    it.scopedLive('applies socket configuration to accepted connections', () =>
      Effect.gen(function* () {
        const accepted = yield* Queue.unbounded<NetworkConnection>();
        const disconnected = yield* Queue.unbounded<ConnectionId>();
        const socketConfiguration = makeSocketConfiguration({
          ...DefaultSocketConfiguration,
          sendBufferSize: 16384,
          receiveBufferSize: 16384,
        });
        const loop = yield* makeTcpAcceptLoop();

        yield* bindScoped(loop, {
          endpoint: tcp('127.0.0.1', 0),
          nodeType: 'Responder',
          socketConfiguration,
          onConnected: (connection) =>
            isNetworkConnection(connection) ? Queue.offer(accepted, connection) : Effect.void,
          onDisconnected: (connection) => Queue.offer(disconnected, connection.id),
        });

        const client = yield* connectTcp({ endpoint: yield* boundAddress(loop) });
        const server = yield* Effect.timeout(Queue.take(accepted), Duration.seconds(5));

        expect(server.socketOptions.sendBufferSize).toBe(16384);
        expect(server.socketOptions.receiveBufferSize).toBe(16384);
        expect(server.socketOptions.noDelay).toBe(true);
        expect(toMillisOrZero(server.socketOptions.receiveTimeout)).toBe(0);

        yield* client.close;

        const id = yield* Effect.timeout(Queue.take(disconnected), Duration.seconds(5));
        expect(id).toBe(server.id);
        yield* Effect.sleep(Duration.millis(50));
        expect(yield* Queue.size(disconnected)).toBe(0);
      })
    );

    it.scopedLive('reports the OS-assigned port', () =>
      Effect.gen(function* () {
        const loop = yield* makeTcpAcceptLoop();
        yield* bindScoped(loop, { endpoint: tcp('127.0.0.1', 0), nodeType: 'Responder' });

        const address = yield* boundAddress(loop);

        expect(isTcp(address)).toBe(true);
        if (isTcp(address)) {
          expect(address.host).toBe('127.0.0.1');
          expect(address.port).toBeGreaterThan(0);
        }
      })
    );

    it.scopedLive('fails with BindFailed when the port is taken', () =>
      Effect.gen(function* () {
        const first = yield* makeTcpAcceptLoop();
        const second = yield* makeTcpAcceptLoop();
        yield* bindScoped(first, { endpoint: tcp('127.0.0.1', 0), nodeType: 'Responder' });
        const address = yield* boundAddress(first);

        const error = yield* Effect.flip(second.bind({ endpoint: address, nodeType: 'Responder' }));

        expect(error._tag).toBe('BindFailed');
        expect(yield* second.isBound).toBe(false);
      })
    );

    it.live('rejects inproc endpoints', () =>
      Effect.gen(function* () {
        const loop = yield* makeTcpAcceptLoop();

        const error = yield* Effect.flip(loop.bind({ endpoint: inproc('x'), nodeType: 'Responder' }));

        expect(error._tag).toBe('InvalidTransport');
      })
    );
  });

  describe('connectTcp', () => {
    it.live('fails with ConnectFailed when nothing listens', () =>
      Effect.gen(function* () {
        const loop = yield* makeTcpAcceptLoop();
        yield* loop.bind({ endpoint: tcp('127.0.0.1', 0), nodeType: 'Responder' });
        const address = yield* boundAddress(loop);
        yield* loop.unbind();

        const error = yield* Effect.flip(connectTcp({ endpoint: address }));

        expect(error._tag).toBe('ConnectFailed');
      })
    );

    it.live('rejects inproc endpoints', () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(connectTcp({ endpoint: inproc('x') }));

        expect(error._tag).toBe('InvalidTransport');
      })
    );

    it.scopedLive('applies the receive timeout to requesters', () =>
      Effect.gen(function* () {
        const loop = yield* makeTcpAcceptLoop();
        yield* bindScoped(loop, { endpoint: tcp('127.0.0.1', 0), nodeType: 'Responder' });
        const socketConfiguration = makeSocketConfiguration({
          ...DefaultSocketConfiguration,
          receiveTimeout: Duration.millis(100),
        });

        const client = yield* Effect.acquireRelease(
          connectTcp({
            endpoint: yield* boundAddress(loop),
            nodeType: 'Requester',
            socketConfiguration,
          }),
          (connection) => connection.close
        );

        const error = yield* Effect.flip(Effect.timeout(client.read(1), Duration.seconds(5)));
        expect(error._tag).toBe('ConnectionIOError');
      })
    );
  });
  describe('NetworkConnection', () => {
    const acceptOne = Effect.gen(function* () {
      const accepted = yield* Queue.unbounded<NetworkConnection>();
      const loop = yield* makeTcpAcceptLoop();
      yield* bindScoped(loop, {
        endpoint: tcp('127.0.0.1', 0),
        nodeType: 'Responder',
        onConnected: (connection) =>
          isNetworkConnection(connection) ? Queue.offer(accepted, connection) : Effect.void,
      });
      return { accepted, address: yield* boundAddress(loop) };
    });

    it.scopedLive('ends the connection when a write outlives the send timeout', () =>
      Effect.gen(function* () {
        const { accepted, address } = yield* acceptOne;
        const client = yield* Effect.acquireRelease(
          connectTcp({
            endpoint: address,
            socketConfiguration: makeSocketConfiguration({
              ...DefaultSocketConfiguration,
              sendTimeout: Duration.millis(50),
            }),
          }),
          (connection) => connection.close
        );
        // accepted but never read, so the peer stops taking bytes
        yield* Effect.timeout(Queue.take(accepted), Duration.seconds(5));

        const error = yield* Effect.flip(client.write(new Uint8Array(32 * 1024 * 1024)));

        expect(error._tag).toBe('ConnectionIOError');
        expect(yield* client.isConnected).toBe(false);
        const next = yield* Effect.flip(client.write(Uint8Array.from([1])));
        expect(next._tag).toBe('ConnectionClosed');
      })
    );

    it.scopedLive('delivers more than the receive buffer once the reader catches up', () =>
      Effect.gen(function* () {
        const { accepted, address } = yield* acceptOne;
        const client = yield* Effect.acquireRelease(
          connectTcp({ endpoint: address }),
          (connection) => connection.close
        );
        const server = yield* Effect.timeout(Queue.take(accepted), Duration.seconds(5));
        const payload = Uint8Array.from({ length: 1024 * 1024 }, (_, i) => i % 251);

        const writer = yield* Effect.fork(client.write(payload));
        yield* Effect.sleep(Duration.millis(50));
        const received = yield* Effect.timeout(server.read(payload.length), Duration.seconds(5));

        yield* Fiber.join(writer);
        expect(received).toEqual(payload);
      })
    );
  });
});
