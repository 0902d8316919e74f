import { describe, it, expect } from '@effect/vitest';
import { Effect, Exit, Fiber, Queue, pipe } from 'effect';
import { inproc, tcp } from '@framewire/transport';
import {
  VirtualTransportRegistry,
  VirtualTransportRegistryDefault,
  makeVirtualTransportRegistry,
} from './virtual-transport-registry';

const bytes = (...values: number[]) => Uint8Array.from(values);

describe('VirtualTransportRegistry', () => {
  it.effect('connects to a registered accepter', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();
      const endpoint = inproc('orders');

      const pending = yield* registry.registerAccepter(endpoint);
      const connectorEnd = yield* registry.connect(endpoint);
      const accepterEnd = yield* Queue.take(pending);

      yield* connectorEnd.write(bytes(1, 2, 3));
      yield* accepterEnd.write(bytes(4, 5));

      expect(Array.from(yield* accepterEnd.read(3))).toEqual([1, 2, 3]);
      expect(Array.from(yield* connectorEnd.read(2))).toEqual([4, 5]);
    })
  );

  it.effect('wakes an accepter already waiting on the queue', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();
      const endpoint = inproc('waiting');
      const pending = yield* registry.registerAccepter(endpoint);
      const accepter = yield* Effect.fork(Queue.take(pending));
      yield* Effect.yieldNow();

      const connectorEnd = yield* registry.connect(endpoint);
      const accepterEnd = yield* Fiber.join(accepter);

      expect(accepterEnd.endpoint).toEqual(connectorEnd.endpoint);
    })
  );

  it.effect('rejects a second accepter on the same endpoint', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();
      yield* registry.registerAccepter(inproc('dup'));

      const error = yield* Effect.flip(registry.registerAccepter(inproc('dup')));

      expect(error._tag).toBe('AlreadyRegistered');
    })
  );

  it.effect('fails to connect without an accepter', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();

      const error = yield* Effect.flip(registry.connect(inproc('nobody')));

      expect(error._tag).toBe('NotListening');
    })
  );

  it.effect('rejects tcp endpoints', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();

      const registerError = yield* Effect.flip(registry.registerAccepter(tcp('localhost', 1)));
      const connectError = yield* Effect.flip(registry.connect(tcp('localhost', 1)));

      expect(registerError._tag).toBe('InvalidTransport');
      expect(connectError._tag).toBe('InvalidTransport');
    })
  );

  it.effect('unregister reports whether an accepter existed', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();
      const endpoint = inproc('gone');
      yield* registry.registerAccepter(endpoint);

      expect(yield* registry.isRegistered(endpoint)).toBe(true);
      expect(yield* registry.unregisterAccepter(endpoint)).toBe(true);
      expect(yield* registry.unregisterAccepter(endpoint)).toBe(false);
      expect(yield* registry.isRegistered(endpoint)).toBe(false);
      expect(yield* registry.unregisterAccepter(tcp('localhost', 1))).toBe(false);

      const error = yield* Effect.flip(registry.connect(endpoint));
      expect(error._tag).toBe('NotListening');
    })
  );

  it.effect('removes only the accepter that owns the queue', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();
      const endpoint = inproc('owned');
      const stale = yield* registry.registerAccepter(endpoint);
      yield* registry.unregisterAccepter(endpoint);
      const current = yield* registry.registerAccepter(endpoint);

      expect(yield* registry.unregisterAccepter(endpoint, stale)).toBe(false);
      expect(yield* registry.isRegistered(endpoint)).toBe(true);

      const connectorEnd = yield* registry.connect(endpoint);
      const accepterEnd = yield* Queue.take(current);
      expect(accepterEnd.endpoint).toEqual(connectorEnd.endpoint);

      expect(yield* registry.unregisterAccepter(endpoint, current)).toBe(true);
      expect(yield* registry.isRegistered(endpoint)).toBe(false);
    })
  );

  it.effect('rejects inproc endpoints without a name', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();

      const registerError = yield* Effect.flip(registry.registerAccepter(inproc('')));
      const connectError = yield* Effect.flip(registry.connect(inproc('  ')));

      expect(registerError._tag).toBe('InvalidEndpoint');
      expect(connectError._tag).toBe('InvalidEndpoint');
      expect(yield* registry.isRegistered(inproc(''))).toBe(false);
    })
  );

  it.effect('leaves established connections open after unregister', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();
      const endpoint = inproc('established');
      const pending = yield* registry.registerAccepter(endpoint);
      const connectorEnd = yield* registry.connect(endpoint);
      const accepterEnd = yield* Queue.take(pending);

      yield* registry.unregisterAccepter(endpoint);
      yield* connectorEnd.write(bytes(8));

      expect(Array.from(yield* accepterEnd.read(1))).toEqual([8]);
      expect(yield* connectorEnd.isConnected).toBe(true);
    })
  );

  it.effect('closes connections nobody accepted and wakes the accepter', () =>
    Effect.gen(function* () {
      const registry = yield* makeVirtualTransportRegistry();
      const endpoint = inproc('abandoned');
      const pending = yield* registry.registerAccepter(endpoint);
      const connectorEnd = yield* registry.connect(endpoint);

      yield* registry.unregisterAccepter(endpoint);

      expect(yield* connectorEnd.isConnected).toBe(false);
      const exit = yield* Effect.exit(Queue.take(pending));
      expect(Exit.isInterrupted(exit)).toBe(true);
    })
  );

  it.effect('keeps separate instances isolated', () =>
    Effect.gen(function* () {
      const first = yield* makeVirtualTransportRegistry();
      const second = yield* makeVirtualTransportRegistry();
      yield* first.registerAccepter(inproc('shared-name'));

      expect(yield* second.isRegistered(inproc('shared-name'))).toBe(false);
      yield* second.registerAccepter(inproc('shared-name'));
    })
  );

  it.effect('is available through its default layer', () =>
    pipe(
      VirtualTransportRegistry,
      Effect.flatMap((registry) => registry.isRegistered(inproc('layered'))),
      Effect.map((registered) => {
        expect(registered).toBe(false);
      }),
      Effect.provide(VirtualTransportRegistryDefault)
    )
  );
});
