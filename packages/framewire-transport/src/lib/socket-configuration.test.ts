import { describe, it, expect } from '@effect/vitest';
import { ConfigProvider, Duration, Effect, Equal, Layer, pipe } from 'effect';
import {
  DefaultSocketConfiguration,
  SocketConfigurationConfig,
  SocketConfigurationLive,
  SocketConfigurationTag,
  toMillisOrZero,
} from './socket-configuration';
import { nodeTypeHasReceiveTimeout } from './node-type';

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries), { pathDelim: '_' }));

describe('SocketConfiguration', () => {
  it.effect('falls back to the defaults', () =>
    Effect.gen(function* () {
      const configuration = yield* pipe(
        Effect.gen(function* () {
          return yield* SocketConfigurationConfig;
        }),
        withEnv([])
      );

      expect(Equal.equals(configuration, DefaultSocketConfiguration)).toBe(true);
    })
  );

  it.effect('reads overrides from the config provider', () =>
    Effect.gen(function* () {
      const configuration = yield* pipe(
        Effect.gen(function* () {
          return yield* SocketConfigurationConfig;
        }),
        withEnv([
          ['SEND_TIMEOUT', '2 seconds'],
          ['RECEIVE_BUFFER_SIZE', '16384'],
        ])
      );

      expect(Duration.toMillis(configuration.sendTimeout)).toBe(2000);
      expect(configuration.receiveBufferSize).toBe(16384);
      expect(configuration.sendBufferSize).toBe(DefaultSocketConfiguration.sendBufferSize);
    })
  );

  it.effect('reads prefixed keys through the live layer', () =>
    Effect.gen(function* () {
      const configuration = yield* pipe(
        SocketConfigurationTag,
        Effect.provide(SocketConfigurationLive('FRAMEWIRE')),
        withEnv([['FRAMEWIRE_SEND_BUFFER_SIZE', '4096']])
      );

      expect(configuration.sendBufferSize).toBe(4096);
    })
  );

  it.effect('fails the layer on malformed values', () =>
    Effect.gen(function* () {
      const error = yield* pipe(
        Layer.build(SocketConfigurationLive()),
        Effect.scoped,
        withEnv([['SEND_BUFFER_SIZE', 'large']]),
        Effect.flip
      );

      expect(error.message.startsWith('Failed to load socket configuration')).toBe(true);
    })
  );

  it('treats infinite and zero timeouts as disabled', () => {
    expect(toMillisOrZero(Duration.infinity)).toBe(0);
    expect(toMillisOrZero(Duration.zero)).toBe(0);
    expect(toMillisOrZero(Duration.millis(1500))).toBe(1500);
  });
});

describe('nodeTypeHasReceiveTimeout', () => {
  it('applies a receive timeout to nodes that wait for replies', () => {
    expect(nodeTypeHasReceiveTimeout('Requester')).toBe(true);
    expect(nodeTypeHasReceiveTimeout('ServiceQueueReader')).toBe(true);
  });

  it('leaves other nodes without one', () => {
    expect(nodeTypeHasReceiveTimeout('Responder')).toBe(false);
    expect(nodeTypeHasReceiveTimeout('Subscriber')).toBe(false);
    expect(nodeTypeHasReceiveTimeout('Publisher')).toBe(false);
  });
});
