import { Config, Context, Data, Duration, Effect, Layer } from 'effect';

/**
 * Socket parameters applied to every connection a transport creates or accepts.
 * A zero or infinite timeout means "no timeout".
 */
export interface SocketConfiguration {
  readonly connectTimeout: Duration.Duration;
  readonly sendTimeout: Duration.Duration;
  readonly receiveTimeout: Duration.Duration;
  readonly sendBufferSize: number;
  readonly receiveBufferSize: number;
}

export const makeSocketConfiguration = (
  configuration: SocketConfiguration
): SocketConfiguration => Data.struct(configuration);

export const DefaultSocketConfiguration: SocketConfiguration = makeSocketConfiguration({
  connectTimeout: Duration.seconds(5),
  sendTimeout: Duration.infinity,
  receiveTimeout: Duration.infinity,
  sendBufferSize: 65536,
  receiveBufferSize: 65536,
});

/**
 * Milliseconds for a timeout, or 0 when the timeout is disabled.
 */
export const toMillisOrZero = (duration: Duration.Duration): number =>
  Duration.isFinite(duration) ? Math.max(0, Math.floor(Duration.toMillis(duration))) : 0;

/**
 * Reads socket settings from the active ConfigProvider. Every key is optional.
 *
 * Keys: CONNECT_TIMEOUT, SEND_TIMEOUT, RECEIVE_TIMEOUT (durations such as "5 seconds"),
 * SEND_BUFFER_SIZE, RECEIVE_BUFFER_SIZE (bytes).
 */
export const SocketConfigurationConfig: Config.Config<SocketConfiguration> = Config.map(
  Config.all({
    connectTimeout: Config.withDefault(
      Config.duration('CONNECT_TIMEOUT'),
      DefaultSocketConfiguration.connectTimeout
    ),
    sendTimeout: Config.withDefault(
      Config.duration('SEND_TIMEOUT'),
      DefaultSocketConfiguration.sendTimeout
    ),
    receiveTimeout: Config.withDefault(
      Config.duration('RECEIVE_TIMEOUT'),
      DefaultSocketConfiguration.receiveTimeout
    ),
    sendBufferSize: Config.withDefault(
      Config.integer('SEND_BUFFER_SIZE'),
      DefaultSocketConfiguration.sendBufferSize
    ),
    receiveBufferSize: Config.withDefault(
      Config.integer('RECEIVE_BUFFER_SIZE'),
      DefaultSocketConfiguration.receiveBufferSize
    ),
  }),
  makeSocketConfiguration
);

export class SocketConfigurationTag extends Context.Tag('@framewire/SocketConfiguration')<
  SocketConfigurationTag,
  SocketConfiguration
>() {}

export const SocketConfigurationDefault = Layer.succeed(
  SocketConfigurationTag,
  DefaultSocketConfiguration
);

/**
 * Loads the socket settings under the given prefix (e.g. "FRAMEWIRE" reads FRAMEWIRE_SEND_TIMEOUT).
 */
export const SocketConfigurationLive = (prefix?: string) =>
  Layer.effect(
    SocketConfigurationTag,
    Effect.mapError(
      prefix === undefined
        ? SocketConfigurationConfig
        : Config.nested(SocketConfigurationConfig, prefix),
      (error) => new Error(`Failed to load socket configuration: ${String(error)}`)
    )
  );
