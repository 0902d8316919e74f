/**
 * Accept Loop
 *
 * Shared bind/unbind lifecycle for every transport. A transport contributes an
 * `OpenListener`: something that starts listening on an endpoint and hands out
 * configured connections one at a time. This module owns the rest:
 *
 * - `bind` reserves the loop, opens the listener (so returning from `bind` means
 *   the transport is already listening) and forks the accept loop without
 *   waiting for its first accept
 * - the loop hands each connection to `onConnected` and arms a one-shot watch
 *   that calls `onDisconnected`; callback failures are logged, never fatal
 * - `unbind` swaps the listener out atomically, interrupts the loop, closes the
 *   listener and optionally waits until the loop has exited
 * - a loop whose listener goes away underneath it closes the listener and
 *   returns to Unbound on its own
 */

import { Data, Deferred, Effect, Fiber, Option, Ref, Scope, pipe } from 'effect';
import type { Connection } from './connection';
import { format, type Endpoint } from './endpoint';
import {
  AlreadyBound,
  type AlreadyRegistered,
  type BindFailed,
  type InvalidEndpoint,
  type InvalidTransport,
} from './errors';
import {
  ignoreConnected,
  ignoreDisconnected,
  isolateHandler,
  type ClientConnectedHandler,
  type ClientDisconnectedHandler,
} from './handlers';
import type { NodeType } from './node-type';
import { DefaultSocketConfiguration, type SocketConfiguration } from './socket-configuration';

// =============================================================================
// Contract Types
// =============================================================================

export type BindError =
  | AlreadyBound
  | AlreadyRegistered
  | BindFailed
  | InvalidEndpoint
  | InvalidTransport;

export interface ListenerOptions {
  readonly endpoint: Endpoint;
  readonly nodeType: NodeType;
  readonly socketConfiguration: SocketConfiguration;
}

/**
 * A started listener. `accept` waits for the next connection and is interrupted
 * once the listener has been closed.
 */
export interface Listener {
  readonly address: Endpoint;
  readonly accept: Effect.Effect<Connection>;
  readonly close: Effect.Effect<void>;
}

export type OpenListener = (options: ListenerOptions) => Effect.Effect<Listener, BindError>;

export interface BindOptions {
  readonly endpoint: Endpoint;
  readonly nodeType: NodeType;
  readonly socketConfiguration?: SocketConfiguration;
  readonly onConnected?: ClientConnectedHandler;
  readonly onDisconnected?: ClientDisconnectedHandler;
}

export interface AcceptLoop {
  readonly bind: (options: BindOptions) => Effect.Effect<void, BindError>;
  readonly unbind: (waitForExit?: boolean) => Effect.Effect<void>;
  /** The endpoint actually listened on, with any OS-assigned port filled in */
  readonly address: Effect.Effect<Option.Option<Endpoint>>;
  readonly isBound: Effect.Effect<boolean>;
}

// =============================================================================
// Internal State
// =============================================================================

interface ActiveBinding {
  readonly listener: Listener;
  readonly fiber: Fiber.RuntimeFiber<never>;
  readonly stopped: Deferred.Deferred<void>;
}

type AcceptLoopState = Data.TaggedEnum<{
  readonly Unbound: {};
  readonly Reserved: {};
  readonly Bound: { readonly binding: ActiveBinding };
  readonly Draining: { readonly stopped: Deferred.Deferred<void> };
}>;

const { Unbound, Reserved, Bound, Draining } = Data.taggedEnum<AcceptLoopState>();

// =============================================================================
// Accept Loop Body
// =============================================================================

const watchDisconnect = (
  connection: Connection,
  onDisconnected: ClientDisconnectedHandler
): Effect.Effect<void> =>
  pipe(
    connection.disconnected,
    Effect.zipRight(isolateHandler('onDisconnected', () => onDisconnected(connection))),
    Effect.annotateLogs('connectionId', connection.id),
    Effect.interruptible,
    Effect.forkDaemon,
    Effect.asVoid
  );

const handOff = (
  connection: Connection,
  socketConfiguration: SocketConfiguration,
  onConnected: ClientConnectedHandler,
  onDisconnected: ClientDisconnectedHandler
): Effect.Effect<void> =>
  pipe(
    watchDisconnect(connection, onDisconnected),
    Effect.zipRight(Effect.logDebug(`Accepted connection from ${connection.remoteAddress}`)),
    Effect.zipRight(
      isolateHandler('onConnected', () => onConnected(connection, socketConfiguration))
    ),
    Effect.annotateLogs('connectionId', connection.id),
    // an accepted connection is always handed to the application
    Effect.uninterruptible
  );

const runAcceptLoop = (
  listener: Listener,
  socketConfiguration: SocketConfiguration,
  onConnected: ClientConnectedHandler,
  onDisconnected: ClientDisconnectedHandler
): Effect.Effect<never> =>
  pipe(
    Effect.uninterruptibleMask((restore) =>
      pipe(
        restore(listener.accept),
        Effect.flatMap((connection) =>
          handOff(connection, socketConfiguration, onConnected, onDisconnected)
        )
      )
    ),
    Effect.forever,
    Effect.onInterrupt(() => Effect.logDebug('Accept loop cancelled'))
  );

// =============================================================================
// Bind / Unbind
// =============================================================================

const reserve =
  (endpoint: Endpoint) =>
  (state: AcceptLoopState): readonly [Effect.Effect<void, AlreadyBound>, AcceptLoopState] =>
    state._tag === 'Unbound'
      ? [Effect.void, Reserved()]
      : [
          Effect.fail(
            new AlreadyBound({
              message: 'Accept loop already bound, unbind it first',
              endpoint: format(endpoint),
            })
          ),
          state,
        ];

const detach = (state: AcceptLoopState): readonly [Option.Option<ActiveBinding>, AcceptLoopState] =>
  state._tag === 'Bound'
    ? [Option.some(state.binding), Draining({ stopped: state.binding.stopped })]
    : [Option.none(), state];

const settle =
  (stopped: Deferred.Deferred<void>) =>
  (state: AcceptLoopState): AcceptLoopState =>
    state._tag === 'Draining' && state.stopped === stopped ? Unbound() : state;

// only a loop nobody unbound is still Bound when its fiber exits
const release =
  (stopped: Deferred.Deferred<void>) =>
  (state: AcceptLoopState): readonly [boolean, AcceptLoopState] =>
    state._tag === 'Bound' && state.binding.stopped === stopped
      ? [true, Unbound()]
      : [false, state];

/**
 * Builds an accept loop on top of a transport's listener factory.
 * `component` names the transport in log annotations.
 */
export const makeAcceptLoop = (
  component: string,
  openListener: OpenListener
): Effect.Effect<AcceptLoop> =>
  pipe(
    Ref.make<AcceptLoopState>(Unbound()),
    Effect.map((stateRef): AcceptLoop => {
      const startLoop = (
        listener: Listener,
        options: BindOptions,
        socketConfiguration: SocketConfiguration
      ): Effect.Effect<ActiveBinding> =>
        pipe(
          Deferred.make<void>(),
          Effect.flatMap((stopped) =>
            pipe(
              runAcceptLoop(
                listener,
                socketConfiguration,
                options.onConnected ?? ignoreConnected,
                options.onDisconnected ?? ignoreDisconnected
              ),
              Effect.ensuring(
                pipe(
                  Ref.modify(stateRef, release(stopped)),
                  Effect.flatMap((ended) =>
                    ended
                      ? pipe(
                          Effect.logWarning('Listener went away, accept loop ending'),
                          Effect.zipRight(listener.close)
                        )
                      : Effect.void
                  ),
                  Effect.zipRight(Deferred.succeed(stopped, undefined))
                )
              ),
              Effect.annotateLogs({ component, endpoint: format(listener.address) }),
              Effect.interruptible,
              Effect.forkDaemon,
              Effect.map((fiber): ActiveBinding => ({ listener, fiber, stopped }))
            )
          )
        );

      const bind = (options: BindOptions): Effect.Effect<void, BindError> => {
        const socketConfiguration = options.socketConfiguration ?? DefaultSocketConfiguration;
        return pipe(
          Ref.modify(stateRef, reserve(options.endpoint)),
          Effect.flatten,
          Effect.zipRight(
            pipe(
              openListener({
                endpoint: options.endpoint,
                nodeType: options.nodeType,
                socketConfiguration,
              }),
              Effect.tapError(() => Ref.set(stateRef, Unbound()))
            )
          ),
          Effect.flatMap((listener) => startLoop(listener, options, socketConfiguration)),
          Effect.flatMap((binding) =>
            pipe(
              Ref.set(stateRef, Bound({ binding })),
              Effect.zipRight(Effect.logInfo(`Listening on ${format(binding.listener.address)}`))
            )
          ),
          Effect.annotateLogs('component', component),
          Effect.uninterruptible
        );
      };

      const stopBinding = (binding: ActiveBinding, waitForExit: boolean): Effect.Effect<void> =>
        Effect.uninterruptibleMask((restore) =>
          pipe(
            Fiber.interruptFork(binding.fiber),
            Effect.zipRight(binding.listener.close),
            Effect.zipRight(
              pipe(
                Deferred.await(binding.stopped),
                Effect.zipRight(Ref.update(stateRef, settle(binding.stopped))),
                Effect.forkDaemon
              )
            ),
            Effect.flatMap((settled) => (waitForExit ? restore(Fiber.join(settled)) : Effect.void)),
            Effect.zipRight(Effect.logInfo(`Stopped listening on ${format(binding.listener.address)}`)),
            Effect.annotateLogs('component', component)
          )
        );

      const unbind = (waitForExit = true): Effect.Effect<void> =>
        pipe(
          Ref.modify(stateRef, detach),
          Effect.flatMap((binding) =>
            Option.match(binding, {
              onNone: () => Effect.void,
              onSome: (active) => stopBinding(active, waitForExit),
            })
          )
        );

      return {
        bind,
        unbind,
        address: Effect.map(Ref.get(stateRef), (state) =>
          state._tag === 'Bound' ? Option.some(state.binding.listener.address) : Option.none()
        ),
        isBound: Effect.map(Ref.get(stateRef), (state) => state._tag === 'Bound'),
      };
    })
  );

/**
 * Binds for the lifetime of the current scope; closing the scope unbinds and
 * waits for the loop to exit.
 */
export const bindScoped = (
  acceptLoop: AcceptLoop,
  options: BindOptions
): Effect.Effect<AcceptLoop, BindError, Scope.Scope> =>
  Effect.acquireRelease(Effect.as(acceptLoop.bind(options), acceptLoop), (loop) => loop.unbind());
