/**
 * Virtual Transport Registry
 *
 * Directory of in-process accepters: each registered inproc endpoint owns a
 * queue of pending virtual connections. `connect` creates a connection pair,
 * queues the accepter end and returns the connector end straight away.
 *
 * The registry is an ordinary value. Components that need one receive it as
 * an argument; the `VirtualTransportRegistry` tag and its default layer are for
 * applications that prefer to wire it through the environment.
 */

import { Context, Effect, HashMap, Layer, Option, Queue, Ref, pipe } from 'effect';
import {
  AlreadyRegistered,
  NotListening,
  formatEndpoint,
  isInproc,
  requireInproc,
  validateEndpoint,
  type Endpoint,
  type InprocEndpoint,
  type InvalidEndpoint,
  type InvalidTransport,
} from '@framewire/transport';
import { makeVirtualConnectionPair, type VirtualConnection } from './virtual-connection';

// =============================================================================
// Service Definition
// =============================================================================

export type PendingConnections = Queue.Queue<VirtualConnection>;

export class VirtualTransportRegistry extends Context.Tag('@framewire/VirtualTransportRegistry')<
  VirtualTransportRegistry,
  {
    /**
     * Installs an empty pending queue for the endpoint and returns it.
     */
    readonly registerAccepter: (
      endpoint: Endpoint
    ) => Effect.Effect<PendingConnections, InvalidEndpoint | InvalidTransport | AlreadyRegistered>;

    /**
     * Queues a new connection for the endpoint's accepter and returns the
     * connecting end without waiting for it to be accepted.
     */
    readonly connect: (
      endpoint: Endpoint
    ) => Effect.Effect<VirtualConnection, InvalidEndpoint | InvalidTransport | NotListening>;

    /**
     * Removes the endpoint's accepter. Established connections are unaffected;
     * connections nobody accepted yet are closed. Returns whether one was removed.
     *
     * Given the queue `registerAccepter` returned, removes the accepter only if
     * that queue is still the one registered.
     */
    readonly unregisterAccepter: (
      endpoint: Endpoint,
      owner?: PendingConnections
    ) => Effect.Effect<boolean>;

    readonly isRegistered: (endpoint: Endpoint) => Effect.Effect<boolean>;
  }
>() {}

export type VirtualTransportRegistryService = Context.Tag.Service<typeof VirtualTransportRegistry>;

type Accepters = HashMap.HashMap<InprocEndpoint, PendingConnections>;

// =============================================================================
// Operations
// =============================================================================

const register =
  (endpoint: InprocEndpoint, pending: PendingConnections) =>
  (accepters: Accepters): readonly [Effect.Effect<PendingConnections, AlreadyRegistered>, Accepters] =>
    HashMap.has(accepters, endpoint)
      ? [
          Effect.fail(
            new AlreadyRegistered({
              message: 'An accepter is already registered for this endpoint',
              endpoint: formatEndpoint(endpoint),
            })
          ),
          accepters,
        ]
      : [Effect.succeed(pending), HashMap.set(accepters, endpoint, pending)];

const remove =
  (endpoint: InprocEndpoint, owner: Option.Option<PendingConnections>) =>
  (accepters: Accepters): readonly [Option.Option<PendingConnections>, Accepters] => {
    const current = pipe(
      HashMap.get(accepters, endpoint),
      Option.filter((pending) => Option.every(owner, (queue) => queue === pending))
    );
    return Option.isSome(current)
      ? [current, HashMap.remove(accepters, endpoint)]
      : [current, accepters];
  };

const requireValidInproc = (
  endpoint: Endpoint
): Effect.Effect<InprocEndpoint, InvalidEndpoint | InvalidTransport> =>
  pipe(requireInproc(endpoint), Effect.tap(validateEndpoint));

const notListening = (endpoint: InprocEndpoint) =>
  new NotListening({
    message: 'No accepter is registered for this endpoint',
    endpoint: formatEndpoint(endpoint),
  });

const offerConnection = (
  endpoint: InprocEndpoint,
  pending: PendingConnections
): Effect.Effect<VirtualConnection, NotListening> =>
  pipe(
    makeVirtualConnectionPair(endpoint),
    Effect.flatMap(([accepterEnd, connectorEnd]) =>
      pipe(
        Queue.offer(pending, accepterEnd),
        // the queue is shut down when the accepter unregisters concurrently
        Effect.catchAllCause(() => Effect.as(accepterEnd.close, false)),
        Effect.flatMap((offered) =>
          offered ? Effect.succeed(connectorEnd) : Effect.fail(notListening(endpoint))
        )
      )
    )
  );

const closePending = (pending: PendingConnections): Effect.Effect<void> =>
  pipe(
    Queue.takeAll(pending),
    Effect.flatMap((connections) =>
      Effect.forEach(connections, (connection) => connection.close, { discard: true })
    ),
    Effect.zipRight(Queue.shutdown(pending))
  );

// =============================================================================
// Constructor
// =============================================================================

export const makeVirtualTransportRegistry = (): Effect.Effect<VirtualTransportRegistryService> =>
  pipe(
    Ref.make<Accepters>(HashMap.empty()),
    Effect.map((accepters): VirtualTransportRegistryService => ({
      registerAccepter: (endpoint) =>
        pipe(
          requireValidInproc(endpoint),
          Effect.flatMap((inprocEndpoint) =>
            pipe(
              Queue.unbounded<VirtualConnection>(),
              Effect.flatMap((pending) =>
                Effect.flatten(Ref.modify(accepters, register(inprocEndpoint, pending)))
              ),
              Effect.tap(() =>
                Effect.logDebug(`Registered accepter for ${formatEndpoint(inprocEndpoint)}`)
              )
            )
          )
        ),

      connect: (endpoint) =>
        pipe(
          requireValidInproc(endpoint),
          Effect.flatMap((inprocEndpoint) =>
            pipe(
              Ref.get(accepters),
              Effect.map((current) => HashMap.get(current, inprocEndpoint)),
              Effect.flatMap((pending) =>
                Option.match(pending, {
                  onNone: () => Effect.fail(notListening(inprocEndpoint)),
                  onSome: (queue) => offerConnection(inprocEndpoint, queue),
                })
              )
            )
          )
        ),

      unregisterAccepter: (endpoint, owner) =>
        isInproc(endpoint)
          ? pipe(
              Ref.modify(accepters, remove(endpoint, Option.fromNullable(owner))),
              Effect.flatMap((removed) =>
                Option.match(removed, {
                  onNone: () => Effect.succeed(false),
                  onSome: (pending) =>
                    pipe(
                      closePending(pending),
                      Effect.zipRight(
                        Effect.logDebug(`Unregistered accepter for ${formatEndpoint(endpoint)}`)
                      ),
                      Effect.as(true)
                    ),
                })
              ),
              Effect.uninterruptible
            )
          : Effect.succeed(false),

      isRegistered: (endpoint) =>
        isInproc(endpoint)
          ? Effect.map(Ref.get(accepters), (current) => HashMap.has(current, endpoint))
          : Effect.succeed(false),
    }))
  );

export const VirtualTransportRegistryDefault = Layer.effect(
  VirtualTransportRegistry,
  makeVirtualTransportRegistry()
);
