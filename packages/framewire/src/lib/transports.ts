/**
 * Endpoint-dispatched entry points: the transport is picked from the endpoint
 * kind, so callers only ever deal with `tcp://` or `inproc://` addresses.
 */

import { Effect, Layer, pipe } from 'effect';
import {
  isInproc,
  parseEndpoint,
  type AcceptLoop,
  type Connection,
  type ConnectError,
  type ConnectOptions,
  type Endpoint,
} from '@framewire/transport';
import {
  VirtualTransportRegistry,
  VirtualTransportRegistryDefault,
  makeVirtualAcceptLoop,
  makeVirtualConnector,
} from '@framewire/transport-inmemory';
import { connectTcp, makeTcpAcceptLoop } from '@framewire/transport-tcp';
import { SerializationRegistryDefault } from '@framewire/protocol';

/**
 * An unbound accept loop for the endpoint's transport. In-process endpoints are
 * served through the VirtualTransportRegistry in context.
 */
export const makeAcceptLoopFor = (
  endpoint: Endpoint
): Effect.Effect<AcceptLoop, never, VirtualTransportRegistry> =>
  isInproc(endpoint)
    ? Effect.flatMap(VirtualTransportRegistry, makeVirtualAcceptLoop)
    : makeTcpAcceptLoop();

export const connect = (
  options: ConnectOptions
): Effect.Effect<Connection, ConnectError, VirtualTransportRegistry> =>
  isInproc(options.endpoint)
    ? Effect.flatMap(VirtualTransportRegistry, (registry) => makeVirtualConnector(registry)(options))
    : connectTcp(options);

/**
 * Connect to an endpoint given in its external form, e.g. `tcp://127.0.0.1:5555`.
 */
export const connectTo = (
  address: string,
  options: Omit<ConnectOptions, 'endpoint'> = {}
): Effect.Effect<Connection, ConnectError, VirtualTransportRegistry> =>
  pipe(
    parseEndpoint(address),
    Effect.flatMap((endpoint) => connect({ ...options, endpoint }))
  );

/**
 * Fresh process-wide registries: one for in-process endpoints, one for message codecs.
 */
export const FramewireLive = Layer.mergeAll(
  VirtualTransportRegistryDefault,
  SerializationRegistryDefault
);
