/**
 * Virtual Accept Loop & Connector
 *
 * The in-process side of the accept-loop contract. Binding registers an
 * accepter with the registry; the listener hands out the accepter ends that
 * `connect` queues and, on close, removes only its own registration. Socket
 * options do not apply to virtual connections.
 */

import { Effect, Queue, pipe } from 'effect';
import {
  makeAcceptLoop,
  requireInproc,
  type AcceptLoop,
  type Connector,
  type Listener,
  type OpenListener,
} from '@framewire/transport';
import type { VirtualTransportRegistryService } from './virtual-transport-registry';

const openVirtualListener =
  (registry: VirtualTransportRegistryService): OpenListener =>
  (options) =>
    pipe(
      requireInproc(options.endpoint),
      Effect.flatMap((endpoint) =>
        pipe(
          registry.registerAccepter(endpoint),
          Effect.map(
            (pending): Listener => ({
              address: endpoint,
              accept: Queue.take(pending),
              close: Effect.asVoid(registry.unregisterAccepter(endpoint, pending)),
            })
          )
        )
      )
    );

export const makeVirtualAcceptLoop = (
  registry: VirtualTransportRegistryService
): Effect.Effect<AcceptLoop> => makeAcceptLoop('inproc', openVirtualListener(registry));

export const makeVirtualConnector =
  (registry: VirtualTransportRegistryService): Connector =>
  (options) =>
    registry.connect(options.endpoint);
