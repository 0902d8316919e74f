/**
 * In-Memory Contract Integration Tests
 *
 * Runs the shared connection and accept-loop contracts against virtual
 * connections. Every context gets its own registry, so tests never share
 * endpoints.
 */

import { Effect, Queue, pipe } from 'effect';
import { inproc } from '@framewire/transport';
import {
  runAcceptLoopContractTests,
  runConnectionContractTests,
  type AcceptLoopTestContext,
  type ConnectionTestContext,
} from '@framewire/testing-contracts';
import { makeVirtualAcceptLoop, makeVirtualConnector } from '../../lib/virtual-accept-loop';
import { makeVirtualTransportRegistry } from '../../lib/virtual-transport-registry';

const makeConnectionContext = (): Effect.Effect<ConnectionTestContext> =>
  pipe(
    makeVirtualTransportRegistry(),
    Effect.map(
      (registry): ConnectionTestContext => ({
        makeConnectionPair: () =>
          Effect.gen(function* () {
            const endpoint = inproc('contract-pair');
            const pending = yield* registry.registerAccepter(endpoint);
            const initiator = yield* Effect.acquireRelease(
              registry.connect(endpoint),
              (connection) => connection.close
            );
            const acceptor = yield* Effect.acquireRelease(
              Queue.take(pending),
              (connection) => connection.close
            );
            return { initiator, acceptor };
          }),
      })
    )
  );

const makeAcceptLoopContext = (): Effect.Effect<AcceptLoopTestContext> =>
  Effect.gen(function* () {
    const registry = yield* makeVirtualTransportRegistry();
    let next = 0;

    return {
      makeAcceptLoop: () => makeVirtualAcceptLoop(registry),
      makeEndpoint: () =>
        Effect.sync(() => {
          next += 1;
          return inproc(`contract-loop-${next}`);
        }),
      connect: (endpoint) => makeVirtualConnector(registry)({ endpoint }),
    };
  });

runConnectionContractTests('Virtual', makeConnectionContext);

runAcceptLoopContractTests('Virtual', makeAcceptLoopContext);
