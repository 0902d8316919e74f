/**
 * Application Callbacks
 *
 * Callbacks are supplied by the embedding application and run inside the
 * transport's background loops. Their failures never reach loop control flow:
 * `isolateHandler` turns every failure or defect into a warning on the log.
 */

import { Cause, Effect, pipe } from 'effect';
import type { Connection } from './connection';
import type { SocketConfiguration } from './socket-configuration';

export type ClientConnectedHandler = (
  connection: Connection,
  socketConfiguration: SocketConfiguration
) => Effect.Effect<void, unknown>;

export type ClientDisconnectedHandler = (connection: Connection) => Effect.Effect<void, unknown>;

export const ignoreConnected: ClientConnectedHandler = () => Effect.void;

export const ignoreDisconnected: ClientDisconnectedHandler = () => Effect.void;

/**
 * Runs a callback so that neither a failure, a defect nor a synchronous throw
 * escapes. Interruption still propagates.
 */
export const isolateHandler = (
  handler: string,
  callback: () => Effect.Effect<void, unknown>
): Effect.Effect<void> =>
  pipe(
    Effect.suspend(callback),
    Effect.catchAllCause((cause) =>
      Cause.isInterruptedOnly(cause)
        ? Effect.interrupt
        : pipe(
            Effect.logWarning(`${handler} handler failed`, cause),
            Effect.annotateLogs('handler', handler)
          )
    )
  );
