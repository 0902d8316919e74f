/**
 * Connection Contract
 *
 * One established, ordered, bidirectional byte stream. Both the network and the
 * in-process transports implement this interface, so the accept loop and the
 * receive loop never know which one they are driving.
 */

import { randomUUID } from 'node:crypto';
import { Brand, Deferred, Effect, pipe } from 'effect';
import type { Endpoint, TransportKind } from './endpoint';
import type {
  ConnectFailed,
  ConnectionError,
  InvalidEndpoint,
  InvalidTransport,
  NotListening,
} from './errors';
import type { NodeType } from './node-type';
import type { SocketConfiguration } from './socket-configuration';

// ============================================================================
// Branded Types
// ============================================================================

export type ConnectionId = string & Brand.Brand<'ConnectionId'>;
export const ConnectionId = Brand.nominal<ConnectionId>();

export const makeConnectionId = (transport: TransportKind): Effect.Effect<ConnectionId> =>
  Effect.sync(() => ConnectionId(`${transport.toLowerCase()}-${randomUUID()}`));

// ============================================================================
// Connection Interface
// ============================================================================

export interface Connection {
  readonly id: ConnectionId;
  readonly transport: TransportKind;

  // The endpoint this connection was accepted on or dialled to
  readonly endpoint: Endpoint;
  readonly remoteAddress: string;

  /**
   * Waits for exactly `size` bytes and removes them from the stream.
   * An interrupted read removes nothing.
   */
  readonly read: (size: number) => Effect.Effect<Uint8Array, ConnectionError>;

  /**
   * Like `read`, without removing the bytes.
   */
  readonly peek: (size: number) => Effect.Effect<Uint8Array, ConnectionError>;

  readonly write: (bytes: Uint8Array) => Effect.Effect<void, ConnectionError>;

  /**
   * Completes once, when the connection goes away for any reason.
   */
  readonly disconnected: Effect.Effect<void>;

  readonly isConnected: Effect.Effect<boolean>;

  /**
   * Closes both directions. Safe to call more than once.
   */
  readonly close: Effect.Effect<void>;
}

// ============================================================================
// Disconnect Notification
// ============================================================================

/**
 * One-shot disconnect notification. `notify` returns true only for the first caller.
 */
export interface DisconnectSignal {
  readonly notify: Effect.Effect<boolean>;
  readonly await: Effect.Effect<void>;
  readonly isSet: Effect.Effect<boolean>;
}

export const makeDisconnectSignal = (): Effect.Effect<DisconnectSignal> =>
  pipe(
    Deferred.make<void>(),
    Effect.map((deferred) => ({
      notify: Deferred.succeed(deferred, undefined),
      await: Deferred.await(deferred),
      isSet: Deferred.isDone(deferred),
    }))
  );

// ============================================================================
// Connector Contract
// ============================================================================

export interface ConnectOptions {
  readonly endpoint: Endpoint;
  readonly nodeType?: NodeType;
  readonly socketConfiguration?: SocketConfiguration;
}

export type ConnectError = ConnectFailed | InvalidEndpoint | InvalidTransport | NotListening;

/**
 * Dials an endpoint. The returned connection belongs to the caller, who closes it.
 */
export type Connector = (options: ConnectOptions) => Effect.Effect<Connection, ConnectError>;
